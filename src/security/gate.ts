import { createHash, timingSafeEqual } from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';
import type { AccessConfig } from '../types/domain';

export const ACCESS_HEADER = 'x-bff-key';

/**
 * Routes that never pass through the gate. Closed on purpose: adding a route
 * here is a code change, never a configuration switch.
 */
export const BYPASS_ROUTES: ReadonlySet<string> = new Set(['/health', '/auth/callback', '/docs', '/openapi.json']);

export type AccessDecision = { admitted: true } | { admitted: false; reason: 'unauthorized' };

const ADMIT: AccessDecision = { admitted: true };
const REJECT: AccessDecision = { admitted: false, reason: 'unauthorized' };

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

function secretsMatch(presented: string, required: string): boolean {
  return timingSafeEqual(digest(presented), digest(required));
}

export function evaluateAccess(presented: string | string[] | undefined, access: AccessConfig): AccessDecision {
  if (!access.enforced) return ADMIT;
  if (!access.requiredSecret) return REJECT;
  if (typeof presented !== 'string') return REJECT;
  return secretsMatch(presented, access.requiredSecret) ? ADMIT : REJECT;
}

export function isBypassedRoute(routeUrl: string | undefined): boolean {
  return Boolean(routeUrl) && BYPASS_ROUTES.has(String(routeUrl));
}

export function createAccessGuard(access: AccessConfig, log: Logger) {
  return async function accessGuard(req: FastifyRequest, reply: FastifyReply) {
    if (isBypassedRoute(req.routeOptions.url)) return;
    const decision = evaluateAccess(req.headers[ACCESS_HEADER], access);
    if (decision.admitted) return;
    log.warn({ reqId: req.id, method: req.method, url: req.url }, 'access rejected');
    return reply.code(401).send({ error: decision.reason });
  };
}
