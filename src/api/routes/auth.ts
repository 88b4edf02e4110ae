import { FastifyInstance } from 'fastify';
import type { RouteContext } from '../context';

export function registerAuthRoutes(app: FastifyInstance, ctx: RouteContext) {
  // The code is opaque to the gateway: forwarded exactly as the provider issued it.
  app.get<{ Querystring: { code?: string } }>('/auth/callback', {
    schema: {
      querystring: {
        type: 'object',
        properties: { code: { type: 'string' } }
      }
    }
  }, async (req, reply) => {
    const { code } = req.query;
    if (!code || !code.trim()) return reply.badRequest('code query parameter is required');
    const result = await ctx.integrations.exchangeOAuthCode(code);
    if (result.status === 'skipped') return reply.badRequest(result.reason);
    return result.payload;
  });
}
