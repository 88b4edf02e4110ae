import type { IntegrationResult } from '../types/domain';

export function skipped<T>(credential: string, input: T): IntegrationResult<T> {
  return { status: 'skipped', reason: `${credential} not set`, payload: input };
}

export function succeeded<T>(payload: T): IntegrationResult<T> {
  return { status: 'ok', payload };
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}
