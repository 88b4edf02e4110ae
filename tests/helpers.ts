import pino from 'pino';
import { loadConfig, EnvSource } from '../src/config/env';

export const silentLogger = pino({ level: 'silent' });

export function testConfig(overrides: EnvSource = {}) {
  return loadConfig({ NODE_ENV: 'test', BFF_MIDDLEWARE_KEY: 'test-secret', ...overrides });
}

export interface FetchCall {
  url: string;
  method: string;
  headers: Headers;
  body: string;
}

export interface MockReply {
  status?: number;
  body?: unknown;
}

export function mockFetch(resolver: (call: FetchCall) => MockReply = () => ({})) {
  const calls: FetchCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const call: FetchCall = {
      url: String(input),
      method: String(init?.method || 'GET'),
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : ''
    };
    calls.push(call);
    const reply = resolver(call);
    const payload = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body ?? {});
    return new Response(payload, { status: reply.status ?? 200, headers: { 'Content-Type': 'application/json' } });
  };
  return { fetchImpl, calls };
}
