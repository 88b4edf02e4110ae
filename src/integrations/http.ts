import { ProviderError } from './errors';

export type FetchLike = typeof fetch;

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return {};
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

/**
 * One outbound call. Non-2xx answers surface as ProviderError carrying the
 * provider's status and body untouched.
 */
export async function callProvider(fetchImpl: FetchLike, provider: string, url: string, init: RequestInit): Promise<unknown> {
  const res = await fetchImpl(url, init);
  const body = await readBody(res);
  if (!res.ok) throw new ProviderError(provider, res.status, body);
  return body;
}

export function jsonRequest(method: 'GET' | 'POST', headers: Record<string, string>, body?: unknown): RequestInit {
  return {
    method,
    headers: body === undefined ? headers : { 'Content-Type': 'application/json', ...headers },
    body: body === undefined ? undefined : JSON.stringify(body)
  };
}
