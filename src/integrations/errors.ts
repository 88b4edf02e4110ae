export class ProviderError extends Error {
  readonly provider: string;
  readonly statusCode: number;
  readonly body: unknown;

  constructor(provider: string, statusCode: number, body: unknown) {
    super(`${provider}_request_failed:${statusCode}`);
    this.name = 'ProviderError';
    this.provider = provider;
    this.statusCode = statusCode;
    this.body = body;
  }
}

export function asMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return 'unknown_error';
  }
}
