import type { AppConfig } from '../config/env';
import type { IntegrationResult } from '../types/domain';
import { callProvider, FetchLike } from './http';
import { skipped, succeeded } from './result';

export function createOAuthExchanger(cfg: AppConfig['oauth'], fetchImpl: FetchLike) {
  return async function exchangeCode(code: string): Promise<IntegrationResult> {
    if (!cfg.clientId) return skipped('OAUTH_CLIENT_ID', { code });
    if (!cfg.clientSecret) return skipped('OAUTH_CLIENT_SECRET', { code });
    if (!cfg.redirectUri) return skipped('OAUTH_REDIRECT_URI', { code });

    const form = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      client_id: cfg.clientId,
      client_secret: cfg.clientSecret,
      redirect_uri: cfg.redirectUri
    });
    const token = await callProvider(fetchImpl, 'oauth', cfg.tokenUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
      body: form.toString()
    });
    return succeeded(token);
  };
}
