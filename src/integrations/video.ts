import type { AppConfig } from '../config/env';
import type { IntegrationResult } from '../types/domain';
import { callProvider, FetchLike, jsonRequest } from './http';
import { skipped, succeeded } from './result';

export function createVideoGenerator(cfg: AppConfig['video'], fetchImpl: FetchLike) {
  return async function generateVideo(request: Record<string, unknown>): Promise<IntegrationResult> {
    if (!cfg.apiKey) return skipped('VIDEOAI_API_KEY', request);
    if (!cfg.endpoint) return skipped('VIDEOAI_ENDPOINT', request);
    const response = await callProvider(
      fetchImpl,
      'videoai',
      cfg.endpoint,
      jsonRequest('POST', { Authorization: `Bearer ${cfg.apiKey}` }, request)
    );
    return succeeded(response);
  };
}
