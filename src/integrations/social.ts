import type { AppConfig } from '../config/env';
import type { IntegrationResult, SocialPost } from '../types/domain';
import { callProvider, FetchLike, jsonRequest } from './http';
import { skipped, succeeded } from './result';

export type SocialPublishInput = SocialPost | Record<string, unknown>;

export function createSocialPublisher(cfg: AppConfig['social'], fetchImpl: FetchLike) {
  return async function publishSocial(post: SocialPublishInput): Promise<IntegrationResult> {
    if (!cfg.apiKey) return skipped('OCOYA_API_KEY', post);
    const response = await callProvider(
      fetchImpl,
      'ocoya',
      cfg.apiUrl,
      jsonRequest('POST', { Authorization: `Bearer ${cfg.apiKey}` }, post)
    );
    return succeeded(response);
  };
}
