import type { AppConfig } from '../config/env';
import type { IntegrationResult, VideoSearchQuery } from '../types/domain';
import { callProvider, FetchLike, jsonRequest } from './http';
import { skipped, succeeded } from './result';

const DEFAULT_MAX_RESULTS = 10;

export function createVideoSearch(cfg: AppConfig['search'], fetchImpl: FetchLike) {
  return async function searchVideos(query: VideoSearchQuery): Promise<IntegrationResult> {
    if (!cfg.apiKey) return skipped('YOUTUBE_API_KEY', query);
    const url = new URL(cfg.apiUrl);
    url.searchParams.set('part', 'snippet');
    url.searchParams.set('type', 'video');
    url.searchParams.set('q', query.q);
    url.searchParams.set('maxResults', String(query.maxResults ?? DEFAULT_MAX_RESULTS));
    url.searchParams.set('key', cfg.apiKey);
    const response = await callProvider(fetchImpl, 'youtube', url.toString(), jsonRequest('GET', { Accept: 'application/json' }));
    return succeeded(response);
  };
}
