import type { AppConfig } from '../config/env';
import { adapterCallCounter } from '../observability/metrics';
import type { CrmContact, EmailMessage, IntegrationResult, VideoSearchQuery } from '../types/domain';
import { createCrmClient } from './crm';
import { createEmailSender } from './email';
import { FetchLike } from './http';
import { createOAuthExchanger } from './oauth';
import { createSocialPublisher, SocialPublishInput } from './social';
import { createVideoSearch } from './search';
import { createVideoGenerator } from './video';

export interface Integrations {
  publishSocial(post: SocialPublishInput): Promise<IntegrationResult>;
  upsertContact(contact: CrmContact): Promise<IntegrationResult>;
  sendEmail(message: EmailMessage): Promise<IntegrationResult>;
  exchangeOAuthCode(code: string): Promise<IntegrationResult>;
  generateVideo(request: Record<string, unknown>): Promise<IntegrationResult>;
  searchVideos(query: VideoSearchQuery): Promise<IntegrationResult>;
}

function instrument<TArgs extends unknown[]>(
  adapter: string,
  fn: (...args: TArgs) => Promise<IntegrationResult>
): (...args: TArgs) => Promise<IntegrationResult> {
  return async (...args) => {
    try {
      const result = await fn(...args);
      adapterCallCounter.inc({ adapter, status: result.status });
      return result;
    } catch (error) {
      adapterCallCounter.inc({ adapter, status: 'error' });
      throw error;
    }
  };
}

export function createIntegrations(config: Readonly<AppConfig>, fetchImpl: FetchLike = fetch): Integrations {
  return {
    publishSocial: instrument('social', createSocialPublisher(config.social, fetchImpl)),
    upsertContact: instrument('crm', createCrmClient(config.crm, fetchImpl)),
    sendEmail: instrument('email', createEmailSender(config.email, fetchImpl)),
    exchangeOAuthCode: instrument('oauth', createOAuthExchanger(config.oauth, fetchImpl)),
    generateVideo: instrument('videoai', createVideoGenerator(config.video, fetchImpl)),
    searchVideos: instrument('search', createVideoSearch(config.search, fetchImpl))
  };
}

export { ProviderError } from './errors';
