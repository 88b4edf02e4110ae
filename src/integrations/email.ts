import type { AppConfig } from '../config/env';
import type { EmailMessage, IntegrationResult } from '../types/domain';
import { callProvider, FetchLike, jsonRequest } from './http';
import { skipped, succeeded } from './result';

export function createEmailSender(cfg: AppConfig['email'], fetchImpl: FetchLike) {
  return async function sendEmail(message: EmailMessage): Promise<IntegrationResult> {
    if (!cfg.apiKey) return skipped('GMAIL_API_KEY', message);
    const response = await callProvider(
      fetchImpl,
      'email',
      cfg.relayUrl,
      jsonRequest('POST', { Authorization: `Bearer ${cfg.apiKey}` }, {
        personalizations: [{ to: [{ email: message.to }] }],
        from: { email: cfg.from },
        subject: message.subject,
        content: [{ type: 'text/html', value: message.html }]
      })
    );
    return succeeded(response);
  };
}
