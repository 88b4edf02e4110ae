import type { AppConfig } from '../config/env';
import type { CrmContact, IntegrationResult } from '../types/domain';
import { callProvider, FetchLike, jsonRequest } from './http';
import { isPlainObject, skipped, succeeded } from './result';

function contactId(created: unknown): string {
  if (!isPlainObject(created)) return '';
  const id = created['id'];
  return typeof id === 'string' || typeof id === 'number' ? String(id) : '';
}

export function createCrmClient(cfg: AppConfig['crm'], fetchImpl: FetchLike) {
  return async function upsertContact(contact: CrmContact): Promise<IntegrationResult> {
    if (!cfg.apiKey) return skipped('SYSTEME_API_KEY', contact);
    const headers = { 'X-API-Key': cfg.apiKey };

    const created = await callProvider(
      fetchImpl,
      'systeme',
      `${cfg.apiUrl}/contacts`,
      jsonRequest('POST', headers, {
        email: contact.email,
        firstName: contact.first_name,
        lastName: contact.last_name
      })
    );

    const id = contactId(created);
    const tags: string[] = [];
    if (id) {
      for (const tag of contact.tags || []) {
        await callProvider(
          fetchImpl,
          'systeme',
          `${cfg.apiUrl}/contacts/${encodeURIComponent(id)}/tags`,
          jsonRequest('POST', headers, { tagName: tag })
        );
        tags.push(tag);
      }
    }
    return succeeded({ contact: created, tags });
  };
}
