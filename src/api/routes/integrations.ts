import { FastifyInstance } from 'fastify';
import type { CrmContact, EmailMessage, SocialPost } from '../../types/domain';
import type { RouteContext } from '../context';

const stringList = { type: 'array', items: { type: 'string' } } as const;

export function registerIntegrationRoutes(app: FastifyInstance, ctx: RouteContext) {
  app.post<{ Body: SocialPost }>('/social/publish-ocoya', {
    schema: {
      body: {
        type: 'object',
        required: ['channel', 'text'],
        properties: {
          channel: { type: 'string' },
          text: { type: 'string' },
          media_url: { type: 'string' },
          schedule_iso: { type: 'string' },
          tags: stringList,
          utm: { type: 'object', additionalProperties: { type: 'string' } }
        }
      }
    }
  }, async (req) => ctx.integrations.publishSocial(req.body));

  app.post<{ Body: CrmContact }>('/systeme/contact', {
    schema: {
      body: {
        type: 'object',
        required: ['email'],
        properties: {
          email: { type: 'string', minLength: 1 },
          first_name: { type: 'string' },
          last_name: { type: 'string' },
          tags: stringList,
          campaign_id: { type: 'string' }
        }
      }
    }
  }, async (req) => ctx.integrations.upsertContact(req.body));

  app.post<{ Body: EmailMessage }>('/gmail/send', {
    schema: {
      body: {
        type: 'object',
        required: ['to', 'subject', 'html'],
        properties: {
          to: { type: 'string', minLength: 1 },
          subject: { type: 'string' },
          html: { type: 'string' }
        }
      }
    }
  }, async (req) => ctx.integrations.sendEmail(req.body));
}
