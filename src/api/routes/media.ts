import { FastifyInstance } from 'fastify';
import type { RouteContext } from '../context';

export function registerMediaRoutes(app: FastifyInstance, ctx: RouteContext) {
  app.get<{ Querystring: { q?: string; max_results?: number } }>('/youtube/search', {
    schema: {
      querystring: {
        type: 'object',
        properties: {
          q: { type: 'string' },
          max_results: { type: 'integer', minimum: 1, maximum: 50 }
        }
      }
    }
  }, async (req, reply) => {
    const q = req.query.q?.trim();
    if (!q) return reply.badRequest('q query parameter is required');
    const result = await ctx.integrations.searchVideos({ q, maxResults: req.query.max_results });
    if (result.status === 'skipped') return reply.badRequest(result.reason);
    return result.payload;
  });

  app.post<{ Body: Record<string, unknown> }>('/videoai/generate', {
    schema: { body: { type: 'object' } }
  }, async (req, reply) => {
    const result = await ctx.integrations.generateVideo(req.body);
    if (result.status === 'skipped') return reply.badRequest(result.reason);
    return result.payload;
  });
}
