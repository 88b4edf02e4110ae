import { FastifyInstance } from 'fastify';
import { buildOpenApiDocument } from '../../docs/openapi';
import { metricsRegistry } from '../../observability/metrics';
import type { RouteContext } from '../context';

export const SERVICE_VERSION = '1.0.0';

export function registerSystemRoutes(app: FastifyInstance, ctx: RouteContext) {
  const document = buildOpenApiDocument(ctx.config.serviceName, SERVICE_VERSION);

  app.get('/health', async () => ({ status: 'ok', service: ctx.config.serviceName }));
  app.get('/openapi.json', async () => document);
  app.get('/docs', async () => document);

  app.get('/metrics', async (_, reply) => {
    reply.header('Content-Type', metricsRegistry().contentType);
    return metricsRegistry().metrics();
  });
}
