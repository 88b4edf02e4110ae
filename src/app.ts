import Fastify, { FastifyError } from 'fastify';
import sensible from '@fastify/sensible';
import helmet from '@fastify/helmet';
import type { Logger } from 'pino';
import type { AppConfig } from './config/env';
import { createIntegrations, Integrations, ProviderError } from './integrations';
import { asMessage } from './integrations/errors';
import { FetchLike } from './integrations/http';
import { logger as defaultLogger } from './observability/logger';
import { httpRequestCounter } from './observability/metrics';
import { createAccessGuard } from './security/gate';
import { registerAgentRoutes } from './api/routes/agents';
import { registerAuthRoutes } from './api/routes/auth';
import { registerCronRoutes } from './api/routes/cron';
import { registerIntegrationRoutes } from './api/routes/integrations';
import { registerMediaRoutes } from './api/routes/media';
import { registerSystemRoutes } from './api/routes/system';

export interface AppDeps {
  config: Readonly<AppConfig>;
  logger?: Logger;
  fetchImpl?: FetchLike;
  integrations?: Integrations;
}

export function buildApp(deps: AppDeps) {
  const log = deps.logger || defaultLogger;
  const ctx = {
    config: deps.config,
    logger: log,
    integrations: deps.integrations || createIntegrations(deps.config, deps.fetchImpl)
  };

  const app = Fastify({ logger: false });

  app.register(sensible);
  app.register(helmet);

  app.addHook('onRequest', createAccessGuard(deps.config.access, log));
  app.addHook('onResponse', async (req, reply) => {
    const route = req.routeOptions.url || 'unmatched';
    httpRequestCounter.inc({ method: req.method, route, status_code: String(reply.statusCode) });
    log.info({ reqId: req.id, method: req.method, route, statusCode: reply.statusCode, ms: Math.round(reply.elapsedTime) }, 'request completed');
  });

  app.setErrorHandler((error: FastifyError, req, reply) => {
    if (error instanceof ProviderError) {
      log.warn({ reqId: req.id, provider: error.provider, statusCode: error.statusCode }, 'provider call failed');
      return reply.code(error.statusCode).send(error.body);
    }
    if (error.validation) {
      return reply.code(400).send({ error: 'invalid_request', message: error.message });
    }
    const statusCode = error.statusCode || 500;
    if (statusCode < 500) {
      return reply.code(statusCode).send({ error: error.message });
    }
    log.error({ reqId: req.id, err: asMessage(error) }, 'unhandled request error');
    return reply.code(500).send({ error: 'internal_error' });
  });

  registerSystemRoutes(app, ctx);
  registerAuthRoutes(app, ctx);
  registerIntegrationRoutes(app, ctx);
  registerMediaRoutes(app, ctx);
  registerAgentRoutes(app, ctx);
  registerCronRoutes(app, ctx);

  return app;
}
