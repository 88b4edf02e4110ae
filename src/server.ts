import dotenv from 'dotenv';
import { buildApp } from './app';
import { loadConfig } from './config/env';
import { createLogger, logger as bootLogger } from './observability/logger';
import { enableDefaultMetrics } from './observability/metrics';

async function main() {
  dotenv.config();
  const config = loadConfig(process.env);
  const logger = createLogger(config.logLevel);
  enableDefaultMetrics();

  if (!config.access.enforced) logger.warn('ALLOW_UNAUTH is set: every route is reachable without x-bff-key');
  else if (!config.access.requiredSecret) logger.warn('BFF_MIDDLEWARE_KEY is not set: gated routes reject every request');

  const app = buildApp({ config, logger });
  await app.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, service: config.serviceName }, 'bff gateway started');
}

main().catch((err) => {
  bootLogger.error({ err }, 'fatal startup error');
  process.exit(1);
});
