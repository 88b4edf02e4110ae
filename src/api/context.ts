import type { Logger } from 'pino';
import type { AppConfig } from '../config/env';
import type { Integrations } from '../integrations';

export interface RouteContext {
  config: Readonly<AppConfig>;
  integrations: Integrations;
  logger: Logger;
}
