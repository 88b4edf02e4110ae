import pino, { Logger } from 'pino';

export function createLogger(level: string): Logger {
  return pino({
    level,
    base: undefined,
    redact: ['req.headers["x-bff-key"]', 'headers["x-bff-key"]', 'password', 'token', 'access_token', '*.secret', '*.apiKey']
  });
}

export const logger = createLogger(process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'));
