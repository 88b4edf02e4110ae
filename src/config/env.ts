import { z } from 'zod';
import type { AccessConfig } from '../types/domain';

const optionalString = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = String(v ?? '').trim();
    return trimmed ? trimmed : undefined;
  });

// A blank value falls back to the field's default instead of failing validation.
const unsetIfBlank = <T extends z.ZodTypeAny>(inner: T) =>
  z.preprocess((v) => (typeof v === 'string' ? v.trim() || undefined : v), inner);

const flag = (fallback: 'true' | 'false') =>
  z
    .string()
    .optional()
    .transform((v) => ['true', '1', 'yes'].includes(String(v || fallback).trim().toLowerCase()));

const schema = z.object({
  NODE_ENV: unsetIfBlank(z.enum(['development', 'test', 'production']).default('development')),
  PORT: unsetIfBlank(z.coerce.number().int().positive().default(8080)),
  HOST: unsetIfBlank(z.string().default('0.0.0.0')),
  LOG_LEVEL: unsetIfBlank(z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()),
  SERVICE_NAME: unsetIfBlank(z.string().min(1).default('bff-gateway')),

  BFF_MIDDLEWARE_KEY: optionalString,
  ALLOW_UNAUTH: flag('false'),

  OCOYA_API_KEY: optionalString,
  OCOYA_API_URL: unsetIfBlank(z.string().url().default('https://api.ocoya.com/v1/schedule')),
  SYSTEME_API_KEY: optionalString,
  SYSTEME_API_URL: unsetIfBlank(z.string().url().default('https://api.systeme.io/api')),
  GMAIL_API_KEY: optionalString,
  EMAIL_RELAY_URL: unsetIfBlank(z.string().url().default('https://api.sendgrid.com/v3/mail/send')),
  YOUTUBE_API_KEY: optionalString,
  YOUTUBE_API_URL: unsetIfBlank(z.string().url().default('https://www.googleapis.com/youtube/v3/search')),
  VIDEOAI_API_KEY: optionalString,
  VIDEOAI_ENDPOINT: optionalString,
  OAUTH_CLIENT_ID: optionalString,
  OAUTH_CLIENT_SECRET: optionalString,
  OAUTH_REDIRECT_URI: optionalString,
  OAUTH_TOKEN_URL: unsetIfBlank(z.string().url().default('https://oauth2.googleapis.com/token')),

  REPORT_SENDER: unsetIfBlank(z.string().email().default('reports@example.com')),
  REPORT_TO: optionalString
});

export type EnvSource = Record<string, string | undefined>;

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  host: string;
  logLevel: string;
  serviceName: string;
  access: AccessConfig;
  social: { apiKey?: string; apiUrl: string };
  crm: { apiKey?: string; apiUrl: string };
  email: { apiKey?: string; relayUrl: string; from: string };
  search: { apiKey?: string; apiUrl: string };
  video: { apiKey?: string; endpoint?: string };
  oauth: { clientId?: string; clientSecret?: string; redirectUri?: string; tokenUrl: string };
  report: { sender: string; recipient?: string };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === 'object' && !Object.isFrozen(child)) deepFreeze(child);
  }
  return Object.freeze(value);
}

/**
 * Reads the process environment once and returns the immutable configuration
 * every other component receives explicitly.
 */
export function loadConfig(source: EnvSource = process.env): Readonly<AppConfig> {
  const env = schema.parse(source);
  return deepFreeze<AppConfig>({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL || (env.NODE_ENV === 'production' ? 'info' : 'debug'),
    serviceName: env.SERVICE_NAME,
    access: {
      requiredSecret: env.BFF_MIDDLEWARE_KEY,
      enforced: !env.ALLOW_UNAUTH
    },
    social: { apiKey: env.OCOYA_API_KEY, apiUrl: env.OCOYA_API_URL },
    crm: { apiKey: env.SYSTEME_API_KEY, apiUrl: env.SYSTEME_API_URL.replace(/\/+$/, '') },
    email: { apiKey: env.GMAIL_API_KEY, relayUrl: env.EMAIL_RELAY_URL, from: env.REPORT_SENDER },
    search: { apiKey: env.YOUTUBE_API_KEY, apiUrl: env.YOUTUBE_API_URL },
    video: { apiKey: env.VIDEOAI_API_KEY, endpoint: env.VIDEOAI_ENDPOINT },
    oauth: {
      clientId: env.OAUTH_CLIENT_ID,
      clientSecret: env.OAUTH_CLIENT_SECRET,
      redirectUri: env.OAUTH_REDIRECT_URI,
      tokenUrl: env.OAUTH_TOKEN_URL
    },
    report: { sender: env.REPORT_SENDER, recipient: env.REPORT_TO }
  });
}
