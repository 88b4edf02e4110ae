import { AGENTS } from '../agents/registry';
import { ACCESS_HEADER, BYPASS_ROUTES } from '../security/gate';

interface RouteDoc {
  method: 'get' | 'post';
  path: string;
  summary: string;
}

const ROUTES: RouteDoc[] = [
  { method: 'get', path: '/health', summary: 'Liveness probe' },
  { method: 'get', path: '/auth/callback', summary: 'Exchange an OAuth authorization code for tokens' },
  { method: 'post', path: '/social/publish-ocoya', summary: 'Schedule a social post' },
  { method: 'post', path: '/systeme/contact', summary: 'Upsert a CRM contact' },
  { method: 'post', path: '/gmail/send', summary: 'Send an email through the relay' },
  { method: 'get', path: '/youtube/search', summary: 'Search videos' },
  { method: 'post', path: '/videoai/generate', summary: 'Request a generated video' },
  { method: 'post', path: '/cron/daily-bff-report', summary: 'Compose and email the daily report' },
  { method: 'get', path: '/metrics', summary: 'Prometheus metrics' }
];

export function buildOpenApiDocument(serviceName: string, version: string) {
  const routes = [
    ...ROUTES,
    ...AGENTS.map((agent): RouteDoc => ({ method: 'post', path: `/gpt/${agent.id}`, summary: `Dispatch a task to ${agent.name}` }))
  ];

  const paths: Record<string, Record<string, unknown>> = {};
  for (const route of routes) {
    paths[route.path] = {
      ...paths[route.path],
      [route.method]: {
        summary: route.summary,
        security: BYPASS_ROUTES.has(route.path) ? [] : [{ sharedSecret: [] }],
        responses: { '200': { description: 'OK' } }
      }
    };
  }

  return {
    openapi: '3.0.3',
    info: { title: serviceName, version },
    components: {
      securitySchemes: {
        sharedSecret: { type: 'apiKey', in: 'header', name: ACCESS_HEADER }
      }
    },
    paths
  };
}
