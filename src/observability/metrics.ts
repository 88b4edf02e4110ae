import client from 'prom-client';

export const httpRequestCounter = new client.Counter({
  name: 'bff_http_requests_total',
  help: 'HTTP requests by method, route and status code',
  labelNames: ['method', 'route', 'status_code']
});

export const adapterCallCounter = new client.Counter({
  name: 'bff_adapter_calls_total',
  help: 'Integration adapter calls by adapter and result status',
  labelNames: ['adapter', 'status']
});

export const agentDispatchCounter = new client.Counter({
  name: 'bff_agent_dispatches_total',
  help: 'Agent task dispatches by agent and effect kind',
  labelNames: ['agent', 'effect']
});

export function enableDefaultMetrics(): void {
  client.collectDefaultMetrics();
}

export function metricsRegistry() {
  return client.register;
}
