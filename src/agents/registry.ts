import type { AgentHints } from '../types/domain';

export type AgentKind = 'echo' | 'leadCapture' | 'contentPublish';

export interface AgentDefinition {
  id: string;
  name: string;
  kind: AgentKind;
  hints?: AgentHints;
}

// Route ids are the path segment under /gpt; names are what callers see in `agent`.
export const AGENTS = [
  { id: 'cris', name: 'CRIS', kind: 'echo', hints: { next: 'route to appropriate agent based on task.intent' } },
  { id: 'ava', name: 'AVA', kind: 'echo' },
  { id: 'vinceassist', name: 'VINCEASSIST', kind: 'echo' },
  { id: 'leadai', name: 'LEADAI', kind: 'leadCapture' },
  { id: 'convertai', name: 'CONVERTAI', kind: 'contentPublish' },
  { id: 'demandai', name: 'DEMANDAI', kind: 'echo' },
  { id: 'scheduleai', name: 'SCHEDULEAI', kind: 'echo' },
  { id: 'verifyai', name: 'VERIFYAI', kind: 'echo' },
  { id: 'fundingai', name: 'FUNDINGAI', kind: 'echo' },
  { id: 'docbot', name: 'DOCBOT', kind: 'echo' },
  { id: 'revenueai', name: 'REVENUEAI', kind: 'echo', hints: { hint: 'includes stock-window content cadence & KPI rollups' } },
  { id: 'ytscribe', name: 'YTSCRIBE', kind: 'echo' },
  { id: 'qa', name: 'QA', kind: 'echo' },
  { id: 'compliance', name: 'COMPLIANCE', kind: 'echo' },
  { id: 'adsai', name: 'ADSAI', kind: 'echo' },
  { id: 'opsai', name: 'OPSAI', kind: 'echo' },
  { id: 'csai', name: 'CSAI', kind: 'echo' },
  { id: 'pricingai', name: 'PRICINGAI', kind: 'echo' },
  { id: 'partnerai', name: 'PARTNERAI', kind: 'echo' },
  { id: 'hiringai', name: 'HIRINGAI', kind: 'echo' },
  { id: 'financeai', name: 'FINANCEAI', kind: 'echo' },
  { id: 'auditai', name: 'AUDITAI', kind: 'echo' },
  { id: 'labsai', name: 'LABSAI', kind: 'echo' },
  { id: 'trendai', name: 'TRENDAI', kind: 'echo' }
] as const satisfies readonly AgentDefinition[];

export type AgentId = (typeof AGENTS)[number]['id'];

const byId = new Map<string, AgentDefinition>(AGENTS.map((agent): [string, AgentDefinition] => [agent.id, agent]));

export function findAgent(id: string): AgentDefinition | undefined {
  return byId.get(String(id || '').trim().toLowerCase());
}
