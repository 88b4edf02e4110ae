import type { Logger } from 'pino';
import type { Integrations } from '../integrations';
import { agentDispatchCounter } from '../observability/metrics';
import type { AgentResponse, AgentTask, IntegrationResult, ParsedTask, TaskEffect } from '../types/domain';
import type { AgentDefinition } from './registry';

export interface DispatchDeps {
  integrations: Integrations;
  logger: Logger;
}

export function buildAgentResponse(agent: AgentDefinition, task: AgentTask): AgentResponse {
  return { agent: agent.name, received: task, ...agent.hints };
}

async function runEffect(effect: TaskEffect, integrations: Integrations): Promise<IntegrationResult | null> {
  switch (effect.kind) {
    case 'crmUpsert':
      return integrations.upsertContact(effect.contact);
    case 'socialPublish':
      return integrations.publishSocial(effect.post);
    case 'none':
      return null;
  }
}

export async function dispatchAgentTask(agent: AgentDefinition, parsed: ParsedTask, deps: DispatchDeps): Promise<AgentResponse> {
  const result = await runEffect(parsed.effect, deps.integrations);
  agentDispatchCounter.inc({ agent: agent.id, effect: parsed.effect.kind });
  if (result) {
    deps.logger.info(
      { agent: agent.id, effect: parsed.effect.kind, status: result.status, reason: result.reason },
      'agent effect completed'
    );
  }
  return buildAgentResponse(agent, parsed.task);
}
