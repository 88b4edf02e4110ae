import { z } from 'zod';
import { isPlainObject } from '../integrations/result';
import type { AgentTask, ParsedTask, TaskEffect } from '../types/domain';
import type { AgentKind } from './registry';

export const LEAD_TAG = 'lead_generated';

const taskSchema = z.object({
  brand: z.string().default('bff'),
  partner: z
    .string()
    .nullish()
    .transform((v) => v ?? null),
  intent: z.string(),
  data: z.record(z.unknown()).default({})
});

function selectEffect(kind: AgentKind, data: Record<string, unknown>): TaskEffect {
  if (kind === 'leadCapture') {
    const lead = data['lead'];
    const email = isPlainObject(lead) ? lead['email'] : undefined;
    if (typeof email === 'string' && email.trim()) {
      return { kind: 'crmUpsert', contact: { email, tags: [LEAD_TAG] } };
    }
  }
  if (kind === 'contentPublish') {
    const post = data['post'];
    if (isPlainObject(post)) return { kind: 'socialPublish', post };
  }
  return { kind: 'none' };
}

/**
 * Validates an inbound agent body and decides, once, which side effect it
 * carries for the given agent kind.
 */
export function parseAgentTask(kind: AgentKind, body: unknown): { ok: true; value: ParsedTask } | { ok: false; errors: string[] } {
  const parsed = taskSchema.safeParse(body ?? {});
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => `/${issue.path.join('/')} ${issue.message}`)
    };
  }
  const { brand, partner, intent, data } = parsed.data;
  const task: AgentTask = { brand, partner, intent, data };
  return { ok: true, value: { task, effect: selectEffect(kind, data) } };
}
