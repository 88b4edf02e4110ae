export interface AccessConfig {
  requiredSecret?: string;
  enforced: boolean;
}

export type IntegrationStatus = 'ok' | 'skipped' | 'error';

export interface IntegrationResult<TPayload = unknown> {
  status: IntegrationStatus;
  reason?: string;
  payload: TPayload;
}

export interface SocialPost {
  channel: string;
  text: string;
  media_url?: string;
  schedule_iso?: string;
  tags?: string[];
  utm?: Record<string, string>;
}

export interface CrmContact {
  email: string;
  first_name?: string;
  last_name?: string;
  tags?: string[];
  campaign_id?: string;
}

export interface EmailMessage {
  to: string;
  subject: string;
  html: string;
}

export interface VideoSearchQuery {
  q: string;
  maxResults?: number;
}

export interface AgentTask {
  brand: string;
  partner: string | null;
  intent: string;
  data: Record<string, unknown>;
}

export type TaskEffect =
  | { kind: 'none' }
  | { kind: 'crmUpsert'; contact: CrmContact }
  | { kind: 'socialPublish'; post: Record<string, unknown> };

export interface ParsedTask {
  task: AgentTask;
  effect: TaskEffect;
}

export interface AgentHints {
  next?: string;
  hint?: string;
}

export interface AgentResponse extends AgentHints {
  agent: string;
  received: AgentTask;
}
