export type IntegrationStatus = "ok" | "skipped" | "error";

export interface IntegrationResult<TPayload = unknown> {
  status: IntegrationStatus;
  reason?: string;
  payload: TPayload;
}

export interface BffError {
  code: string;
  message: string;
  retryable: boolean;
  details?: unknown;
}

export interface BffResponse<TData = unknown> {
  ok: boolean;
  status: number;
  data: TData | null;
  error: BffError | null;
}

export interface AgentTaskInput {
  brand?: string;
  partner?: string;
  intent: string;
  data?: Record<string, unknown>;
}

export interface AgentReply {
  agent: string;
  received: {
    brand: string;
    partner: string | null;
    intent: string;
    data: Record<string, unknown>;
  };
  next?: string;
  hint?: string;
}

export interface SocialPostInput {
  channel: string;
  text: string;
  media_url?: string;
  schedule_iso?: string;
  tags?: string[];
  utm?: Record<string, string>;
}

export interface ContactInput {
  email: string;
  first_name?: string;
  last_name?: string;
  tags?: string[];
  campaign_id?: string;
}

export interface EmailInput {
  to: string;
  subject: string;
  html: string;
}

export interface DailyReportReply {
  status: "ok";
  report: {
    headline: string;
    sections: Array<{ title: string; value: string | number; metric?: string; notes?: string }>;
  };
  delivery: IntegrationResult;
}

export interface BffClientOptions {
  baseUrl: string;
  key?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}
