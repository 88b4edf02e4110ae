import type {
  AgentReply,
  AgentTaskInput,
  BffClientOptions,
  BffResponse,
  ContactInput,
  DailyReportReply,
  EmailInput,
  IntegrationResult,
  SocialPostInput
} from "./types";

const KEY_HEADER = "x-bff-key";

function normalizeBaseUrl(input: string): string {
  const value = String(input || "").trim();
  if (!value) throw new Error("baseUrl is required.");
  return value.replace(/\/+$/, "");
}

function errorMessage(payload: unknown, status: number): string {
  if (payload && typeof payload === "object") {
    const message = "message" in payload ? payload.message : undefined;
    const error = "error" in payload ? payload.error : undefined;
    if (typeof message === "string" && message) return message;
    if (typeof error === "string" && error) return error;
  }
  if (typeof payload === "string" && payload) return payload;
  return `Gateway responded with HTTP ${status}.`;
}

function errorCode(status: number): string {
  if (status === 400) return "BAD_REQUEST";
  if (status === 401 || status === 403) return "UNAUTHORIZED";
  if (status === 404) return "NOT_FOUND";
  if (status >= 500) return "UPSTREAM_ERROR";
  return "REQUEST_FAILED";
}

export class BffSdkError<TData = unknown> extends Error {
  readonly response: BffResponse<TData>;

  constructor(response: BffResponse<TData>) {
    super(response.error?.message || "BFF gateway request failed.");
    this.name = "BffSdkError";
    this.response = response;
  }
}

export class BffClient {
  private readonly baseUrl: string;
  private readonly key: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: BffClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.key = String(options.key || "").trim();
    this.timeoutMs = Math.max(1000, Number(options.timeoutMs || 20_000));
    this.fetchImpl = options.fetchImpl || fetch;
  }

  private async request<TData>(method: "GET" | "POST", endpoint: string, body?: unknown): Promise<BffResponse<TData>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const headers: Record<string, string> = {};
      if (body !== undefined) headers["Content-Type"] = "application/json";
      if (this.key) headers[KEY_HEADER] = this.key;

      const response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal
      });
      const text = await response.text();
      let payload: unknown = null;
      try {
        payload = text ? JSON.parse(text) : null;
      } catch {
        payload = text;
      }
      if (!response.ok) {
        return {
          ok: false,
          status: response.status,
          data: null,
          error: {
            code: errorCode(response.status),
            message: errorMessage(payload, response.status),
            retryable: response.status >= 500,
            details: payload
          }
        };
      }
      return { ok: true, status: response.status, data: payload as TData, error: null };
    } catch (error) {
      return {
        ok: false,
        status: 0,
        data: null,
        error: {
          code: "NETWORK_ERROR",
          message: error instanceof Error ? error.message : String(error || "Network error"),
          retryable: true
        }
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async health(): Promise<BffResponse<{ status: string; service: string }>> {
    return this.request("GET", "/health");
  }

  async publishSocial(post: SocialPostInput): Promise<BffResponse<IntegrationResult>> {
    return this.request("POST", "/social/publish-ocoya", post);
  }

  async upsertContact(contact: ContactInput): Promise<BffResponse<IntegrationResult>> {
    return this.request("POST", "/systeme/contact", contact);
  }

  async sendEmail(message: EmailInput): Promise<BffResponse<IntegrationResult>> {
    return this.request("POST", "/gmail/send", message);
  }

  async dispatch(agent: string, task: AgentTaskInput): Promise<BffResponse<AgentReply>> {
    return this.request("POST", `/gpt/${encodeURIComponent(agent)}`, task);
  }

  async dailyReport(): Promise<BffResponse<DailyReportReply>> {
    return this.request("POST", "/cron/daily-bff-report");
  }

  async searchVideos(q: string, maxResults?: number): Promise<BffResponse<Record<string, unknown>>> {
    const params = new URLSearchParams({ q });
    if (maxResults !== undefined) params.set("max_results", String(maxResults));
    return this.request("GET", `/youtube/search?${params.toString()}`);
  }

  async generateVideo(request: Record<string, unknown>): Promise<BffResponse<Record<string, unknown>>> {
    return this.request("POST", "/videoai/generate", request);
  }
}

export function createBffClient(options: BffClientOptions): BffClient {
  return new BffClient(options);
}

export function assertOk<TData>(response: BffResponse<TData>): BffResponse<TData> {
  if (!response.ok) throw new BffSdkError(response);
  return response;
}
