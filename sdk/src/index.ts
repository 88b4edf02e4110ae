export {
  BffClient,
  BffSdkError,
  assertOk,
  createBffClient
} from "./client";

export type {
  AgentReply,
  AgentTaskInput,
  BffClientOptions,
  BffError,
  BffResponse,
  ContactInput,
  DailyReportReply,
  EmailInput,
  IntegrationResult,
  IntegrationStatus,
  SocialPostInput
} from "./types";
