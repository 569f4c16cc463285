/**
 * Summarization providers and failover engine
 */

export { OpenAICompatibleProvider } from "./openai-compatible-provider";
export type { OpenAICompatibleProviderOptions } from "./openai-compatible-provider";
export { SummaryEngine } from "./summary-engine";
export type {
  SummaryStrategy,
  SummaryOutcome,
  ProviderStatus,
  ProviderCheck,
} from "./summary-engine";
export { SUMMARY_SYSTEM_PROMPT, buildSummaryMessages } from "./prompts";
export type { SummaryClient } from "../../interfaces/summary-client";
