/**
 * Core package entry point
 *
 * Exports the research pipeline, its providers, models and report formatters.
 */

// Models
export { SUMMARY_PROVIDER_NAMES } from "./models/research-result";
export type {
  SummaryProviderName,
  ResearchStatus,
  SearchCandidate,
  RawDocument,
  SourceRecord,
  ProviderAttempt,
  ResearchResult,
  ProviderCredentials,
} from "./models/research-result";

// Interfaces
export type {
  EncyclopediaClient,
  ArticleExtract,
  RequestOptions,
  SummaryClient,
  LlmMessage,
} from "./interfaces";

// Errors
export {
  ResearchError,
  InvalidTopicError,
  UpstreamUnavailableError,
  ProviderFailureError,
  errorMessage,
} from "./errors";
export type { ResearchErrorCode } from "./errors";

// Services
export * from "./services/research-engine";
export * from "./services/llm";
export * from "./services/wikipedia";
export * from "./services/report";

// Providers
export {
  createSummaryClient,
  createSummaryStrategies,
  createSummaryEngine,
  createEncyclopediaClient,
} from "./providers";

// Utilities
export {
  Deadline,
  createLogger,
  rootLogger,
  loggerOptions,
  clampInt,
  REDACT_PATHS,
} from "./utils";
export type { Clock, Logger } from "./utils";
