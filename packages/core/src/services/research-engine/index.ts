/**
 * Research Engine service
 *
 * Core orchestrator that coordinates one research pass:
 * 1. Plan the search query and bounds
 * 2. Search the encyclopedia and fetch candidate extracts
 * 3. Aggregate extracts under the wall-clock deadline
 * 4. Summarize through the provider failover chain
 */

export { ResearchOrchestrator } from "./orchestrator";
export { planQuery } from "./query-planner";
export type { QueryPlan } from "./query-planner";
export { SourceFetcher } from "./source-fetcher";
export type { SourceFetcherOptions } from "./source-fetcher";
export {
  aggregateDocuments,
  truncateExtract,
  combineExtracts,
} from "./content-aggregator";
export type { AggregationOptions, AggregationResult } from "./content-aggregator";
export { resolveCredentials, CREDENTIAL_ENV_VARS } from "./credentials";
export {
  DEFAULT_CONFIG,
  loadConfig,
  getConfig,
  clearConfigCache,
  getConfigPath,
  withConfigOverrides,
  resolveConfig,
  getEncyclopediaApiUrl,
} from "./config";
export type {
  ResearchConfig,
  EncyclopediaConfig,
  AggregationConfig,
  LimitsConfig,
  SummaryConfig,
  ProviderEndpointConfig,
  DeepPartial,
} from "./config";
export type { ResearchRequest, OrchestratorOptions } from "./types";
