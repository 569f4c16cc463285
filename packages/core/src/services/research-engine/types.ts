/**
 * Type definitions for research engine
 */

import type { EncyclopediaClient } from "../../interfaces/encyclopedia-client";
import type { ProviderCredentials } from "../../models/research-result";
import type { Clock } from "../../utils/deadline";
import type { Logger } from "../../utils/logger";
import type { SummaryEngine } from "../llm/summary-engine";
import type { ResearchConfig } from "./config";

/**
 * Caller-supplied parameters of one research run
 */
export interface ResearchRequest {
  topic: string;
  maxSources?: number; // 1-20 (default: from config)
  timeoutSeconds?: number; // 30-300, fetch budget only (default: from config)
  depth?: number; // 1-3, widens the candidate pool (default: from config)
}

/**
 * Orchestrator construction options
 */
export interface OrchestratorOptions {
  credentials: ProviderCredentials;

  // === Overrides ===
  config?: ResearchConfig; // Default: loaded research-config.yaml
  summaryEngine?: SummaryEngine; // Default: OpenRouter then Groq
  createClient?: () => EncyclopediaClient; // Called once per run
  logger?: Logger;
  now?: Clock; // Injected for deterministic deadlines
}
