/**
 * Provider Factory Functions
 *
 * Centralized provider creation and initialization.
 * Allows easy switching between providers via configuration.
 */

import type { EncyclopediaClient } from "./interfaces/encyclopedia-client";
import type { SummaryClient } from "./interfaces/summary-client";
import {
  SUMMARY_PROVIDER_NAMES,
  type SummaryProviderName,
} from "./models/research-result";
import { OpenAICompatibleProvider } from "./services/llm/openai-compatible-provider";
import { SummaryEngine, type SummaryStrategy } from "./services/llm/summary-engine";
import {
  getConfig,
  getEncyclopediaApiUrl,
  type EncyclopediaConfig,
  type SummaryConfig,
} from "./services/research-engine/config";
import { WikipediaClient } from "./services/wikipedia/client";
import type { FetchLike } from "./services/wikipedia/types";
import type { Logger } from "./utils/logger";

/**
 * Create the chat client for one summarization provider
 */
export function createSummaryClient(
  name: SummaryProviderName,
  apiKey: string,
  config: SummaryConfig
): SummaryClient {
  switch (name) {
    case "openrouter":
    case "groq":
      return new OpenAICompatibleProvider({
        name,
        apiKey,
        endpoint: config.providers[name],
        temperature: config.temperature,
      });
  }
}

/**
 * Failover chain in priority order: hosted gateway first, fast fallback second
 */
export function createSummaryStrategies(
  config: SummaryConfig = getConfig().summary
): SummaryStrategy[] {
  return SUMMARY_PROVIDER_NAMES.map((name) => ({
    name,
    create: (apiKey: string) => createSummaryClient(name, apiKey, config),
  }));
}

export function createSummaryEngine(
  config: SummaryConfig = getConfig().summary,
  logger?: Logger
): SummaryEngine {
  return new SummaryEngine(createSummaryStrategies(config), logger);
}

/**
 * Create an encyclopedia client from configuration
 */
export function createEncyclopediaClient(
  config: EncyclopediaConfig = getConfig().encyclopedia,
  options: { fetchImpl?: FetchLike; logger?: Logger } = {}
): EncyclopediaClient {
  return new WikipediaClient({
    apiUrl: getEncyclopediaApiUrl(config),
    requestTimeoutMs: config.requestTimeoutMs,
    userAgent: config.userAgent,
    fetchImpl: options.fetchImpl,
    logger: options.logger,
  });
}
