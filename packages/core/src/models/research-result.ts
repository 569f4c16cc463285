/**
 * Research result data model
 */

/**
 * Summarization providers in failover priority order
 */
export const SUMMARY_PROVIDER_NAMES = ["openrouter", "groq"] as const;
export type SummaryProviderName = (typeof SUMMARY_PROVIDER_NAMES)[number];

export type ResearchStatus = "complete" | "partial_timeout" | "no_results";

/**
 * Search hit not yet confirmed to have a usable extract
 */
export interface SearchCandidate {
  title: string;
  pageId: number;
  rank: number; // 0-based position in upstream relevance order
}

/**
 * Fetched article before truncation
 */
export interface RawDocument {
  title: string;
  url: string;
  extract: string;
  pageId: number;
}

/**
 * One accepted article in a research result
 */
export interface SourceRecord {
  readonly title: string; // Unique within a result
  readonly url: string;
  readonly extract: string; // Truncated to the configured character cap
  readonly pageId: number;
  readonly fetchedAt: number;
}

export interface ProviderAttempt {
  provider: SummaryProviderName;
  outcome: "skipped" | "failed" | "succeeded";
  detail?: string;
}

export interface ResearchResult {
  topic: string;
  query: string;
  depth: number;

  sources: SourceRecord[]; // Retrieval order
  candidatesFound: number;
  combinedText: string;

  summary: string | null;
  summaryProvider: SummaryProviderName | null;
  summaryAttempts: ProviderAttempt[];

  status: ResearchStatus;

  // Timing
  startedAt: number;
  completedAt: number;
  elapsedSeconds: number;
}

/**
 * API keys for the summarization providers. Absent means disabled.
 */
export type ProviderCredentials = Partial<Record<SummaryProviderName, string>>;
