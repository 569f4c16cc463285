/**
 * Encyclopedia Client Interface
 *
 * Abstract interface for the article source behind the research pipeline.
 * Wikipedia is the shipped implementation.
 */

import type { SearchCandidate } from "../models/research-result";

/**
 * Per-request knobs passed down from the retrieval pass
 */
export interface RequestOptions {
  timeoutMs?: number; // Overrides the client's default per-request timeout
}

/**
 * Article detail returned by the extract endpoint
 */
export interface ArticleExtract {
  title: string;
  url: string;
  extract: string;
}

export interface EncyclopediaClient {
  /**
   * Ranked candidates for a query, in upstream order
   */
  search(
    query: string,
    limit: number,
    options?: RequestOptions
  ): Promise<SearchCandidate[]>;

  /**
   * Plain-text extract and canonical URL for one candidate
   */
  fetchExtract(
    candidate: SearchCandidate,
    options?: RequestOptions
  ): Promise<ArticleExtract>;

  /**
   * Release the client; aborts anything still in flight
   */
  close(): void;
}
