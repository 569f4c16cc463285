/**
 * Source retrieval
 *
 * One search call, then one extract call per candidate. Extracts are fetched
 * in small parallel batches but always yielded in relevance order, and the
 * pass deadline is checked before each batch starts.
 */

import type { EncyclopediaClient } from "../../interfaces/encyclopedia-client";
import type { RawDocument, SearchCandidate } from "../../models/research-result";
import { errorMessage } from "../../errors";
import type { Deadline } from "../../utils/deadline";
import { createLogger, type Logger } from "../../utils/logger";

export interface SourceFetcherOptions {
  concurrency: number;
  requestTimeoutMs: number;
  logger?: Logger;
}

export class SourceFetcher {
  private readonly client: EncyclopediaClient;
  private readonly concurrency: number;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;

  constructor(client: EncyclopediaClient, options: SourceFetcherOptions) {
    this.client = client;
    this.concurrency = Math.max(1, options.concurrency);
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.logger = options.logger ?? createLogger("source-fetcher");
  }

  /**
   * Ranked candidates for the query. Errors propagate; the caller decides
   * what a failed search means for the run.
   */
  async search(
    query: string,
    limit: number,
    deadline: Deadline
  ): Promise<SearchCandidate[]> {
    const candidates = await this.client.search(query, limit, {
      timeoutMs: this.timeoutFor(deadline),
    });
    this.logger.info(
      { query, limit, candidates: candidates.length },
      "search completed"
    );
    return candidates;
  }

  /**
   * Fetch one candidate's extract. Resolves to null when the candidate has
   * to be skipped.
   */
  async fetchExtract(
    candidate: SearchCandidate,
    deadline: Deadline
  ): Promise<RawDocument | null> {
    try {
      const article = await this.client.fetchExtract(candidate, {
        timeoutMs: this.timeoutFor(deadline),
      });
      return {
        title: article.title,
        url: article.url,
        extract: article.extract,
        pageId: candidate.pageId,
      };
    } catch (error) {
      this.logger.warn(
        { title: candidate.title, pageId: candidate.pageId, reason: errorMessage(error) },
        "candidate skipped"
      );
      return null;
    }
  }

  /**
   * Documents for the candidates, in candidate order. Stops scheduling new
   * batches once the deadline has passed or the consumer stops iterating.
   */
  async *documents(
    candidates: SearchCandidate[],
    deadline: Deadline
  ): AsyncGenerator<RawDocument, void, undefined> {
    for (let start = 0; start < candidates.length; start += this.concurrency) {
      if (deadline.expired()) {
        this.logger.info(
          { remaining: candidates.length - start },
          "deadline reached before fetching remaining candidates"
        );
        return;
      }

      const batch = candidates.slice(start, start + this.concurrency);
      const docs = await Promise.all(
        batch.map((candidate) => this.fetchExtract(candidate, deadline))
      );

      for (const doc of docs) {
        if (doc) {
          yield doc;
        }
      }
    }
  }

  /**
   * Per-request timeout, never longer than what is left of the pass budget
   */
  private timeoutFor(deadline: Deadline): number {
    return Math.max(1, Math.min(this.requestTimeoutMs, deadline.remainingMs()));
  }
}
