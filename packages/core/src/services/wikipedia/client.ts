/**
 * Wikipedia API client
 * Search and plain-text extract retrieval against the MediaWiki Action API
 */

import type {
  ArticleExtract,
  EncyclopediaClient,
  RequestOptions,
} from "../../interfaces/encyclopedia-client";
import type { SearchCandidate } from "../../models/research-result";
import { UpstreamUnavailableError, errorMessage } from "../../errors";
import { createLogger, type Logger } from "../../utils/logger";
import {
  apiErrorSchema,
  extractResponseSchema,
  searchResponseSchema,
  type FetchLike,
} from "./types";

export interface WikipediaClientOptions {
  apiUrl: string;
  requestTimeoutMs: number;
  userAgent: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Wikipedia implementation of EncyclopediaClient
 *
 * One instance per research run. `close()` aborts every request the instance
 * still has in flight.
 */
export class WikipediaClient implements EncyclopediaClient {
  private readonly apiUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly lifetime = new AbortController();

  constructor(options: WikipediaClientOptions) {
    this.apiUrl = options.apiUrl;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createLogger("wikipedia");
  }

  /**
   * Full-text search; candidates keep the upstream relevance order
   */
  async search(
    query: string,
    limit: number,
    options?: RequestOptions
  ): Promise<SearchCandidate[]> {
    const payload = await this.request(
      {
        action: "query",
        list: "search",
        srsearch: query,
        srlimit: String(limit),
      },
      options
    );

    const parsed = searchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamUnavailableError("Malformed search response");
    }

    const hits = parsed.data.query?.search ?? [];
    return hits.slice(0, limit).map((hit, index) => ({
      title: hit.title,
      pageId: hit.pageid,
      rank: index,
    }));
  }

  /**
   * Plain-text article body for one candidate
   */
  async fetchExtract(
    candidate: SearchCandidate,
    options?: RequestOptions
  ): Promise<ArticleExtract> {
    const payload = await this.request(
      {
        action: "query",
        prop: "extracts|info",
        inprop: "url",
        explaintext: "1",
        pageids: String(candidate.pageId),
      },
      options
    );

    const parsed = extractResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(
        `Malformed extract response for "${candidate.title}"`
      );
    }

    const page = parsed.data.query?.pages[0];
    if (!page || page.missing) {
      throw new UpstreamUnavailableError(`Page not found: "${candidate.title}"`);
    }

    const extract = page.extract?.trim();
    if (!extract) {
      throw new UpstreamUnavailableError(`No extract for "${candidate.title}"`);
    }

    return {
      title: page.title,
      url: page.canonicalurl ?? page.fullurl ?? this.articleUrl(page.title),
      extract,
    };
  }

  close(): void {
    if (!this.lifetime.signal.aborted) {
      this.lifetime.abort();
    }
  }

  /**
   * Fallback article URL when the API omits canonicalurl
   */
  articleUrl(title: string): string {
    const origin = new URL(this.apiUrl).origin;
    return `${origin}/wiki/${encodeURI(title.replace(/ /g, "_"))}`;
  }

  private async request(
    params: Record<string, string>,
    options?: RequestOptions
  ): Promise<unknown> {
    if (this.lifetime.signal.aborted) {
      throw new UpstreamUnavailableError("Wikipedia client is closed");
    }

    const query = new URLSearchParams({
      ...params,
      format: "json",
      formatversion: "2",
    });
    const url = `${this.apiUrl}?${query.toString()}`;
    const timeoutMs = options?.timeoutMs ?? this.requestTimeoutMs;

    // Create abort controller for timeout, chained to the client lifetime
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onClose = (): void => controller.abort();
    this.lifetime.signal.addEventListener("abort", onClose, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        signal: controller.signal,
        headers: {
          Accept: "application/json",
          "User-Agent": this.userAgent,
        },
      });

      if (!response.ok) {
        throw new UpstreamUnavailableError(
          `Wikipedia API error (${response.status})`,
          response.status
        );
      }

      const payload: unknown = await response.json();
      const apiError = apiErrorSchema.safeParse(payload);
      if (apiError.success) {
        throw new UpstreamUnavailableError(
          `Wikipedia API error (${apiError.data.error.code}): ${apiError.data.error.info ?? "no details"}`
        );
      }

      return payload;
    } catch (error) {
      if (error instanceof UpstreamUnavailableError) {
        throw error;
      }
      if (controller.signal.aborted) {
        const reason = this.lifetime.signal.aborted
          ? "client closed"
          : `timed out after ${timeoutMs}ms`;
        this.logger.debug({ url, reason }, "Wikipedia request aborted");
        throw new UpstreamUnavailableError(`Request ${reason}`, undefined, {
          cause: error,
        });
      }
      throw new UpstreamUnavailableError(
        `Wikipedia request failed: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
      this.lifetime.signal.removeEventListener("abort", onClose);
    }
  }
}
