import pino from "pino";
import { vi } from "vitest";
import type {
  ArticleExtract,
  EncyclopediaClient,
  LlmMessage,
  SearchCandidate,
  SummaryClient,
  SummaryProviderName,
  SummaryStrategy,
} from "../src";
import { UpstreamUnavailableError } from "../src";

export const silentLogger = pino({ level: "silent" });

export interface FakeArticle {
  title: string;
  extract: string;
  pageId?: number;
  fail?: boolean;
}

/**
 * In-memory encyclopedia: search returns the articles in order, extracts
 * come back from the same list.
 */
export class FakeEncyclopediaClient implements EncyclopediaClient {
  readonly searchCalls: Array<{ query: string; limit: number }> = [];
  readonly extractCalls: string[] = [];
  closed = false;

  constructor(
    private readonly articles: FakeArticle[],
    private readonly hooks: {
      searchError?: Error;
      onExtract?: (candidate: SearchCandidate) => void | Promise<void>;
    } = {}
  ) {}

  async search(query: string, limit: number): Promise<SearchCandidate[]> {
    this.searchCalls.push({ query, limit });
    if (this.hooks.searchError) {
      throw this.hooks.searchError;
    }
    return this.articles.slice(0, limit).map((article, index) => ({
      title: article.title,
      pageId: article.pageId ?? index + 1,
      rank: index,
    }));
  }

  async fetchExtract(candidate: SearchCandidate): Promise<ArticleExtract> {
    this.extractCalls.push(candidate.title);
    await this.hooks.onExtract?.(candidate);

    const article = this.articles[candidate.rank];
    if (!article || article.fail) {
      throw new UpstreamUnavailableError(`Wikipedia API error (503)`, 503);
    }
    return {
      title: article.title,
      url: `https://en.wikipedia.org/wiki/${article.title.replace(/ /g, "_")}`,
      extract: article.extract,
    };
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Controllable clock for deadline tests
 */
export class ManualClock {
  current = 1_700_000_000_000;

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Summary strategy whose client replies with `reply` or rejects with it
 */
export function fakeStrategy(name: SummaryProviderName, reply: string | Error) {
  const complete = vi.fn(async (_messages: LlmMessage[]): Promise<string> => {
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });
  const create = vi.fn(
    (_apiKey: string): SummaryClient => ({
      name,
      complete,
      getModel: () => `${name}-test-model`,
    })
  );
  const strategy: SummaryStrategy = { name, create };
  return { strategy, create, complete };
}
