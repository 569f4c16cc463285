import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import {
  ResearchOrchestrator,
  SummaryEngine,
  UpstreamUnavailableError,
  DEFAULT_CONFIG,
  createLogger,
  type ArticleExtract,
  type EncyclopediaClient,
  type SearchCandidate,
  type SummaryStrategy,
} from "@wiki-research/core";
import { buildApp } from "../src/app";

const logger = createLogger("backend-tests");

const ARTICLES: ArticleExtract[] = [
  {
    title: "Turing machine",
    url: "https://en.wikipedia.org/wiki/Turing_machine",
    extract: "A Turing machine is a mathematical model of computation.",
  },
  {
    title: "Alan Turing",
    url: "https://en.wikipedia.org/wiki/Alan_Turing",
    extract: "Alan Turing was an English mathematician.",
  },
];

class StaticEncyclopedia implements EncyclopediaClient {
  async search(_query: string, limit: number): Promise<SearchCandidate[]> {
    return ARTICLES.slice(0, limit).map((article, index) => ({
      title: article.title,
      pageId: index + 1,
      rank: index,
    }));
  }

  async fetchExtract(candidate: SearchCandidate): Promise<ArticleExtract> {
    const article = ARTICLES[candidate.rank];
    if (!article) {
      throw new UpstreamUnavailableError("Page not found");
    }
    return article;
  }

  close(): void {}
}

function strategy(name: SummaryStrategy["name"], reply: string): SummaryStrategy {
  return {
    name,
    create: () => ({
      name,
      complete: async () => reply,
      getModel: () => "test-model",
    }),
  };
}

describe("research API", () => {
  let app: FastifyInstance;
  const credentials = { openrouter: "test-openrouter-key" };

  beforeEach(async () => {
    const summaryEngine = new SummaryEngine(
      [strategy("openrouter", "A short summary."), strategy("groq", "unused")],
      logger
    );
    const orchestrator = new ResearchOrchestrator({
      config: DEFAULT_CONFIG,
      credentials,
      summaryEngine,
      createClient: () => new StaticEncyclopedia(),
      logger,
    });
    app = await buildApp({ orchestrator, summaryEngine, credentials, logLevel: false });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await app.close();
  });

  it("runs a research pass and returns the result as JSON", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/v1/research",
      payload: { topic: "Turing machine", maxSources: 2, depth: 1 },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe("complete");
    expect(body.sources.map((source: { title: string }) => source.title)).toEqual([
      "Turing machine",
      "Alan Turing",
    ]);
    expect(body.summary).toBe("A short summary.");
    expect(body.summaryProvider).toBe("openrouter");
  });

  it("renders markdown reports on request", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/v1/research?format=markdown",
      payload: { topic: "Turing machine", maxSources: 1 },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/markdown; charset=utf-8");
    expect(res.body.split("\n")[0]).toBe("# Research Report: Turing machine");
  });

  it("rejects blank topics", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/v1/research",
      payload: { topic: "   " },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: { code: "invalid_topic", message: "Topic must not be empty" },
    });
  });

  it("validates request bounds", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/v1/research",
      payload: { topic: "Turing machine", maxSources: 50 },
    });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error.code).toBe("invalid_request");
    expect(body.error.issues[0].path).toBe("maxSources");
  });

  it("rejects unknown report formats", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/v1/research?format=pdf",
      payload: { topic: "Turing machine" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.issues[0].path).toBe("format");
  });

  it("lists provider configuration without exposing keys", async () => {
    const res = await app.inject({ method: "GET", url: "/api/v1/research/providers" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      providers: [
        { provider: "openrouter", configured: true },
        { provider: "groq", configured: false },
      ],
    });
    expect(res.body.includes("test-openrouter-key")).toBe(false);
  });

  it("verifies a configured provider", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/v1/research/providers/openrouter/verify",
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ provider: "openrouter", configured: true, ok: true });
  });

  it("returns 404 for unknown providers", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/v1/research/providers/openai/verify",
    });

    expect(res.statusCode).toBe(404);
    expect(res.json().error.code).toBe("unknown_provider");
  });

  it("answers health checks and unknown routes", async () => {
    const health = await app.inject({ method: "GET", url: "/healthz" });
    expect(health.json()).toEqual({ ok: true });

    const missing = await app.inject({ method: "GET", url: "/nope" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json().error.code).toBe("not_found");
  });

  it("shapes unexpected failures as internal errors", async () => {
    vi.spyOn(ResearchOrchestrator.prototype, "run").mockRejectedValueOnce(new Error("boom"));

    const res = await app.inject({
      method: "POST",
      url: "/api/v1/research",
      payload: { topic: "Turing machine" },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      error: { code: "internal_error", message: "Internal server error", detail: "boom" },
    });
  });
});
