/**
 * Research orchestrator
 * Composes planning, retrieval, aggregation and summarization into one run
 */

import type { EncyclopediaClient } from "../../interfaces/encyclopedia-client";
import type {
  ProviderAttempt,
  ProviderCredentials,
  ResearchResult,
  SearchCandidate,
  SummaryProviderName,
} from "../../models/research-result";
import { errorMessage } from "../../errors";
import { createEncyclopediaClient, createSummaryEngine } from "../../providers";
import { Deadline, type Clock } from "../../utils/deadline";
import { clampInt } from "../../utils/limits";
import { createLogger, type Logger } from "../../utils/logger";
import type { SummaryEngine } from "../llm/summary-engine";
import { aggregateDocuments, type AggregationResult } from "./content-aggregator";
import { getConfig, type ResearchConfig } from "./config";
import { planQuery } from "./query-planner";
import { SourceFetcher } from "./source-fetcher";
import type { OrchestratorOptions, ResearchRequest } from "./types";

export class ResearchOrchestrator {
  private readonly config: ResearchConfig;
  private readonly credentials: ProviderCredentials;
  private readonly summaryEngine: SummaryEngine;
  private readonly createClient: () => EncyclopediaClient;
  private readonly logger: Logger;
  private readonly now: Clock;

  constructor(options: OrchestratorOptions) {
    this.config = options.config ?? getConfig();
    this.credentials = options.credentials;
    this.logger = options.logger ?? createLogger("research");
    this.now = options.now ?? Date.now;
    this.summaryEngine =
      options.summaryEngine ??
      createSummaryEngine(this.config.summary, this.logger.child({ component: "summary-engine" }));
    this.createClient =
      options.createClient ??
      (() =>
        createEncyclopediaClient(this.config.encyclopedia, {
          logger: this.logger.child({ component: "wikipedia" }),
        }));
  }

  /**
   * Execute one research pass. Throws only InvalidTopicError; every other
   * fault degrades the returned result instead.
   */
  async run(request: ResearchRequest): Promise<ResearchResult> {
    const startedAt = this.now();
    const { limits, aggregation, encyclopedia } = this.config;

    // 1. Plan (rejects blank topics before any network call)
    const plan = planQuery(request.topic, request.maxSources, request.depth, limits);
    const timeoutSeconds = clampInt(
      request.timeoutSeconds,
      limits.minTimeoutSeconds,
      limits.maxTimeoutSeconds,
      limits.defaultTimeoutSeconds
    );

    this.logger.info(
      {
        query: plan.query,
        maxSources: plan.limit,
        candidateLimit: plan.candidateLimit,
        depth: plan.depth,
        timeoutSeconds,
      },
      "research started"
    );

    // 2. Fetch + aggregate under the wall-clock budget
    const deadline = new Deadline(timeoutSeconds * 1000, this.now);
    const client = this.createClient();
    const fetcher = new SourceFetcher(client, {
      concurrency: encyclopedia.concurrency,
      requestTimeoutMs: encyclopedia.requestTimeoutMs,
      logger: this.logger,
    });

    let candidates: SearchCandidate[] = [];
    let aggregated: AggregationResult;

    try {
      try {
        candidates = await fetcher.search(plan.query, plan.candidateLimit, deadline);
      } catch (error) {
        this.logger.warn({ query: plan.query, reason: errorMessage(error) }, "search failed");
      }

      aggregated = await aggregateDocuments(
        fetcher.documents(candidates, deadline),
        deadline,
        {
          maxSources: plan.limit,
          extractCharCap: aggregation.extractCharCap,
          separator: aggregation.separator,
          now: this.now,
          logger: this.logger,
        }
      );
    } finally {
      client.close();
    }

    // 3. Summarize (best effort, outside the fetch budget)
    let summary: string | null = null;
    let summaryProvider: SummaryProviderName | null = null;
    let summaryAttempts: ProviderAttempt[] = [];

    if (aggregated.combinedText) {
      const outcome = await this.summaryEngine.summarize(
        aggregated.combinedText,
        this.credentials,
        plan.query
      );
      summaryAttempts = outcome.attempts;
      if (outcome.status === "ok") {
        summary = outcome.text;
        summaryProvider = outcome.provider;
      }
    }

    const completedAt = Math.max(this.now(), startedAt);
    const result: ResearchResult = {
      topic: request.topic,
      query: plan.query,
      depth: plan.depth,
      sources: aggregated.sources,
      candidatesFound: candidates.length,
      combinedText: aggregated.combinedText,
      summary,
      summaryProvider,
      summaryAttempts,
      status: aggregated.status,
      startedAt,
      completedAt,
      elapsedSeconds: (completedAt - startedAt) / 1000,
    };

    this.logger.info(
      {
        query: plan.query,
        status: result.status,
        sources: result.sources.length,
        candidates: result.candidatesFound,
        duplicatesSkipped: aggregated.duplicatesSkipped,
        summaryProvider,
        elapsedSeconds: result.elapsedSeconds,
      },
      "research completed"
    );

    return result;
  }
}
