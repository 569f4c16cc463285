/**
 * Summary engine
 *
 * Walks an ordered strategy list once. A provider without a credential is
 * skipped without a call; a failing provider hands over to the next one.
 * Running out of providers is an outcome, never an exception.
 */

import type { SummaryClient } from "../../interfaces/summary-client";
import type {
  ProviderAttempt,
  ProviderCredentials,
  SummaryProviderName,
} from "../../models/research-result";
import { errorMessage } from "../../errors";
import { createLogger, type Logger } from "../../utils/logger";
import { PING_MESSAGES, buildSummaryMessages } from "./prompts";

export interface SummaryStrategy {
  name: SummaryProviderName;
  create(apiKey: string): SummaryClient;
}

export type SummaryOutcome =
  | {
      status: "ok";
      text: string;
      provider: SummaryProviderName;
      attempts: ProviderAttempt[];
    }
  | {
      status: "unavailable";
      attempts: ProviderAttempt[];
    };

export interface ProviderStatus {
  provider: SummaryProviderName;
  configured: boolean;
}

export interface ProviderCheck extends ProviderStatus {
  ok: boolean;
  detail?: string;
}

export class SummaryEngine {
  private readonly strategies: SummaryStrategy[];
  private readonly logger: Logger;

  constructor(strategies: SummaryStrategy[], logger?: Logger) {
    this.strategies = strategies;
    this.logger = logger ?? createLogger("summary-engine");
  }

  getProviderNames(): SummaryProviderName[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  hasProvider(name: string): name is SummaryProviderName {
    return this.strategies.some((strategy) => strategy.name === name);
  }

  /**
   * Whether each provider has a key, in priority order
   */
  describeProviders(credentials: ProviderCredentials): ProviderStatus[] {
    return this.strategies.map((strategy) => ({
      provider: strategy.name,
      configured: Boolean(credentials[strategy.name]),
    }));
  }

  async summarize(
    combinedText: string,
    credentials: ProviderCredentials,
    topic?: string
  ): Promise<SummaryOutcome> {
    const attempts: ProviderAttempt[] = [];
    const messages = buildSummaryMessages(combinedText, topic);

    for (const strategy of this.strategies) {
      const apiKey = credentials[strategy.name];
      if (!apiKey) {
        attempts.push({ provider: strategy.name, outcome: "skipped", detail: "not configured" });
        this.logger.debug({ provider: strategy.name }, "provider skipped");
        continue;
      }

      try {
        const client = strategy.create(apiKey);
        const text = await client.complete(messages);
        attempts.push({ provider: strategy.name, outcome: "succeeded" });
        this.logger.info(
          { provider: strategy.name, model: client.getModel(), chars: text.length },
          "summary generated"
        );
        return { status: "ok", text, provider: strategy.name, attempts };
      } catch (error) {
        const detail = errorMessage(error);
        attempts.push({ provider: strategy.name, outcome: "failed", detail });
        this.logger.warn({ provider: strategy.name, detail }, "provider failed");
      }
    }

    this.logger.info(
      { attempts: attempts.map((attempt) => `${attempt.provider}:${attempt.outcome}`) },
      "summary unavailable"
    );
    return { status: "unavailable", attempts };
  }

  /**
   * Send a single ping through one provider to check its credential
   */
  async verifyProvider(
    name: SummaryProviderName,
    credentials: ProviderCredentials
  ): Promise<ProviderCheck> {
    const strategy = this.strategies.find((candidate) => candidate.name === name);
    const apiKey = credentials[name];

    if (!strategy || !apiKey) {
      return { provider: name, configured: false, ok: false, detail: "not configured" };
    }

    try {
      await strategy.create(apiKey).complete(PING_MESSAGES);
      return { provider: name, configured: true, ok: true };
    } catch (error) {
      const detail = errorMessage(error);
      this.logger.warn({ provider: name, detail }, "provider verification failed");
      return { provider: name, configured: true, ok: false, detail };
    }
  }
}
