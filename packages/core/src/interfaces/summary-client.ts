/**
 * Summary Client Interface
 *
 * One chat-completion backend used by the summary engine.
 */

import type { SummaryProviderName } from "../models/research-result";

export interface LlmMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface SummaryClient {
  readonly name: SummaryProviderName;

  /**
   * Single chat completion; resolves to the trimmed reply text.
   * Rejects on any transport, status or empty-content failure.
   */
  complete(messages: LlmMessage[]): Promise<string>;

  getModel(): string;
}
