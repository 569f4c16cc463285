/**
 * Prompt templates for summarization
 */

import type { LlmMessage } from "../../interfaces/summary-client";

export const SUMMARY_SYSTEM_PROMPT =
  "You are a research expert. Provide a concise, well-structured summary of the research findings in 2-3 paragraphs. Use only the supplied material and do not invent facts or sources.";

/**
 * Chat messages for one summary request. The aggregated research text is
 * the user content, headed by the topic when one is given.
 */
export function buildSummaryMessages(
  combinedText: string,
  topic?: string
): LlmMessage[] {
  const content = topic
    ? `Topic: ${topic}\n\nResearch material:\n\n${combinedText}`
    : combinedText;

  return [
    { role: "system", content: SUMMARY_SYSTEM_PROMPT },
    { role: "user", content },
  ];
}

/**
 * Smallest possible request used to check a credential
 */
export const PING_MESSAGES: LlmMessage[] = [{ role: "user", content: "Ping" }];
