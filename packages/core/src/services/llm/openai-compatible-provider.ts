/**
 * OpenAI-compatible chat provider
 *
 * OpenRouter and Groq both expose the OpenAI chat-completions API, so one
 * client class backed by the openai SDK serves both; only the base URL,
 * model and key differ.
 */

import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { LlmMessage, SummaryClient } from "../../interfaces/summary-client";
import type { SummaryProviderName } from "../../models/research-result";
import type { ProviderEndpointConfig } from "../research-engine/config";
import { ProviderFailureError, errorMessage } from "../../errors";

export interface OpenAICompatibleProviderOptions {
  name: SummaryProviderName;
  apiKey: string;
  endpoint: ProviderEndpointConfig;
  temperature: number;
}

function toMessageParam(message: LlmMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export class OpenAICompatibleProvider implements SummaryClient {
  readonly name: SummaryProviderName;
  private readonly client: OpenAI;
  private readonly modelName: string;
  private readonly temperature: number;

  constructor(options: OpenAICompatibleProviderOptions) {
    this.name = options.name;
    this.modelName = options.endpoint.model;
    this.temperature = options.temperature;
    // Fail fast: failover to the next provider replaces retries
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.endpoint.baseUrl,
      timeout: options.endpoint.timeoutMs,
      maxRetries: 0,
    });
  }

  getModel(): string {
    return this.modelName;
  }

  async complete(messages: LlmMessage[]): Promise<string> {
    let content: string | null | undefined;

    try {
      const response = await this.client.chat.completions.create({
        model: this.modelName,
        temperature: this.temperature,
        messages: messages.map(toMessageParam),
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw new ProviderFailureError(this.name, errorMessage(error), {
        cause: error,
      });
    }

    const text = content?.trim();
    if (!text) {
      throw new ProviderFailureError(this.name, "No content in completion response");
    }
    return text;
  }
}
