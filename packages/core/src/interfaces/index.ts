/**
 * Provider interfaces for dependency injection
 */

export type {
  EncyclopediaClient,
  ArticleExtract,
  RequestOptions,
} from "./encyclopedia-client";

export type { SummaryClient, LlmMessage } from "./summary-client";
