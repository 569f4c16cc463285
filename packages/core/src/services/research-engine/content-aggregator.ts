/**
 * Content aggregation
 *
 * Folds fetched documents into the ordered source list of a research result.
 */

import type {
  RawDocument,
  ResearchStatus,
  SourceRecord,
} from "../../models/research-result";
import type { Clock, Deadline } from "../../utils/deadline";
import { createLogger, type Logger } from "../../utils/logger";

export interface AggregationOptions {
  maxSources: number;
  extractCharCap: number;
  separator: string;
  now?: Clock;
  logger?: Logger;
}

export interface AggregationResult {
  sources: SourceRecord[];
  combinedText: string;
  status: ResearchStatus;
  duplicatesSkipped: number;
  elapsedSeconds: number;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Hard slice at `cap` UTF-16 code units; applying it twice yields the same
 * string. A surrogate pair split by the cut is dropped whole.
 */
export function truncateExtract(text: string, cap: number): string {
  if (text.length <= cap) {
    return text;
  }
  const end = cap > 0 && isHighSurrogate(text.charCodeAt(cap - 1)) ? cap - 1 : cap;
  return text.slice(0, end);
}

export function combineExtracts(sources: SourceRecord[], separator: string): string {
  return sources.map((source) => source.extract).join(separator);
}

/**
 * Accept documents in arrival order until the source cap is reached, the
 * deadline passes, or the input runs out.
 */
export async function aggregateDocuments(
  docs: AsyncIterable<RawDocument> | Iterable<RawDocument>,
  deadline: Deadline,
  options: AggregationOptions
): Promise<AggregationResult> {
  const now = options.now ?? Date.now;
  const logger = options.logger ?? createLogger("aggregator");

  const sources: SourceRecord[] = [];
  const seenTitles = new Set<string>();
  let duplicatesSkipped = 0;

  if (options.maxSources > 0) {
    for await (const doc of docs) {
      if (deadline.expired()) {
        logger.info(
          { accepted: sources.length, elapsedMs: deadline.elapsedMs() },
          "deadline reached"
        );
        break;
      }

      if (seenTitles.has(doc.title)) {
        duplicatesSkipped++;
        continue;
      }

      seenTitles.add(doc.title);
      sources.push(
        Object.freeze({
          title: doc.title,
          url: doc.url,
          extract: truncateExtract(doc.extract, options.extractCharCap),
          pageId: doc.pageId,
          fetchedAt: now(),
        })
      );

      if (sources.length >= options.maxSources) {
        break;
      }
    }
  }

  let status: ResearchStatus = "complete";
  if (sources.length === 0) {
    status = "no_results";
  } else if (deadline.hasFired()) {
    status = "partial_timeout";
  }

  return {
    sources,
    combinedText: status === "no_results" ? "" : combineExtracts(sources, options.separator),
    status,
    duplicatesSkipped,
    elapsedSeconds: deadline.elapsedMs() / 1000,
  };
}
