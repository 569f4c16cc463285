/**
 * Query planning
 *
 * Turns a free-text topic into the search query and the bounds for one
 * retrieval pass. Depth only widens the candidate pool so skipped or
 * duplicate candidates can be replaced; it never triggers recursive crawling.
 */

import { InvalidTopicError } from "../../errors";
import { clampInt } from "../../utils/limits";
import type { LimitsConfig } from "./config";

export interface QueryPlan {
  query: string;
  limit: number; // Max sources kept in the result
  candidateLimit: number; // Max candidates requested from search
  depth: number;
}

export function planQuery(
  topic: string,
  maxSources: number | undefined,
  depth: number | undefined,
  limits: LimitsConfig
): QueryPlan {
  const query = topic.trim();
  if (!query) {
    throw new InvalidTopicError();
  }

  const limit = clampInt(
    maxSources,
    limits.minSources,
    limits.maxSources,
    limits.defaultSources
  );
  const clampedDepth = clampInt(
    depth,
    limits.minDepth,
    limits.maxDepth,
    limits.defaultDepth
  );

  return {
    query,
    limit,
    candidateLimit: Math.max(limit, Math.min(limit * clampedDepth, limits.maxCandidates)),
    depth: clampedDepth,
  };
}
