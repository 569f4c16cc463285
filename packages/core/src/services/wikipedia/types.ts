/**
 * MediaWiki Action API response shapes (formatversion=2)
 */

import { z } from "zod";

export const apiErrorSchema = z.object({
  error: z.object({
    code: z.string(),
    info: z.string().optional(),
  }),
});

export const searchResponseSchema = z.object({
  query: z
    .object({
      search: z
        .array(
          z.object({
            title: z.string(),
            pageid: z.number(),
            snippet: z.string().optional(),
            wordcount: z.number().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

export const extractResponseSchema = z.object({
  query: z
    .object({
      pages: z
        .array(
          z.object({
            pageid: z.number().optional(),
            title: z.string(),
            extract: z.string().optional(),
            canonicalurl: z.string().optional(),
            fullurl: z.string().optional(),
            missing: z.boolean().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

export type SearchResponse = z.infer<typeof searchResponseSchema>;
export type ExtractResponse = z.infer<typeof extractResponseSchema>;

/**
 * Minimal fetch signature the client needs; the global fetch satisfies it
 */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
