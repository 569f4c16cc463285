/**
 * Report rendering
 *
 * Markdown / plain text views for people, and a JSON form that carries every
 * field of a ResearchResult and can be read back.
 */

import { z } from "zod";
import {
  SUMMARY_PROVIDER_NAMES,
  type ResearchResult,
} from "../../models/research-result";

export const REPORT_FORMATS = ["json", "markdown", "text"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

const EXTENSIONS: Record<ReportFormat, string> = {
  json: "json",
  markdown: "md",
  text: "txt",
};

export const REPORT_CONTENT_TYPES: Record<ReportFormat, string> = {
  json: "application/json; charset=utf-8",
  markdown: "text/markdown; charset=utf-8",
  text: "text/plain; charset=utf-8",
};

const STATUS_LABELS: Record<ResearchResult["status"], string> = {
  complete: "Complete",
  partial_timeout: "Partial (time budget reached)",
  no_results: "No results",
};

export function formatMarkdown(result: ResearchResult): string {
  const lines: string[] = [
    `# Research Report: ${result.topic}`,
    "",
    `**Generated:** ${new Date(result.completedAt).toISOString()}`,
    `**Status:** ${STATUS_LABELS[result.status]}`,
    `**Sources:** ${result.sources.length}`,
    `**Elapsed:** ${result.elapsedSeconds.toFixed(2)}s`,
    "",
    "## Summary",
    "",
  ];

  if (result.summary) {
    lines.push(result.summary, "", `_Summary provider: ${result.summaryProvider}_`);
  } else {
    lines.push("No summary available");
  }

  lines.push("", "## Sources");

  result.sources.forEach((source, index) => {
    lines.push(
      "",
      `### ${index + 1}. ${source.title}`,
      `**URL:** ${source.url}`,
      "",
      source.extract
    );
  });

  return `${lines.join("\n")}\n`;
}

/**
 * Markdown with emphasis and heading markers stripped
 */
export function formatPlainText(result: ResearchResult): string {
  return formatMarkdown(result)
    .replace(/\*\*/g, "")
    .replace(/^#+ /gm, "");
}

export function formatJson(result: ResearchResult): string {
  return JSON.stringify(result, null, 2);
}

export function formatReport(result: ResearchResult, format: ReportFormat): string {
  switch (format) {
    case "json":
      return formatJson(result);
    case "markdown":
      return formatMarkdown(result);
    case "text":
      return formatPlainText(result);
  }
}

// Path separators, reserved filename characters and control characters
const UNSAFE_FILENAME_CHARS = /[\s\/\\:*?"<>|\u0000-\u001f]/g;

/**
 * Download name, e.g. "Turing machine" -> "Turing_machine_report.md".
 * Always a bare file name: no directory parts, no leading dot.
 */
export function reportFilename(topic: string, format: ReportFormat): string {
  const stem = topic
    .trim()
    .replace(UNSAFE_FILENAME_CHARS, "_")
    .replace(/^[._]+/, "");
  return `${stem || "research"}_report.${EXTENSIONS[format]}`;
}

const providerNameSchema = z.enum(SUMMARY_PROVIDER_NAMES);

export const researchResultSchema = z.object({
  topic: z.string(),
  query: z.string(),
  depth: z.number().int(),
  sources: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      extract: z.string(),
      pageId: z.number().int(),
      fetchedAt: z.number(),
    })
  ),
  candidatesFound: z.number().int(),
  combinedText: z.string(),
  summary: z.string().nullable(),
  summaryProvider: providerNameSchema.nullable(),
  summaryAttempts: z.array(
    z.object({
      provider: providerNameSchema,
      outcome: z.enum(["skipped", "failed", "succeeded"]),
      detail: z.string().optional(),
    })
  ),
  status: z.enum(["complete", "partial_timeout", "no_results"]),
  startedAt: z.number(),
  completedAt: z.number(),
  elapsedSeconds: z.number(),
});

/**
 * Read a JSON report back into a ResearchResult
 */
export function parseResearchResult(json: string): ResearchResult {
  return researchResultSchema.parse(JSON.parse(json));
}
