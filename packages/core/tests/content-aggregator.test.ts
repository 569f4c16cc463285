import { describe, expect, it } from "vitest";
import {
  Deadline,
  aggregateDocuments,
  truncateExtract,
  type RawDocument,
} from "../src";
import { ManualClock, silentLogger } from "./helpers";

const SEPARATOR = "\n\n---\n\n";

function doc(title: string, extract: string, position = 0): RawDocument {
  return {
    title,
    extract,
    pageId: position + 1,
    url: `https://en.wikipedia.org/wiki/${title}`,
  };
}

function options(clock: ManualClock, maxSources = 5) {
  return {
    maxSources,
    extractCharCap: 1200,
    separator: SEPARATOR,
    now: clock.now,
    logger: silentLogger,
  };
}

describe("truncateExtract", () => {
  it("slices long text to exactly the cap", () => {
    expect(truncateExtract("a".repeat(2000), 1200)).toHaveLength(1200);
  });

  it("never splits a surrogate pair at the cap", () => {
    const text = `${"a".repeat(1199)}\u{1D465}tail`;

    const truncated = truncateExtract(text, 1200);

    expect(truncated).toBe("a".repeat(1199));
    expect(truncateExtract(truncated, 1200)).toBe(truncated);
    expect(truncateExtract(`${"a".repeat(1198)}\u{1D465}tail`, 1200)).toBe(
      `${"a".repeat(1198)}\u{1D465}`
    );
  });

  it("leaves short text unchanged and is idempotent", () => {
    expect(truncateExtract("short", 1200)).toBe("short");
    const once = truncateExtract("b".repeat(1500), 1200);
    expect(truncateExtract(once, 1200)).toBe(once);
  });
});

describe("aggregateDocuments", () => {
  it("keeps retrieval order and joins extracts with the separator", async () => {
    const clock = new ManualClock();
    const deadline = new Deadline(30_000, clock.now);

    const result = await aggregateDocuments(
      [doc("Alpha", "a".repeat(2000), 0), doc("Beta", "b".repeat(500), 1)],
      deadline,
      options(clock)
    );

    expect(result.status).toBe("complete");
    expect(result.sources.map((source) => source.title)).toEqual(["Alpha", "Beta"]);
    expect(result.sources.map((source) => source.extract.length)).toEqual([1200, 500]);
    expect(result.combinedText).toBe(`${"a".repeat(1200)}${SEPARATOR}${"b".repeat(500)}`);
    expect(result.combinedText).toHaveLength(1200 + 500 + SEPARATOR.length);
    expect(result.sources[0].fetchedAt).toBe(clock.current);
    expect(Object.isFrozen(result.sources[0])).toBe(true);
  });

  it("skips later duplicates by exact title", async () => {
    const clock = new ManualClock();
    const result = await aggregateDocuments(
      [doc("Alpha", "first", 0), doc("Alpha", "second", 1), doc("alpha", "third", 2)],
      new Deadline(30_000, clock.now),
      options(clock)
    );

    expect(result.sources.map((source) => source.extract)).toEqual(["first", "third"]);
    expect(result.duplicatesSkipped).toBe(1);
  });

  it("stops at maxSources", async () => {
    const clock = new ManualClock();
    const docs = ["A", "B", "C", "D"].map((title, rank) => doc(title, title, rank));

    const result = await aggregateDocuments(
      docs,
      new Deadline(30_000, clock.now),
      options(clock, 2)
    );

    expect(result.sources).toHaveLength(2);
    expect(result.status).toBe("complete");
  });

  it("reports no_results with empty text when nothing arrives", async () => {
    const clock = new ManualClock();
    const result = await aggregateDocuments([], new Deadline(30_000, clock.now), options(clock));

    expect(result).toMatchObject({ status: "no_results", combinedText: "", sources: [] });
  });

  it("stops accepting documents once the deadline has passed", async () => {
    const clock = new ManualClock();
    const deadline = new Deadline(30_000, clock.now);

    async function* arriving(): AsyncGenerator<RawDocument> {
      yield doc("Alpha", "first", 0);
      clock.advance(30_001);
      yield doc("Beta", "second", 1);
      yield doc("Gamma", "third", 2);
    }

    const result = await aggregateDocuments(arriving(), deadline, options(clock));

    expect(result.status).toBe("partial_timeout");
    expect(result.sources.map((source) => source.title)).toEqual(["Alpha"]);
    expect(result.combinedText).toBe("first");
    expect(result.elapsedSeconds).toBeCloseTo(30.001);
  });

  it("prefers no_results over partial_timeout when nothing was collected", async () => {
    const clock = new ManualClock();
    const deadline = new Deadline(1_000, clock.now);
    clock.advance(2_000);

    const result = await aggregateDocuments([doc("Alpha", "x")], deadline, options(clock));

    expect(result.status).toBe("no_results");
    expect(deadline.hasFired()).toBe(true);
  });
});
