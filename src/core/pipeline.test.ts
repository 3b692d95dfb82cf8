import { Readable } from "node:stream";

import { describe, expect, it } from "vitest";

import { DEFAULT_RULESET, createClassifier } from "./classifier.js";
import { LogFormatSchema, defaultProjectConfig } from "./config.js";
import type { ClassifiedEvent, ParseError } from "./events.js";
import { readLogLines } from "./log-reader.js";
import { analyzeLines, withinWindow } from "./pipeline.js";

const format = defaultProjectConfig().log_format;
const classifier = createClassifier(DEFAULT_RULESET);

const SCENARIO_LINES = [
  "task=1,type=batch,ts=100,schedule=90-110,outcome=success",
  "task=2,type=batch,ts=200,outcome=success",
];

describe("analyzeLines", () => {
  it("classifies and aggregates a small log", async () => {
    const events: ClassifiedEvent[] = [];
    const { metrics, ingest } = await analyzeLines(SCENARIO_LINES, {
      format,
      classifier,
      bucketWidth: 1000,
      onEvent: (event) => events.push(event),
    });

    expect(events.map((event) => [event.task_id, event.status])).toEqual([
      ["1", "scheduled"],
      ["2", "unscheduled"],
    ]);
    expect(metrics.total).toBe(2);
    expect(metrics.scheduledRatio).toBe(0.5);
    expect(ingest).toMatchObject({ linesRead: 2, parsed: 2, rejected: 0 });
  });

  it("sends rejected lines to the side channel", async () => {
    const errors: ParseError[] = [];
    const { metrics, ingest } = await analyzeLines(["type=batch,ts=100,outcome=success"], {
      format,
      classifier,
      bucketWidth: 1000,
      onParseError: (error) => errors.push(error),
    });

    expect(metrics.total).toBe(0);
    expect(ingest.rejected).toBe(1);
    expect(ingest.rejectedByReason.missing_field).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ reason: "missing_field", line_number: 1 });
  });

  it("accounts for every non-blank line as parsed or rejected", async () => {
    const { ingest } = await analyzeLines(
      ["task=1,ts=1,outcome=ok", "", "   ", "garbage", "task=2,ts=x,outcome=ok"],
      { format, classifier, bucketWidth: 1000 },
    );

    expect(ingest.linesRead).toBe(3);
    expect(ingest.blankLines).toBe(2);
    expect(ingest.parsed + ingest.rejected).toBe(ingest.linesRead);
    expect(ingest.samples.map((sample) => [sample.reason, sample.line_number])).toEqual([
      ["malformed", 4],
      ["bad_timestamp", 5],
    ]);
  });

  it("keeps at most the configured number of samples", async () => {
    const { ingest } = await analyzeLines(["bad one", "bad two", "bad three"], {
      format,
      classifier,
      bucketWidth: 1000,
      parseErrorSamples: 1,
    });

    expect(ingest.rejected).toBe(3);
    expect(ingest.samples).toHaveLength(1);
  });

  it("skips header lines in positional logs", async () => {
    const positional = LogFormatSchema.parse({
      mode: "positional",
      columns: ["task", "ts", "outcome"],
      header_lines: 1,
    });

    const { metrics, ingest } = await analyzeLines(["task,ts,outcome", "", "7,100,ok"], {
      format: positional,
      classifier,
      bucketWidth: 1000,
    });

    expect(ingest).toMatchObject({ headerLines: 1, blankLines: 1, linesRead: 1, parsed: 1 });
    expect(metrics.total).toBe(1);
  });

  it("drops events outside the time window", async () => {
    const { metrics, ingest } = await analyzeLines(SCENARIO_LINES, {
      format,
      classifier,
      bucketWidth: 1000,
      window: { since: 150 },
    });

    expect(ingest.parsed).toBe(2);
    expect(ingest.filtered).toBe(1);
    expect(metrics.total).toBe(1);
    expect(metrics.countFor("unscheduled")).toBe(1);
  });

  it("does not count a CRLF split across chunks as a blank line", async () => {
    const stream = Readable.from(["task=1,ts=1,outcome=ok\r", "\ntask=2,ts=2,outcome=ok\n"], {
      objectMode: false,
    });

    const { ingest } = await analyzeLines(readLogLines({ kind: "stream", label: "stdin", stream }), {
      format,
      classifier,
      bucketWidth: 1000,
    });

    expect(ingest).toMatchObject({ linesRead: 2, parsed: 2, blankLines: 0 });
  });

  it("reads async line sources", async () => {
    async function* lines(): AsyncGenerator<string> {
      yield* SCENARIO_LINES;
    }

    const { metrics } = await analyzeLines(lines(), { format, classifier, bucketWidth: 1000 });
    expect(metrics.total).toBe(2);
  });
});

describe("withinWindow", () => {
  it("includes both bounds", () => {
    expect(withinWindow(10, { since: 10, until: 20 })).toBe(true);
    expect(withinWindow(20, { since: 10, until: 20 })).toBe(true);
    expect(withinWindow(21, { since: 10, until: 20 })).toBe(false);
    expect(withinWindow(9, { since: 10 })).toBe(false);
    expect(withinWindow(9, undefined)).toBe(true);
  });
});
