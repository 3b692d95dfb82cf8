import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough, Readable } from "node:stream";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { defaultProjectConfig } from "../../core/config.js";
import { SourceUnavailableError } from "../../core/errors.js";
import type { LogEventInput, RunLogger } from "../../core/logger.js";
import type { ReportDocument } from "../../core/report-sections.js";
import { createAppContext } from "../context.js";
import type { ReportRenderer } from "../report/report-renderer.js";
import { StaticSnapshotProvider } from "../snapshots/snapshot-provider.js";
import { runAnalysis } from "./run-analysis.js";

class MemoryLogger implements RunLogger {
  readonly events: LogEventInput[] = [];
  closed = false;

  log(event: LogEventInput): void {
    this.events.push(event);
  }

  close(): void {
    this.closed = true;
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

class MemoryRenderer implements ReportRenderer {
  readonly documents: ReportDocument[] = [];

  async render(document: ReportDocument): Promise<string> {
    this.documents.push(document);
    return `memory://${document.runId}`;
  }
}

describe("runAnalysis", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "run-analysis-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeLog(name: string, lines: string[]): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, `${lines.join("\n")}\n`, "utf8");
    return file;
  }

  function makeContext(maxParallelShards = 4) {
    const config = defaultProjectConfig();
    config.aggregation.max_parallel_shards = maxParallelShards;
    return createAppContext({ configPath: null, config, outputDir: tmpDir });
  }

  it("merges shards and hands the document to the renderer", async () => {
    const first = writeLog("a.log", [
      "task=1,type=batch,ts=100,schedule=90-110,outcome=success",
      "task=2,type=batch,ts=200,outcome=success",
    ]);
    const second = writeLog("b.log", ["task=3,type=cron,ts=300,schedule=250-350,outcome=ok", "oops"]);
    const logger = new MemoryLogger();
    const renderer = new MemoryRenderer();

    const result = await runAnalysis({
      context: makeContext(),
      sources: [
        { kind: "file", path: first },
        { kind: "file", path: second },
      ],
      runId: "run-1",
      bucketWidth: 1000,
      snapshotProvider: new StaticSnapshotProvider([
        { label: "queue depth", kind: "image", mediaType: "image/png", uri: "/tmp/queue.png" },
      ]),
      renderer,
      logger,
      now: () => new Date("2024-05-01T00:00:00Z"),
    });

    expect(result.reportPath).toBe("memory://run-1");
    expect(result.metrics.total).toBe(3);
    expect(result.metrics.countFor("scheduled")).toBe(2);
    expect(result.metrics.countFor("unscheduled")).toBe(1);
    expect(result.ingest).toMatchObject({ linesRead: 4, parsed: 3, rejected: 1 });
    expect(result.shards).toEqual([
      expect.objectContaining({ source: first, events: 2 }),
      expect.objectContaining({ source: second, events: 1 }),
    ]);

    expect(renderer.documents).toHaveLength(1);
    expect(result.document).toMatchObject({
      title: "Scheduler Log Analysis Report",
      runId: "run-1",
      generatedAt: "2024-05-01T00:00:00.000Z",
    });
    expect(result.document.sections.map((section) => section.kind)).toEqual([
      "narrative-text",
      "table",
      "table",
      "chart-data",
      "image-reference",
      "narrative-text",
    ]);

    const types = logger.types();
    expect(types[0]).toBe("run.start");
    expect(types.slice(-2)).toEqual(["report.written", "run.complete"]);
    expect(types.filter((type) => type === "source.complete")).toHaveLength(2);
    expect(logger.events.find((event) => event.type === "parse.error")).toMatchObject({
      source: second,
      payload: { reason: "malformed", line_number: 2 },
    });
  });

  it("gives the same metrics with one shard at a time", async () => {
    const files = [
      writeLog("a.log", ["task=1,ts=100,schedule=0-150,outcome=ok", "task=2,ts=1200,outcome=failed"]),
      writeLog("b.log", ["task=3,ts=2500,schedule=daily,outcome=retry"]),
      writeLog("c.log", ["task=4,ts=900,schedule=0-50,outcome=ok,duration=7"]),
    ];
    const run = (limit: number) =>
      runAnalysis({
        context: makeContext(limit),
        sources: files.map((file) => ({ kind: "file" as const, path: file })),
        runId: `run-${limit}`,
        bucketWidth: 1000,
        snapshotProvider: new StaticSnapshotProvider([]),
        renderer: new MemoryRenderer(),
        logger: new MemoryLogger(),
      });

    const serial = await run(1);
    const parallel = await run(3);

    expect(parallel.metrics.toJSON()).toEqual(serial.metrics.toJSON());
    expect(serial.metrics.countFor("unknown")).toBe(1);
  });

  it("logs run.failed and rethrows when a source is unavailable", async () => {
    const logger = new MemoryLogger();
    const missing = path.join(tmpDir, "missing.log");

    await expect(
      runAnalysis({
        context: makeContext(),
        sources: [{ kind: "file", path: missing }],
        runId: "run-missing",
        snapshotProvider: new StaticSnapshotProvider([]),
        renderer: new MemoryRenderer(),
        logger,
      }),
    ).rejects.toBeInstanceOf(SourceUnavailableError);

    expect(logger.events[logger.events.length - 1]).toEqual({
      type: "run.failed",
      payload: { error: `Cannot open log file ${missing}` },
    });
  });

  it("stops the other shards when one fails", async () => {
    const logger = new MemoryLogger();
    const missing = path.join(tmpDir, "missing.log");
    const stalled = new PassThrough();
    const queued = writeLog("queued.log", ["task=1,ts=5,outcome=ok"]);

    await expect(
      runAnalysis({
        context: makeContext(2),
        sources: [
          { kind: "file", path: missing },
          { kind: "stream", label: "stalled", stream: stalled },
          { kind: "file", path: queued },
        ],
        runId: "run-abort",
        snapshotProvider: new StaticSnapshotProvider([]),
        renderer: new MemoryRenderer(),
        logger,
      }),
    ).rejects.toBeInstanceOf(SourceUnavailableError);

    expect(stalled.destroyed).toBe(true);
    expect(
      logger.events.filter((event) => event.type === "source.open").map((event) => event.source),
    ).toEqual([missing, "stalled"]);
    expect(logger.types()).not.toContain("source.complete");
    expect(logger.types()[logger.types().length - 1]).toBe("run.failed");
  });

  it("reads stream sources", async () => {
    const stream = Readable.from(["task=9,ts=5,outcome=ok\n"], { objectMode: false });

    const result = await runAnalysis({
      context: makeContext(),
      sources: [{ kind: "stream", label: "stdin", stream }],
      runId: "run-stdin",
      snapshotProvider: new StaticSnapshotProvider([]),
      renderer: new MemoryRenderer(),
      logger: new MemoryLogger(),
    });

    expect(result.shards).toEqual([expect.objectContaining({ source: "stdin", events: 1 })]);
    expect(result.metrics.bucketWidth).toBe(3_600_000);
  });
});
