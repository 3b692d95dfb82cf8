/**
 * Drives one analysis run: every log source is a shard with its own accumulators,
 * shards run concurrently up to aggregation.max_parallel_shards, and their results merge
 * once all have finished. The merged metrics become the report handed to the renderer.
 * The first shard failure stops the remaining shards and fails the run.
 */

import { mergeMetrics, type ReportMetrics } from "../../core/aggregator.js";
import { createClassifier, type Classifier } from "../../core/classifier.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { describeParseError } from "../../core/event-parser.js";
import { createIngestStats, mergeIngestStats, type IngestStats } from "../../core/events.js";
import { describeSource, readLogLines, type LogSource } from "../../core/log-reader.js";
import { logRunEvent, type RunLogger } from "../../core/logger.js";
import { analyzeLines, type ShardResult, type TimeWindow } from "../../core/pipeline.js";
import { assembleReport } from "../../core/report-assembler.js";
import type { ReportDocument } from "../../core/report-sections.js";
import type { AppContext } from "../context.js";
import type { ReportRenderer } from "../report/report-renderer.js";
import type { SnapshotProvider } from "../snapshots/snapshot-provider.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunAnalysisOptions = {
  context: AppContext;
  sources: readonly LogSource[];
  runId: string;
  snapshotProvider: SnapshotProvider;
  renderer: ReportRenderer;
  logger: RunLogger;
  window?: TimeWindow;
  bucketWidth?: number;
  signal?: AbortSignal;
  now?: () => Date;
};

export type ShardSummary = {
  source: string;
  ingest: IngestStats;
  events: number;
};

export type AnalysisResult = {
  document: ReportDocument;
  reportPath: string;
  metrics: ReportMetrics;
  ingest: IngestStats;
  shards: ShardSummary[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runAnalysis(options: RunAnalysisOptions): Promise<AnalysisResult> {
  const { config } = options.context;
  const { logger } = options;
  const bucketWidth = options.bucketWidth ?? config.aggregation.bucket_width;
  const classifier = createClassifier(config.classifier.rules);

  logRunEvent(logger, "run.start", {
    payload: {
      sources: options.sources.map(describeSource),
      bucket_width: bucketWidth,
      rules: classifier.rules.map((rule) => rule.name),
    },
  });

  const shards = new AbortController();
  const forwardAbort = (): void => shards.abort();
  if (options.signal?.aborted) {
    shards.abort();
  } else {
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
  }

  try {
    const shardResults = await mapWithConcurrency(
      options.sources,
      config.aggregation.max_parallel_shards,
      shards,
      (source) =>
        analyzeSource(source, { ...options, signal: shards.signal, bucketWidth, classifier }),
    );

    const metrics = mergeMetrics(
      shardResults.map((shard) => shard.metrics),
      bucketWidth,
    );
    const ingest = shardResults.reduce(
      (acc, shard) => mergeIngestStats(acc, shard.ingest),
      createIngestStats(),
    );

    const snapshots = await options.snapshotProvider.capture();
    const sections = assembleReport({
      metrics,
      ingest,
      snapshots,
      fillGaps: config.report.fill_gaps,
      maxRejectedRatio: config.report.max_rejected_ratio,
    });

    const document: ReportDocument = {
      title: config.report.title,
      runId: options.runId,
      generatedAt: (options.now ?? (() => new Date()))().toISOString(),
      sections,
    };
    const reportPath = await options.renderer.render(document);

    logRunEvent(logger, "report.written", {
      payload: { path: reportPath, sections: sections.length, snapshots: snapshots.length },
    });
    logRunEvent(logger, "run.complete", {
      payload: {
        events: metrics.total,
        lines_read: ingest.linesRead,
        rejected: ingest.rejected,
        unknown: metrics.countFor("unknown"),
      },
    });

    return {
      document,
      reportPath,
      metrics,
      ingest,
      shards: shardResults.map((shard, index) => ({
        source: describeSource(options.sources[index]),
        ingest: shard.ingest,
        events: shard.metrics.total,
      })),
    };
  } catch (err) {
    logRunEvent(logger, "run.failed", { payload: { error: formatErrorMessage(err) } });
    throw err;
  } finally {
    options.signal?.removeEventListener("abort", forwardAbort);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function analyzeSource(
  source: LogSource,
  options: RunAnalysisOptions & { bucketWidth: number; classifier: Classifier },
): Promise<ShardResult> {
  const { config } = options.context;
  const label = describeSource(source);
  const sampleLimit = config.logging.parse_error_samples;
  let loggedErrors = 0;

  logRunEvent(options.logger, "source.open", { source: label });

  const result = await analyzeLines(
    readLogLines(source, { timeoutMs: config.reader.timeout_ms, signal: options.signal }),
    {
      format: config.log_format,
      classifier: options.classifier,
      bucketWidth: options.bucketWidth,
      window: options.window,
      parseErrorSamples: sampleLimit,
      onParseError: (error) => {
        if (loggedErrors >= sampleLimit) return;
        loggedErrors += 1;
        logRunEvent(options.logger, "parse.error", {
          source: label,
          payload: {
            reason: error.reason,
            line_number: error.line_number,
            message: describeParseError(error),
          },
        });
      },
    },
  );

  if (options.signal?.aborted) {
    return result;
  }

  logRunEvent(options.logger, "source.complete", {
    source: label,
    payload: {
      lines_read: result.ingest.linesRead,
      parsed: result.ingest.parsed,
      rejected: result.ingest.rejected,
      filtered: result.ingest.filtered,
      events: result.metrics.total,
    },
  });

  return result;
}

/**
 * Runs `worker` over `items` with at most `limit` in flight. The first failure aborts
 * `controller` so running workers wind down, and no new item starts. The returned promise
 * rejects with that failure once every lane has stopped.
 */
async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  controller: AbortController,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;
  const failures: unknown[] = [];

  const runNext = async (): Promise<void> => {
    while (nextIndex < items.length && failures.length === 0) {
      const index = nextIndex;
      nextIndex += 1;
      try {
        results[index] = await worker(items[index]);
      } catch (err) {
        failures.push(err);
        controller.abort();
      }
    }
  };

  const lanes = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => runNext());
  await Promise.all(lanes);
  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
