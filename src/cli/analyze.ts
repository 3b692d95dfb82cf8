import path from "node:path";
import type { Readable } from "node:stream";

import fg from "fast-glob";

import { runAnalysis, type AnalysisResult } from "../app/analysis/run-analysis.js";
import type { AppContext } from "../app/context.js";
import { JsonReportRenderer } from "../app/report/report-renderer.js";
import { FileSnapshotProvider } from "../app/snapshots/snapshot-provider.js";
import { ReportError, SourceUnavailableError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { parseTimestamp } from "../core/event-parser.js";
import type { LogSource } from "../core/log-reader.js";
import { JsonlLogger, nullLogger, type RunLogger } from "../core/logger.js";
import { runLogPath } from "../core/paths.js";
import type { TimeWindow } from "../core/pipeline.js";
import { formatPercent } from "../core/report-assembler.js";
import { defaultRunId } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type AnalyzeCommandOptions = {
  sources: string[];
  runId?: string;
  bucketWidth?: number;
  since?: string;
  until?: string;
  snapshots?: string[];
  json?: boolean;
  debug?: boolean;
};

export type AnalyzeCommandIo = {
  stdin: Readable;
  cwd: string;
};

export const STDIN_SOURCE = "-";

// =============================================================================
// COMMAND
// =============================================================================

export async function analyzeCommand(
  appContext: AppContext,
  opts: AnalyzeCommandOptions,
  io: AnalyzeCommandIo = { stdin: process.stdin, cwd: process.cwd() },
): Promise<AnalysisResult> {
  const { config } = appContext;
  const runId = opts.runId ?? defaultRunId();
  const sources = await resolveSources(opts.sources, io);
  const window = resolveWindow(opts, config.log_format.timestamp);
  const bucketWidth = resolveBucketWidth(opts.bucketWidth);

  const snapshotProvider =
    opts.snapshots && opts.snapshots.length > 0
      ? new FileSnapshotProvider(io.cwd, opts.snapshots)
      : new FileSnapshotProvider(config.report.snapshots.base_dir, config.report.snapshots.patterns);

  const logger: RunLogger = config.logging.enabled
    ? new JsonlLogger(runLogPath(appContext.outputDir, runId), { runId }, { debug: opts.debug })
    : nullLogger;

  let result: AnalysisResult;
  try {
    result = await runAnalysis({
      context: appContext,
      sources,
      runId,
      window,
      bucketWidth,
      snapshotProvider,
      renderer: new JsonReportRenderer(appContext.outputDir),
      logger,
    });
  } catch (err) {
    throw toUserFacingError(err);
  } finally {
    logger.close();
  }

  if (opts.json) {
    console.log(JSON.stringify(result.document, null, 2));
  } else {
    printSummary(result);
  }
  return result;
}

// =============================================================================
// INPUT RESOLUTION
// =============================================================================

export async function resolveSources(args: string[], io: AnalyzeCommandIo): Promise<LogSource[]> {
  const sources: LogSource[] = [];
  let stdinUsed = false;

  for (const arg of args) {
    if (arg === STDIN_SOURCE) {
      if (!stdinUsed) {
        sources.push({ kind: "stream", label: "stdin", stream: io.stdin });
        stdinUsed = true;
      }
      continue;
    }

    if (!fg.isDynamicPattern(arg)) {
      sources.push({ kind: "file", path: path.resolve(io.cwd, arg) });
      continue;
    }

    const matches = await fg(arg, { cwd: io.cwd, absolute: true, onlyFiles: true });
    if (matches.length === 0) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.source,
        title: "No log files matched.",
        message: `Pattern ${arg} matched no files under ${io.cwd}.`,
        hint: "Quote glob patterns so the shell does not expand them.",
      });
    }
    for (const file of matches.sort()) {
      sources.push({ kind: "file", path: file });
    }
  }

  if (sources.length === 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "No log sources given.",
      message: "Pass one or more log files, glob patterns, or - for stdin.",
    });
  }
  return sources;
}

function resolveWindow(
  opts: Pick<AnalyzeCommandOptions, "since" | "until">,
  kind: "number" | "iso",
): TimeWindow | undefined {
  if (opts.since === undefined && opts.until === undefined) return undefined;

  const read = (flag: string, value: string | undefined): number | undefined => {
    if (value === undefined) return undefined;
    const parsed = parseTimestamp(value, kind);
    if (parsed === null) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.input,
        title: "Invalid time window.",
        message: `${flag} ${value} is not a valid ${kind} timestamp.`,
        hint: "Use the same timestamp format as log_format.timestamp.",
      });
    }
    return parsed;
  };

  return { since: read("--since", opts.since), until: read("--until", opts.until) };
}

function resolveBucketWidth(value: number | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isFinite(value) || value <= 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Invalid bucket width.",
      message: `--bucket-width must be a positive number, received ${value}.`,
    });
  }
  return value;
}

function toUserFacingError(err: unknown): unknown {
  if (err instanceof SourceUnavailableError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.source,
      title: "Log source unavailable.",
      message: err.message,
      hint: "Check the path and permissions, or raise reader.timeout_ms for slow streams.",
      cause: err,
    });
  }
  if (err instanceof ReportError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.report,
      title: "Report not written.",
      message: err.message,
      cause: err,
    });
  }
  return err;
}

// =============================================================================
// OUTPUT
// =============================================================================

function printSummary(result: AnalysisResult): void {
  const { metrics, ingest } = result;
  console.log(`Report written to ${result.reportPath}`);
  console.log(
    `Events: ${metrics.total} (scheduled ${metrics.countFor("scheduled")}, ` +
      `unscheduled ${metrics.countFor("unscheduled")}, unknown ${metrics.countFor("unknown")})`,
  );
  console.log(
    `Scheduled ratio: ${formatPercent(metrics.scheduledRatio)}, ` +
      `unscheduled ratio: ${formatPercent(metrics.unscheduledRatio)}`,
  );
  console.log(
    `Lines: read ${ingest.linesRead}, parsed ${ingest.parsed}, rejected ${ingest.rejected}` +
      (ingest.filtered > 0 ? `, outside window ${ingest.filtered}` : ""),
  );
}
