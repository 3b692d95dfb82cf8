import { ReportMetrics } from "./aggregator.js";
import type { Classifier } from "./classifier.js";
import type { LogFormatConfig } from "./config.js";
import { isBlankLine, parseLine } from "./event-parser.js";
import {
  createIngestStats,
  recordParseError,
  type ClassifiedEvent,
  type IngestStats,
  type ParseError,
} from "./events.js";

// =============================================================================
// TYPES
// =============================================================================

export type TimeWindow = {
  since?: number;
  until?: number;
};

export type AnalyzeLinesOptions = {
  format: LogFormatConfig;
  classifier: Classifier;
  bucketWidth: number;
  window?: TimeWindow;
  parseErrorSamples?: number;
  onParseError?: (error: ParseError) => void;
  onEvent?: (event: ClassifiedEvent) => void;
};

export type ShardResult = {
  metrics: ReportMetrics;
  ingest: IngestStats;
};

const DEFAULT_PARSE_ERROR_SAMPLES = 20;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Runs parse -> classify -> aggregate over one shard of lines.
 * Each call owns its accumulators, so shards can run concurrently and merge afterwards.
 */
export async function analyzeLines(
  lines: AsyncIterable<string> | Iterable<string>,
  options: AnalyzeLinesOptions,
): Promise<ShardResult> {
  const metrics = new ReportMetrics(options.bucketWidth);
  const ingest = createIngestStats();
  const sampleLimit = options.parseErrorSamples ?? DEFAULT_PARSE_ERROR_SAMPLES;
  let headerLinesLeft = options.format.header_lines;
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber += 1;

    if (isBlankLine(line)) {
      ingest.blankLines += 1;
      continue;
    }
    if (headerLinesLeft > 0) {
      headerLinesLeft -= 1;
      ingest.headerLines += 1;
      continue;
    }

    ingest.linesRead += 1;
    const result = parseLine(line, lineNumber, options.format);
    if (!result.ok) {
      recordParseError(ingest, result.error, sampleLimit);
      options.onParseError?.(result.error);
      continue;
    }

    ingest.parsed += 1;
    if (!withinWindow(result.event.timestamp, options.window)) {
      ingest.filtered += 1;
      continue;
    }

    const classified = options.classifier.classify(result.event);
    metrics.record(classified);
    options.onEvent?.(classified);
  }

  return { metrics, ingest };
}

export function withinWindow(timestamp: number, window: TimeWindow | undefined): boolean {
  if (!window) return true;
  if (window.since !== undefined && timestamp < window.since) return false;
  if (window.until !== undefined && timestamp > window.until) return false;
  return true;
}
