/**
 * Event model shared by every pipeline stage.
 * Purpose: one immutable shape per parsed log line, plus the side-channel for rejected lines.
 * Assumptions: timestamps are plain numbers in whatever unit the log format produces.
 * Usage: parser creates TaskEvent, classifier wraps it in ClassifiedEvent, aggregator folds it.
 */

// =============================================================================
// ENUMS
// =============================================================================

export const TASK_OUTCOMES = ["success", "failure", "retry", "unknown"] as const;
export type TaskOutcome = (typeof TASK_OUTCOMES)[number];

export const SCHEDULE_STATUSES = ["scheduled", "unscheduled", "unknown"] as const;
export type ScheduleStatus = (typeof SCHEDULE_STATUSES)[number];

export const PARSE_ERROR_REASONS = ["missing_field", "bad_timestamp", "malformed"] as const;
export type ParseErrorReason = (typeof PARSE_ERROR_REASONS)[number];

// =============================================================================
// EVENTS
// =============================================================================

export type ScheduleWindow = {
  readonly kind: "window";
  readonly start: number;
  readonly end: number;
  // Schedule value as written in the log.
  readonly text: string;
};

// A schedule value was present but could not be read as a window.
export type UnparsedSchedule = {
  readonly kind: "unparsed";
  readonly text: string;
};

export type DeclaredSchedule = ScheduleWindow | UnparsedSchedule;

export type TaskEvent = {
  readonly task_id: string;
  readonly task_type: string;
  readonly timestamp: number;
  readonly declared_schedule?: DeclaredSchedule;
  readonly outcome: TaskOutcome;
  readonly duration?: number;
  readonly raw_fields: Readonly<Record<string, string>>;
  readonly line_number: number;
};

export type ClassifiedEvent = TaskEvent & {
  readonly status: ScheduleStatus;
  // Name of the rule that matched; null when no rule did.
  readonly rule: string | null;
};

export type ParseError = {
  readonly reason: ParseErrorReason;
  readonly detail: string;
  readonly line: string;
  readonly line_number: number;
};

export type ParseResult = { ok: true; event: TaskEvent } | { ok: false; error: ParseError };

// =============================================================================
// INGEST STATS
// =============================================================================

export type IngestStats = {
  // Non-blank, non-header lines handed to the parser.
  linesRead: number;
  blankLines: number;
  headerLines: number;
  parsed: number;
  rejected: number;
  // Parsed events dropped by the --since/--until window.
  filtered: number;
  rejectedByReason: Record<ParseErrorReason, number>;
  samples: ParseError[];
};

export function createIngestStats(): IngestStats {
  return {
    linesRead: 0,
    blankLines: 0,
    headerLines: 0,
    parsed: 0,
    rejected: 0,
    filtered: 0,
    rejectedByReason: { missing_field: 0, bad_timestamp: 0, malformed: 0 },
    samples: [],
  };
}

export function recordParseError(stats: IngestStats, error: ParseError, sampleLimit: number): void {
  stats.rejected += 1;
  stats.rejectedByReason[error.reason] += 1;
  if (stats.samples.length < sampleLimit) {
    stats.samples.push(error);
  }
}

export function mergeIngestStats(a: IngestStats, b: IngestStats): IngestStats {
  return {
    linesRead: a.linesRead + b.linesRead,
    blankLines: a.blankLines + b.blankLines,
    headerLines: a.headerLines + b.headerLines,
    parsed: a.parsed + b.parsed,
    rejected: a.rejected + b.rejected,
    filtered: a.filtered + b.filtered,
    rejectedByReason: {
      missing_field: a.rejectedByReason.missing_field + b.rejectedByReason.missing_field,
      bad_timestamp: a.rejectedByReason.bad_timestamp + b.rejectedByReason.bad_timestamp,
      malformed: a.rejectedByReason.malformed + b.rejectedByReason.malformed,
    },
    samples: [...a.samples, ...b.samples],
  };
}

export function rejectedFraction(stats: IngestStats): number | null {
  if (stats.linesRead === 0) return null;
  return stats.rejected / stats.linesRead;
}
