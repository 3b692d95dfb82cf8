/**
 * Line grammar for scheduler logs.
 *
 * A line is split on `delimiter` (double-quoted values may contain the delimiter). In keyed
 * mode each segment is `key<key_separator>value`; in positional mode segments are matched to
 * `columns` by index. Either way the result is a key -> value record that `fields` maps onto
 * the canonical TaskEvent fields. Keys not mapped to a canonical field land in `raw_fields`.
 *
 * parseLine never throws: every non-blank line becomes exactly one TaskEvent or ParseError.
 */

import {
  CANONICAL_FIELDS,
  MINIMUM_REQUIRED_FIELDS,
  type CanonicalField,
  type LogFormatConfig,
} from "./config.js";
import type {
  DeclaredSchedule,
  ParseError,
  ParseErrorReason,
  ParseResult,
  TaskEvent,
  TaskOutcome,
} from "./events.js";

type FieldRecord = Map<string, string>;

type SplitResult = { ok: true; record: FieldRecord } | { ok: false; detail: string };

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseLine(line: string, lineNumber: number, format: LogFormatConfig): ParseResult {
  const trimmed = stripLineEnding(line).trim();
  const reject = (reason: ParseErrorReason, detail: string): ParseResult => ({
    ok: false,
    error: { reason, detail, line, line_number: lineNumber },
  });

  if (trimmed === "") {
    return reject("malformed", "line is empty");
  }

  const split = format.mode === "keyed" ? splitKeyed(trimmed, format) : splitPositional(trimmed, format);
  if (!split.ok) {
    return reject("malformed", split.detail);
  }

  const record = split.record;
  const lookup = (field: CanonicalField): string | undefined => {
    const value = record.get(format.fields[field]);
    return value === undefined || value === "" ? undefined : value;
  };

  for (const field of requiredFields(format)) {
    if (lookup(field) === undefined) {
      return reject("missing_field", `missing ${field} (key "${format.fields[field]}")`);
    }
  }

  const rawTimestamp = lookup("timestamp") ?? "";
  const timestamp = parseTimestamp(rawTimestamp, format.timestamp);
  if (timestamp === null) {
    return reject("bad_timestamp", `cannot read timestamp "${rawTimestamp}" as ${format.timestamp}`);
  }

  let duration: number | undefined;
  const rawDuration = lookup("duration");
  if (rawDuration !== undefined) {
    if (!NUMBER_PATTERN.test(rawDuration)) {
      return reject("malformed", `duration "${rawDuration}" is not a number`);
    }
    duration = Number(rawDuration);
  }

  const rawSchedule = lookup("schedule");
  const event: TaskEvent = {
    task_id: lookup("task_id") ?? "",
    task_type: lookup("task_type") ?? format.default_task_type,
    timestamp,
    outcome: normalizeOutcome(lookup("outcome") ?? "", format),
    raw_fields: Object.freeze(collectRawFields(record, format)),
    line_number: lineNumber,
    ...(rawSchedule !== undefined
      ? { declared_schedule: parseScheduleWindow(rawSchedule, format) }
      : {}),
    ...(duration !== undefined ? { duration } : {}),
  };

  return { ok: true, event: Object.freeze(event) };
}

export function isBlankLine(line: string): boolean {
  return line.trim() === "";
}

export function parseTimestamp(value: string, kind: LogFormatConfig["timestamp"]): number | null {
  const text = value.trim();
  if (text === "") return null;

  if (kind === "number") {
    if (!NUMBER_PATTERN.test(text)) return null;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : null;
  }

  const parsed = Date.parse(text);
  return Number.isNaN(parsed) ? null : parsed;
}

export function parseScheduleWindow(value: string, format: LogFormatConfig): DeclaredSchedule {
  const text = value.trim();
  const separator = format.window_separator;

  // ISO dates and negative starts contain the default "-" separator, so try every occurrence
  // after the first character until both halves parse.
  let index = text.indexOf(separator, 1);
  while (index !== -1) {
    const start = parseTimestamp(text.slice(0, index), format.timestamp);
    const end = parseTimestamp(text.slice(index + separator.length), format.timestamp);
    if (start !== null && end !== null && start <= end) {
      return { kind: "window", start, end, text };
    }
    index = text.indexOf(separator, index + separator.length);
  }

  return { kind: "unparsed", text };
}

export function describeParseError(error: ParseError): string {
  return `line ${error.line_number}: ${error.reason} (${error.detail})`;
}

// =============================================================================
// SPLITTING
// =============================================================================

function splitKeyed(line: string, format: LogFormatConfig): SplitResult {
  const record: FieldRecord = new Map();

  for (const segment of splitDelimited(line, format.delimiter)) {
    const trimmed = segment.trim();
    if (trimmed === "") continue;

    const separatorIndex = trimmed.indexOf(format.key_separator);
    if (separatorIndex <= 0) {
      return { ok: false, detail: `segment "${trimmed}" has no key` };
    }

    const key = trimmed.slice(0, separatorIndex).trim();
    const value = unquote(trimmed.slice(separatorIndex + format.key_separator.length).trim());
    record.set(key, value);
  }

  if (record.size === 0) {
    return { ok: false, detail: "no fields found" };
  }
  return { ok: true, record };
}

function splitPositional(line: string, format: LogFormatConfig): SplitResult {
  const values = splitDelimited(line, format.delimiter);
  if (values.length > format.columns.length) {
    return {
      ok: false,
      detail: `expected at most ${format.columns.length} columns, found ${values.length}`,
    };
  }

  const record: FieldRecord = new Map();
  values.forEach((value, index) => {
    record.set(format.columns[index], unquote(value.trim()));
  });
  return { ok: true, record };
}

function splitDelimited(line: string, delimiter: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < line.length; i += 1) {
    const char = line[i];
    if (char === '"') {
      if (quoted && line[i + 1] === '"') {
        current += '""';
        i += 1;
        continue;
      }
      quoted = !quoted;
      current += char;
      continue;
    }

    if (!quoted && line.startsWith(delimiter, i)) {
      parts.push(current);
      current = "";
      i += delimiter.length - 1;
      continue;
    }

    current += char;
  }

  parts.push(current);
  return parts;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/""/g, '"');
  }
  return value;
}

// =============================================================================
// FIELD HELPERS
// =============================================================================

function requiredFields(format: LogFormatConfig): CanonicalField[] {
  return [...new Set<CanonicalField>([...MINIMUM_REQUIRED_FIELDS, ...format.required_fields])];
}

function normalizeOutcome(value: string, format: LogFormatConfig): TaskOutcome {
  const needle = value.trim().toLowerCase();
  const matches = (candidates: string[]): boolean =>
    candidates.some((candidate) => candidate.toLowerCase() === needle);

  if (matches(format.outcome_values.success)) return "success";
  if (matches(format.outcome_values.failure)) return "failure";
  if (matches(format.outcome_values.retry)) return "retry";
  return "unknown";
}

function collectRawFields(record: FieldRecord, format: LogFormatConfig): Record<string, string> {
  const mappedKeys = new Set(CANONICAL_FIELDS.map((field) => format.fields[field]));
  const raw: Record<string, string> = {};
  for (const [key, value] of record) {
    if (!mappedKeys.has(key)) {
      raw[key] = value;
    }
  }
  return raw;
}

function stripLineEnding(line: string): string {
  return line.replace(/[\r\n]+$/, "");
}
