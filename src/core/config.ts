import { z } from "zod";

import {
  DEFAULT_RULESET,
  SCHEDULE_STATES,
  type ClassificationRule,
  type RuleCondition,
} from "./classifier.js";
import { SCHEDULE_STATUSES } from "./events.js";

// =============================================================================
// LOG FORMAT
// =============================================================================

export const CANONICAL_FIELDS = [
  "task_id",
  "task_type",
  "timestamp",
  "schedule",
  "outcome",
  "duration",
] as const;
export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

// Fields the parser needs no matter what required_fields says.
export const MINIMUM_REQUIRED_FIELDS: readonly CanonicalField[] = ["task_id", "timestamp", "outcome"];

const FieldMapSchema = z.object({
  task_id: z.string().min(1).default("task"),
  task_type: z.string().min(1).default("type"),
  timestamp: z.string().min(1).default("ts"),
  schedule: z.string().min(1).default("schedule"),
  outcome: z.string().min(1).default("outcome"),
  duration: z.string().min(1).default("duration"),
});

const OutcomeValuesSchema = z.object({
  success: z.array(z.string().min(1)).default(["success", "ok", "completed"]),
  failure: z.array(z.string().min(1)).default(["failure", "failed", "error"]),
  retry: z.array(z.string().min(1)).default(["retry", "retrying"]),
});

export const LogFormatSchema = z
  .object({
    // keyed: "task=1,ts=100"; positional: "1,100" read against `columns`.
    mode: z.enum(["keyed", "positional"]).default("keyed"),
    delimiter: z.string().min(1).default(","),
    key_separator: z.string().min(1).default("="),
    columns: z.array(z.string().min(1)).default([]),
    header_lines: z.number().int().nonnegative().default(0),
    fields: FieldMapSchema.default({}),
    required_fields: z.array(z.enum(CANONICAL_FIELDS)).default([...MINIMUM_REQUIRED_FIELDS]),
    timestamp: z.enum(["number", "iso"]).default("number"),
    window_separator: z.string().min(1).default("-"),
    outcome_values: OutcomeValuesSchema.default({}),
    default_task_type: z.string().min(1).default("unknown"),
  })
  .strict()
  .superRefine((format, ctx) => {
    if (format.mode === "positional" && format.columns.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["columns"],
        message: "positional mode needs at least one column",
      });
    }
  });

export type LogFormatConfig = z.infer<typeof LogFormatSchema>;

// =============================================================================
// CLASSIFIER RULES
// =============================================================================

export const RuleConditionSchema: z.ZodType<RuleCondition> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal("field-equals"), field: z.string().min(1), value: z.string() }),
    z
      .object({
        kind: z.literal("field-in-range"),
        field: z.string().min(1),
        min: z.number().optional(),
        max: z.number().optional(),
      })
      .refine((cond) => cond.min !== undefined || cond.max !== undefined, {
        message: "field-in-range needs min, max, or both",
      }),
    z.object({ kind: z.literal("field-present"), field: z.string().min(1) }),
    z.object({ kind: z.literal("schedule"), state: z.enum(SCHEDULE_STATES) }),
    z.object({ kind: z.literal("all"), conditions: z.array(RuleConditionSchema).min(1) }),
    z.object({ kind: z.literal("any"), conditions: z.array(RuleConditionSchema).min(1) }),
    z.object({ kind: z.literal("not"), condition: RuleConditionSchema }),
  ]),
);

export const ClassificationRuleSchema: z.ZodType<ClassificationRule> = z.object({
  name: z.string().min(1),
  when: RuleConditionSchema,
  status: z.enum(SCHEDULE_STATUSES),
});

const ClassifierSchema = z
  .object({
    rules: z
      .array(ClassificationRuleSchema)
      .min(1)
      .default(() => DEFAULT_RULESET.map((rule) => ({ ...rule }))),
  })
  .strict();

// =============================================================================
// AGGREGATION / REPORT / RUNTIME
// =============================================================================

const AggregationSchema = z
  .object({
    // Same unit as parsed timestamps (milliseconds for iso).
    bucket_width: z.number().positive().default(3_600_000),
    max_parallel_shards: z.number().int().positive().default(4),
  })
  .strict();

const SnapshotsSchema = z
  .object({
    base_dir: z.string().min(1).default("."),
    patterns: z.array(z.string().min(1)).default([]),
  })
  .strict();

const ReportSchema = z
  .object({
    title: z.string().min(1).default("Scheduler Log Analysis Report"),
    output_dir: z.string().min(1).default("reports"),
    fill_gaps: z.boolean().default(false),
    max_rejected_ratio: z.number().min(0).max(1).optional(),
    snapshots: SnapshotsSchema.default({}),
  })
  .strict();

const ReaderSchema = z
  .object({
    timeout_ms: z.number().int().positive().default(30_000),
  })
  .strict();

const LoggingSchema = z
  .object({
    enabled: z.boolean().default(true),
    parse_error_samples: z.number().int().nonnegative().default(20),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    log_format: LogFormatSchema.default({}),
    classifier: ClassifierSchema.default({}),
    aggregation: AggregationSchema.default({}),
    report: ReportSchema.default({}),
    reader: ReaderSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ReportConfig = ProjectConfig["report"];
export type SnapshotsConfig = ReportConfig["snapshots"];

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}
