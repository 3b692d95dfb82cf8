/**
 * Rule interpreter that assigns a ScheduleStatus to every parsed event.
 * Rules are evaluated in order and the first match wins; no match means "unknown".
 * Conditions are a closed tagged union so rulesets can live in YAML.
 */

import type { ClassifiedEvent, ScheduleStatus, TaskEvent } from "./events.js";

// =============================================================================
// TYPES
// =============================================================================

export const SCHEDULE_STATES = ["within", "outside", "absent", "unparsed"] as const;
export type ScheduleState = (typeof SCHEDULE_STATES)[number];

export type RuleCondition =
  | { kind: "field-equals"; field: string; value: string }
  | { kind: "field-in-range"; field: string; min?: number; max?: number }
  | { kind: "field-present"; field: string }
  | { kind: "schedule"; state: ScheduleState }
  | { kind: "all"; conditions: RuleCondition[] }
  | { kind: "any"; conditions: RuleCondition[] }
  | { kind: "not"; condition: RuleCondition };

export type ClassificationRule = {
  name: string;
  when: RuleCondition;
  status: ScheduleStatus;
};

export type Classifier = {
  readonly rules: readonly ClassificationRule[];
  match(event: TaskEvent): ClassificationRule | null;
  classify(event: TaskEvent): ClassifiedEvent;
};

// =============================================================================
// DEFAULT RULESET
// =============================================================================

export const DEFAULT_RULESET: readonly ClassificationRule[] = [
  { name: "unreadable-schedule", when: { kind: "schedule", state: "unparsed" }, status: "unknown" },
  { name: "within-window", when: { kind: "schedule", state: "within" }, status: "scheduled" },
  { name: "outside-window", when: { kind: "schedule", state: "outside" }, status: "unscheduled" },
  { name: "no-schedule", when: { kind: "schedule", state: "absent" }, status: "unscheduled" },
];

// =============================================================================
// PUBLIC API
// =============================================================================

export function createClassifier(rules: readonly ClassificationRule[]): Classifier {
  const ordered = Object.freeze(rules.map((rule) => ({ ...rule })));

  const match = (event: TaskEvent): ClassificationRule | null =>
    ordered.find((rule) => evaluateCondition(rule.when, event)) ?? null;

  return {
    rules: ordered,
    match,
    classify(event) {
      const rule = match(event);
      return Object.freeze({
        ...event,
        status: rule ? rule.status : "unknown",
        rule: rule ? rule.name : null,
      });
    },
  };
}

export function evaluateCondition(condition: RuleCondition, event: TaskEvent): boolean {
  switch (condition.kind) {
    case "field-equals":
      return resolveField(event, condition.field) === condition.value;
    case "field-present": {
      const value = resolveField(event, condition.field);
      return value !== undefined && value !== "";
    }
    case "field-in-range": {
      const value = resolveNumericField(event, condition.field);
      if (value === undefined) return false;
      if (condition.min !== undefined && value < condition.min) return false;
      if (condition.max !== undefined && value > condition.max) return false;
      return true;
    }
    case "schedule":
      return resolveScheduleState(event) === condition.state;
    case "all":
      return condition.conditions.every((child) => evaluateCondition(child, event));
    case "any":
      return condition.conditions.some((child) => evaluateCondition(child, event));
    case "not":
      return !evaluateCondition(condition.condition, event);
  }
}

export function resolveScheduleState(event: TaskEvent): ScheduleState {
  const schedule = event.declared_schedule;
  if (!schedule) return "absent";
  if (schedule.kind === "unparsed") return "unparsed";
  return event.timestamp >= schedule.start && event.timestamp <= schedule.end
    ? "within"
    : "outside";
}

// =============================================================================
// FIELD LOOKUP
// =============================================================================

function resolveField(event: TaskEvent, field: string): string | undefined {
  switch (field) {
    case "task_id":
      return event.task_id;
    case "task_type":
      return event.task_type;
    case "outcome":
      return event.outcome;
    case "schedule":
      return event.declared_schedule?.text;
    case "timestamp":
      return String(event.timestamp);
    case "duration":
      return event.duration === undefined ? undefined : String(event.duration);
    default:
      return Object.prototype.hasOwnProperty.call(event.raw_fields, field)
        ? event.raw_fields[field]
        : undefined;
  }
}

function resolveNumericField(event: TaskEvent, field: string): number | undefined {
  if (field === "timestamp") return event.timestamp;
  if (field === "duration") return event.duration;

  const raw = resolveField(event, field);
  if (raw === undefined || raw.trim() === "") return undefined;

  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}
