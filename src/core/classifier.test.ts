import { describe, expect, it } from "vitest";

import {
  DEFAULT_RULESET,
  createClassifier,
  resolveScheduleState,
  type ClassificationRule,
} from "./classifier.js";
import { defaultProjectConfig } from "./config.js";
import { parseLine } from "./event-parser.js";
import type { TaskEvent } from "./events.js";

function makeEvent(overrides: Partial<TaskEvent> = {}): TaskEvent {
  return {
    task_id: "1",
    task_type: "batch",
    timestamp: 100,
    outcome: "success",
    raw_fields: {},
    line_number: 1,
    ...overrides,
  };
}

describe("default ruleset", () => {
  const classifier = createClassifier(DEFAULT_RULESET);

  it("marks events inside their declared window as scheduled", () => {
    const event = makeEvent({ declared_schedule: { kind: "window", start: 90, end: 110, text: "90-110" } });
    expect(classifier.classify(event)).toMatchObject({ status: "scheduled", rule: "within-window" });
  });

  it("marks events outside their declared window as unscheduled", () => {
    const event = makeEvent({
      timestamp: 200,
      declared_schedule: { kind: "window", start: 90, end: 110, text: "90-110" },
    });
    expect(classifier.classify(event)).toMatchObject({
      status: "unscheduled",
      rule: "outside-window",
    });
  });

  it("marks events without a schedule as unscheduled", () => {
    expect(classifier.classify(makeEvent())).toMatchObject({
      status: "unscheduled",
      rule: "no-schedule",
    });
  });

  it("marks events with an unreadable schedule as unknown", () => {
    const event = makeEvent({ declared_schedule: { kind: "unparsed", text: "daily" } });
    expect(classifier.classify(event)).toMatchObject({
      status: "unknown",
      rule: "unreadable-schedule",
    });
  });

  it("includes both window boundaries", () => {
    const window = { kind: "window", start: 90, end: 110, text: "90-110" } as const;
    expect(resolveScheduleState(makeEvent({ timestamp: 90, declared_schedule: window }))).toBe(
      "within",
    );
    expect(resolveScheduleState(makeEvent({ timestamp: 110, declared_schedule: window }))).toBe(
      "within",
    );
    expect(resolveScheduleState(makeEvent({ timestamp: 111, declared_schedule: window }))).toBe(
      "outside",
    );
  });

  it("returns the same result for the same event", () => {
    const event = makeEvent({ declared_schedule: { kind: "window", start: 0, end: 50, text: "0-50" } });
    expect(classifier.classify(event)).toEqual(classifier.classify(event));
  });
});

describe("createClassifier", () => {
  const batchRule: ClassificationRule = {
    name: "batch-is-scheduled",
    when: { kind: "field-equals", field: "task_type", value: "batch" },
    status: "scheduled",
  };
  const catchAll: ClassificationRule = {
    name: "everything-else",
    when: { kind: "not", condition: { kind: "field-present", field: "nonexistent" } },
    status: "unscheduled",
  };

  it("applies the first matching rule", () => {
    const event = makeEvent();

    expect(createClassifier([batchRule, catchAll]).classify(event).rule).toBe(
      "batch-is-scheduled",
    );
    expect(createClassifier([catchAll, batchRule]).classify(event).rule).toBe("everything-else");
  });

  it("falls back to unknown when no rule matches", () => {
    const classified = createClassifier([batchRule]).classify(makeEvent({ task_type: "cron" }));

    expect(classified.status).toBe("unknown");
    expect(classified.rule).toBeNull();
  });

  it("leaves the input event untouched", () => {
    const event = makeEvent();
    const classified = createClassifier([batchRule]).classify(event);

    expect(classified).not.toBe(event);
    expect(event).not.toHaveProperty("status");
    expect(Object.isFrozen(classified)).toBe(true);
  });

  it("is not affected by later changes to the rules array", () => {
    const rules = [batchRule];
    const classifier = createClassifier(rules);
    rules.unshift(catchAll);

    expect(classifier.rules).toHaveLength(1);
    expect(classifier.classify(makeEvent()).rule).toBe("batch-is-scheduled");
  });

  it("compares numeric raw fields by range", () => {
    const classifier = createClassifier([
      {
        name: "high-priority",
        when: { kind: "field-in-range", field: "priority", min: 5, max: 10 },
        status: "scheduled",
      },
    ]);

    expect(classifier.classify(makeEvent({ raw_fields: { priority: "7" } })).status).toBe(
      "scheduled",
    );
    expect(classifier.classify(makeEvent({ raw_fields: { priority: "11" } })).status).toBe(
      "unknown",
    );
    expect(classifier.classify(makeEvent({ raw_fields: { priority: "high" } })).status).toBe(
      "unknown",
    );
    expect(classifier.classify(makeEvent()).status).toBe("unknown");
  });

  it("combines conditions with all and any", () => {
    const classifier = createClassifier([
      {
        name: "nightly-success",
        when: {
          kind: "all",
          conditions: [
            { kind: "field-equals", field: "outcome", value: "success" },
            {
              kind: "any",
              conditions: [
                { kind: "field-equals", field: "task_type", value: "nightly" },
                { kind: "field-equals", field: "queue", value: "night" },
              ],
            },
          ],
        },
        status: "scheduled",
      },
    ]);

    expect(classifier.classify(makeEvent({ task_type: "nightly" })).status).toBe("scheduled");
    expect(classifier.classify(makeEvent({ raw_fields: { queue: "night" } })).status).toBe(
      "scheduled",
    );
    expect(
      classifier.classify(makeEvent({ task_type: "nightly", outcome: "failure" })).status,
    ).toBe("unknown");
  });

  it("compares timestamp and duration as strings for equality", () => {
    const classifier = createClassifier([
      { name: "exact", when: { kind: "field-equals", field: "duration", value: "30" }, status: "scheduled" },
    ]);

    expect(classifier.classify(makeEvent({ duration: 30 })).status).toBe("scheduled");
    expect(classifier.classify(makeEvent()).status).toBe("unknown");
  });

  it("matches rules on the declared schedule as written", () => {
    const parsed = parseLine(
      "task=1,ts=100,schedule=90-110,outcome=ok",
      1,
      defaultProjectConfig().log_format,
    );
    if (!parsed.ok) throw new Error(parsed.error.detail);

    const hasSchedule = createClassifier([
      { name: "has-schedule", when: { kind: "field-present", field: "schedule" }, status: "scheduled" },
    ]);
    const exactWindow = createClassifier([
      {
        name: "exact-window",
        when: { kind: "field-equals", field: "schedule", value: "90-110" },
        status: "scheduled",
      },
    ]);

    expect(hasSchedule.classify(parsed.event)).toMatchObject({
      status: "scheduled",
      rule: "has-schedule",
    });
    expect(exactWindow.classify(parsed.event).rule).toBe("exact-window");
    expect(hasSchedule.classify(makeEvent()).rule).toBeNull();
    expect(
      exactWindow.classify(makeEvent({ declared_schedule: { kind: "unparsed", text: "daily" } })).rule,
    ).toBeNull();
  });
});
