/**
 * ReportMetrics folds classified events into counts, bucketed trends and duration stats.
 * Purpose: the only mutable accumulator in the pipeline; one instance per shard.
 * Assumptions: events arrive already classified; bucket width is in timestamp units.
 * Usage: const metrics = aggregate(events, 1000); const all = mergeMetrics([a, b], 1000).
 */

import {
  SCHEDULE_STATUSES,
  TASK_OUTCOMES,
  type ClassifiedEvent,
  type ScheduleStatus,
  type TaskOutcome,
} from "./events.js";

// =============================================================================
// TYPES
// =============================================================================

export type StatusCounts = Record<ScheduleStatus, number>;

export type DurationStats = {
  count: number;
  total: number;
  min: number | null;
  max: number | null;
};

export type DurationSummary = DurationStats & { mean: number | null };

export type TaskTypeBreakdown = {
  taskType: string;
  counts: StatusCounts;
  total: number;
};

export type BucketCounts = {
  key: number;
  start: number;
  counts: StatusCounts;
  total: number;
};

export type MetricsSnapshot = {
  bucketWidth: number;
  total: number;
  statusCounts: StatusCounts;
  outcomeCounts: Record<TaskOutcome, number>;
  taskTypes: TaskTypeBreakdown[];
  buckets: BucketCounts[];
  durations: Record<ScheduleStatus, DurationStats>;
};

// =============================================================================
// REPORT METRICS
// =============================================================================

export class ReportMetrics {
  private totalEvents = 0;
  private readonly statusCounts = emptyStatusCounts();
  private readonly outcomeCounts = emptyOutcomeCounts();
  private readonly typeCounts = new Map<string, StatusCounts>();
  private readonly bucketCounts = new Map<number, StatusCounts>();
  private readonly durations = emptyDurations();

  constructor(public readonly bucketWidth: number) {
    if (!Number.isFinite(bucketWidth) || bucketWidth <= 0) {
      throw new RangeError(`bucket width must be a positive number, received ${bucketWidth}`);
    }
  }

  record(event: ClassifiedEvent): void {
    this.totalEvents += 1;
    this.statusCounts[event.status] += 1;
    this.outcomeCounts[event.outcome] += 1;

    countInto(this.typeCounts, event.task_type, event.status, 1);
    countInto(this.bucketCounts, this.bucketKey(event.timestamp), event.status, 1);

    if (event.duration !== undefined) {
      addDuration(this.durations[event.status], event.duration);
    }
  }

  bucketKey(timestamp: number): number {
    return Math.floor(timestamp / this.bucketWidth);
  }

  get total(): number {
    return this.totalEvents;
  }

  get scheduledRatio(): number | null {
    return this.ratioOf("scheduled");
  }

  get unscheduledRatio(): number | null {
    return this.ratioOf("unscheduled");
  }

  get unknownRatio(): number | null {
    return this.ratioOf("unknown");
  }

  ratioOf(status: ScheduleStatus): number | null {
    if (this.totalEvents === 0) return null;
    return this.statusCounts[status] / this.totalEvents;
  }

  countFor(status: ScheduleStatus): number {
    return this.statusCounts[status];
  }

  outcomeCount(outcome: TaskOutcome): number {
    return this.outcomeCounts[outcome];
  }

  taskTypes(): TaskTypeBreakdown[] {
    return [...this.typeCounts.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([taskType, counts]) => ({ taskType, counts: { ...counts }, total: sumCounts(counts) }));
  }

  buckets(): BucketCounts[] {
    return [...this.bucketCounts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([key, counts]) => ({
        key,
        start: key * this.bucketWidth,
        counts: { ...counts },
        total: sumCounts(counts),
      }));
  }

  // Busiest bucket; the earliest one wins a tie.
  peakBucket(): BucketCounts | null {
    let peak: BucketCounts | null = null;
    for (const bucket of this.buckets()) {
      if (!peak || bucket.total > peak.total) {
        peak = bucket;
      }
    }
    return peak;
  }

  duration(status: ScheduleStatus): DurationSummary {
    const stats = this.durations[status];
    return { ...stats, mean: stats.count === 0 ? null : stats.total / stats.count };
  }

  /** Returns a new accumulator; neither input is modified. */
  merge(other: ReportMetrics): ReportMetrics {
    if (other.bucketWidth !== this.bucketWidth) {
      throw new RangeError(
        `cannot merge metrics with bucket widths ${this.bucketWidth} and ${other.bucketWidth}`,
      );
    }

    const merged = new ReportMetrics(this.bucketWidth);
    for (const source of [this, other]) {
      merged.totalEvents += source.totalEvents;
      for (const status of SCHEDULE_STATUSES) {
        merged.statusCounts[status] += source.statusCounts[status];
        mergeDuration(merged.durations[status], source.durations[status]);
      }
      for (const outcome of TASK_OUTCOMES) {
        merged.outcomeCounts[outcome] += source.outcomeCounts[outcome];
      }
      for (const [taskType, counts] of source.typeCounts) {
        for (const status of SCHEDULE_STATUSES) {
          countInto(merged.typeCounts, taskType, status, counts[status]);
        }
      }
      for (const [key, counts] of source.bucketCounts) {
        for (const status of SCHEDULE_STATUSES) {
          countInto(merged.bucketCounts, key, status, counts[status]);
        }
      }
    }
    return merged;
  }

  toJSON(): MetricsSnapshot {
    return {
      bucketWidth: this.bucketWidth,
      total: this.totalEvents,
      statusCounts: { ...this.statusCounts },
      outcomeCounts: { ...this.outcomeCounts },
      taskTypes: this.taskTypes(),
      buckets: this.buckets(),
      durations: {
        scheduled: { ...this.durations.scheduled },
        unscheduled: { ...this.durations.unscheduled },
        unknown: { ...this.durations.unknown },
      },
    };
  }
}

// =============================================================================
// FOLDS
// =============================================================================

export function aggregate(events: Iterable<ClassifiedEvent>, bucketWidth: number): ReportMetrics {
  const metrics = new ReportMetrics(bucketWidth);
  for (const event of events) {
    metrics.record(event);
  }
  return metrics;
}

export function mergeMetrics(parts: readonly ReportMetrics[], bucketWidth: number): ReportMetrics {
  return parts.reduce((acc, part) => acc.merge(part), new ReportMetrics(bucketWidth));
}

export function emptyStatusCounts(): StatusCounts {
  return { scheduled: 0, unscheduled: 0, unknown: 0 };
}

export function sumCounts(counts: StatusCounts): number {
  return counts.scheduled + counts.unscheduled + counts.unknown;
}

// =============================================================================
// INTERNALS
// =============================================================================

function emptyOutcomeCounts(): Record<TaskOutcome, number> {
  return { success: 0, failure: 0, retry: 0, unknown: 0 };
}

function emptyDurations(): Record<ScheduleStatus, DurationStats> {
  return {
    scheduled: { count: 0, total: 0, min: null, max: null },
    unscheduled: { count: 0, total: 0, min: null, max: null },
    unknown: { count: 0, total: 0, min: null, max: null },
  };
}

function countInto<K>(
  map: Map<K, StatusCounts>,
  key: K,
  status: ScheduleStatus,
  amount: number,
): void {
  let counts = map.get(key);
  if (!counts) {
    counts = emptyStatusCounts();
    map.set(key, counts);
  }
  counts[status] += amount;
}

function addDuration(stats: DurationStats, value: number): void {
  stats.count += 1;
  stats.total += value;
  stats.min = stats.min === null ? value : Math.min(stats.min, value);
  stats.max = stats.max === null ? value : Math.max(stats.max, value);
}

function mergeDuration(target: DurationStats, source: DurationStats): void {
  target.count += source.count;
  target.total += source.total;
  if (source.min !== null) {
    target.min = target.min === null ? source.min : Math.min(target.min, source.min);
  }
  if (source.max !== null) {
    target.max = target.max === null ? source.max : Math.max(target.max, source.max);
  }
}
