import { emptyStatusCounts, sumCounts, type BucketCounts, type ReportMetrics } from "./aggregator.js";
import {
  PARSE_ERROR_REASONS,
  SCHEDULE_STATUSES,
  rejectedFraction,
  type IngestStats,
} from "./events.js";
import type {
  ChartPayload,
  DashboardSnapshot,
  ReportSection,
  TableCell,
} from "./report-sections.js";

// =============================================================================
// TYPES
// =============================================================================

export type AssembleReportInput = {
  metrics: ReportMetrics;
  ingest: IngestStats;
  snapshots: readonly DashboardSnapshot[];
  fillGaps?: boolean;
  maxRejectedRatio?: number;
};

// Gap filling stops past this many buckets; the chart keeps the sparse series instead.
export const MAX_FILLED_BUCKETS = 1000;

export const SECTION_TITLES = {
  summary: "Summary",
  breakdown: "Scheduled vs Unscheduled",
  taskTypes: "Task Types",
  trend: "Trend",
  quality: "Data Quality",
} as const;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Maps metrics and snapshots to the fixed section order:
 * summary, breakdown table, task-type table, trend chart, one image per snapshot, data quality.
 */
export function assembleReport(input: AssembleReportInput): ReportSection[] {
  return [
    buildSummary(input.metrics, input.ingest),
    buildBreakdownTable(input.metrics),
    buildTaskTypeTable(input.metrics),
    buildTrendChart(input.metrics, input.fillGaps ?? false),
    ...input.snapshots.map(buildSnapshotReference),
    buildQualityNarrative(input.metrics, input.ingest, input.maxRejectedRatio),
  ];
}

export function formatPercent(ratio: number | null): string {
  return ratio === null ? "n/a" : `${(ratio * 100).toFixed(1)}%`;
}

export function formatCount(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

// =============================================================================
// SECTIONS
// =============================================================================

function buildSummary(metrics: ReportMetrics, ingest: IngestStats): ReportSection {
  const paragraphs = [
    `Analyzed ${formatCount(metrics.total, "task event")} from ${formatCount(ingest.linesRead, "log line")}.`,
  ];

  if (metrics.total === 0) {
    paragraphs.push("No task events were classified.");
  } else {
    paragraphs.push(
      `Scheduled: ${metrics.countFor("scheduled")} (${formatPercent(metrics.scheduledRatio)}), ` +
        `unscheduled: ${metrics.countFor("unscheduled")} (${formatPercent(metrics.unscheduledRatio)}), ` +
        `unknown: ${metrics.countFor("unknown")}.`,
    );
    paragraphs.push(
      `Outcomes: ${metrics.outcomeCount("success")} success, ${metrics.outcomeCount("failure")} failure, ` +
        `${metrics.outcomeCount("retry")} retry, ${metrics.outcomeCount("unknown")} unknown.`,
    );
  }

  const peak = metrics.peakBucket();
  if (peak) {
    paragraphs.push(`Busiest bucket starts at ${peak.start} with ${formatCount(peak.total, "event")}.`);
  }

  if (ingest.filtered > 0) {
    paragraphs.push(
      `${formatCount(ingest.filtered, "event")} fell outside the requested time window.`,
    );
  }

  return { title: SECTION_TITLES.summary, kind: "narrative-text", payload: { paragraphs } };
}

function buildBreakdownTable(metrics: ReportMetrics): ReportSection {
  const rows: TableCell[][] = SCHEDULE_STATUSES.map((status) => [
    status,
    metrics.countFor(status),
    metrics.ratioOf(status),
    metrics.duration(status).mean,
  ]);
  rows.push(["total", metrics.total, metrics.total === 0 ? null : 1, null]);

  return {
    title: SECTION_TITLES.breakdown,
    kind: "table",
    payload: { columns: ["Status", "Events", "Share", "Avg Duration"], rows },
  };
}

function buildTaskTypeTable(metrics: ReportMetrics): ReportSection {
  const rows: TableCell[][] = metrics
    .taskTypes()
    .map(({ taskType, counts, total }) => [
      taskType,
      counts.scheduled,
      counts.unscheduled,
      counts.unknown,
      total,
      total === 0 ? null : counts.scheduled / total,
    ]);

  return {
    title: SECTION_TITLES.taskTypes,
    kind: "table",
    payload: {
      columns: ["Task Type", "Scheduled", "Unscheduled", "Unknown", "Total", "Scheduled Share"],
      rows,
    },
  };
}

function buildTrendChart(metrics: ReportMetrics, fillGaps: boolean): ReportSection {
  const sparse = metrics.buckets();
  const filled = fillGaps ? fillBucketGaps(sparse, metrics.bucketWidth) : null;
  const buckets = filled ?? sparse;

  const payload: ChartPayload = {
    xLabel: "bucket_start",
    bucketWidth: metrics.bucketWidth,
    gapsFilled: filled !== null,
    series: [
      ...SCHEDULE_STATUSES.map((status) => ({
        name: status,
        points: buckets.map((bucket) => ({ x: bucket.start, y: bucket.counts[status] })),
      })),
      {
        name: "scheduled_delta",
        points: buckets.map((bucket, index) => ({
          x: bucket.start,
          y: index === 0 ? null : bucket.counts.scheduled - buckets[index - 1].counts.scheduled,
        })),
      },
    ],
  };

  return { title: SECTION_TITLES.trend, kind: "chart-data", payload };
}

function buildSnapshotReference(snapshot: DashboardSnapshot): ReportSection {
  return { title: snapshot.label, kind: "image-reference", payload: { ...snapshot } };
}

function buildQualityNarrative(
  metrics: ReportMetrics,
  ingest: IngestStats,
  maxRejectedRatio: number | undefined,
): ReportSection {
  const fraction = rejectedFraction(ingest);
  const paragraphs = [
    `Read ${formatCount(ingest.linesRead, "line")}: ${ingest.parsed} parsed, ${ingest.rejected} rejected ` +
      `(${formatPercent(fraction)}).`,
  ];

  if (ingest.rejected > 0) {
    const reasons = PARSE_ERROR_REASONS.map(
      (reason) => `${reason} ${ingest.rejectedByReason[reason]}`,
    ).join(", ");
    paragraphs.push(`Rejections by reason: ${reasons}.`);
  }

  const unknown = metrics.countFor("unknown");
  paragraphs.push(
    `${formatCount(unknown, "event")} could not be classified and ` +
      `${unknown === 1 ? "is" : "are"} reported as unknown.`,
  );

  if (ingest.blankLines > 0) {
    paragraphs.push(`Skipped ${formatCount(ingest.blankLines, "blank line")}.`);
  }

  if (maxRejectedRatio !== undefined && fraction !== null && fraction > maxRejectedRatio) {
    paragraphs.push(
      `Rejected fraction exceeds the configured limit of ${formatPercent(maxRejectedRatio)}; ` +
        "treat these figures with caution.",
    );
  }

  return { title: SECTION_TITLES.quality, kind: "narrative-text", payload: { paragraphs } };
}

// =============================================================================
// INTERNALS
// =============================================================================

function fillBucketGaps(buckets: BucketCounts[], bucketWidth: number): BucketCounts[] | null {
  if (buckets.length === 0) return [];

  const first = buckets[0].key;
  const last = buckets[buckets.length - 1].key;
  if (last - first + 1 > MAX_FILLED_BUCKETS) return null;

  const byKey = new Map(buckets.map((bucket) => [bucket.key, bucket]));
  const filled: BucketCounts[] = [];
  for (let key = first; key <= last; key += 1) {
    const counts = byKey.get(key)?.counts ?? emptyStatusCounts();
    filled.push({ key, start: key * bucketWidth, counts, total: sumCounts(counts) });
  }
  return filled;
}
