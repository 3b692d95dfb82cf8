/**
 * Data contract handed to document renderers.
 * Nothing here references pipeline state; a section sequence is plain, serializable data.
 */

// =============================================================================
// SNAPSHOTS (external input)
// =============================================================================

// Opaque handle to something captured from the scheduler dashboard.
export type DashboardSnapshot = {
  label: string;
  kind: "image" | "chart-data";
  mediaType: string;
  uri: string;
  byteLength?: number;
  capturedAt?: string;
};

// =============================================================================
// SECTIONS
// =============================================================================

export type TableCell = string | number | null;

export type TablePayload = {
  columns: string[];
  rows: TableCell[][];
};

export type ChartPoint = {
  x: number;
  y: number | null;
};

export type ChartSeries = {
  name: string;
  points: ChartPoint[];
};

export type ChartPayload = {
  xLabel: string;
  bucketWidth: number;
  gapsFilled: boolean;
  series: ChartSeries[];
};

export type NarrativePayload = {
  paragraphs: string[];
};

export type ImageReferencePayload = DashboardSnapshot;

export type ReportSection =
  | { title: string; kind: "narrative-text"; payload: NarrativePayload }
  | { title: string; kind: "table"; payload: TablePayload }
  | { title: string; kind: "chart-data"; payload: ChartPayload }
  | { title: string; kind: "image-reference"; payload: ImageReferencePayload };

export type ReportDocument = {
  title: string;
  runId: string;
  generatedAt: string;
  sections: ReportSection[];
};
