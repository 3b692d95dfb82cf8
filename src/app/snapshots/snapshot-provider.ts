import fsp from "node:fs/promises";
import path from "node:path";

import fg from "fast-glob";

import type { DashboardSnapshot } from "../../core/report-sections.js";

// =============================================================================
// TYPES
// =============================================================================

// Whatever captures the dashboard (a browser session, an export job) sits behind this.
export interface SnapshotProvider {
  capture(): Promise<DashboardSnapshot[]>;
}

const MEDIA_TYPES: Record<string, { mediaType: string; kind: DashboardSnapshot["kind"] }> = {
  ".png": { mediaType: "image/png", kind: "image" },
  ".jpg": { mediaType: "image/jpeg", kind: "image" },
  ".jpeg": { mediaType: "image/jpeg", kind: "image" },
  ".gif": { mediaType: "image/gif", kind: "image" },
  ".webp": { mediaType: "image/webp", kind: "image" },
  ".svg": { mediaType: "image/svg+xml", kind: "image" },
  ".json": { mediaType: "application/json", kind: "chart-data" },
  ".csv": { mediaType: "text/csv", kind: "chart-data" },
};

// =============================================================================
// PROVIDERS
// =============================================================================

/**
 * Collects snapshot files already written to disk by an external capture step.
 * Files are referenced by absolute path; their bytes are never read.
 */
export class FileSnapshotProvider implements SnapshotProvider {
  constructor(
    private readonly baseDir: string,
    private readonly patterns: readonly string[],
  ) {}

  async capture(): Promise<DashboardSnapshot[]> {
    if (this.patterns.length === 0) return [];

    const files = await fg([...this.patterns], {
      cwd: this.baseDir,
      absolute: true,
      onlyFiles: true,
      unique: true,
    });

    const snapshots: DashboardSnapshot[] = [];
    for (const file of files.sort()) {
      const type = MEDIA_TYPES[path.extname(file).toLowerCase()];
      if (!type) continue;

      const stat = await fsp.stat(file);
      snapshots.push({
        label: labelFromFile(file),
        kind: type.kind,
        mediaType: type.mediaType,
        uri: file,
        byteLength: stat.size,
        capturedAt: stat.mtime.toISOString(),
      });
    }
    return snapshots;
  }
}

export class StaticSnapshotProvider implements SnapshotProvider {
  constructor(private readonly snapshots: readonly DashboardSnapshot[]) {}

  async capture(): Promise<DashboardSnapshot[]> {
    return this.snapshots.map((snapshot) => ({ ...snapshot }));
  }
}

// "queue-depth_24h.png" -> "queue depth 24h"
export function labelFromFile(file: string): string {
  return path
    .basename(file, path.extname(file))
    .replace(/[-_]+/g, " ")
    .trim();
}
