import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FileSnapshotProvider, StaticSnapshotProvider, labelFromFile } from "./snapshot-provider.js";

describe("FileSnapshotProvider", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "snapshots-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("references matching image and chart files in name order", async () => {
    fs.writeFileSync(path.join(tmpDir, "series.json"), "[]");
    fs.writeFileSync(path.join(tmpDir, "queue-depth_24h.png"), "png");
    fs.writeFileSync(path.join(tmpDir, "notes.txt"), "ignored");

    const snapshots = await new FileSnapshotProvider(tmpDir, ["*"]).capture();

    expect(snapshots).toEqual([
      expect.objectContaining({
        label: "queue depth 24h",
        kind: "image",
        mediaType: "image/png",
        uri: path.join(tmpDir, "queue-depth_24h.png"),
        byteLength: 3,
      }),
      expect.objectContaining({
        label: "series",
        kind: "chart-data",
        mediaType: "application/json",
        uri: path.join(tmpDir, "series.json"),
        byteLength: 2,
      }),
    ]);
  });

  it("returns nothing without patterns", async () => {
    fs.writeFileSync(path.join(tmpDir, "queue.png"), "png");

    expect(await new FileSnapshotProvider(tmpDir, []).capture()).toEqual([]);
  });
});

describe("StaticSnapshotProvider", () => {
  it("returns copies of the given snapshots", async () => {
    const snapshot = { label: "latency", kind: "image" as const, mediaType: "image/png", uri: "a.png" };
    const provider = new StaticSnapshotProvider([snapshot]);

    const [captured] = await provider.capture();

    expect(captured).toEqual(snapshot);
    expect(captured).not.toBe(snapshot);
  });
});

describe("labelFromFile", () => {
  it("turns a file name into a readable label", () => {
    expect(labelFromFile("/dash/queue-depth_24h.png")).toBe("queue depth 24h");
  });
});
