import fs from "node:fs";
import fsp from "node:fs/promises";
import type { Readable } from "node:stream";

import { SourceUnavailableError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type LogSource =
  | { kind: "file"; path: string }
  | { kind: "stream"; label: string; stream: Readable };

export type ReadLogLinesOptions = {
  // Longest wait for the next chunk before the source counts as unavailable.
  timeoutMs?: number;
  signal?: AbortSignal;
};

const LINE_BREAK = /\r\n|\n|\r/;

// =============================================================================
// PUBLIC API
// =============================================================================

export function describeSource(source: LogSource): string {
  return source.kind === "file" ? source.path : source.label;
}

/**
 * Yields raw lines (without line endings) from a log source.
 * A final line without a trailing newline is still yielded. The underlying stream is
 * destroyed when iteration finishes, fails, or the consumer stops early.
 */
export async function* readLogLines(
  source: LogSource,
  options: ReadLogLinesOptions = {},
): AsyncGenerator<string, void, undefined> {
  const stream = await openSource(source);
  const label = describeSource(source);
  const chunks = stream[Symbol.asyncIterator]();
  let pending = "";

  try {
    while (true) {
      if (options.signal?.aborted) return;

      const next = await nextChunk(chunks, label, options);
      if (next === "aborted") return;
      if (next.done) break;

      const text = pending + toText(next.value);
      const lines = text.split(LINE_BREAK);
      pending = lines.pop() ?? "";
      // A trailing "\r" may be the first half of a "\r\n" split across chunks.
      if (text.endsWith("\r")) {
        pending = `${lines.pop() ?? ""}\r`;
      }

      for (const line of lines) {
        if (options.signal?.aborted) return;
        yield line;
      }
    }

    if (pending !== "") {
      yield pending.replace(/\r$/, "");
    }
  } finally {
    stream.destroy();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function openSource(source: LogSource): Promise<Readable> {
  if (source.kind === "stream") {
    source.stream.setEncoding("utf8");
    return source.stream;
  }

  let stat: fs.Stats;
  try {
    stat = await fsp.stat(source.path);
  } catch (err) {
    throw new SourceUnavailableError(source.path, `Cannot open log file ${source.path}`, err);
  }
  if (!stat.isFile()) {
    throw new SourceUnavailableError(source.path, `Log source ${source.path} is not a file`);
  }

  const stream = fs.createReadStream(source.path, { encoding: "utf8" });
  await new Promise<void>((resolve, reject) => {
    stream.once("open", () => resolve());
    stream.once("error", (err) =>
      reject(new SourceUnavailableError(source.path, `Cannot open log file ${source.path}`, err)),
    );
  });
  return stream;
}

async function nextChunk(
  chunks: AsyncIterator<unknown>,
  label: string,
  options: ReadLogLinesOptions,
): Promise<IteratorResult<unknown> | "aborted"> {
  const { timeoutMs, signal } = options;
  const pending = chunks.next().catch((err: unknown) => {
    throw new SourceUnavailableError(label, `Failed while reading ${label}`, err);
  });
  if (timeoutMs === undefined && !signal) {
    return pending;
  }

  const waits: Array<Promise<IteratorResult<unknown> | "timeout" | "aborted">> = [pending];
  let timer: NodeJS.Timeout | undefined;
  let removeAbortListener = (): void => undefined;

  if (timeoutMs !== undefined) {
    waits.push(
      new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), timeoutMs);
      }),
    );
  }
  if (signal) {
    waits.push(
      new Promise<"aborted">((resolve) => {
        const onAbort = (): void => resolve("aborted");
        signal.addEventListener("abort", onAbort, { once: true });
        removeAbortListener = () => signal.removeEventListener("abort", onAbort);
      }),
    );
  }

  try {
    const result = await Promise.race(waits);
    if (result === "timeout" || result === "aborted") {
      // The read settles once the caller destroys the stream; its outcome is moot by then.
      void pending.catch(ignoreLateFailure);
    }
    if (result === "timeout") {
      throw new SourceUnavailableError(label, `No data from ${label} within ${timeoutMs}ms`);
    }
    return result;
  } finally {
    clearTimeout(timer);
    removeAbortListener();
  }
}

function ignoreLateFailure(): undefined {
  return undefined;
}

function toText(chunk: unknown): string {
  if (typeof chunk === "string") return chunk;
  if (Buffer.isBuffer(chunk)) return chunk.toString("utf8");
  return String(chunk);
}
