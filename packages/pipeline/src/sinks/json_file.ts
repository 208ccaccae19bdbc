import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { createLogger, type PostRecord, type Sink } from "@threadloom/shared";

const log = createLogger({ component: "sink" });

export type JsonFileFormat = "json" | "ndjson";

export interface JsonFileSinkOptions {
  dir: string;
  /** Discovery mode, first part of the file name. */
  mode: string;
  /** Query, handle or feed the run was seeded with. */
  label?: string | null;
  format?: JsonFileFormat;
  now?: Date;
}

/**
 * Letters, digits and underscores only, at most 30 characters.
 */
export function sanitizeLabel(label: string): string {
  return label
    .replace(/[^\p{L}\p{N} _]/gu, "")
    .trim()
    .replace(/\s+/g, "_")
    .slice(0, 30);
}

function timestamp(now: Date): string {
  const iso = now.toISOString(); // 2025-01-02T03:04:05.678Z
  return `${iso.slice(0, 10)}_${iso.slice(11, 19).replace(/:/g, "-")}`;
}

export function outputFileName(options: Omit<JsonFileSinkOptions, "dir">): string {
  const label = options.label ? sanitizeLabel(options.label) : "";
  const ext = options.format === "ndjson" ? "ndjson" : "json";
  return [options.mode, label, timestamp(options.now ?? new Date())].filter((p) => p.length > 0).join("_") + `.${ext}`;
}

/**
 * Writes a run's records to one file: a pretty-printed JSON array written on
 * close, or NDJSON appended record by record.
 */
export class JsonFileSink implements Sink {
  readonly path: string;
  private readonly format: JsonFileFormat;
  private readonly buffered: PostRecord[] = [];
  private written = 0;
  private ready: Promise<void> | null = null;

  constructor(private readonly options: JsonFileSinkOptions) {
    this.format = options.format ?? "json";
    this.path = join(options.dir, outputFileName(options));
  }

  async write(record: PostRecord): Promise<void> {
    this.written += 1;
    if (this.format === "json") {
      this.buffered.push(record);
      return;
    }
    await this.ensureDir();
    await appendFile(this.path, `${JSON.stringify(record)}\n`, "utf8");
  }

  async close(): Promise<void> {
    await this.ensureDir();
    if (this.format === "json") {
      await writeFile(this.path, `${JSON.stringify(this.buffered, null, 2)}\n`, "utf8");
    } else if (this.written === 0) {
      await writeFile(this.path, "", "utf8");
    }
    log.info({ path: this.path, records: this.written }, "Output written");
  }

  private ensureDir(): Promise<void> {
    this.ready ??= mkdir(this.options.dir, { recursive: true }).then(() => undefined);
    return this.ready;
  }
}
