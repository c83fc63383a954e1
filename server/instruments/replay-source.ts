// Replays a previously captured run from CSV, one row per read, in file order.
import { createReadStream, type ReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { parse, type Parser } from "csv-parse";
import { z } from "zod";
import { REPLAY_REQUIRED_COLUMNS, type RawSample } from "../../shared/rig-schema.js";
import { EndOfDataError, ResourceError, SourceIOError, errorMessage } from "./errors.js";
import type { Connectable, DataSource } from "./source.js";

const intCell = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "expected an integer")
  .transform((value) => Number.parseInt(value, 10));

const floatCell = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/, "expected a decimal number")
  .transform((value) => Number(value))
  .refine((value) => Number.isFinite(value), "expected a finite number");

const replayRowSchema = z.object({
  t_ms: intCell,
  servo_deg: intCell,
  v_div: floatCell,
  v_rf: floatCell,
  v_photo: floatCell,
});

const checkHeader = (header: string[]): string[] => {
  const missing = REPLAY_REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new SourceIOError(`replay file lacks columns: ${missing.join(", ")}`);
  }
  return header;
};

export class CsvReplaySource implements DataSource, Connectable {
  readonly kind = "replay";
  private stream: ReadStream | null = null;
  private parser: Parser | null = null;
  private rows: AsyncIterator<unknown> | null = null;
  private rowIndex = 0;
  private failure: Error | null = null;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return path.resolve(this.filePath);
  }

  async connect(): Promise<void> {
    if (this.rows) return;

    const resolved = this.path;
    try {
      await fs.access(resolved);
    } catch (err) {
      throw new ResourceError(`replay file not found: ${resolved}`, { cause: err });
    }

    const stream = createReadStream(resolved, { encoding: "utf8" });
    const parser = parse({ columns: checkHeader, skip_empty_lines: true, trim: true, bom: true });
    stream.on("error", (err) => parser.destroy(err));
    // the row iterator only listens once read; parse errors before that land here
    parser.on("error", (err: Error) => {
      if (!this.failure) this.failure = err;
    });
    stream.pipe(parser);

    this.stream = stream;
    this.parser = parser;
    this.rows = parser[Symbol.asyncIterator]();
    this.rowIndex = 0;
    this.failure = null;
  }

  async close(): Promise<void> {
    this.parser?.destroy();
    this.stream?.destroy();
    this.parser = null;
    this.stream = null;
    this.rows = null;
    this.failure = null;
  }

  async readSample(): Promise<RawSample> {
    const rows = this.rows;
    if (!rows) {
      throw new ResourceError("replay source is not open; call connect() first");
    }

    if (this.failure) {
      throw this.readFailure(this.failure);
    }

    let next: IteratorResult<unknown>;
    try {
      next = await rows.next();
    } catch (err) {
      throw this.readFailure(this.failure ?? err);
    }
    if (next.done) {
      throw new EndOfDataError(`end of replay file ${this.path} after ${this.rowIndex} rows`);
    }

    this.rowIndex += 1;
    const parsed = replayRowSchema.safeParse(next.value);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new SourceIOError(`replay row ${this.rowIndex} is malformed: ${detail}`);
    }
    return parsed.data;
  }

  private readFailure(err: unknown): SourceIOError {
    if (err instanceof SourceIOError) return err;
    return new SourceIOError(`replay read failed: ${errorMessage(err)}`, { cause: err });
  }
}
