// Line-oriented transport under the live device source. The production link
// wraps a serialport handle with a readline parser.
import { ReadlineParser, SerialPort } from "serialport";
import { ResourceError, SourceIOError, errorMessage } from "./errors.js";

export interface LineLink {
  readonly isOpen: boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  /** Drops anything buffered on either side of the link. */
  discardInput(): Promise<void>;
  writeLine(text: string): Promise<void>;
  /** Next received line, or null when nothing arrives within timeoutMs. */
  readLine(timeoutMs: number): Promise<string | null>;
}

type PortCallback = (err: Error | null) => void;

/** The part of a serialport stream the link relies on. */
export interface SerialPortHandle {
  readonly isOpen: boolean;
  open(callback: PortCallback): void;
  close(callback: PortCallback): void;
  flush(callback: PortCallback): void;
  drain(callback: PortCallback): void;
  write(data: string, encoding: BufferEncoding, callback: (err: Error | null | undefined) => void): boolean;
  pipe<T extends NodeJS.WritableStream>(destination: T): T;
  on(event: "error", listener: (err: Error) => void): this;
  on(event: "close", listener: () => void): this;
}

export type SerialPortFactory = (options: { path: string; baudRate: number }) => SerialPortHandle;

const openSerialPort: SerialPortFactory = ({ path, baudRate }) =>
  new SerialPort({ path, baudRate, autoOpen: false });

type SerialLinkOptions = {
  path: string;
  baudRate: number;
  maxBufferedLines?: number;
  /** Builds an unopened port; defaults to a hardware serialport. */
  createPort?: SerialPortFactory;
};

type PendingRead = {
  resolve: (line: string | null) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

export class SerialPortLink implements LineLink {
  private port: SerialPortHandle | null = null;
  private lines: string[] = [];
  private pending: PendingRead | null = null;
  private failure: Error | null = null;
  private readonly maxBufferedLines: number;
  private readonly createPort: SerialPortFactory;

  constructor(private readonly opts: SerialLinkOptions) {
    this.maxBufferedLines = Math.max(1, opts.maxBufferedLines ?? 4096);
    this.createPort = opts.createPort ?? openSerialPort;
  }

  get isOpen(): boolean {
    return this.port?.isOpen ?? false;
  }

  async open(): Promise<void> {
    if (this.port?.isOpen) return;

    const { path, baudRate } = this.opts;
    const port = this.createPort({ path, baudRate });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          reject(new ResourceError(`cannot open ${path} @ ${baudRate}: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });

    const parser = port.pipe(new ReadlineParser({ delimiter: "\n" }));
    parser.on("data", (line: string) => this.pushLine(line));

    port.on("error", (err: Error) => {
      if (this.port !== port) return;
      console.warn(`[rig/serial] port error on ${path}: ${err.message}`);
      this.fail(err);
    });
    port.on("close", () => {
      if (this.port !== port) return;
      this.fail(new Error(`port ${path} closed`));
    });

    this.port = port;
    this.lines = [];
    this.failure = null;
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = null;
    this.lines = [];
    this.settlePending(null);
    if (!port || !port.isOpen) return;

    await new Promise<void>((resolve, reject) => {
      port.close((err) => {
        if (err) {
          reject(new ResourceError(`cannot close ${this.opts.path}: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  async discardInput(): Promise<void> {
    const port = this.requirePort();
    this.lines = [];
    await new Promise<void>((resolve, reject) => {
      port.flush((err) => {
        if (err) {
          reject(new SourceIOError(`flush failed: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }

  async writeLine(text: string): Promise<void> {
    const port = this.requirePort();
    const payload = text.endsWith("\n") ? text : `${text}\n`;
    await new Promise<void>((resolve, reject) => {
      port.write(payload, "utf8", (err) => {
        if (err) {
          reject(new SourceIOError(`write failed: ${err.message}`, { cause: err }));
          return;
        }
        port.drain((drainErr) => {
          if (drainErr) {
            reject(new SourceIOError(`drain failed: ${drainErr.message}`, { cause: drainErr }));
            return;
          }
          resolve();
        });
      });
    });
  }

  readLine(timeoutMs: number): Promise<string | null> {
    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);

    if (this.failure) {
      const cause = this.failure;
      this.failure = null;
      return Promise.reject(new SourceIOError(`serial read failed: ${cause.message}`, { cause }));
    }
    if (!this.port?.isOpen) {
      return Promise.reject(new SourceIOError("serial link is not open"));
    }
    if (this.pending) {
      return Promise.reject(new SourceIOError("a read is already pending on the serial link"));
    }

    return new Promise<string | null>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(null);
      }, Math.max(0, timeoutMs));
      this.pending = { resolve, reject, timer };
    });
  }

  private pushLine(line: string): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      clearTimeout(pending.timer);
      pending.resolve(line);
      return;
    }
    this.lines.push(line);
    if (this.lines.length > this.maxBufferedLines) {
      this.lines.shift();
    }
  }

  private fail(err: Error): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      clearTimeout(pending.timer);
      pending.reject(new SourceIOError(`serial read failed: ${errorMessage(err)}`, { cause: err }));
      return;
    }
    this.failure = err;
  }

  private settlePending(line: string | null): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve(line);
  }

  private requirePort(): SerialPortHandle {
    const port = this.port;
    if (!port || !port.isOpen) {
      throw new SourceIOError("serial link is not open");
    }
    return port;
  }
}
