import type { Degrees, RawSample } from "../../shared/rig-schema.js";
import type { ServoLimits } from "../config/env.js";
import {
  ProtocolError,
  ResourceError,
  SourceIOError,
  SourceTimeoutError,
  errorMessage,
} from "./errors.js";
import {
  PONG_REPLY,
  decodeDataLine,
  formatCommand,
  isDataLine,
  sampleRateHz,
  type DeviceCommand,
} from "./protocol.js";
import type { LineLink } from "./serial-link.js";
import {
  assertServoAngle,
  closeAndCollect,
  type Actuatable,
  type Connectable,
  type DataSource,
  type Streamable,
} from "./source.js";

export type SerialDeviceOptions = {
  link: LineLink;
  readTimeoutMs: number;
  samplePeriodMs: number;
  servo: ServoLimits;
  /** PING/PONG check plus a STOP right after opening the link. */
  handshake?: boolean;
  verbose?: boolean;
  now?: () => number;
};

/** Rig firmware reached over a serial line. */
export class SerialDeviceSource implements DataSource, Connectable, Streamable, Actuatable {
  readonly kind = "serial";
  private readonly link: LineLink;
  private readonly now: () => number;

  constructor(private readonly opts: SerialDeviceOptions) {
    this.link = opts.link;
    this.now = opts.now ?? Date.now;
  }

  async connect(): Promise<void> {
    try {
      await this.link.open();
      await this.link.discardInput();
    } catch (err) {
      if (err instanceof ResourceError) throw err;
      throw new ResourceError(`failed to open serial link: ${errorMessage(err)}`, { cause: err });
    }

    if (!this.opts.handshake) return;

    const answered = await this.ping();
    if (!answered) {
      await closeAndCollect([["close serial link", () => this.link.close()]], "rig/serial");
      throw new ResourceError(`device did not answer PING within ${this.opts.readTimeoutMs} ms`);
    }
    // firmware may boot with streaming already on
    await this.send("STOP");
  }

  async close(): Promise<void> {
    if (!this.link.isOpen) return;
    await this.link.close();
  }

  async startStream(): Promise<void> {
    await this.send("RAW=0");
    await this.send(`RATE=${sampleRateHz(this.opts.samplePeriodMs)}`);
    await this.send("START");
  }

  async stopStream(): Promise<void> {
    if (!this.link.isOpen) return;
    await this.send("STOP");
  }

  async setServoAngle(deg: Degrees): Promise<void> {
    const checked = assertServoAngle(deg, this.opts.servo);
    await this.send(`SERVO=${checked}`);
  }

  /** Sends PING and waits up to the read timeout for PONG, skipping other lines. */
  async ping(): Promise<boolean> {
    await this.send("PING");
    const deadline = this.now() + this.opts.readTimeoutMs;
    for (let remaining = this.opts.readTimeoutMs; remaining > 0; remaining = deadline - this.now()) {
      const line = await this.link.readLine(remaining);
      if (line === null) return false;
      if (line.trim() === PONG_REPLY) return true;
    }
    return false;
  }

  async readSample(): Promise<RawSample> {
    for (;;) {
      const line = await this.link.readLine(this.opts.readTimeoutMs);
      if (line === null) {
        throw new SourceTimeoutError(
          `no DATA frame within ${this.opts.readTimeoutMs} ms`,
          this.opts.readTimeoutMs,
        );
      }

      const text = line.trim();
      if (!text) continue;
      if (!isDataLine(text)) {
        if (this.opts.verbose) {
          console.info(`[rig/serial] ignored: ${text}`);
        }
        continue;
      }

      try {
        return decodeDataLine(text);
      } catch (err) {
        if (err instanceof ProtocolError) {
          console.warn(`[rig/serial] discarded frame (${err.message}): ${err.line}`);
          continue;
        }
        throw err;
      }
    }
  }

  private async send(cmd: DeviceCommand): Promise<void> {
    if (!this.link.isOpen) {
      throw new SourceIOError(`cannot send ${cmd}: serial link is not open`);
    }
    if (this.opts.verbose) {
      console.info(`[rig/serial] -> ${cmd}`);
    }
    await this.link.writeLine(formatCommand(cmd));
  }
}
