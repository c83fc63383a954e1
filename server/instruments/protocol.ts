// Line protocol spoken by the rig firmware.
//
//   PC -> device:  PING | START | STOP | RAW=0|1 | RATE=<hz> | SERVO=<deg>
//   device -> PC:  PONG | OK | READY | INFO ... | DATA,<t_ms>,<servo_deg>,<v_div>,<v_rf>,<v_photo>
//
// Frames are decoded assuming RAW=0 (voltages as floats).
import type { RawSample } from "../../shared/rig-schema.js";
import { ProtocolError } from "./errors.js";

export const DATA_TAG = "DATA,";
export const DATA_FIELD_COUNT = 6;

export type DeviceCommand =
  | "PING"
  | "START"
  | "STOP"
  | `RAW=${0 | 1}`
  | `RATE=${number}`
  | `SERVO=${number}`;

export const PONG_REPLY = "PONG";

export function formatCommand(cmd: DeviceCommand): string {
  return `${cmd.trim()}\n`;
}

/** Device sampling rate matching a host sampling period; at least 1 Hz. */
export function sampleRateHz(periodMs: number): number {
  return Math.max(1, Math.round(1000 / periodMs));
}

export function isDataLine(line: string): boolean {
  return line.trim().startsWith(DATA_TAG);
}

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseIntField(name: string, raw: string): number {
  const text = raw.trim();
  if (!INT_RE.test(text)) {
    throw new TypeError(`${name} is not an integer: "${raw}"`);
  }
  return Number.parseInt(text, 10);
}

function parseFloatField(name: string, raw: string): number {
  const text = raw.trim();
  const value = FLOAT_RE.test(text) ? Number(text) : Number.NaN;
  if (!Number.isFinite(value)) {
    throw new TypeError(`${name} is not a finite number: "${raw}"`);
  }
  return value;
}

/**
 * Decodes one `DATA,...` frame.
 * @throws ProtocolError for a missing tag, a wrong field count or an unparsable field.
 */
export function decodeDataLine(line: string): RawSample {
  const text = line.trim();
  if (!text.startsWith(DATA_TAG)) {
    throw new ProtocolError(`invalid line: missing "${DATA_TAG}" tag`, text);
  }

  const parts = text.split(",");
  if (parts.length !== DATA_FIELD_COUNT) {
    throw new ProtocolError(
      `invalid line: expected ${DATA_FIELD_COUNT} fields, got ${parts.length}`,
      text,
    );
  }

  const [, tRaw, servoRaw, divRaw, rfRaw, photoRaw] = parts;
  try {
    return {
      t_ms: parseIntField("t_ms", tRaw),
      servo_deg: parseIntField("servo_deg", servoRaw),
      v_div: parseFloatField("v_div", divRaw),
      v_rf: parseFloatField("v_rf", rfRaw),
      v_photo: parseFloatField("v_photo", photoRaw),
    };
  } catch (err) {
    throw new ProtocolError("invalid line: field conversion failed", text, { cause: err });
  }
}
