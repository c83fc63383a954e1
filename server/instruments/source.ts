// Data source contract. Every source yields raw frames; lifecycle, streaming and
// actuation are optional capabilities detected by shape, never by class.
import type { Degrees, RawSample } from "../../shared/rig-schema.js";
import type { ServoLimits } from "../config/env.js";
import { RigValidationError, errorMessage } from "./errors.js";

export interface DataSource {
  readonly kind: string;
  readSample(): Promise<RawSample>;
}

export interface Connectable {
  connect(): Promise<void>;
  close(): Promise<void>;
}

export interface Streamable {
  startStream(): Promise<void>;
  stopStream(): Promise<void>;
}

export interface Actuatable {
  setServoAngle(deg: Degrees): Promise<void>;
}

export function isConnectable<S extends DataSource>(source: S): source is S & Connectable {
  return (
    "connect" in source &&
    typeof source.connect === "function" &&
    "close" in source &&
    typeof source.close === "function"
  );
}

export function isStreamable<S extends DataSource>(source: S): source is S & Streamable {
  return (
    "startStream" in source &&
    typeof source.startStream === "function" &&
    "stopStream" in source &&
    typeof source.stopStream === "function"
  );
}

export function isActuatable<S extends DataSource>(source: S): source is S & Actuatable {
  return "setServoAngle" in source && typeof source.setServoAngle === "function";
}

/** Rejects non-integer or out-of-range servo angles. */
export function assertServoAngle(deg: number, limits: ServoLimits): number {
  if (!Number.isInteger(deg)) {
    throw new RigValidationError(`servo angle must be an integer, got ${deg}`);
  }
  if (deg < limits.minDeg || deg > limits.maxDeg) {
    throw new RigValidationError(
      `servo angle ${deg} outside [${limits.minDeg}, ${limits.maxDeg}] deg`,
    );
  }
  return deg;
}

export type TeardownStep = readonly [label: string, run: () => Promise<void> | void];

export type TeardownFailure = {
  label: string;
  error: unknown;
};

/**
 * Runs every teardown step even when earlier ones fail. Failures are logged and
 * returned; nothing is thrown, so the caller keeps whatever primary failure
 * started the shutdown.
 */
export async function closeAndCollect(
  steps: readonly TeardownStep[],
  tag = "rig",
): Promise<TeardownFailure[]> {
  const failures: TeardownFailure[] = [];
  for (const [label, run] of steps) {
    try {
      await run();
    } catch (error) {
      failures.push({ label, error });
      console.warn(`[${tag}] ${label} failed during teardown: ${errorMessage(error)}`);
    }
  }
  return failures;
}
