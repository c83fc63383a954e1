// Closed-form relations used to turn a raw rig frame into physical quantities.
// Singular points return null instead of Infinity so results stay serializable.
import type { Degrees, Measure, Radians } from "./rig-schema.js";

export const DIV_EPS = 1e-12;

const DEG2RAD = Math.PI / 180;

export function degToRad(theta_deg: Degrees): Radians {
  return theta_deg * DEG2RAD;
}

/**
 * Squared loop-to-coil distance for a servo angle. Equals
 * (y0 - L)^2 + 2*y0*L*(1 - sin(theta)), so it is never negative for
 * non-negative arm length and base offset.
 */
export function distanceRadicand(theta_deg: Degrees, armLength_m: number, baseOffset_m: number): number {
  const theta = degToRad(theta_deg);
  return armLength_m ** 2 + baseOffset_m ** 2 - 2 * baseOffset_m * armLength_m * Math.sin(theta);
}

export function distance(theta_deg: Degrees, armLength_m: number, baseOffset_m: number): number {
  return Math.sqrt(Math.max(0, distanceRadicand(theta_deg, armLength_m, baseOffset_m)));
}

/** Vin = Vdiv * (Rtop + Rbot) / Rbot */
export function reconstructInputVoltage(v_div: number, rTop_ohm: number, rBottom_ohm: number): number {
  return (v_div * (rTop_ohm + rBottom_ohm)) / rBottom_ohm;
}

/** Low regime strictly below the threshold; the threshold itself selects the high regime. */
export function selectEquivalentResistance(
  vin: number,
  low_ohm: number,
  high_ohm: number,
  threshold_V: number,
): number {
  return vin < threshold_V ? low_ohm : high_ohm;
}

export function inputPower(vin: number, req_ohm: number): number {
  return vin ** 2 / Math.max(req_ohm, DIV_EPS);
}

export function inversePowerLaw(r_m: number, n: number): Measure {
  if (r_m <= 0) return null;
  return 1 / r_m ** n;
}

export function scaledInversePowerLaw(k: number, r_m: number, n: number): Measure {
  const trend = inversePowerLaw(r_m, n);
  return trend === null ? null : k * trend;
}

export function absoluteError(experimental: number, theoretical: Measure): Measure {
  if (theoretical === null) return null;
  return experimental - theoretical;
}

export function relativeError(experimental: number, theoretical: Measure, eps = DIV_EPS): Measure {
  if (theoretical === null || Math.abs(theoretical) < eps) return null;
  return (experimental - theoretical) / theoretical;
}
