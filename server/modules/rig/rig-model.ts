import type { ProcessedSample, RawSample } from "../../../shared/rig-schema.js";
import {
  absoluteError,
  distance,
  inputPower,
  reconstructInputVoltage,
  relativeError,
  scaledInversePowerLaw,
  selectEquivalentResistance,
} from "../../../shared/rig-equations.js";
import type { RigSettings } from "../../config/env.js";

export type RigModelParams = {
  armLength_m: number;
  baseOffset_m: number;
  rTop_ohm: number;
  rBottom_ohm: number;
  reqLow_ohm: number;
  reqHigh_ohm: number;
  reqThreshold_V: number;
  kB: number;
  kL: number;
};

export function modelParamsFromSettings(settings: RigSettings): RigModelParams {
  return {
    armLength_m: settings.geometry.armLength_m,
    baseOffset_m: settings.geometry.baseOffset_m,
    rTop_ohm: settings.divider.top_ohm,
    rBottom_ohm: settings.divider.bottom_ohm,
    reqLow_ohm: settings.regime.low_ohm,
    reqHigh_ohm: settings.regime.high_ohm,
    reqThreshold_V: settings.regime.threshold_V,
    kB: settings.theory.kB,
    kL: settings.theory.kL,
  };
}

/**
 * Turns raw frames into processed samples and keeps the run history.
 * Calibration constants are fixed for the lifetime of the instance.
 */
export class RigModel {
  private readonly params: Readonly<RigModelParams>;
  private history: ProcessedSample[] = [];

  constructor(params: RigModelParams) {
    this.params = Object.freeze({ ...params });
  }

  processSample(raw: RawSample): ProcessedSample {
    const p = this.params;

    const r_m = distance(raw.servo_deg, p.armLength_m, p.baseOffset_m);
    const V_in = reconstructInputVoltage(raw.v_div, p.rTop_ohm, p.rBottom_ohm);
    const req = selectEquivalentResistance(V_in, p.reqLow_ohm, p.reqHigh_ohm, p.reqThreshold_V);
    const P_in = inputPower(V_in, req);

    const B_exp = raw.v_rf;
    const L_exp = raw.v_photo;
    const B_teo = scaledInversePowerLaw(p.kB, r_m, 1);
    const L_teo = scaledInversePowerLaw(p.kL, r_m, 2);

    const sample: ProcessedSample = Object.freeze({
      t_ms: raw.t_ms,
      servo_deg: raw.servo_deg,
      v_div: raw.v_div,
      v_rf: raw.v_rf,
      v_photo: raw.v_photo,
      r_m,
      V_in,
      P_in,
      B_exp,
      B_teo,
      L_exp,
      L_teo,
      err_B_abs: absoluteError(B_exp, B_teo),
      err_L_abs: absoluteError(L_exp, L_teo),
      err_B_rel: relativeError(B_exp, B_teo),
      err_L_rel: relativeError(L_exp, L_teo),
    });

    this.history.push(sample);
    return sample;
  }

  reset(): void {
    this.history = [];
  }

  getHistory(): ProcessedSample[] {
    return [...this.history];
  }

  get size(): number {
    return this.history.length;
  }
}
