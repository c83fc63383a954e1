import { describe, expect, it } from "vitest";
import { RigModel, type RigModelParams } from "../rig-model.js";

const params: RigModelParams = {
  armLength_m: 0.3,
  baseOffset_m: 0.4,
  rTop_ohm: 9,
  rBottom_ohm: 1,
  reqLow_ohm: 15,
  reqHigh_ohm: 20,
  reqThreshold_V: 11,
  kB: 0.3,
  kL: 1,
};

describe("RigModel", () => {
  it("derives geometry, power and theory terms from a raw frame", () => {
    const model = new RigModel(params);
    const s = model.processSample({ t_ms: 100, servo_deg: 0, v_div: 1.2, v_rf: 0.9, v_photo: 2 });

    expect(s.t_ms).toBe(100);
    expect(s.r_m).toBeCloseTo(0.5, 12);
    expect(s.V_in).toBeCloseTo(12, 12);
    expect(s.P_in).toBeCloseTo(7.2, 12);
    expect(s.B_exp).toBe(0.9);
    expect(s.L_exp).toBe(2);
    expect(s.B_teo).toBeCloseTo(0.6, 12);
    expect(s.L_teo).toBeCloseTo(4, 12);
    expect(s.err_B_abs).toBeCloseTo(0.3, 12);
    expect(s.err_B_rel).toBeCloseTo(0.5, 12);
    expect(s.err_L_abs).toBeCloseTo(-2, 12);
    expect(s.err_L_rel).toBeCloseTo(-0.5, 12);
  });

  it("uses the low-regime resistance below the threshold", () => {
    const model = new RigModel(params);
    const s = model.processSample({ t_ms: 0, servo_deg: 0, v_div: 1, v_rf: 0, v_photo: 0 });
    expect(s.V_in).toBeCloseTo(10, 12);
    expect(s.P_in).toBeCloseTo(100 / 15, 12);
  });

  it("leaves theory and error terms undefined at zero distance", () => {
    const model = new RigModel({ ...params, armLength_m: 0.5, baseOffset_m: 0.5 });
    const s = model.processSample({ t_ms: 0, servo_deg: 90, v_div: 1, v_rf: 0.5, v_photo: 0.5 });
    expect(s.r_m).toBe(0);
    expect(s.B_teo).toBeNull();
    expect(s.L_teo).toBeNull();
    expect(s.err_B_abs).toBeNull();
    expect(s.err_L_abs).toBeNull();
    expect(s.err_B_rel).toBeNull();
    expect(s.err_L_rel).toBeNull();
    expect(model.size).toBe(1);
  });

  it("keeps an append-only history of frozen samples", () => {
    const model = new RigModel(params);
    model.processSample({ t_ms: 0, servo_deg: 0, v_div: 1, v_rf: 0.5, v_photo: 0.5 });
    model.processSample({ t_ms: 50, servo_deg: 10, v_div: 1, v_rf: 0.5, v_photo: 0.5 });

    const history = model.getHistory();
    expect(history.map((s) => s.t_ms)).toEqual([0, 50]);
    expect(Object.isFrozen(history[0])).toBe(true);

    history.pop();
    expect(model.size).toBe(2);

    model.reset();
    expect(model.getHistory()).toEqual([]);
  });
});
