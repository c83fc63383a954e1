import { describe, expect, it } from "vitest";
import { RigConfigError, flagEnabled, readRigSettings } from "../env.js";

const configError = (env: Record<string, string>): RigConfigError => {
  try {
    readRigSettings(env);
  } catch (err) {
    if (err instanceof RigConfigError) return err;
    throw err;
  }
  throw new Error("expected the settings to be rejected");
};

describe("readRigSettings", () => {
  it("falls back to the bench defaults", () => {
    const settings = readRigSettings({});
    expect(settings.serial).toEqual({
      port: "/dev/ttyUSB0",
      baudRate: 115200,
      readTimeoutMs: 1000,
      handshake: false,
    });
    expect(settings.experiment).toEqual({ minDurationS: 1, maxDurationS: 20, samplePeriodMs: 50 });
    expect(settings.divider).toEqual({ top_ohm: 99800, bottom_ohm: 9935 });
    expect(settings.regime).toEqual({ low_ohm: 15.25, high_ohm: 19.64, threshold_V: 11 });
    expect(settings.source).toEqual({ kind: "synthetic", replayPath: null });
    expect(settings.output.defaultPath).toBe("output/experiment.csv");
    expect(settings.synthetic.noise).toEqual({ v_div: 0.02, v_rf: 0.02, v_photo: 0.02 });
  });

  it("lets each synthetic channel override the shared noise budget", () => {
    const settings = readRigSettings({ RIG_SIM_NOISE_V: "0.05", RIG_SIM_NOISE_RF_V: "0" });
    expect(settings.synthetic.noise).toEqual({ v_div: 0.05, v_rf: 0, v_photo: 0.05 });
  });

  it("reads overrides from the environment", () => {
    const settings = readRigSettings({
      RIG_SOURCE: " Replay ",
      RIG_REPLAY_PATH: "fixtures/run.csv",
      RIG_SERVO_MAX_DEG: "45",
      RIG_SERIAL_HANDSHAKE: "yes",
      RIG_LOG: "1",
    });
    expect(settings.source).toEqual({ kind: "replay", replayPath: "fixtures/run.csv" });
    expect(settings.servo.maxDeg).toBe(45);
    expect(settings.serial.handshake).toBe(true);
    expect(settings.logging.verbose).toBe(true);
  });

  it("returns a deeply frozen value", () => {
    const settings = readRigSettings({});
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.servo)).toBe(true);
  });

  it("rejects inconsistent limits", () => {
    expect(configError({ RIG_MIN_DURATION_S: "30" }).message).toBe(
      "invalid rig settings: experiment.minDurationS: minimum duration exceeds maximum duration",
    );
    expect(configError({ RIG_SERVO_DEFAULT_DEG: "40" }).message).toBe(
      "invalid rig settings: servo.defaultDeg: default servo angle must lie in [0, 30]",
    );
    expect(configError({ RIG_SOURCE: "replay" }).message).toBe(
      "invalid rig settings: source.replayPath: replay source requires RIG_REPLAY_PATH",
    );
  });

  it("rejects values that are not numbers", () => {
    const err = configError({ RIG_SAMPLE_PERIOD_MS: "fast" });
    expect(err.issues.map((issue) => issue.path.join("."))).toEqual(["experiment.samplePeriodMs"]);
  });
});

describe("flagEnabled", () => {
  it("parses common spellings and keeps the default otherwise", () => {
    expect(flagEnabled("on", false)).toBe(true);
    expect(flagEnabled("0", true)).toBe(false);
    expect(flagEnabled("maybe", true)).toBe(true);
    expect(flagEnabled(undefined, false)).toBe(false);
  });
});
