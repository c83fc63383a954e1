import { describe, expect, it } from "vitest";
import { ArgsError, parseRunArgs } from "../rig-args.js";

describe("parseRunArgs", () => {
  it("defaults to an automatic run", () => {
    expect(parseRunArgs([])).toEqual({ help: false, mode: "AUTO" });
  });

  it("reads spaced and inline values", () => {
    expect(
      parseRunArgs(["--source", "serial", "--mode=manual", "--duration", "7.5", "--servo=12", "--out", "runs/x.csv"]),
    ).toEqual({
      help: false,
      source: "serial",
      mode: "MANUAL",
      durationS: 7.5,
      servoDeg: 12,
      out: "runs/x.csv",
    });
  });

  it("keeps everything after the first equals sign", () => {
    expect(parseRunArgs(["--out=runs/a=b.csv"]).out).toBe("runs/a=b.csv");
  });

  it("switches to replay when a file is given", () => {
    expect(parseRunArgs(["--file", "capture.csv"])).toMatchObject({ source: "replay", file: "capture.csv" });
    expect(parseRunArgs(["--file", "capture.csv", "--source", "synthetic"]).source).toBe("synthetic");
  });

  it("recognizes help", () => {
    expect(parseRunArgs(["-h"]).help).toBe(true);
  });

  it("rejects unknown flags and bad values", () => {
    expect(() => parseRunArgs(["--speed", "3"])).toThrow(new ArgsError("unknown option --speed"));
    expect(() => parseRunArgs(["--duration", "soon"])).toThrow('--duration expects a number, got "soon"');
    expect(() => parseRunArgs(["--mode", "turbo"])).toThrow('--mode must be AUTO or MANUAL, got "turbo"');
    expect(() => parseRunArgs(["--source", "usb"])).toThrow('--source must be one of serial|synthetic|replay, got "usb"');
    expect(() => parseRunArgs(["--out"])).toThrow("--out expects a value");
    expect(() => parseRunArgs(["stray"])).toThrow('unexpected argument "stray"');
  });
});
