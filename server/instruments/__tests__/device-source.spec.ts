import { describe, expect, it, vi } from "vitest";
import { ResourceError, RigValidationError, SourceIOError, SourceTimeoutError } from "../errors.js";
import { SerialDeviceSource, type SerialDeviceOptions } from "../device-source.js";
import { FakeLineLink } from "./fake-link.js";

const build = (link: FakeLineLink, extra: Partial<SerialDeviceOptions> = {}) =>
  new SerialDeviceSource({
    link,
    readTimeoutMs: 1000,
    samplePeriodMs: 50,
    servo: { minDeg: 0, maxDeg: 30, defaultDeg: 0 },
    ...extra,
  });

describe("SerialDeviceSource", () => {
  it("opens the link and drops stale input", async () => {
    const link = new FakeLineLink();
    await build(link).connect();
    expect(link.isOpen).toBe(true);
    expect(link.discards).toBe(1);
    expect(link.written).toEqual([]);
  });

  it("pings and stops the device when the handshake is enabled", async () => {
    const link = new FakeLineLink(["READY", "PONG"]);
    await build(link, { handshake: true }).connect();
    expect(link.written).toEqual(["PING\n", "STOP\n"]);
  });

  it("closes the link when the device never answers PING", async () => {
    const link = new FakeLineLink();
    await expect(build(link, { handshake: true }).connect()).rejects.toThrow(
      new ResourceError("device did not answer PING within 1000 ms"),
    );
    expect(link.isOpen).toBe(false);
  });

  it("wraps transport failures on open", async () => {
    const link = new FakeLineLink();
    link.openError = new Error("port busy");
    const err = await build(link).connect().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ResourceError);
    expect(err).toMatchObject({ message: "failed to open serial link: port busy" });
  });

  it("configures the raw mode and rate before starting the stream", async () => {
    const link = new FakeLineLink();
    const source = build(link);
    await source.connect();
    await source.startStream();
    await source.stopStream();
    expect(link.written).toEqual(["RAW=0\n", "RATE=20\n", "START\n", "STOP\n"]);
  });

  it("skips blank, informational and malformed lines", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const link = new FakeLineLink(["", "INFO rate=20", "DATA,1,2", "DATA,40,12,0.9,0.5,0.2"]);
    const source = build(link);
    await source.connect();
    await expect(source.readSample()).resolves.toEqual({
      t_ms: 40,
      servo_deg: 12,
      v_div: 0.9,
      v_rf: 0.5,
      v_photo: 0.2,
    });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[rig/serial] discarded frame (invalid line: expected 6 fields, got 3): DATA,1,2",
    );
  });

  it("times out when no frame arrives", async () => {
    const link = new FakeLineLink();
    const source = build(link);
    await source.connect();
    const err = await source.readSample().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceTimeoutError);
    expect(err).toMatchObject({ message: "no DATA frame within 1000 ms", timeoutMs: 1000 });
    expect(link.timeouts).toEqual([1000]);
  });

  it("validates servo angles before writing", async () => {
    const link = new FakeLineLink();
    const source = build(link);
    await source.connect();
    await expect(source.setServoAngle(31)).rejects.toBeInstanceOf(RigValidationError);
    await expect(source.setServoAngle(7.5)).rejects.toBeInstanceOf(RigValidationError);
    await source.setServoAngle(10);
    expect(link.written).toEqual(["SERVO=10\n"]);
  });

  it("refuses commands on a closed link but tolerates stop and close", async () => {
    const link = new FakeLineLink();
    const source = build(link);
    await expect(source.startStream()).rejects.toBeInstanceOf(SourceIOError);
    await source.stopStream();
    await source.close();
    expect(link.written).toEqual([]);
  });
});
