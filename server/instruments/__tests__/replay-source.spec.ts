import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { readRigSettings } from "../../config/env.js";
import { RigController } from "../../modules/rig/rig-controller.js";
import { FakeExporter } from "../../modules/rig/__tests__/fakes.js";
import { EndOfDataError, ResourceError, SourceIOError } from "../errors.js";
import { CsvReplaySource } from "../replay-source.js";

const settle = (ms = 50) => new Promise((resolve) => setTimeout(resolve, ms));

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "rig-replay-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

const writeCsv = async (name: string, body: string): Promise<string> => {
  const file = path.join(dir, name);
  await writeFile(file, body, "utf8");
  return file;
};

describe("CsvReplaySource", () => {
  it("yields rows in file order and then ends", async () => {
    const file = await writeCsv(
      "run.csv",
      "t_ms,servo_deg,v_div,v_rf,v_photo\n0,5,0.9,0.5,0.1\n\n50,6,0.91,0.51,0.11\n",
    );
    const source = new CsvReplaySource(file);
    await source.connect();

    await expect(source.readSample()).resolves.toEqual({
      t_ms: 0,
      servo_deg: 5,
      v_div: 0.9,
      v_rf: 0.5,
      v_photo: 0.1,
    });
    await expect(source.readSample()).resolves.toEqual({
      t_ms: 50,
      servo_deg: 6,
      v_div: 0.91,
      v_rf: 0.51,
      v_photo: 0.11,
    });
    const end = await source.readSample().catch((e: unknown) => e);
    expect(end).toBeInstanceOf(EndOfDataError);
    expect(end).toMatchObject({ message: `end of replay file ${file} after 2 rows` });
    await source.close();
  });

  it("ignores derived columns from an exported run", async () => {
    const file = await writeCsv(
      "exported.csv",
      "t_ms,servo_deg,v_div,v_rf,v_photo,r_m,B_teo\n10,3,1.5,0.2,0.3,0.39,\n",
    );
    const source = new CsvReplaySource(file);
    await source.connect();
    await expect(source.readSample()).resolves.toEqual({
      t_ms: 10,
      servo_deg: 3,
      v_div: 1.5,
      v_rf: 0.2,
      v_photo: 0.3,
    });
    await source.close();
  });

  it("fails on a malformed row", async () => {
    const file = await writeCsv("bad.csv", "t_ms,servo_deg,v_div,v_rf,v_photo\nabc,5,0.9,0.5,0.1\n");
    const source = new CsvReplaySource(file);
    await source.connect();
    const err = await source.readSample().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceIOError);
    expect(err).toMatchObject({ message: "replay row 1 is malformed: t_ms: expected an integer" });
    await source.close();
  });

  it("fails when a required column is absent", async () => {
    const file = await writeCsv("short.csv", "t_ms,servo_deg,v_div,v_rf\n0,5,0.9,0.5\n");
    const source = new CsvReplaySource(file);
    await source.connect();
    await expect(source.readSample()).rejects.toThrow("replay file lacks columns: v_photo");
    await source.close();
  });

  it("rejects non-decimal voltages", async () => {
    const file = await writeCsv("hex.csv", "t_ms,servo_deg,v_div,v_rf,v_photo\n0,5,0x10,0.5,0.1\n");
    const source = new CsvReplaySource(file);
    await source.connect();
    await expect(source.readSample()).rejects.toThrow("replay row 1 is malformed: v_div: expected a decimal number");
    await source.close();
  });

  it("holds a header failure raised before the first read", async () => {
    const file = await writeCsv("late-header.csv", "t_ms,servo_deg,v_div,v_rf\n0,5,0.9,0.5\n");
    const source = new CsvReplaySource(file);
    await source.connect();
    await settle();
    const err = await source.readSample().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceIOError);
    expect(err).toMatchObject({ message: "replay file lacks columns: v_photo" });
    await source.close();
  });

  it("holds a ragged-row failure raised before the first read", async () => {
    const file = await writeCsv(
      "ragged.csv",
      "t_ms,servo_deg,v_div,v_rf,v_photo\n0,5,0.9,0.5,0.1\n1,2\n",
    );
    const source = new CsvReplaySource(file);
    await source.connect();
    await settle();
    const err = await source.readSample().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceIOError);
    expect(err).toMatchObject({ message: expect.stringContaining("replay read failed: Invalid Record Length") });
    await source.close();
  });

  it("fails the run on a ragged file instead of crashing the process", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    const file = await writeCsv("ragged-run.csv", "t_ms,servo_deg,v_div,v_rf,v_photo\n1,2\n");
    const controller = new RigController({
      source: new CsvReplaySource(file),
      settings: readRigSettings({}),
      exporter: new FakeExporter(),
    });
    controller.setChecklist(true);
    await controller.startExperiment({ mode: "AUTO", durationS: 5 });
    await settle();
    await controller.tick();
    expect(controller.getState()).toBe("ERROR");
    expect(controller.getLastError()).toContain("Sample read failed: replay read failed: Invalid Record Length");
    await controller.reset();
  });

  it("reports a missing file as a resource failure", async () => {
    const source = new CsvReplaySource(path.join(dir, "missing.csv"));
    await expect(source.connect()).rejects.toBeInstanceOf(ResourceError);
  });

  it("refuses reads before connect", async () => {
    const source = new CsvReplaySource(path.join(dir, "never.csv"));
    await expect(source.readSample()).rejects.toThrow("replay source is not open; call connect() first");
  });
});
