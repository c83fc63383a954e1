import type { DataSourceKind, RigSettings } from "../config/env.js";
import { SerialDeviceSource } from "./device-source.js";
import { CsvReplaySource } from "./replay-source.js";
import { SerialPortLink, type LineLink } from "./serial-link.js";
import type { DataSource } from "./source.js";
import { SyntheticSource } from "./synthetic-source.js";

export * from "./errors.js";
export * from "./protocol.js";
export * from "./source.js";
export { SerialDeviceSource } from "./device-source.js";
export { CsvReplaySource } from "./replay-source.js";
export { SerialPortLink, type LineLink } from "./serial-link.js";
export { SyntheticSource } from "./synthetic-source.js";

export type DataSourceOverrides = {
  replayPath?: string;
  /** Transport for the serial source; defaults to a serialport link on the configured port. */
  link?: LineLink;
  random?: () => number;
};

export function createDataSource(
  kind: DataSourceKind,
  settings: RigSettings,
  overrides: DataSourceOverrides = {},
): DataSource {
  switch (kind) {
    case "serial":
      return new SerialDeviceSource({
        link:
          overrides.link ??
          new SerialPortLink({ path: settings.serial.port, baudRate: settings.serial.baudRate }),
        readTimeoutMs: settings.serial.readTimeoutMs,
        samplePeriodMs: settings.experiment.samplePeriodMs,
        servo: settings.servo,
        handshake: settings.serial.handshake,
        verbose: settings.logging.verbose,
      });
    case "synthetic":
      return new SyntheticSource({
        stepMs: settings.experiment.samplePeriodMs,
        servo: settings.servo,
        vDivBase: settings.synthetic.vDivBase,
        vRfBase: settings.synthetic.vRfBase,
        vPhotoBase: settings.synthetic.vPhotoBase,
        noise: settings.synthetic.noise,
        random: overrides.random,
      });
    case "replay": {
      const replayPath = overrides.replayPath ?? settings.source.replayPath;
      if (!replayPath) {
        throw new Error("replay source requires a file path (RIG_REPLAY_PATH or --file)");
      }
      return new CsvReplaySource(replayPath);
    }
  }
}
