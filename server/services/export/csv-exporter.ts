import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  RUN_CSV_COLUMNS,
  type Measure,
  type ProcessedSample,
  type RunCsvColumn,
} from "../../../shared/rig-schema.js";

export interface RunExporter {
  /** Writes the ordered run history and returns where the artifact landed. */
  export(history: readonly ProcessedSample[], outputPath: string): Promise<string>;
}

type CsvRow = Record<RunCsvColumn, Measure>;

function toRow(sample: ProcessedSample, t0_ms: number): CsvRow {
  const t_ms_rel = sample.t_ms - t0_ms;
  return {
    t_ms: sample.t_ms,
    t_ms_rel,
    t_s_rel: t_ms_rel / 1000,
    servo_deg: sample.servo_deg,
    v_div: sample.v_div,
    v_rf: sample.v_rf,
    v_photo: sample.v_photo,
    r_m: sample.r_m,
    B_exp: sample.B_exp,
    L_exp: sample.L_exp,
    V_in: sample.V_in,
    P_in: sample.P_in,
    B_teo: sample.B_teo,
    L_teo: sample.L_teo,
    err_B_abs: sample.err_B_abs,
    err_L_abs: sample.err_L_abs,
    err_B_rel: sample.err_B_rel,
    err_L_rel: sample.err_L_rel,
  };
}

const formatCell = (value: Measure): string =>
  value === null || !Number.isFinite(value) ? "" : String(value);

/** Header line plus one line per sample; relative time is measured from the first row. */
export function formatRunCsv(history: readonly ProcessedSample[]): string {
  const header = RUN_CSV_COLUMNS.join(",");
  const t0_ms = history.length > 0 ? history[0].t_ms : 0;
  const lines = history.map((sample) => {
    const row = toRow(sample, t0_ms);
    return RUN_CSV_COLUMNS.map((col) => formatCell(row[col])).join(",");
  });
  return [header, ...lines].join("\n") + "\n";
}

export class CsvExporter implements RunExporter {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async export(history: readonly ProcessedSample[], outputPath: string): Promise<string> {
    const target = path.resolve(this.baseDir, outputPath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, formatRunCsv(history), "utf-8");
    return target;
  }
}
