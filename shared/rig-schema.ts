import { z } from "zod";

export type Degrees = number;
export type Radians = number;

// null marks a value that is undefined/unbounded (zero distance, vanishing denominator).
export const measureSchema = z.number().nullable();
export type Measure = z.infer<typeof measureSchema>;

export const rawSampleSchema = z.object({
  t_ms: z.number().int(),
  servo_deg: z.number().int(),
  v_div: z.number(),
  v_rf: z.number(),
  v_photo: z.number(),
});
export type RawSample = z.infer<typeof rawSampleSchema>;

export const processedSampleSchema = rawSampleSchema.extend({
  r_m: z.number(),
  V_in: z.number(),
  P_in: z.number(),
  B_exp: z.number(),
  B_teo: measureSchema,
  L_exp: z.number(),
  L_teo: measureSchema,
  err_B_abs: measureSchema,
  err_L_abs: measureSchema,
  err_B_rel: measureSchema,
  err_L_rel: measureSchema,
});
export type ProcessedSample = Readonly<z.infer<typeof processedSampleSchema>>;

export const experimentModeSchema = z.enum(["AUTO", "MANUAL"]);
export type ExperimentMode = z.infer<typeof experimentModeSchema>;

export const controllerStateSchema = z.enum([
  "IDLE",
  "READY",
  "RUNNING_AUTO",
  "RUNNING_MANUAL",
  "FINISHED",
  "ERROR",
]);
export type ControllerState = z.infer<typeof controllerStateSchema>;

export const RUNNING_STATES: ReadonlySet<ControllerState> = new Set<ControllerState>([
  "RUNNING_AUTO",
  "RUNNING_MANUAL",
]);

export const isRunningState = (state: ControllerState): boolean => RUNNING_STATES.has(state);

export const experimentConfigSchema = z.object({
  mode: experimentModeSchema,
  durationS: z.number().finite(),
  initialServoDeg: z.number().int().optional(),
  outputPath: z.string().trim().min(1).optional(),
});
export type ExperimentConfig = z.infer<typeof experimentConfigSchema>;

export type ResolvedExperimentConfig = Required<ExperimentConfig>;

export const servoCommandSchema = z.object({
  deg: z.number().int(),
});

export const checklistUpdateSchema = z.object({
  ok: z.boolean(),
});

export type ControllerStatus = {
  state: ControllerState;
  checklistOk: boolean;
  config: ResolvedExperimentConfig | null;
  startedAtMs: number | null;
  endsAtMs: number | null;
  remainingS: number | null;
  sampleCount: number;
  servoDeg: number | null;
  lastError: string | null;
  artifactPath: string | null;
};

/** Column order of the exported run record. */
export const RUN_CSV_COLUMNS = [
  "t_ms",
  "t_ms_rel",
  "t_s_rel",
  "servo_deg",
  "v_div",
  "v_rf",
  "v_photo",
  "r_m",
  "B_exp",
  "L_exp",
  "V_in",
  "P_in",
  "B_teo",
  "L_teo",
  "err_B_abs",
  "err_L_abs",
  "err_B_rel",
  "err_L_rel",
] as const;
export type RunCsvColumn = (typeof RUN_CSV_COLUMNS)[number];

/** Columns a replay file must provide. */
export const REPLAY_REQUIRED_COLUMNS = ["t_ms", "servo_deg", "v_div", "v_rf", "v_photo"] as const;
