import { z } from "zod";

// Centralized environment switches for the rig server and CLI.
export const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const numberOr = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === "") return fallback;
  return Number(raw);
};

const stringOr = (raw: string | undefined, fallback: string): string => {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : fallback;
};

export const dataSourceKindSchema = z.enum(["serial", "synthetic", "replay"]);
export type DataSourceKind = z.infer<typeof dataSourceKindSchema>;

const positive = z.number().finite().positive();

export const rigSettingsSchema = z
  .object({
    serial: z.object({
      port: z.string().min(1),
      baudRate: z.number().int().positive(),
      readTimeoutMs: positive,
      handshake: z.boolean(),
    }),
    experiment: z.object({
      minDurationS: positive,
      maxDurationS: positive,
      samplePeriodMs: z.number().int().positive(),
    }),
    servo: z.object({
      minDeg: z.number().int(),
      maxDeg: z.number().int(),
      defaultDeg: z.number().int(),
    }),
    geometry: z.object({
      armLength_m: positive,
      baseOffset_m: positive,
    }),
    divider: z.object({
      top_ohm: positive,
      bottom_ohm: positive,
    }),
    regime: z.object({
      low_ohm: positive,
      high_ohm: positive,
      threshold_V: z.number().finite(),
    }),
    theory: z.object({
      kB: z.number().finite(),
      kL: z.number().finite(),
    }),
    operatingRange: z.object({
      vinMin_V: z.number().finite(),
      vinMax_V: z.number().finite(),
    }),
    source: z.object({
      kind: dataSourceKindSchema,
      replayPath: z.string().nullable(),
    }),
    synthetic: z.object({
      vDivBase: z.number().finite(),
      vRfBase: z.number().finite(),
      vPhotoBase: z.number().finite(),
      noise: z.object({
        v_div: z.number().finite().nonnegative(),
        v_rf: z.number().finite().nonnegative(),
        v_photo: z.number().finite().nonnegative(),
      }),
    }),
    output: z.object({
      defaultPath: z.string().min(1),
    }),
    logging: z.object({
      verbose: z.boolean(),
    }),
  })
  .superRefine((settings, ctx) => {
    if (settings.experiment.minDurationS > settings.experiment.maxDurationS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["experiment", "minDurationS"],
        message: "minimum duration exceeds maximum duration",
      });
    }
    const { minDeg, maxDeg, defaultDeg } = settings.servo;
    if (minDeg > maxDeg) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["servo", "minDeg"],
        message: "servo minimum exceeds servo maximum",
      });
    } else if (defaultDeg < minDeg || defaultDeg > maxDeg) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["servo", "defaultDeg"],
        message: `default servo angle must lie in [${minDeg}, ${maxDeg}]`,
      });
    }
    if (settings.source.kind === "replay" && !settings.source.replayPath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["source", "replayPath"],
        message: "replay source requires RIG_REPLAY_PATH",
      });
    }
  });

type RigSettingsShape = z.infer<typeof rigSettingsSchema>;

type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

export type RigSettings = DeepReadonly<RigSettingsShape>;
export type ServoLimits = RigSettings["servo"];

export class RigConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[],
  ) {
    super(message);
    this.name = "RigConfigError";
  }
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  Object.freeze(value);
  return value;
}

/** Validates a complete settings object and returns a frozen copy. */
export function buildRigSettings(input: unknown): RigSettings {
  const parsed = rigSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new RigConfigError(`invalid rig settings: ${summary}`, parsed.error.issues);
  }
  return deepFreeze(parsed.data);
}

export const readRigSettings = (
  env: Record<string, string | undefined> = typeof process !== "undefined" ? process.env : {},
): RigSettings => {
  const replayPath = env.RIG_REPLAY_PATH?.trim();
  const noise_V = numberOr(env.RIG_SIM_NOISE_V, 0.02);
  return buildRigSettings({
    serial: {
      port: stringOr(env.RIG_SERIAL_PORT, "/dev/ttyUSB0"),
      baudRate: numberOr(env.RIG_SERIAL_BAUD, 115_200),
      readTimeoutMs: numberOr(env.RIG_SERIAL_TIMEOUT_MS, 1_000),
      handshake: flagEnabled(env.RIG_SERIAL_HANDSHAKE, false),
    },
    experiment: {
      minDurationS: numberOr(env.RIG_MIN_DURATION_S, 1),
      // coil heats quickly; keep runs short
      maxDurationS: numberOr(env.RIG_MAX_DURATION_S, 20),
      samplePeriodMs: numberOr(env.RIG_SAMPLE_PERIOD_MS, 50),
    },
    servo: {
      minDeg: numberOr(env.RIG_SERVO_MIN_DEG, 0),
      maxDeg: numberOr(env.RIG_SERVO_MAX_DEG, 30),
      defaultDeg: numberOr(env.RIG_SERVO_DEFAULT_DEG, 0),
    },
    geometry: {
      armLength_m: numberOr(env.RIG_ARM_LENGTH_M, 0.22),
      baseOffset_m: numberOr(env.RIG_BASE_OFFSET_M, 0.325),
    },
    divider: {
      top_ohm: numberOr(env.RIG_DIVIDER_TOP_OHM, 99_800),
      bottom_ohm: numberOr(env.RIG_DIVIDER_BOTTOM_OHM, 9_935),
    },
    regime: {
      low_ohm: numberOr(env.RIG_REQ_LOW_OHM, 15.25),
      high_ohm: numberOr(env.RIG_REQ_HIGH_OHM, 19.64),
      threshold_V: numberOr(env.RIG_REQ_THRESHOLD_V, 11),
    },
    theory: {
      kB: numberOr(env.RIG_K_B, 0.3),
      kL: numberOr(env.RIG_K_L, 1),
    },
    operatingRange: {
      vinMin_V: numberOr(env.RIG_VIN_MIN_V, 9),
      vinMax_V: numberOr(env.RIG_VIN_MAX_V, 12),
    },
    source: {
      kind: stringOr(env.RIG_SOURCE, "synthetic").toLowerCase(),
      replayPath: replayPath ? replayPath : null,
    },
    synthetic: {
      vDivBase: numberOr(env.RIG_SIM_V_DIV, 0.95),
      vRfBase: numberOr(env.RIG_SIM_V_RF, 0.6),
      vPhotoBase: numberOr(env.RIG_SIM_V_PHOTO, 0.1),
      noise: {
        v_div: numberOr(env.RIG_SIM_NOISE_DIV_V, noise_V),
        v_rf: numberOr(env.RIG_SIM_NOISE_RF_V, noise_V),
        v_photo: numberOr(env.RIG_SIM_NOISE_PHOTO_V, noise_V),
      },
    },
    output: {
      defaultPath: stringOr(env.RIG_OUTPUT_PATH, "output/experiment.csv"),
    },
    logging: {
      verbose: flagEnabled(env.RIG_LOG, false),
    },
  });
};
