import type { ExperimentMode } from "../shared/rig-schema.js";
import type { DataSourceKind } from "../server/config/env.js";

export type RunArgs = {
  help: boolean;
  source?: DataSourceKind;
  file?: string;
  mode: ExperimentMode;
  durationS?: number;
  servoDeg?: number;
  out?: string;
};

export class ArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgsError";
  }
}

const SOURCE_KINDS: readonly DataSourceKind[] = ["serial", "synthetic", "replay"];

const parseSource = (value: string): DataSourceKind => {
  const kind = SOURCE_KINDS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!kind) throw new ArgsError(`--source must be one of ${SOURCE_KINDS.join("|")}, got "${value}"`);
  return kind;
};

const parseMode = (value: string): ExperimentMode => {
  const normalized = value.trim().toUpperCase();
  if (normalized === "AUTO" || normalized === "MANUAL") return normalized;
  throw new ArgsError(`--mode must be AUTO or MANUAL, got "${value}"`);
};

const parseNumber = (flag: string, value: string): number => {
  const parsed = Number(value);
  if (!value.trim() || !Number.isFinite(parsed)) throw new ArgsError(`${flag} expects a number, got "${value}"`);
  return parsed;
};

export function parseRunArgs(argv: readonly string[]): RunArgs {
  const out: RunArgs = { help: false, mode: "AUTO" };

  const takeValue = (token: string, next: string | undefined): string => {
    if (token.includes("=")) return token.slice(token.indexOf("=") + 1);
    if (next === undefined) throw new ArgsError(`${token} expects a value`);
    return next;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? "";
    const flag = token.split("=", 1)[0] ?? token;
    if (flag === "--help" || flag === "-h") {
      out.help = true;
      continue;
    }
    if (!flag.startsWith("--")) {
      throw new ArgsError(`unexpected argument "${token}"`);
    }
    const value = takeValue(token, argv[i + 1]);
    if (!token.includes("=")) i += 1;
    switch (flag) {
      case "--source":
        out.source = parseSource(value);
        break;
      case "--file":
        out.file = value;
        break;
      case "--mode":
        out.mode = parseMode(value);
        break;
      case "--duration":
        out.durationS = parseNumber(flag, value);
        break;
      case "--servo":
        out.servoDeg = parseNumber(flag, value);
        break;
      case "--out":
        out.out = value;
        break;
      default:
        throw new ArgsError(`unknown option ${flag}`);
    }
  }

  if (out.file && out.source === undefined) out.source = "replay";
  return out;
}

export const RUN_USAGE = [
  "Usage: rig-run [options]",
  "",
  "  --source <serial|synthetic|replay>  data source (default RIG_SOURCE or synthetic)",
  "  --file <path>                       CSV to replay (implies --source replay)",
  "  --mode <AUTO|MANUAL>                run mode (default AUTO)",
  "  --duration <s>                      run length in seconds (default: maximum allowed)",
  "  --servo <deg>                       initial servo angle",
  "  --out <path>                        CSV output path",
  "  -h, --help                          show this help",
].join("\n");
