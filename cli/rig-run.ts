#!/usr/bin/env node
/**
 * Headless rig run: confirms the checklist, runs one experiment against the
 * configured source and writes the CSV. Settings come from RIG_* variables;
 * flags override the run itself.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { isRunningState } from "../shared/rig-schema.js";
import { readRigSettings } from "../server/config/env.js";
import { createDataSource, errorMessage } from "../server/instruments/index.js";
import { RigController } from "../server/modules/rig/rig-controller.js";
import { CsvExporter } from "../server/services/export/csv-exporter.js";
import { ArgsError, RUN_USAGE, parseRunArgs, type RunArgs } from "./rig-args.js";

function fmt(n: number): string {
  if (!Number.isFinite(n)) return String(n);
  return parseFloat(n.toPrecision(4)).toString();
}

async function run(args: RunArgs): Promise<number> {
  const settings = readRigSettings(process.env);
  const kind = args.source ?? settings.source.kind;
  const source = createDataSource(kind, settings, { replayPath: args.file });
  const controller = new RigController({ source, settings, exporter: new CsvExporter() });

  controller.setChecklist(true);
  await controller.startExperiment({
    mode: args.mode,
    durationS: args.durationS ?? settings.experiment.maxDurationS,
    initialServoDeg: args.servoDeg,
    outputPath: args.out,
  });

  const periodMs = settings.experiment.samplePeriodMs;
  while (isRunningState(controller.getState())) {
    await controller.tick();
    if (isRunningState(controller.getState())) {
      await sleep(periodMs);
    }
  }

  const history = controller.getHistory();
  const last = history.at(-1);
  const state = controller.getState();
  const artifact = controller.getArtifactPath();
  // keep the error and artifact around for the report, then release the source
  const lastError = controller.getLastError();
  await controller.reset();

  if (state === "ERROR") {
    console.error(`[rig] run failed after ${history.length} samples: ${lastError ?? "unknown error"}`);
    return 1;
  }
  console.log(`samples=${history.length}`);
  if (last) {
    console.log(`last r_m=${fmt(last.r_m)} V_in=${fmt(last.V_in)} P_in=${fmt(last.P_in)}`);
  }
  console.log(`artifact=${artifact ?? "(none)"}`);
  return 0;
}

async function main() {
  let args: RunArgs;
  try {
    args = parseRunArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ArgsError) {
      console.error(err.message);
      console.error(RUN_USAGE);
      process.exit(2);
    }
    throw err;
  }
  if (args.help) {
    console.log(RUN_USAGE);
    return;
  }
  process.exitCode = await run(args);
}

main().catch((err: unknown) => {
  console.error(`[rig] ${errorMessage(err)}`);
  process.exit(1);
});
