import {
  experimentConfigSchema,
  isRunningState,
  type ControllerState,
  type ControllerStatus,
  type ExperimentConfig,
  type ProcessedSample,
  type RawSample,
  type ResolvedExperimentConfig,
} from "../../../shared/rig-schema.js";
import type { RigSettings } from "../../config/env.js";
import { RigValidationError, errorMessage } from "../../instruments/errors.js";
import {
  assertServoAngle,
  closeAndCollect,
  isActuatable,
  isConnectable,
  isStreamable,
  type DataSource,
  type TeardownStep,
} from "../../instruments/source.js";
import { metrics } from "../../metrics/index.js";
import type { RunExporter } from "../../services/export/csv-exporter.js";
import { RigModel, modelParamsFromSettings } from "./rig-model.js";

export type RigControllerDeps = {
  source: DataSource;
  settings: RigSettings;
  exporter: RunExporter;
  model?: RigModel;
  /** Wall clock in milliseconds. */
  now?: () => number;
};

/**
 * Run state machine for the coil rig.
 *
 * IDLE -> READY (checklist) -> RUNNING_AUTO | RUNNING_MANUAL -> FINISHED | ERROR,
 * and back to IDLE through reset(). The controller owns no timers: an external
 * driver calls tick() at its own cadence, one call at a time.
 */
export class RigController {
  private readonly source: DataSource;
  private readonly settings: RigSettings;
  private readonly exporter: RunExporter;
  private readonly model: RigModel;
  private readonly now: () => number;

  private state: ControllerState = "IDLE";
  private checklistOk = false;
  private config: ResolvedExperimentConfig | null = null;
  private startedAtMs: number | null = null;
  private endsAtMs: number | null = null;
  private lastError: string | null = null;
  private artifactPath: string | null = null;
  private servoDeg: number | null = null;
  private resourcesOpen = false;

  constructor(deps: RigControllerDeps) {
    this.source = deps.source;
    this.settings = deps.settings;
    this.exporter = deps.exporter;
    this.model = deps.model ?? new RigModel(modelParamsFromSettings(deps.settings));
    this.now = deps.now ?? Date.now;
    metrics.setState(this.state);
  }

  getState(): ControllerState {
    return this.state;
  }

  getLastError(): string | null {
    return this.lastError;
  }

  getArtifactPath(): string | null {
    return this.artifactPath;
  }

  isChecklistOk(): boolean {
    return this.checklistOk;
  }

  getHistory(): ProcessedSample[] {
    return this.model.getHistory();
  }

  /** Seconds left in the active run window, or null when no run is active. */
  remainingTime(): number | null {
    if (this.endsAtMs === null) return null;
    return Math.max(0, (this.endsAtMs - this.now()) / 1000);
  }

  getStatus(): ControllerStatus {
    return {
      state: this.state,
      checklistOk: this.checklistOk,
      config: this.config ? { ...this.config } : null,
      startedAtMs: this.startedAtMs,
      endsAtMs: this.endsAtMs,
      remainingS: this.remainingTime(),
      sampleCount: this.model.size,
      servoDeg: this.servoDeg,
      lastError: this.lastError,
      artifactPath: this.artifactPath,
    };
  }

  setChecklist(ok: boolean): ControllerState {
    this.checklistOk = ok;
    // Only IDLE <-> READY follows the flag; a finished or failed run keeps its state.
    if (ok && this.state === "IDLE") {
      this.transition("READY");
    } else if (!ok && this.state === "READY") {
      this.transition("IDLE");
    }
    return this.state;
  }

  async startExperiment(input: ExperimentConfig): Promise<void> {
    if (!this.checklistOk) {
      throw new RigValidationError("safety checklist has not been confirmed", 409);
    }
    if (this.state !== "READY") {
      throw new RigValidationError(`cannot start a run from ${this.state}; controller must be READY`, 409);
    }
    const cfg = this.resolveConfig(input);

    this.model.reset();
    this.artifactPath = null;
    await this.openResources();

    try {
      if (isStreamable(this.source)) {
        await this.source.startStream();
      }
      if (isActuatable(this.source)) {
        await this.source.setServoAngle(cfg.initialServoDeg);
      }
    } catch (err) {
      await closeAndCollect(this.stopStreamStep());
      throw err;
    }

    this.config = cfg;
    this.servoDeg = cfg.initialServoDeg;
    const startedAt = this.now();
    this.startedAtMs = startedAt;
    this.endsAtMs = startedAt + cfg.durationS * 1000;
    this.lastError = null;
    this.transition(cfg.mode === "AUTO" ? "RUNNING_AUTO" : "RUNNING_MANUAL");
    console.info(
      `[rig] run started: mode=${cfg.mode} duration=${cfg.durationS}s servo=${cfg.initialServoDeg}deg source=${this.source.kind}`,
    );
  }

  async tick(): Promise<void> {
    if (!isRunningState(this.state)) return;

    const remaining = this.remainingTime();
    if (remaining !== null && remaining <= 0) {
      await this.finalize();
      return;
    }

    let raw: RawSample;
    try {
      raw = await this.source.readSample();
    } catch (err) {
      metrics.recordReadFailure(this.source.kind);
      await this.fail(`Sample read failed: ${errorMessage(err)}`);
      return;
    }

    this.model.processSample(raw);
    metrics.recordSample();
  }

  async setServoAngle(deg: number): Promise<void> {
    if (this.state !== "RUNNING_MANUAL") {
      throw new RigValidationError(`servo moves are only accepted in RUNNING_MANUAL (state ${this.state})`, 409);
    }
    await this.applyServoAngle(deg);
  }

  /** Moves the servo before a run so the operator can check actuation. */
  async previewServoAngle(deg: number): Promise<void> {
    if (this.state !== "READY") {
      throw new RigValidationError(`servo preview is only accepted in READY (state ${this.state})`, 409);
    }
    assertServoAngle(deg, this.settings.servo);
    await this.openResources();
    await this.applyServoAngle(deg);
  }

  async stopExperiment(): Promise<void> {
    if (!isRunningState(this.state)) return;
    await this.finalize();
  }

  async reset(): Promise<void> {
    if (isRunningState(this.state)) {
      await this.stopExperiment();
    }

    this.model.reset();
    this.config = null;
    this.artifactPath = null;
    this.startedAtMs = null;
    this.endsAtMs = null;
    this.checklistOk = false;
    this.lastError = null;
    this.servoDeg = null;
    await this.releaseResources();
    this.transition("IDLE");
  }

  private resolveConfig(input: ExperimentConfig): ResolvedExperimentConfig {
    const parsed = experimentConfigSchema.safeParse(input);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
        .join("; ");
      throw new RigValidationError(`invalid experiment config: ${detail}`);
    }

    const { minDurationS, maxDurationS } = this.settings.experiment;
    const { durationS } = parsed.data;
    if (durationS < minDurationS) {
      throw new RigValidationError(`duration ${durationS}s is below the minimum of ${minDurationS}s`);
    }
    if (durationS > maxDurationS) {
      throw new RigValidationError(`duration ${durationS}s exceeds the safety limit of ${maxDurationS}s`);
    }

    const initialServoDeg = assertServoAngle(
      parsed.data.initialServoDeg ?? this.settings.servo.defaultDeg,
      this.settings.servo,
    );

    return {
      mode: parsed.data.mode,
      durationS,
      initialServoDeg,
      outputPath: parsed.data.outputPath ?? this.settings.output.defaultPath,
    };
  }

  private async applyServoAngle(deg: number): Promise<void> {
    const checked = assertServoAngle(deg, this.settings.servo);
    if (isActuatable(this.source)) {
      await this.source.setServoAngle(checked);
    }
    this.servoDeg = checked;
  }

  private async openResources(): Promise<void> {
    if (this.resourcesOpen) return;
    if (isConnectable(this.source)) {
      await this.source.connect();
    }
    this.resourcesOpen = true;
  }

  private async releaseResources(): Promise<void> {
    if (!this.resourcesOpen) return;
    const steps: TeardownStep[] = [...this.stopStreamStep()];
    if (isConnectable(this.source)) {
      const source = this.source;
      steps.push(["close data source", () => source.close()]);
    }
    await closeAndCollect(steps);
    this.resourcesOpen = false;
  }

  private stopStreamStep(): TeardownStep[] {
    if (!isStreamable(this.source)) return [];
    const source = this.source;
    return [["stop stream", () => source.stopStream()]];
  }

  private async finalize(): Promise<void> {
    await closeAndCollect(this.stopStreamStep());

    const history = this.model.getHistory();
    const outputPath = this.config?.outputPath ?? this.settings.output.defaultPath;
    this.startedAtMs = null;
    this.endsAtMs = null;

    try {
      this.artifactPath = await this.exporter.export(history, outputPath);
    } catch (err) {
      this.lastError = `Export failed: ${errorMessage(err)}`;
      this.transition("ERROR");
      metrics.recordRun("error");
      console.error(`[rig] ${this.lastError}`);
      return;
    }

    this.transition("FINISHED");
    metrics.recordRun("finished");
    console.info(`[rig] run finished: ${history.length} samples -> ${this.artifactPath}`);
  }

  private async fail(message: string): Promise<void> {
    this.lastError = message;
    this.startedAtMs = null;
    this.endsAtMs = null;
    this.transition("ERROR");
    metrics.recordRun("error");
    console.error(`[rig] ${message}`);
    await closeAndCollect(this.stopStreamStep());
  }

  private transition(next: ControllerState): void {
    this.state = next;
    metrics.setState(next);
  }
}
