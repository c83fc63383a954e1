// Synthetic rig that emulates DATA frames without hardware. Its clock advances
// by a fixed step per read, independent of wall-clock time.
import type { Degrees, RawSample } from "../../shared/rig-schema.js";
import type { ServoLimits } from "../config/env.js";
import { assertServoAngle, type Actuatable, type DataSource } from "./source.js";

/** Half-width of the uniform noise on each channel, in volts. */
export type ChannelNoise = {
  v_div: number;
  v_rf: number;
  v_photo: number;
};

type SyntheticOptions = {
  stepMs: number;
  servo: ServoLimits;
  initialServoDeg?: number;
  vDivBase: number;
  vRfBase: number;
  vPhotoBase: number;
  noise: ChannelNoise;
  /** Uniform generator in [0, 1). */
  random?: () => number;
};

export class SyntheticSource implements DataSource, Actuatable {
  readonly kind = "synthetic";
  private t_ms = 0;
  private servoDeg: number;
  private readonly random: () => number;

  constructor(private readonly opts: SyntheticOptions) {
    this.random = opts.random ?? Math.random;
    this.servoDeg = assertServoAngle(opts.initialServoDeg ?? opts.servo.defaultDeg, opts.servo);
  }

  async setServoAngle(deg: Degrees): Promise<void> {
    this.servoDeg = assertServoAngle(deg, this.opts.servo);
  }

  get servoAngle(): number {
    return this.servoDeg;
  }

  async readSample(): Promise<RawSample> {
    this.t_ms += this.opts.stepMs;
    return {
      t_ms: this.t_ms,
      servo_deg: this.servoDeg,
      v_div: this.opts.vDivBase + this.jitter(this.opts.noise.v_div),
      v_rf: this.opts.vRfBase + this.jitter(this.opts.noise.v_rf),
      v_photo: this.opts.vPhotoBase + this.jitter(this.opts.noise.v_photo),
    };
  }

  private jitter(budget: number): number {
    return budget > 0 ? (2 * this.random() - 1) * budget : 0;
  }
}
