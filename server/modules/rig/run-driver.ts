import { errorMessage } from "../../instruments/errors.js";
import type { RigController } from "./rig-controller.js";

// ── simple async mutex ───────────────────────────────────────────────────────
// Every call into the controller goes through one queue so HTTP handlers and the
// tick loop never interleave.
export class CallQueue {
  private p: Promise<void> = Promise.resolve();
  private depth = 0;

  run<T>(fn: () => Promise<T> | T): Promise<T> {
    this.depth += 1;
    const run = this.p.then(fn, fn);
    this.p = run.then(
      () => {
        this.depth -= 1;
      },
      () => {
        this.depth -= 1;
      },
    );
    return run;
  }

  /** Calls queued or in flight. */
  get pending(): number {
    return this.depth;
  }
}

type RunDriverOptions = {
  periodMs: number;
};

/** Calls controller.tick() every periodMs through the call queue. */
export class RunDriver {
  private timer: NodeJS.Timeout | null = null;
  private evaluating = false;
  private readonly periodMs: number;

  constructor(
    private readonly controller: RigController,
    private readonly queue: CallQueue,
    opts: RunDriverOptions,
  ) {
    this.periodMs = Math.max(1, Math.round(opts.periodMs));
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.step();
    }, this.periodMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One tick unless the previous one is still in flight; never rejects. */
  async step(): Promise<void> {
    if (this.evaluating) return;
    this.evaluating = true;
    try {
      await this.queue.run(() => this.controller.tick());
    } catch (err) {
      console.error(`[rig/driver] tick failed: ${errorMessage(err)}`);
    } finally {
      this.evaluating = false;
    }
  }
}
