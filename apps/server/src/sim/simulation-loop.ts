import { logger } from "@arena/shared-servers";

export interface SimulationLoopOptions {
  periodMs: number;
  onStep: (nowMs: number) => void;
  now?: () => number;
}

/**
 * The single periodic driver. Uses a self-correcting setTimeout so long-term
 * pacing stays on schedule; a step that runs late is not replayed, the next
 * one simply uses the current time.
 */
export class SimulationLoop {
  private readonly periodMs: number;
  private readonly onStep: (nowMs: number) => void;
  private readonly now: () => number;
  private timeout: ReturnType<typeof setTimeout> | null = null;
  private nextStepTime = 0;
  private running = false;
  private steps = 0;

  constructor(options: SimulationLoopOptions) {
    if (!Number.isFinite(options.periodMs) || options.periodMs <= 0) {
      throw new Error("SimulationLoop periodMs must be positive.");
    }
    this.periodMs = options.periodMs;
    this.onStep = options.onStep;
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get stepCount(): number {
    return this.steps;
  }

  start(): void {
    if (this.running) {
      logger.warn("Simulation loop already running");
      return;
    }
    this.running = true;
    this.nextStepTime = this.now() + this.periodMs;
    this.scheduleNext();
  }

  stop(): void {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
    this.running = false;
  }

  private scheduleNext(): void {
    if (!this.running) {
      return;
    }
    const delay = Math.max(1, this.nextStepTime - this.now());
    this.timeout = setTimeout(() => {
      this.runStep();
      this.scheduleNext();
    }, delay);
  }

  private runStep(): void {
    const now = this.now();
    this.steps += 1;
    this.nextStepTime += this.periodMs;

    if (now > this.nextStepTime + this.periodMs) {
      logger.warn(
        { lateByMs: now - this.nextStepTime + this.periodMs, step: this.steps },
        "Simulation step late, resetting schedule",
      );
      this.nextStepTime = now + this.periodMs;
    }

    try {
      this.onStep(now);
    } catch (error) {
      logger.error({ err: error, step: this.steps }, "Simulation step failed");
    }
  }
}
