import { TICK_MS } from "@arena/shared-protocol";
import { logger } from "@arena/shared-servers";

/** Cancellation token for a one-shot timer. `clear()` is idempotent. */
export interface TimerHandle {
  readonly active: boolean;
  clear(): void;
}

interface ScheduledTimer {
  id: number;
  dueMs: number;
  label: string;
  callback: () => void;
  active: boolean;
}

/**
 * Logical time source and one-shot timer queue for the simulation context.
 * Timers fire only while the clock is advanced, in due-time order and then in
 * scheduling order, so every callback runs serialized with the pulse.
 */
export class SimulationClock {
  private nowMs: number;
  private nextTimerId = 1;
  private readonly timers: ScheduledTimer[] = [];

  constructor(
    private readonly tickMs: number = TICK_MS,
    startMs = 0,
  ) {
    if (!Number.isFinite(tickMs) || tickMs <= 0) {
      throw new Error("SimulationClock tickMs must be positive.");
    }
    this.nowMs = startMs;
  }

  now(): number {
    return this.nowMs;
  }

  /** Pulse index derived from the current logical time. */
  get serverTick(): number {
    return Math.floor(this.nowMs / this.tickMs);
  }

  get pendingTimers(): number {
    return this.timers.length;
  }

  setTimeout(callback: () => void, delayMs: number, label = "timer"): TimerHandle {
    const timer: ScheduledTimer = {
      id: this.nextTimerId,
      dueMs: this.nowMs + Math.max(0, delayMs),
      label,
      callback,
      active: true,
    };
    this.nextTimerId += 1;
    this.insert(timer);

    return {
      get active() {
        return timer.active;
      },
      clear: () => this.cancel(timer),
    };
  }

  /**
   * Move logical time forward, firing every timer due at or before `targetMs`.
   * Returns the number of callbacks that ran.
   */
  advanceTo(targetMs: number): number {
    let fired = 0;
    while (this.timers.length > 0) {
      const next = this.timers[0];
      if (next.dueMs > targetMs) {
        break;
      }

      this.timers.shift();
      next.active = false;
      this.nowMs = Math.max(this.nowMs, next.dueMs);
      fired += 1;

      try {
        next.callback();
      } catch (error) {
        logger.error({ err: error, timer: next.label }, "Simulation timer callback failed");
      }
    }

    this.nowMs = Math.max(this.nowMs, targetMs);
    return fired;
  }

  advance(deltaMs: number): number {
    return this.advanceTo(this.nowMs + deltaMs);
  }

  /** Drop every pending timer without running it. */
  clearAll(): void {
    for (const timer of this.timers) {
      timer.active = false;
    }
    this.timers.length = 0;
  }

  private insert(timer: ScheduledTimer): void {
    let low = 0;
    let high = this.timers.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.timers[mid].dueMs <= timer.dueMs) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.timers.splice(low, 0, timer);
  }

  private cancel(timer: ScheduledTimer): void {
    if (!timer.active) {
      return;
    }
    timer.active = false;
    const index = this.timers.indexOf(timer);
    if (index >= 0) {
      this.timers.splice(index, 1);
    }
  }
}
