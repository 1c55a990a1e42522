import { describe, expect, it, vi } from "vitest";
import { SimulationClock } from "../src/sim/simulation-clock";
import { SimulationLoop } from "../src/sim/simulation-loop";

describe("SimulationClock", () => {
  it("fires timers in due order, then scheduling order, at their due time", () => {
    const clock = new SimulationClock(50);
    const fired: string[] = [];
    clock.setTimeout(() => fired.push(`late@${clock.now()}`), 300);
    clock.setTimeout(() => fired.push(`first@${clock.now()}`), 100);
    clock.setTimeout(() => fired.push(`second@${clock.now()}`), 100);

    expect(clock.advanceTo(250)).toBe(2);
    expect(fired).toEqual(["first@100", "second@100"]);
    expect(clock.now()).toBe(250);
    expect(clock.serverTick).toBe(5);

    clock.advance(50);
    expect(fired).toEqual(["first@100", "second@100", "late@300"]);
  });

  it("runs timers scheduled by a callback within the same advance", () => {
    const clock = new SimulationClock();
    const callback = vi.fn();
    clock.setTimeout(() => clock.setTimeout(callback, 100), 100);

    clock.advanceTo(200);

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("clears handles idempotently", () => {
    const clock = new SimulationClock();
    const callback = vi.fn();
    const handle = clock.setTimeout(callback, 100);

    handle.clear();
    handle.clear();
    clock.advanceTo(500);

    expect(handle.active).toBe(false);
    expect(callback).not.toHaveBeenCalled();
    expect(clock.pendingTimers).toBe(0);
  });

  it("keeps firing after a callback throws", () => {
    const clock = new SimulationClock();
    const after = vi.fn();
    clock.setTimeout(() => {
      throw new Error("timer failed");
    }, 10);
    clock.setTimeout(after, 20);

    expect(() => clock.advanceTo(20)).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it("rejects a non-positive tick", () => {
    expect(() => new SimulationClock(0)).toThrow("SimulationClock tickMs must be positive.");
  });
});

describe("SimulationLoop", () => {
  it("steps once per period with the wall clock time", () => {
    vi.useFakeTimers();
    try {
      let wall = 1000;
      const onStep = vi.fn();
      const loop = new SimulationLoop({ periodMs: 50, onStep, now: () => wall });

      loop.start();
      wall = 1050;
      vi.advanceTimersByTime(50);
      wall = 1100;
      vi.advanceTimersByTime(50);
      loop.stop();
      vi.advanceTimersByTime(500);

      expect(onStep.mock.calls).toEqual([[1050], [1100]]);
      expect(loop.stepCount).toBe(2);
      expect(loop.isRunning).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });
});
