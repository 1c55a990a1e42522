import type { TimingSnapshot } from "@arena/shared-sim";
import type { Implement, TimingSubject } from "../types";

/**
 * Maps an actor and implement to millisecond timing values. Implementations
 * are pure and never throw; unknown implements fall back to a default.
 */
export interface TimingProvider {
  readonly name: string;
  getAttackIntervalMs(actor: TimingSubject | undefined, implement: Implement | undefined): number;
  getAnimationHitOffsetMs(implement: Implement | undefined): number;
  getAnimationDurationMs(implement: Implement | undefined): number;
}

export const createTimingSnapshot = (
  provider: TimingProvider,
  actor: TimingSubject | undefined,
  implement: Implement | undefined,
): TimingSnapshot =>
  Object.freeze({
    attackIntervalMs: provider.getAttackIntervalMs(actor, implement),
    animationHitOffsetMs: provider.getAnimationHitOffsetMs(implement),
    animationDurationMs: provider.getAnimationDurationMs(implement),
  });
