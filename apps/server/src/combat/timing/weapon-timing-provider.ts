import {
  ATTACK_INTERVAL_STEP_MS,
  MAX_ATTACK_INTERVAL_MS,
  MIN_ATTACK_INTERVAL_MS,
} from "@arena/shared-sim";
import type { Implement, TimingSubject } from "../types";
import type { TimingProvider } from "./timing-provider";
import type { WeaponTimingTable } from "./weapon-timing-table";

const DEX_BASELINE = 100;
const MAX_DEX_BONUS = 25;
const MAX_DEX_PENALTY = -50;
const HIGH_DEX_MODIFIER = 0.008;
const LOW_DEX_MODIFIER = 0.004;
const SPEED_VALUE_TO_MS = 40;

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * Data-driven timings. Interval is speedValue * 40ms scaled by dexterity
 * (players only), snapped to whole pulses.
 */
export class WeaponTimingProvider implements TimingProvider {
  readonly name = "weapon_table";

  constructor(private readonly table: WeaponTimingTable) {}

  getAttackIntervalMs(actor: TimingSubject | undefined, implement: Implement | undefined): number {
    if (!actor) {
      return MIN_ATTACK_INTERVAL_MS;
    }

    const entry = this.table.lookup(implement);
    const baseDelayMs = entry.weaponSpeedValue * SPEED_VALUE_TO_MS;

    const bonusDex = actor.isPlayer
      ? clamp(actor.dexterity - DEX_BASELINE, MAX_DEX_PENALTY, MAX_DEX_BONUS)
      : 0;

    let multiplier = 1;
    if (bonusDex > 0) {
      multiplier -= bonusDex * HIGH_DEX_MODIFIER;
    } else if (bonusDex < 0) {
      multiplier -= bonusDex * LOW_DEX_MODIFIER;
    }

    const snapped =
      Math.round((baseDelayMs * multiplier) / ATTACK_INTERVAL_STEP_MS) * ATTACK_INTERVAL_STEP_MS;
    return clamp(snapped, MIN_ATTACK_INTERVAL_MS, MAX_ATTACK_INTERVAL_MS);
  }

  getAnimationHitOffsetMs(implement: Implement | undefined): number {
    return this.table.lookup(implement).animationHitOffsetMs;
  }

  getAnimationDurationMs(implement: Implement | undefined): number {
    return this.table.lookup(implement).animationDurationMs;
  }
}
