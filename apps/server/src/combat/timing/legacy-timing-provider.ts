import type { CombatPolicy } from "../../config/combat-policy";
import type { Implement, TimingSubject } from "../types";
import type { TimingProvider } from "./timing-provider";
import type { WeaponTimingTable } from "./weapon-timing-table";

const MISSING_ACTOR_INTERVAL_MS = 700;
const FALLBACK_INTERVAL_MS = 1500;

/**
 * Classic formula: weapon speed (seconds) divided by dex/100, bounded by the
 * policy's swing speed limits. Animation values come from weapon class defaults.
 */
export class LegacyFormulaTimingProvider implements TimingProvider {
  readonly name = "legacy_formula";

  constructor(
    private readonly table: WeaponTimingTable,
    private readonly policy: Pick<
      CombatPolicy,
      "minimumSwingSpeedSeconds" | "maximumSwingSpeedSeconds"
    >,
  ) {}

  getAttackIntervalMs(actor: TimingSubject | undefined, implement: Implement | undefined): number {
    if (!actor) {
      return MISSING_ACTOR_INTERVAL_MS;
    }
    const speedSeconds = implement?.legacySpeedSeconds;
    if (speedSeconds === undefined || !Number.isFinite(speedSeconds) || speedSeconds <= 0) {
      return FALLBACK_INTERVAL_MS;
    }

    const dex = actor.dexterity > 0 ? actor.dexterity : 1;
    const seconds = Math.min(
      this.policy.maximumSwingSpeedSeconds,
      Math.max(this.policy.minimumSwingSpeedSeconds, speedSeconds / (dex / 100)),
    );
    return Math.round(seconds * 1000);
  }

  getAnimationHitOffsetMs(implement: Implement | undefined): number {
    return this.table.classDefault(implement?.weaponClass).animationHitOffsetMs;
  }

  getAnimationDurationMs(implement: Implement | undefined): number {
    return this.table.classDefault(implement?.weaponClass).animationDurationMs;
  }
}
