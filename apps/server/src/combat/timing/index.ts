import type { CombatPolicy } from "../../config/combat-policy";
import { LegacyFormulaTimingProvider } from "./legacy-timing-provider";
import type { TimingProvider } from "./timing-provider";
import { WeaponTimingProvider } from "./weapon-timing-provider";
import type { WeaponTimingTable } from "./weapon-timing-table";

export * from "./legacy-timing-provider";
export * from "./timing-provider";
export * from "./weapon-timing-provider";
export * from "./weapon-timing-table";

/** Pick the provider named by policy. Called once at startup. */
export const createTimingProvider = (
  policy: CombatPolicy,
  table: WeaponTimingTable,
): TimingProvider =>
  policy.timingProvider === "legacy_formula"
    ? new LegacyFormulaTimingProvider(table, policy)
    : new WeaponTimingProvider(table);
