import { z } from "zod";
import { TICK_MS } from "@arena/shared-protocol";
import { COMBAT_IDLE_TIMEOUT_MS } from "@arena/shared-sim";

const clampPercent = (value: number): number => Math.min(100, Math.max(0, value));

export const combatPolicySchema = z
  .object({
    // Timers
    independentTimers: z.boolean().default(true),
    removeGlobalRecovery: z.boolean().default(true),
    globalRecoveryMs: z.number().int().nonnegative().default(500),

    // Cross-cancellation matrix
    spellCancelSwing: z.boolean().default(true),
    swingCancelSpell: z.boolean().default(true),
    bandageCancelActions: z.boolean().default(true),
    disableSwingDuringCast: z.boolean().default(true),
    disableSwingDuringCastDelay: z.boolean().default(true),
    swingBlocksCast: z.boolean().default(false),
    actionsCancelBandage: z.boolean().default(false),

    // Spellcasting
    damageBasedFizzle: z.boolean().default(false),
    restrictedFizzleTriggers: z.boolean().default(true),
    targetManaDeduction: z.boolean().default(true),
    partialManaPercent: z.number().int().default(50).transform(clampPercent),
    removePostCastRecovery: z.boolean().default(true),
    castRecoveryMs: z.number().int().nonnegative().default(1000),
    minimumCastDelayMs: z.number().int().nonnegative().default(0),
    maximumCastDelayMs: z.number().int().positive().default(10_000),

    // Swing speed bounds for the legacy formula
    minimumSwingSpeedSeconds: z.number().positive().default(0.5),
    maximumSwingSpeedSeconds: z.number().positive().default(10),

    bandageDurationMs: z.number().int().positive().default(5000),

    // Pulse
    globalTickMs: z.number().int().positive().default(TICK_MS),
    combatIdleTimeoutMs: z.number().int().positive().default(COMBAT_IDLE_TIMEOUT_MS),
    timingProvider: z.enum(["weapon_table", "legacy_formula"]).default("weapon_table"),

    // Diagnostics
    logActionCancellations: z.boolean().default(false),
    enableDebugLogging: z.boolean().default(false),
    logTimerStateChanges: z.boolean().default(false),
  })
  .refine((policy) => policy.minimumSwingSpeedSeconds <= policy.maximumSwingSpeedSeconds, {
    message: "minimumSwingSpeedSeconds must not exceed maximumSwingSpeedSeconds",
    path: ["minimumSwingSpeedSeconds"],
  })
  .refine((policy) => policy.minimumCastDelayMs <= policy.maximumCastDelayMs, {
    message: "minimumCastDelayMs must not exceed maximumCastDelayMs",
    path: ["minimumCastDelayMs"],
  });

export type CombatPolicyInput = z.input<typeof combatPolicySchema>;

/** Immutable cross-cancellation and timing policy, read once at startup. */
export type CombatPolicy = Readonly<z.output<typeof combatPolicySchema>>;

export type TimingProviderKind = CombatPolicy["timingProvider"];

/** Mana forfeited by a cast that is fizzled before its resources were committed. */
export const calculatePartialMana = (policy: CombatPolicy, totalMana: number): number =>
  Math.floor((totalMana * policy.partialManaPercent) / 100);
