import { z } from "zod";
import {
  CHALLENGE_TIMEOUT_MS,
  DUEL_CLEANUP_DELAY_MS,
  DUEL_COUNTDOWN_MS,
  DUEL_LOOT_PHASE_MS,
  DUEL_MAX_DURATION_MS,
  DUEL_PAYOUT_RATE,
  DUEL_PRE_TELEPORT_DELAY_MS,
} from "@arena/shared-sim";

export const duelSettingsSchema = z.object({
  challengeTimeoutMs: z.number().int().positive().default(CHALLENGE_TIMEOUT_MS),
  preTeleportDelayMs: z.number().int().nonnegative().default(DUEL_PRE_TELEPORT_DELAY_MS),
  countdownMs: z.number().int().nonnegative().default(DUEL_COUNTDOWN_MS),
  maxDurationMs: z.number().int().positive().default(DUEL_MAX_DURATION_MS),
  lootPhaseMs: z.number().int().nonnegative().default(DUEL_LOOT_PHASE_MS),
  cleanupDelayMs: z.number().int().nonnegative().default(DUEL_CLEANUP_DELAY_MS),
  payoutRate: z.number().min(0).max(1).default(DUEL_PAYOUT_RATE),
});

export type DuelSettingsInput = z.input<typeof duelSettingsSchema>;
export type DuelSettings = Readonly<z.output<typeof duelSettingsSchema>>;
