import { TICK_MS } from "@arena/shared-protocol";

// Combat pulse
export const COMBAT_IDLE_TIMEOUT_MS = 5000;
export const SLOW_TICK_WARNING_MS = 10;
export const TICK_SAMPLE_SIZE = 1000;
export const P99_MIN_SAMPLES = 10;

// Attack interval bounds, always whole pulses
export const ATTACK_INTERVAL_STEP_MS = TICK_MS;
export const MIN_ATTACK_INTERVAL_MS = 200;
export const MAX_ATTACK_INTERVAL_MS = 4000;

// Duels
export const CHALLENGE_TIMEOUT_MS = 30_000;
export const DUEL_PRE_TELEPORT_DELAY_MS = 5000;
export const DUEL_COUNTDOWN_MS = 10_000;
export const DUEL_MAX_DURATION_MS = 30 * 60 * 1000;
export const DUEL_LOOT_PHASE_MS = 120_000;
export const DUEL_CLEANUP_DELAY_MS = 5000;
export const DUEL_PAYOUT_RATE = 0.9;
