import type { CombatActor } from "../combat/types";
import type { TimerHandle } from "../sim/simulation-clock";
import type { DuelContext } from "./duel-context";
import type { DuelParticipant } from "./duel-participant";

export interface DuelArena {
  readonly id: string;
  readonly name: string;
}

/** Gold held by actors. `debit` fails without side effects when funds are short. */
export interface GoldLedger {
  getBalance(actor: CombatActor): number;
  debit(actor: CombatActor, amount: number): boolean;
  credit(actor: CombatActor, amount: number): void;
}

/** World-side effects the duel lifecycle asks the host game to perform. */
export interface DuelWorld {
  teleportToArena(actor: CombatActor, arena: DuelArena, slot: number): void;
  returnFromArena(actor: CombatActor): void;
  setFrozen(actor: CombatActor, frozen: boolean): void;
  restore(actor: CombatActor): void;
  /** Drop criminal and aggressor flags the kill would otherwise leave on either side. */
  clearAggression(victim: CombatActor, killer?: CombatActor): void;
}

/** Pluggable per-duel mechanics. */
export interface DuelRuleset {
  readonly id: string;
  onDuelBegin(context: DuelContext): void;
  onParticipantDeath(context: DuelContext, victim: DuelParticipant, killer?: DuelParticipant): void;
  onDuelEnd(context: DuelContext): void;
}

export interface PendingChallenge {
  readonly initiator: CombatActor;
  readonly target: CombatActor;
  readonly arena: DuelArena;
  readonly wager: number;
  readonly isLoot: boolean;
  readonly createdAtMs: number;
  timeout: TimerHandle | undefined;
}

export type DuelRejectReason =
  | "self_challenge"
  | "invalid_wager"
  | "initiator_unavailable"
  | "target_unavailable"
  | "initiator_busy"
  | "target_busy"
  | "insufficient_gold"
  | "arena_busy"
  | "payment_failed"
  | "no_challenge"
  | "duel_unavailable"
  | "duel_full";

export interface DuelRejected {
  accepted: false;
  error: "DuelRejected";
  rejectReason: DuelRejectReason;
}

export type ChallengeResult = { accepted: true; challenge: PendingChallenge } | DuelRejected;
export type AcceptResult = { accepted: true; context: DuelContext } | DuelRejected;
export type JoinResult = { accepted: true; participant: DuelParticipant } | DuelRejected;
