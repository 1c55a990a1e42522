import type { EventCategory, EventLogEntry } from "@arena/shared-protocol";
import type { DuelState, DuelType } from "./duel-types";

export enum DuelEventType {
  ChallengeIssued = 1,
  ChallengeAccepted = 2,
  ChallengeDeclined = 3,
  ChallengeExpired = 4,
  ChallengeCancelled = 5,
  WagerRefunded = 6,
  DuelCreated = 7,
  CountdownStarted = 8,
  DuelStarted = 9,
  MechanicsEngaged = 10,
  ParticipantEliminated = 11,
  DuelEnded = 12,
  LootPhaseStarted = 13,
  DuelCompleted = 14,
  DuelAborted = 15,
}

export type ChallengeIssuedEvent = EventLogEntry & {
  category: EventCategory.Duel;
  eventType: DuelEventType.ChallengeIssued;
  actorId: string;
  targetId: string;
  arenaId: string;
  wager: number;
  isLoot: boolean;
  expiresAtMs: number;
};

export type ChallengeResolvedEvent = EventLogEntry & {
  category: EventCategory.Duel;
  eventType:
    | DuelEventType.ChallengeAccepted
    | DuelEventType.ChallengeDeclined
    | DuelEventType.ChallengeExpired
    | DuelEventType.ChallengeCancelled;
  actorId: string;
  targetId: string;
};

export type WagerRefundedEvent = EventLogEntry & {
  category: EventCategory.Duel;
  eventType: DuelEventType.WagerRefunded;
  actorId: string;
  amount: number;
};

export type DuelStateEvent = EventLogEntry & {
  category: EventCategory.Duel;
  eventType:
    | DuelEventType.DuelCreated
    | DuelEventType.CountdownStarted
    | DuelEventType.DuelStarted
    | DuelEventType.LootPhaseStarted
    | DuelEventType.DuelCompleted;
  contextId: string;
  arenaId: string;
  duelType: DuelType;
  state: DuelState;
};

export type MechanicsEngagedEvent = EventLogEntry & {
  category: EventCategory.Duel;
  eventType: DuelEventType.MechanicsEngaged;
  contextId: string;
  rulesetId: string;
  participantIds: string[];
};

export type ParticipantEliminatedEvent = EventLogEntry & {
  category: EventCategory.Duel;
  eventType: DuelEventType.ParticipantEliminated;
  contextId: string;
  actorId: string;
  killerId?: string;
  teamId: number;
};

export type DuelEndedEvent = EventLogEntry & {
  category: EventCategory.Duel;
  eventType: DuelEventType.DuelEnded;
  contextId: string;
  winnerIds: string[];
  payoutPerWinner: number;
  draw: boolean;
};

export type DuelAbortedEvent = EventLogEntry & {
  category: EventCategory.Duel;
  eventType: DuelEventType.DuelAborted;
  contextId: string;
  reason: "participant_unavailable" | "insufficient_participants";
};

export type DuelEvent =
  | ChallengeIssuedEvent
  | ChallengeResolvedEvent
  | WagerRefundedEvent
  | DuelStateEvent
  | MechanicsEngagedEvent
  | ParticipantEliminatedEvent
  | DuelEndedEvent
  | DuelAbortedEvent;
