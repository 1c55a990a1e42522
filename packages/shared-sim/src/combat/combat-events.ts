import type { EventCategory, EventLogEntry } from "@arena/shared-protocol";
import type {
  ActionKind,
  ActionRejectReason,
  CastFizzleReason,
  CastInterruptReason,
} from "./timing-types";

export enum CombatEventType {
  SwingStart = 1,
  SwingHit = 2,
  ActionCancelled = 3,
  ActionRejected = 4,
  CastStart = 5,
  CastDelayStart = 6,
  CastFizzle = 7,
  CastInterrupt = 8,
  CastApplied = 9,
  SpellReflected = 10,
  BandageStart = 11,
  CombatantRegistered = 12,
  CombatantEvicted = 13,
}

export type SwingStartEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.SwingStart;
  actorId: string;
  targetId?: string;
  attackIntervalMs: number;
  hitTimeMs: number;
  nextSwingTimeMs: number;
};

export type SwingHitEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.SwingHit;
  actorId: string;
  targetId: string;
};

export type ActionCancelledEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.ActionCancelled;
  actorId: string;
  action: ActionKind;
  reason: string;
};

export type ActionRejectedEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.ActionRejected;
  actorId: string;
  action: ActionKind;
  reason: ActionRejectReason;
};

export type CastStartEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.CastStart;
  actorId: string;
  castId: number;
  spellId: string;
};

export type CastDelayStartEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.CastDelayStart;
  actorId: string;
  castId: number;
  spellId: string;
  targetId: string;
  manaSpent: number;
  delayMs: number;
  effectTimeMs: number;
};

export type CastFizzleEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.CastFizzle;
  actorId: string;
  castId: number;
  spellId: string;
  reason: CastFizzleReason;
};

export type CastInterruptEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.CastInterrupt;
  actorId: string;
  castId: number;
  spellId: string;
  reason: CastInterruptReason;
  resourcesForfeited: boolean;
};

export type CastAppliedEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.CastApplied;
  actorId: string;
  castId: number;
  spellId: string;
  targetId: string;
  reflected: boolean;
};

export type SpellReflectedEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.SpellReflected;
  actorId: string;
  castId: number;
  spellId: string;
  reflectorId: string;
};

export type BandageStartEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.BandageStart;
  actorId: string;
  durationMs: number;
};

export type CombatantRegisteredEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.CombatantRegistered;
  actorId: string;
  activeCombatants: number;
};

export type CombatantEvictedEvent = EventLogEntry & {
  category: EventCategory.Combat;
  eventType: CombatEventType.CombatantEvicted;
  actorId: string;
  reason: "idle" | "deleted" | "unregistered";
  activeCombatants: number;
};

export type CombatEvent =
  | SwingStartEvent
  | SwingHitEvent
  | ActionCancelledEvent
  | ActionRejectedEvent
  | CastStartEvent
  | CastDelayStartEvent
  | CastFizzleEvent
  | CastInterruptEvent
  | CastAppliedEvent
  | SpellReflectedEvent
  | BandageStartEvent
  | CombatantRegisteredEvent
  | CombatantEvictedEvent;
