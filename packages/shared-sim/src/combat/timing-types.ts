/** Timing values derived for one (actor, implement) pair. Never mutated. */
export interface TimingSnapshot {
  readonly attackIntervalMs: number;
  readonly animationHitOffsetMs: number;
  readonly animationDurationMs: number;
}

export type ActionKind = "swing" | "cast" | "bandage";

export type WeaponClass = "dagger" | "one_handed" | "two_handed" | "bow" | "crossbow";

export type ActionRejectReason =
  | "dead"
  | "casting"
  | "cast_delay"
  | "not_ready"
  | "swing_pending"
  | "global_recovery"
  | "bandaging"
  | "no_cast";

export type CastStatus =
  | "awaiting_target"
  | "resource_commit"
  | "delaying"
  | "resolving"
  | "applied"
  | "fizzled"
  | "interrupted";

export type CastInterruptReason =
  | "replaced"
  | "swing"
  | "bandage"
  | "damage"
  | "movement"
  | "death"
  | "disconnect"
  | "manual"
  | "target_invalid"
  | "caster_invalid"
  | "fault";

export type CastFizzleReason = "insufficient_mana" | "insufficient_reagents";

/** Error taxonomy shared by result values, events and logs. */
export type CombatErrorKind =
  | "ActionBlocked"
  | "InsufficientResources"
  | "TargetInvalid"
  | "ConfigurationError"
  | "SchedulerFault";

export const isTerminalCastStatus = (status: CastStatus): boolean =>
  status === "applied" || status === "fizzled" || status === "interrupted";
