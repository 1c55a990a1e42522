import {
  CombatEventType,
  EventCategory,
  type ActionKind,
  type ActionRejectReason,
  type CastInterruptReason,
  type TimingSnapshot,
} from "@arena/shared-sim";
import { logger } from "@arena/shared-servers";
import type { CombatPolicy } from "../config/combat-policy";
import { eventHeader, type EventLog } from "../eventLog/event-log";
import type { SimulationClock } from "../sim/simulation-clock";
import { CastDescriptor, type TerminalCastStatus } from "./cast-descriptor";
import { createTimingSnapshot, type TimingProvider } from "./timing/timing-provider";
import { isActorAvailable, type CombatActor, type Implement, type Spell } from "./types";

/** Rejection returned when policy or a running timer disallows an action. */
export interface ActionBlocked {
  accepted: false;
  error: "ActionBlocked";
  rejectReason: ActionRejectReason;
}

export interface SwingAccepted {
  accepted: true;
  snapshot: TimingSnapshot;
  nextSwingTime: number;
  hitTime: number;
}

export interface CastAccepted {
  accepted: true;
  cast: CastDescriptor;
}

export interface BandageAccepted {
  accepted: true;
  endTime: number;
}

export type SwingResult = SwingAccepted | ActionBlocked;
export type CastResult = CastAccepted | ActionBlocked;
export type BandageResult = BandageAccepted | ActionBlocked;

export interface PendingHit {
  defender: WeakRef<CombatActor> | undefined;
  implement: Implement | undefined;
  resolveAtMs: number;
}

export interface TimingStateContext {
  policy: CombatPolicy;
  timing: TimingProvider;
  clock: SimulationClock;
  events: EventLog;
  allocateCastId: () => number;
  /** Called once a swing has been committed, before its start event is logged. */
  notifySwingStarted: (actor: CombatActor) => void;
}

/**
 * Per-actor timing state machine. Swing, cast and bandage each keep their own
 * next-ready time unless independent timers are disabled, in which case all
 * three share one.
 */
export class CombatantTimingState {
  private nextSwingTime = 0;
  private nextCastTime = 0;
  private nextBandageTime = 0;
  private sharedNextActionTime = 0;
  private globalRecoveryEndTime = 0;
  private bandageEndTime = 0;
  private castDelayEndTime = 0;
  private pendingHit: PendingHit | null = null;
  private currentCast: CastDescriptor | null = null;
  private lastAction: number;

  constructor(
    readonly actor: CombatActor,
    private readonly context: TimingStateContext,
  ) {
    this.lastAction = context.clock.now();
  }

  get activeCast(): CastDescriptor | null {
    return this.currentCast;
  }

  get hasPendingSwing(): boolean {
    return this.pendingHit !== null;
  }

  get lastActionTimestamp(): number {
    return this.lastAction;
  }

  getNextTime(kind: ActionKind): number {
    if (!this.context.policy.independentTimers) {
      return this.sharedNextActionTime;
    }
    switch (kind) {
      case "swing":
        return this.nextSwingTime;
      case "cast":
        return this.nextCastTime;
      case "bandage":
        return this.nextBandageTime;
    }
  }

  /** Pure timing check; never mutates state. */
  isReady(kind: ActionKind, now: number): boolean {
    return now >= this.getNextTime(kind);
  }

  isBandaging(now: number): boolean {
    return now < this.bandageEndTime;
  }

  isInCastDelay(now: number): boolean {
    return this.currentCast?.status === "delaying" && now < this.castDelayEndTime;
  }

  isBusy(now: number): boolean {
    return this.currentCast !== null || this.pendingHit !== null || this.isBandaging(now);
  }

  touch(now: number = this.context.clock.now()): void {
    this.lastAction = now;
  }

  /** Why a swing would be refused right now, or undefined when it may start. */
  getSwingBlock(now: number): ActionRejectReason | undefined {
    const { policy } = this.context;
    const cast = this.currentCast;
    if (cast?.status === "awaiting_target" && policy.disableSwingDuringCast) {
      return "casting";
    }
    if (cast?.status === "delaying" && policy.disableSwingDuringCastDelay) {
      return "cast_delay";
    }
    if (!this.isReady("swing", now) || (this.pendingHit && now < this.pendingHit.resolveAtMs)) {
      return "not_ready";
    }
    if (this.inGlobalRecovery(now)) {
      return "global_recovery";
    }
    return undefined;
  }

  beginSwing(implement: Implement | undefined, target?: CombatActor): SwingResult {
    const { policy, clock } = this.context;
    const now = clock.now();

    if (!isActorAvailable(this.actor)) {
      return this.reject("swing", "dead");
    }

    const blocked = this.getSwingBlock(now);
    if (blocked) {
      return this.reject("swing", blocked);
    }

    if (this.currentCast && policy.swingCancelSpell) {
      this.interruptCast("swing");
    }
    if (policy.actionsCancelBandage) {
      this.cancelBandage("swing");
    }

    const snapshot = createTimingSnapshot(this.context.timing, this.actor, implement);
    const nextSwingTime = now + snapshot.attackIntervalMs;
    const hitTime = now + snapshot.animationHitOffsetMs;
    this.setNextTime("swing", nextSwingTime);
    this.pendingHit = {
      defender: target ? new WeakRef(target) : undefined,
      implement,
      resolveAtMs: hitTime,
    };
    this.markAction(now);
    this.context.notifySwingStarted(this.actor);

    this.context.events.append({
      ...eventHeader(clock),
      category: EventCategory.Combat,
      eventType: CombatEventType.SwingStart,
      actorId: this.actor.id,
      targetId: target?.id,
      attackIntervalMs: snapshot.attackIntervalMs,
      hitTimeMs: hitTime,
      nextSwingTimeMs: nextSwingTime,
    });

    return { accepted: true, snapshot, nextSwingTime, hitTime };
  }

  beginCast(spell: Spell): CastResult {
    const { policy, clock } = this.context;
    const now = clock.now();

    if (!isActorAvailable(this.actor)) {
      return this.reject("cast", "dead");
    }
    if (this.currentCast) {
      return this.reject("cast", "casting");
    }
    if (policy.swingBlocksCast && this.pendingHit) {
      return this.reject("cast", "swing_pending");
    }
    if (!this.isReady("cast", now)) {
      return this.reject("cast", "not_ready");
    }
    if (this.inGlobalRecovery(now)) {
      return this.reject("cast", "global_recovery");
    }

    if (policy.spellCancelSwing) {
      this.cancelSwing("cast");
    }
    if (policy.actionsCancelBandage) {
      this.cancelBandage("cast");
    }

    const cast = new CastDescriptor(this.context.allocateCastId(), this.actor, spell, now);
    this.currentCast = cast;
    this.markAction(now);
    return { accepted: true, cast };
  }

  beginBandage(durationMs: number = this.context.policy.bandageDurationMs): BandageResult {
    const { policy, clock } = this.context;
    const now = clock.now();

    if (!isActorAvailable(this.actor)) {
      return this.reject("bandage", "dead");
    }
    if (this.isBandaging(now)) {
      return this.reject("bandage", "bandaging");
    }
    if (!this.isReady("bandage", now)) {
      return this.reject("bandage", "not_ready");
    }

    if (policy.bandageCancelActions) {
      this.cancelSwing("bandage");
      this.interruptCast("bandage");
    }

    const endTime = now + durationMs;
    this.bandageEndTime = endTime;
    this.setNextTime("bandage", endTime);
    this.touch(now);

    this.context.events.append({
      ...eventHeader(clock),
      category: EventCategory.Combat,
      eventType: CombatEventType.BandageStart,
      actorId: this.actor.id,
      durationMs,
    });

    return { accepted: true, endTime };
  }

  /** Idempotent: cancelling an action that is not running is a no-op. */
  cancel(kind: ActionKind, reason: CastInterruptReason = "manual"): boolean {
    switch (kind) {
      case "swing":
        return this.cancelSwing(reason);
      case "cast":
        return this.interruptCast(reason);
      case "bandage":
        return this.cancelBandage(reason);
    }
  }

  /** Hand over the pending hit once its animation offset has elapsed. */
  takeDueHit(now: number): PendingHit | null {
    const hit = this.pendingHit;
    if (!hit || now < hit.resolveAtMs) {
      return null;
    }
    this.pendingHit = null;
    return hit;
  }

  enterCastDelay(cast: CastDescriptor, delayMs: number): void {
    if (this.currentCast !== cast) {
      return;
    }
    const now = this.context.clock.now();
    cast.status = "delaying";
    cast.scheduledEffectTimeMs = now + delayMs;
    this.castDelayEndTime = now + delayMs;
  }

  /** Terminal transition for the active cast; applied casts start post-cast recovery. */
  completeCast(cast: CastDescriptor, status: TerminalCastStatus, recoveryMs = 0): void {
    if (this.currentCast === cast) {
      this.currentCast = null;
      this.castDelayEndTime = 0;
    }
    if (!cast.finish(status)) {
      return;
    }
    if (status === "applied") {
      this.setNextTime("cast", this.context.clock.now() + recoveryMs);
    }
  }

  interruptCast(reason: CastInterruptReason): boolean {
    const cast = this.currentCast;
    if (!cast) {
      return false;
    }
    this.currentCast = null;
    this.castDelayEndTime = 0;
    if (!cast.finish("interrupted")) {
      return false;
    }

    this.context.events.append({
      ...eventHeader(this.context.clock),
      category: EventCategory.Combat,
      eventType: CombatEventType.CastInterrupt,
      actorId: this.actor.id,
      castId: cast.castId,
      spellId: cast.spell.id,
      reason,
      resourcesForfeited: cast.resourcesCommitted,
    });
    this.logCancellation("cast", reason);
    return true;
  }

  private cancelSwing(reason: string): boolean {
    if (!this.pendingHit) {
      return false;
    }
    this.pendingHit = null;
    this.emitCancelled("swing", reason);
    return true;
  }

  private cancelBandage(reason: string): boolean {
    const now = this.context.clock.now();
    if (!this.isBandaging(now)) {
      return false;
    }
    this.bandageEndTime = now;
    if (this.context.policy.independentTimers) {
      this.nextBandageTime = now;
    }
    this.emitCancelled("bandage", reason);
    return true;
  }

  private emitCancelled(action: ActionKind, reason: string): void {
    this.context.events.append({
      ...eventHeader(this.context.clock),
      category: EventCategory.Combat,
      eventType: CombatEventType.ActionCancelled,
      actorId: this.actor.id,
      action,
      reason,
    });
    this.logCancellation(action, reason);
  }

  private reject(action: ActionKind, rejectReason: ActionRejectReason): ActionBlocked {
    this.context.events.append({
      ...eventHeader(this.context.clock),
      category: EventCategory.Combat,
      eventType: CombatEventType.ActionRejected,
      actorId: this.actor.id,
      action,
      reason: rejectReason,
    });
    if (this.context.policy.enableDebugLogging) {
      logger.debug({ actorId: this.actor.id, action, rejectReason }, "Combat action blocked");
    }
    return { accepted: false, error: "ActionBlocked", rejectReason };
  }

  private inGlobalRecovery(now: number): boolean {
    return !this.context.policy.removeGlobalRecovery && now < this.globalRecoveryEndTime;
  }

  private markAction(now: number): void {
    this.touch(now);
    if (!this.context.policy.removeGlobalRecovery) {
      this.globalRecoveryEndTime = now + this.context.policy.globalRecoveryMs;
    }
  }

  private setNextTime(kind: ActionKind, time: number): void {
    if (!this.context.policy.independentTimers) {
      // One timer serves every action, so a short action never shortens a longer one.
      this.sharedNextActionTime = Math.max(this.sharedNextActionTime, time);
    } else if (kind === "swing") {
      this.nextSwingTime = time;
    } else if (kind === "cast") {
      this.nextCastTime = time;
    } else {
      this.nextBandageTime = time;
    }

    if (this.context.policy.logTimerStateChanges) {
      logger.debug({ actorId: this.actor.id, kind, nextTime: time }, "Combat timer committed");
    }
  }

  private logCancellation(action: ActionKind, reason: string): void {
    if (this.context.policy.logActionCancellations) {
      logger.info({ actorId: this.actor.id, action, reason }, "Combat action cancelled");
    }
  }
}
