import {
  CombatEventType,
  EventCategory,
  type ActionRejectReason,
  type CastFizzleReason,
  type CastInterruptReason,
  type CombatEvent,
} from "@arena/shared-sim";
import { logger } from "@arena/shared-servers";
import { calculatePartialMana, type CombatPolicy } from "../config/combat-policy";
import { eventHeader, type EventBody, type EventLog } from "../eventLog/event-log";
import type { SimulationClock } from "../sim/simulation-clock";
import type { CastDescriptor } from "../combat/cast-descriptor";
import type { CombatTimingStore } from "../combat/combat-timing-store";
import type {
  ActionBlocked,
  CastAccepted,
  CombatantTimingState,
} from "../combat/combatant-timing-state";
import {
  isActorAvailable,
  type CombatActor,
  type LineOfSightQuery,
  type ReflectionCheck,
  type Spell,
} from "../combat/types";
import type { CastDelayInput, SpellTimingTable } from "./spell-timing-table";

export interface CastFizzled {
  accepted: false;
  error: "InsufficientResources";
  reason: CastFizzleReason;
  cast: CastDescriptor;
}

export interface CastTargetInvalid {
  accepted: false;
  error: "TargetInvalid";
  cast: CastDescriptor;
}

export interface CastScheduled {
  accepted: true;
  cast: CastDescriptor;
  delayMs: number;
  effectTimeMs: number;
}

export type BeginCastResult = CastAccepted | CastFizzled | ActionBlocked;
export type ConfirmTargetResult = CastScheduled | CastFizzled | CastTargetInvalid | ActionBlocked;

export type ConfirmTargetOptions = Omit<CastDelayInput, "skill">;

/** Things that may disturb a cast in progress. */
export type InterruptTrigger = Extract<
  CastInterruptReason,
  "damage" | "movement" | "death" | "disconnect" | "manual"
>;

export interface CastPipelineOptions {
  policy: CombatPolicy;
  store: CombatTimingStore;
  clock: SimulationClock;
  events: EventLog;
  spellTable?: SpellTimingTable;
  reflection?: ReflectionCheck;
  lineOfSight?: LineOfSightQuery;
}

const DEFAULT_CAST_SKILL = "magery";

/**
 * Spell lifecycle from targeting through resource commit, delay and effect.
 * Resources are committed exactly once and never refunded.
 */
export class CastPipeline {
  constructor(private readonly options: CastPipelineOptions) {}

  getActiveCast(caster: CombatActor): CastDescriptor | null {
    return this.options.store.get(caster)?.activeCast ?? null;
  }

  beginCast(caster: CombatActor, spell: Spell): BeginCastResult {
    const { store, policy } = this.options;
    if (!isActorAvailable(caster)) {
      return this.blocked(caster, "dead");
    }

    const state = store.getOrCreate(caster);
    const previous = state.activeCast;
    if (previous) {
      this.forfeitPartialMana(previous);
      state.interruptCast("replaced");
    }

    const result = state.beginCast(spell);
    if (!result.accepted) {
      return result;
    }
    const { cast } = result;

    this.emit({
      eventType: CombatEventType.CastStart,
      actorId: caster.id,
      castId: cast.castId,
      spellId: spell.id,
    });

    if (!policy.targetManaDeduction) {
      const cost = spell.getManaCost(caster);
      if (caster.mana < cost) {
        return this.fizzle(state, cast, "insufficient_mana");
      }
      this.commitMana(cast, cost);
    }

    return result;
  }

  confirmTarget(
    caster: CombatActor,
    target: CombatActor | undefined,
    options: ConfirmTargetOptions = {},
  ): ConfirmTargetResult {
    const { clock } = this.options;
    const state = this.options.store.get(caster);
    const cast = state?.activeCast;
    if (!state || !cast || cast.status !== "awaiting_target") {
      return this.blocked(caster, "no_cast");
    }

    if (!isActorAvailable(caster)) {
      state.interruptCast("caster_invalid");
      return this.blocked(caster, "dead");
    }
    if (!isActorAvailable(target)) {
      state.interruptCast("target_invalid");
      return { accepted: false, error: "TargetInvalid", cast };
    }

    cast.setTarget(target);
    cast.status = "resource_commit";

    const cost = cast.spell.getManaCost(caster);
    if (!cast.resourcesCommitted && caster.mana < cost) {
      return this.fizzle(state, cast, "insufficient_mana");
    }
    if (!cast.spell.consumeReagents(caster)) {
      return this.fizzle(state, cast, "insufficient_reagents");
    }
    if (!cast.resourcesCommitted) {
      this.commitMana(cast, cost);
    }

    const delayMs = this.computeCastDelay(caster, cast.spell, options);
    const effectTimeMs = clock.now() + delayMs;
    state.enterCastDelay(cast, delayMs);

    this.emit({
      eventType: CombatEventType.CastDelayStart,
      actorId: caster.id,
      castId: cast.castId,
      spellId: cast.spell.id,
      targetId: target.id,
      manaSpent: cast.manaSpent,
      delayMs,
      effectTimeMs,
    });

    if (delayMs === 0) {
      this.resolve(cast);
    } else {
      cast.delayTimer = clock.setTimeout(() => this.resolve(cast), delayMs, `cast:${cast.castId}`);
    }

    return { accepted: true, cast, delayMs, effectTimeMs };
  }

  /** Apply fizzle policy to a disturbance. Never refunds. */
  interrupt(caster: CombatActor, trigger: InterruptTrigger): boolean {
    const { policy } = this.options;
    const state = this.options.store.get(caster);
    if (!state?.activeCast) {
      return false;
    }
    if (trigger === "damage" && (!policy.damageBasedFizzle || policy.restrictedFizzleTriggers)) {
      return false;
    }
    if (trigger === "movement" && policy.restrictedFizzleTriggers) {
      return false;
    }
    return state.interruptCast(trigger);
  }

  computeCastDelay(caster: CombatActor, spell: Spell, options: ConfirmTargetOptions = {}): number {
    const { policy, spellTable } = this.options;
    const skill = caster.getSkill(spell.skill ?? DEFAULT_CAST_SKILL);
    const fromTable =
      spellTable?.getCastDelay(spell.id, { ...options, skill }) ??
      spellTable?.getCastDelay(spell.name, { ...options, skill });
    const delay = fromTable ?? spell.castDelayMs ?? 0;
    return Math.min(policy.maximumCastDelayMs, Math.max(policy.minimumCastDelayMs, delay));
  }

  private resolve(cast: CastDescriptor): void {
    // Stale timer: the cast was interrupted or replaced while delaying.
    if (cast.status !== "delaying") {
      return;
    }
    cast.status = "resolving";
    cast.delayTimer = undefined;

    const { caster, spell } = cast;
    const state = this.options.store.get(caster);
    if (!state || state.activeCast !== cast) {
      cast.finish("interrupted");
      return;
    }
    if (!isActorAvailable(caster)) {
      state.interruptCast("caster_invalid");
      return;
    }

    const target = cast.target;
    if (!isActorAvailable(target) || !this.canSee(spell, caster, target)) {
      state.interruptCast("target_invalid");
      return;
    }

    const { reflection, policy } = this.options;
    let recipient = target;
    const reflected = spell.reflectable !== false && (reflection?.hasReflection(target) ?? false);
    if (reflected) {
      reflection?.consumeReflection?.(target);
      recipient = caster;
      this.emit({
        eventType: CombatEventType.SpellReflected,
        actorId: caster.id,
        castId: cast.castId,
        spellId: spell.id,
        reflectorId: target.id,
      });
    }

    try {
      spell.applyEffect(caster, recipient);
    } catch (error) {
      logger.error(
        { err: error, actorId: caster.id, spellId: spell.id, castId: cast.castId },
        "Spell effect failed",
      );
      state.interruptCast("fault");
      return;
    }

    const recoveryMs = policy.removePostCastRecovery ? 0 : (spell.recoveryMs ?? policy.castRecoveryMs);
    state.completeCast(cast, "applied", recoveryMs);

    this.emit({
      eventType: CombatEventType.CastApplied,
      actorId: caster.id,
      castId: cast.castId,
      spellId: spell.id,
      targetId: recipient.id,
      reflected,
    });
  }

  private canSee(spell: Spell, caster: CombatActor, target: CombatActor): boolean {
    const { lineOfSight } = this.options;
    if (spell.requiresLineOfSight === false || !lineOfSight) {
      return true;
    }
    return lineOfSight.hasLineOfSight(caster, target);
  }

  /** A cast replaced before its target was chosen loses part of its mana. */
  private forfeitPartialMana(previous: CastDescriptor): void {
    if (previous.status !== "awaiting_target" || previous.resourcesCommitted) {
      return;
    }
    const { caster, spell } = previous;
    const forfeit = calculatePartialMana(this.options.policy, spell.getManaCost(caster));
    if (forfeit > 0 && caster.mana >= forfeit) {
      caster.mana -= forfeit;
      previous.manaSpent += forfeit;
    }
  }

  private commitMana(cast: CastDescriptor, cost: number): void {
    cast.caster.mana -= cost;
    cast.manaSpent += cost;
    cast.resourcesCommitted = true;
  }

  private fizzle(
    state: CombatantTimingState,
    cast: CastDescriptor,
    reason: CastFizzleReason,
  ): CastFizzled {
    state.completeCast(cast, "fizzled");
    this.emit({
      eventType: CombatEventType.CastFizzle,
      actorId: cast.caster.id,
      castId: cast.castId,
      spellId: cast.spell.id,
      reason,
    });
    if (this.options.policy.enableDebugLogging) {
      logger.debug({ actorId: cast.caster.id, spellId: cast.spell.id, reason }, "Cast fizzled");
    }
    return { accepted: false, error: "InsufficientResources", reason, cast };
  }

  private blocked(caster: CombatActor, rejectReason: ActionRejectReason): ActionBlocked {
    this.emit({
      eventType: CombatEventType.ActionRejected,
      actorId: caster.id,
      action: "cast",
      reason: rejectReason,
    });
    return { accepted: false, error: "ActionBlocked", rejectReason };
  }

  private emit(event: EventBody<CombatEvent>): void {
    this.options.events.append({
      ...eventHeader(this.options.clock),
      category: EventCategory.Combat,
      ...event,
    });
  }
}
