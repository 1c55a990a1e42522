import { DuelEventType, EventCategory } from "@arena/shared-sim";
import { logger } from "@arena/shared-servers";
import type { CombatTimingStore } from "../combat/combat-timing-store";
import type { GlobalPulseScheduler } from "../combat/combat-pulse";
import { eventHeader, type EventLog } from "../eventLog/event-log";
import type { SimulationClock } from "../sim/simulation-clock";
import type { DuelContext } from "./duel-context";
import type { DuelParticipant } from "./duel-participant";
import type { DuelRuleset, DuelWorld } from "./types";

/** Heals everyone at the bell and keeps deaths free of aggression penalties. */
export class StandardDuelRuleset implements DuelRuleset {
  readonly id: string = "standard";

  constructor(protected readonly world: DuelWorld) {}

  onDuelBegin(context: DuelContext): void {
    for (const participant of context.participants) {
      if (!participant.actor.deleted) {
        this.world.restore(participant.actor);
      }
    }
  }

  onParticipantDeath(_context: DuelContext, victim: DuelParticipant, killer?: DuelParticipant): void {
    this.world.clearAggression(victim.actor, killer?.actor);
  }

  onDuelEnd(_context: DuelContext): void {}
}

export interface IndependentTimerRulesetOptions {
  world: DuelWorld;
  pulse: GlobalPulseScheduler;
  store: CombatTimingStore;
  clock: SimulationClock;
  events: EventLog;
}

/**
 * Standard rules plus independent swing, cast and bandage timers for every
 * participant for the length of the fight.
 */
export class IndependentTimerDuelRuleset implements DuelRuleset {
  readonly id = "independent_timers";
  private readonly base: StandardDuelRuleset;

  constructor(private readonly options: IndependentTimerRulesetOptions) {
    this.base = new StandardDuelRuleset(options.world);
  }

  onDuelBegin(context: DuelContext): void {
    this.base.onDuelBegin(context);

    const engaged: string[] = [];
    for (const participant of context.participants) {
      // Participants stay on the pulse while they chase, however long that takes.
      if (this.options.pulse.registerCombatant(participant.actor, { persistent: true })) {
        engaged.push(participant.actor.id);
      }
    }

    this.options.events.append({
      ...eventHeader(this.options.clock),
      category: EventCategory.Duel,
      eventType: DuelEventType.MechanicsEngaged,
      contextId: context.id,
      rulesetId: this.id,
      participantIds: engaged,
    });
    logger.info(
      { contextId: context.id, participants: engaged.length },
      "Independent timer mechanics engaged",
    );
  }

  onParticipantDeath(context: DuelContext, victim: DuelParticipant, killer?: DuelParticipant): void {
    this.base.onParticipantDeath(context, victim, killer);
  }

  onDuelEnd(context: DuelContext): void {
    this.base.onDuelEnd(context);
    for (const participant of context.participants) {
      this.options.pulse.unregisterCombatant(participant.actor);
      this.options.store.release(participant.actor);
    }
  }
}
