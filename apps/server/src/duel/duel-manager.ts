import {
  DuelEventType,
  DuelState,
  EventCategory,
  resolveDuelType,
  type DuelEvent,
  type DuelResult,
  type DuelType,
} from "@arena/shared-sim";
import { logger } from "@arena/shared-servers";
import { isActorAvailable, type CombatActor } from "../combat/types";
import type { DuelSettings } from "../config/duel-settings";
import { eventHeader, type EventBody, type EventLog } from "../eventLog/event-log";
import type { SimulationClock } from "../sim/simulation-clock";
import { DuelContext } from "./duel-context";
import { evaluateDuelOutcome } from "./duel-outcome";
import type { DuelParticipant } from "./duel-participant";
import { StandardDuelRuleset } from "./rulesets";
import type {
  AcceptResult,
  ChallengeResult,
  DuelArena,
  DuelRejectReason,
  DuelRejected,
  DuelRuleset,
  DuelWorld,
  GoldLedger,
  JoinResult,
  PendingChallenge,
} from "./types";

export interface DuelManagerOptions {
  settings: DuelSettings;
  clock: SimulationClock;
  events: EventLog;
  ledger: GoldLedger;
  world: DuelWorld;
  /** Defaults to the standard ruleset for every duel. */
  createRuleset?: (type: DuelType) => DuelRuleset;
}

type ChallengeResolution =
  | DuelEventType.ChallengeAccepted
  | DuelEventType.ChallengeDeclined
  | DuelEventType.ChallengeExpired
  | DuelEventType.ChallengeCancelled;

const rejected = (rejectReason: DuelRejectReason): DuelRejected => ({
  accepted: false,
  error: "DuelRejected",
  rejectReason,
});

/** Full, healthy, on foot and out of combat. */
const isReadyToDuel = (actor: CombatActor): boolean =>
  isActorAvailable(actor) && actor.hits >= actor.maxHits && !actor.mounted && !actor.inCombat;

/**
 * Challenge escrow, arena locking and the duel state machine. Every timer is
 * cleared on the transition that makes it obsolete, and callbacks re-check
 * state on fire.
 */
export class DuelManager {
  /** Keyed by the challenged actor's id. */
  private readonly challenges = new Map<string, PendingChallenge>();
  /** Initiator id to challenged id. */
  private readonly outgoing = new Map<string, string>();
  private readonly contexts = new Map<string, DuelContext>();
  private readonly actorContexts = new Map<string, DuelContext>();
  private readonly lockedArenas = new Map<string, string>();
  private readonly results: DuelResult[] = [];
  private readonly createRuleset: (type: DuelType) => DuelRuleset;
  private nextContextId = 1;

  constructor(private readonly options: DuelManagerOptions) {
    const standard = new StandardDuelRuleset(options.world);
    this.createRuleset = options.createRuleset ?? (() => standard);
  }

  get activeDuels(): number {
    return this.contexts.size;
  }

  getPendingChallenge(target: CombatActor): PendingChallenge | undefined {
    return this.challenges.get(target.id);
  }

  findContext(actor: CombatActor | undefined): DuelContext | undefined {
    return actor ? this.actorContexts.get(actor.id) : undefined;
  }

  getResults(): readonly DuelResult[] {
    return this.results;
  }

  isArenaBusy(arena: DuelArena): boolean {
    return this.lockedArenas.has(arena.id);
  }

  issueChallenge(
    initiator: CombatActor,
    target: CombatActor,
    arena: DuelArena,
    wager: number,
    isLoot: boolean,
  ): ChallengeResult {
    const { ledger, clock, settings } = this.options;

    if (initiator.id === target.id) {
      return rejected("self_challenge");
    }
    if (!Number.isInteger(wager) || wager < 0) {
      return rejected("invalid_wager");
    }
    if (!isReadyToDuel(initiator)) {
      return rejected("initiator_unavailable");
    }
    if (!isReadyToDuel(target)) {
      return rejected("target_unavailable");
    }
    if (this.isEngaged(initiator)) {
      return rejected("initiator_busy");
    }
    if (this.isEngaged(target)) {
      return rejected("target_busy");
    }
    if (ledger.getBalance(initiator) < wager || ledger.getBalance(target) < wager) {
      return rejected("insufficient_gold");
    }
    if (this.isArenaBusy(arena)) {
      return rejected("arena_busy");
    }
    if (wager > 0 && !ledger.debit(initiator, wager)) {
      return rejected("payment_failed");
    }

    const challenge: PendingChallenge = {
      initiator,
      target,
      arena,
      wager,
      isLoot,
      createdAtMs: clock.now(),
      timeout: undefined,
    };
    challenge.timeout = clock.setTimeout(
      () => this.expireChallenge(challenge),
      settings.challengeTimeoutMs,
      `duel-challenge:${target.id}`,
    );
    this.challenges.set(target.id, challenge);
    this.outgoing.set(initiator.id, target.id);

    this.emit({
      eventType: DuelEventType.ChallengeIssued,
      actorId: initiator.id,
      targetId: target.id,
      arenaId: arena.id,
      wager,
      isLoot,
      expiresAtMs: challenge.createdAtMs + settings.challengeTimeoutMs,
    });
    return { accepted: true, challenge };
  }

  acceptChallenge(target: CombatActor): AcceptResult {
    const challenge = this.challenges.get(target.id);
    if (!challenge) {
      return rejected("no_challenge");
    }
    this.removeChallenge(challenge);

    const { initiator, arena, wager } = challenge;
    if (wager > 0 && !this.options.ledger.debit(target, wager)) {
      this.refund(initiator, wager);
      return rejected("payment_failed");
    }
    if (this.isArenaBusy(arena)) {
      this.refund(initiator, wager);
      this.refund(target, wager);
      return rejected("arena_busy");
    }

    this.emitChallenge(DuelEventType.ChallengeAccepted, challenge);

    const context = this.openContext(arena, resolveDuelType(challenge.isLoot, false), wager);
    this.seat(context, initiator);
    this.seat(context, target);
    this.schedulePreTeleport(context);
    return { accepted: true, context };
  }

  declineChallenge(target: CombatActor): boolean {
    const challenge = this.challenges.get(target.id);
    if (!challenge) {
      return false;
    }
    this.removeChallenge(challenge);
    this.refund(challenge.initiator, challenge.wager);
    this.emitChallenge(DuelEventType.ChallengeDeclined, challenge);
    return true;
  }

  /** Open a team duel that actors enter with `joinDuel`. Undefined when the arena is taken. */
  createDuel(arena: DuelArena, type: DuelType, entryCost: number): DuelContext | undefined {
    if (this.isArenaBusy(arena) || !Number.isInteger(entryCost) || entryCost < 0) {
      return undefined;
    }
    return this.openContext(arena, type, entryCost);
  }

  joinDuel(context: DuelContext, actor: CombatActor): JoinResult {
    if (context.state !== DuelState.Waiting || !this.contexts.has(context.id)) {
      return rejected("duel_unavailable");
    }
    if (context.isFull) {
      return rejected("duel_full");
    }
    if (!isReadyToDuel(actor)) {
      return rejected("initiator_unavailable");
    }
    if (this.isEngaged(actor)) {
      return rejected("initiator_busy");
    }
    if (this.options.ledger.getBalance(actor) < context.entryCost) {
      return rejected("insufficient_gold");
    }
    if (context.entryCost > 0 && !this.options.ledger.debit(actor, context.entryCost)) {
      return rejected("payment_failed");
    }

    const participant = this.seat(context, actor);
    if (!participant) {
      this.refund(actor, context.entryCost);
      return rejected("duel_full");
    }
    if (context.isFull) {
      this.schedulePreTeleport(context);
    }
    return { accepted: true, participant };
  }

  /** Freeze participants in the arena and start the pre-fight countdown. */
  startCountdown(context: DuelContext): boolean {
    if (context.state !== DuelState.Waiting) {
      return false;
    }
    const { world, clock, settings } = this.options;
    context.timers.preTeleport?.clear();
    context.timers.preTeleport = undefined;
    context.state = DuelState.Countdown;

    for (const participant of context.participants) {
      world.setFrozen(participant.actor, true);
    }
    context.timers.countdown = clock.setTimeout(
      () => this.beginDuel(context),
      settings.countdownMs,
      `duel-countdown:${context.id}`,
    );
    this.emitState(DuelEventType.CountdownStarted, context);
    return true;
  }

  beginDuel(context: DuelContext): boolean {
    if (context.state !== DuelState.Countdown) {
      return false;
    }
    const { world, clock, settings } = this.options;
    context.timers.countdown?.clear();
    context.timers.countdown = undefined;
    context.state = DuelState.InProgress;

    context.ruleset.onDuelBegin(context);
    for (const participant of context.participants) {
      world.setFrozen(participant.actor, false);
    }
    context.startedAtMs = clock.now();
    context.timers.match = clock.setTimeout(
      () => this.endDuel(context, null),
      settings.maxDurationMs,
      `duel-match:${context.id}`,
    );

    this.emitState(DuelEventType.DuelStarted, context);
    logger.info(
      { contextId: context.id, arenaId: context.arena.id, type: context.type },
      "Duel started",
    );
    return true;
  }

  /**
   * Settle the duel. A null winner is a draw and pays nothing. Only an
   * in-progress duel can end, so repeat calls are no-ops.
   */
  endDuel(context: DuelContext, winner: DuelParticipant | null): boolean {
    if (context.state !== DuelState.InProgress) {
      return false;
    }
    const { clock, ledger, settings } = this.options;
    context.state = DuelState.Ending;
    context.timers.match?.clear();
    context.timers.match = undefined;

    const winners = winner
      ? context.getTeam(winner.teamId).filter((participant) => !participant.actor.deleted)
      : [];
    const goldPot = context.entryCost * context.participants.length;
    let payoutPerWinner = 0;
    if (!context.isLoot && winners.length > 0) {
      payoutPerWinner = Math.floor(Math.floor(goldPot * settings.payoutRate) / winners.length);
      if (payoutPerWinner > 0) {
        for (const participant of winners) {
          ledger.credit(participant.actor, payoutPerWinner);
        }
      }
    }

    const winningTeam = winner?.teamId;
    context.settlement = {
      winnerIds: winners.map((participant) => participant.actor.id),
      loserIds: context.participants
        .filter((participant) => winningTeam === undefined || participant.teamId !== winningTeam)
        .map((participant) => participant.actor.id),
      goldPot,
      endedAtMs: clock.now(),
    };

    this.emit({
      eventType: DuelEventType.DuelEnded,
      contextId: context.id,
      winnerIds: context.settlement.winnerIds,
      payoutPerWinner,
      draw: winner === null,
    });

    if (context.isLoot) {
      context.state = DuelState.LootPhase;
      this.emitState(DuelEventType.LootPhaseStarted, context);
      context.timers.phase = clock.setTimeout(
        () => this.cleanup(context),
        settings.lootPhaseMs,
        `duel-loot:${context.id}`,
      );
    } else {
      context.timers.phase = clock.setTimeout(
        () => this.cleanup(context),
        settings.cleanupDelayMs,
        `duel-cleanup:${context.id}`,
      );
    }
    return true;
  }

  handleDeath(victim: CombatActor | undefined, killer?: CombatActor): boolean {
    const context = this.findContext(victim);
    if (!context || context.state !== DuelState.InProgress) {
      return false;
    }
    const participant = context.getParticipant(victim);
    if (!participant || participant.eliminated) {
      return false;
    }

    participant.eliminate();
    const killerParticipant = context.getParticipant(killer);
    if (killerParticipant && killerParticipant !== participant) {
      killerParticipant.kills += 1;
    }
    this.emitEliminated(context, participant, killerParticipant);
    context.ruleset.onParticipantDeath(context, participant, killerParticipant);

    const outcome = evaluateDuelOutcome(context);
    if (outcome.decided) {
      this.endDuel(context, outcome.winner);
    }
    return true;
  }

  handleDisconnect(actor: CombatActor | undefined): void {
    if (!actor) {
      return;
    }
    this.cancelChallengesFor(actor);

    const context = this.actorContexts.get(actor.id);
    if (!context) {
      return;
    }

    if (context.state === DuelState.InProgress) {
      const participant = context.getParticipant(actor);
      if (participant && !participant.eliminated) {
        participant.eliminate();
        this.emitEliminated(context, participant, undefined);
      }
      this.endDuel(context, null);
      return;
    }

    if (context.state === DuelState.Waiting || context.state === DuelState.Countdown) {
      const wasTeleported = context.state === DuelState.Countdown;
      context.removeParticipant(actor);
      this.actorContexts.delete(actor.id);
      if (wasTeleported && !actor.deleted) {
        this.options.world.setFrozen(actor, false);
        this.options.world.returnFromArena(actor);
      }
      if (context.participants.length < 2) {
        this.abort(context, "insufficient_participants");
      }
    }
  }

  /** Clear every timer and forget all state. Escrowed gold is not returned. */
  dispose(): void {
    for (const challenge of this.challenges.values()) {
      challenge.timeout?.clear();
    }
    for (const context of this.contexts.values()) {
      context.clearTimers();
    }
    this.challenges.clear();
    this.outgoing.clear();
    this.contexts.clear();
    this.actorContexts.clear();
    this.lockedArenas.clear();
  }

  private isEngaged(actor: CombatActor): boolean {
    return (
      this.actorContexts.has(actor.id) ||
      this.challenges.has(actor.id) ||
      this.outgoing.has(actor.id)
    );
  }

  private openContext(arena: DuelArena, type: DuelType, entryCost: number): DuelContext {
    const context = new DuelContext(
      `duel-${this.nextContextId}`,
      arena,
      type,
      entryCost,
      this.createRuleset(type),
    );
    this.nextContextId += 1;
    this.contexts.set(context.id, context);
    this.lockedArenas.set(arena.id, context.id);
    this.emitState(DuelEventType.DuelCreated, context);
    return context;
  }

  private seat(context: DuelContext, actor: CombatActor): DuelParticipant | undefined {
    const participant = context.addParticipant(actor);
    if (participant) {
      this.actorContexts.set(actor.id, context);
    }
    return participant;
  }

  private schedulePreTeleport(context: DuelContext): void {
    const { clock, settings } = this.options;
    context.timers.preTeleport?.clear();
    context.timers.preTeleport = clock.setTimeout(
      () => this.preTeleport(context),
      settings.preTeleportDelayMs,
      `duel-teleport:${context.id}`,
    );
  }

  private preTeleport(context: DuelContext): void {
    context.timers.preTeleport = undefined;
    if (context.state !== DuelState.Waiting) {
      return;
    }
    if (context.participants.some((participant) => !isActorAvailable(participant.actor))) {
      this.abort(context, "participant_unavailable");
      return;
    }
    context.participants.forEach((participant, slot) => {
      this.options.world.teleportToArena(participant.actor, context.arena, slot);
    });
    this.startCountdown(context);
  }

  /** Cancel a duel that never started, refunding every remaining entry. */
  private abort(
    context: DuelContext,
    reason: "participant_unavailable" | "insufficient_participants",
  ): void {
    const wasTeleported = context.state === DuelState.Countdown;
    context.clearTimers();
    context.state = DuelState.Completed;

    for (const participant of context.participants) {
      this.refund(participant.actor, context.entryCost);
      if (wasTeleported && !participant.actor.deleted) {
        this.options.world.setFrozen(participant.actor, false);
        this.options.world.returnFromArena(participant.actor);
      }
    }
    this.release(context);

    this.emit({ eventType: DuelEventType.DuelAborted, contextId: context.id, reason });
    logger.info({ contextId: context.id, reason }, "Duel aborted");
  }

  private cleanup(context: DuelContext): void {
    if (context.state === DuelState.Completed) {
      return;
    }
    const { world, clock } = this.options;
    context.clearTimers();
    context.ruleset.onDuelEnd(context);

    for (const participant of context.participants) {
      if (!participant.actor.deleted) {
        world.returnFromArena(participant.actor);
      }
    }
    this.release(context);

    const settlement = context.settlement;
    const endedAtMs = settlement?.endedAtMs ?? clock.now();
    this.results.push({
      contextId: context.id,
      arenaId: context.arena.id,
      completedAtMs: clock.now(),
      type: context.type,
      winnerIds: settlement?.winnerIds ?? [],
      loserIds: settlement?.loserIds ?? [],
      durationMs: context.startedAtMs === undefined ? 0 : endedAtMs - context.startedAtMs,
      goldPot: settlement?.goldPot ?? 0,
    });

    context.state = DuelState.Completed;
    this.emitState(DuelEventType.DuelCompleted, context);
  }

  private release(context: DuelContext): void {
    if (this.lockedArenas.get(context.arena.id) === context.id) {
      this.lockedArenas.delete(context.arena.id);
    }
    for (const participant of context.participants) {
      if (this.actorContexts.get(participant.actor.id) === context) {
        this.actorContexts.delete(participant.actor.id);
      }
    }
    this.contexts.delete(context.id);
  }

  private expireChallenge(challenge: PendingChallenge): void {
    // Already accepted, declined or cancelled.
    if (this.challenges.get(challenge.target.id) !== challenge) {
      return;
    }
    challenge.timeout = undefined;
    this.removeChallenge(challenge);
    this.refund(challenge.initiator, challenge.wager);
    this.emitChallenge(DuelEventType.ChallengeExpired, challenge);
  }

  private cancelChallengesFor(actor: CombatActor): void {
    const incoming = this.challenges.get(actor.id);
    const outgoingTarget = this.outgoing.get(actor.id);
    const outgoingChallenge =
      outgoingTarget === undefined ? undefined : this.challenges.get(outgoingTarget);

    for (const challenge of [incoming, outgoingChallenge]) {
      if (challenge) {
        this.removeChallenge(challenge);
        this.refund(challenge.initiator, challenge.wager);
        this.emitChallenge(DuelEventType.ChallengeCancelled, challenge);
      }
    }
  }

  private removeChallenge(challenge: PendingChallenge): void {
    challenge.timeout?.clear();
    challenge.timeout = undefined;
    if (this.challenges.get(challenge.target.id) === challenge) {
      this.challenges.delete(challenge.target.id);
    }
    if (this.outgoing.get(challenge.initiator.id) === challenge.target.id) {
      this.outgoing.delete(challenge.initiator.id);
    }
  }

  private refund(actor: CombatActor, amount: number): void {
    if (amount <= 0) {
      return;
    }
    this.options.ledger.credit(actor, amount);
    this.emit({ eventType: DuelEventType.WagerRefunded, actorId: actor.id, amount });
  }

  private emitChallenge(eventType: ChallengeResolution, challenge: PendingChallenge): void {
    this.emit({
      eventType,
      actorId: challenge.initiator.id,
      targetId: challenge.target.id,
    });
  }

  private emitState(
    eventType:
      | DuelEventType.DuelCreated
      | DuelEventType.CountdownStarted
      | DuelEventType.DuelStarted
      | DuelEventType.LootPhaseStarted
      | DuelEventType.DuelCompleted,
    context: DuelContext,
  ): void {
    this.emit({
      eventType,
      contextId: context.id,
      arenaId: context.arena.id,
      duelType: context.type,
      state: context.state,
    });
  }

  private emitEliminated(
    context: DuelContext,
    participant: DuelParticipant,
    killer: DuelParticipant | undefined,
  ): void {
    this.emit({
      eventType: DuelEventType.ParticipantEliminated,
      contextId: context.id,
      actorId: participant.actor.id,
      killerId: killer?.actor.id,
      teamId: participant.teamId,
    });
  }

  private emit(event: EventBody<DuelEvent>): void {
    this.options.events.append({
      ...eventHeader(this.options.clock),
      category: EventCategory.Duel,
      ...event,
    });
  }
}
