import {
  CombatEventType,
  EventCategory,
  SLOW_TICK_WARNING_MS,
  SystemEventType,
} from "@arena/shared-sim";
import { logger } from "@arena/shared-servers";
import type { CombatPolicy } from "../config/combat-policy";
import { describeError, type SchedulerFault } from "../errors";
import { eventHeader, type EventLog } from "../eventLog/event-log";
import type { SimulationClock } from "../sim/simulation-clock";
import type { CombatTimingStore } from "./combat-timing-store";
import { TickStatistics } from "./tick-statistics";
import { isActorAvailable, type CombatActor, type CombatResolver } from "./types";

export type PulseState = "uninitialized" | "running" | "stopped";

/** Monotonic milliseconds used to time a tick. */
export type Stopwatch = () => number;

export interface PulseMetrics {
  readonly averageTickMs: number;
  readonly maxTickMs: number;
  readonly p99TickMs: number | undefined;
  readonly totalTicks: number;
  readonly activeCombatants: number;
  readonly throttleEvents: number;
  readonly faults: number;
}

export interface GlobalPulseSchedulerOptions {
  policy: CombatPolicy;
  store: CombatTimingStore;
  resolver: CombatResolver;
  clock: SimulationClock;
  events: EventLog;
  stopwatch?: Stopwatch;
}

export interface RegistrationOptions {
  /** Exempt from idle eviction until explicitly unregistered. */
  persistent?: boolean;
}

type EvictionReason = "idle" | "deleted" | "unregistered";

/**
 * Drives auto-attacks for every registered combatant once per pulse. A single
 * actor failing never stops the tick; the fault is logged and counted.
 */
export class GlobalPulseScheduler {
  private state: PulseState = "uninitialized";
  private readonly roster = new Map<string, CombatActor>();
  private readonly persistent = new Set<string>();
  private readonly statistics = new TickStatistics();
  private readonly stopwatch: Stopwatch;
  private throttleEvents = 0;
  private faults = 0;
  private lastFault: SchedulerFault | undefined;

  constructor(private readonly options: GlobalPulseSchedulerOptions) {
    this.stopwatch = options.stopwatch ?? (() => performance.now());
    // Any committed swing puts its attacker (back) on the roster.
    options.store.onSwingStarted((actor) => {
      this.registerCombatant(actor);
    });
  }

  get status(): PulseState {
    return this.state;
  }

  get tickMs(): number {
    return this.options.policy.globalTickMs;
  }

  get activeCombatants(): number {
    return this.roster.size;
  }

  get latestFault(): SchedulerFault | undefined {
    return this.lastFault;
  }

  /** Starting again after `stop()` resets statistics and counters. */
  start(): void {
    if (this.state === "running") {
      return;
    }
    if (this.state === "stopped") {
      this.statistics.reset();
      this.throttleEvents = 0;
      this.faults = 0;
      this.lastFault = undefined;
    }
    this.state = "running";
    this.emitLifecycle(SystemEventType.PulseStarted);
    logger.info({ tickMs: this.tickMs }, "Combat pulse started");
  }

  stop(): void {
    if (this.state !== "running") {
      return;
    }
    this.state = "stopped";
    this.emitLifecycle(SystemEventType.PulseStopped);
    logger.info(
      { totalTicks: this.statistics.totalTicks, activeCombatants: this.roster.size },
      "Combat pulse stopped",
    );
  }

  isRegistered(actor: CombatActor): boolean {
    return this.roster.has(actor.id);
  }

  registerCombatant(actor: CombatActor, registration: RegistrationOptions = {}): boolean {
    if (actor.deleted) {
      return false;
    }
    const state = this.options.store.getOrCreate(actor);
    state.touch();
    if (registration.persistent) {
      this.persistent.add(actor.id);
    }
    if (this.roster.has(actor.id)) {
      return false;
    }
    this.roster.set(actor.id, actor);

    this.options.events.append({
      ...eventHeader(this.options.clock),
      category: EventCategory.Combat,
      eventType: CombatEventType.CombatantRegistered,
      actorId: actor.id,
      activeCombatants: this.roster.size,
    });
    return true;
  }

  unregisterCombatant(actor: CombatActor): boolean {
    if (!this.roster.has(actor.id)) {
      return false;
    }
    this.evict(actor, "unregistered");
    return true;
  }

  tick(now: number = this.options.clock.now()): void {
    if (this.state !== "running") {
      return;
    }

    const startedAt = this.stopwatch();
    // Snapshot so registrations made by collaborators during the tick are safe.
    const actors = [...this.roster.values()];

    for (const actor of actors) {
      try {
        this.processCombatant(actor, now);
      } catch (error) {
        this.recordFault(actor, now, error);
      }
    }
    this.evictIdle(now);

    const durationMs = this.stopwatch() - startedAt;
    this.statistics.record(durationMs);

    if (durationMs > this.tickMs) {
      this.throttleEvents += 1;
      logger.warn(
        { tickDurationMs: durationMs, tickMs: this.tickMs, activeCombatants: this.roster.size },
        "Combat pulse tick exceeded budget",
      );
      this.options.events.append({
        ...eventHeader(this.options.clock),
        category: EventCategory.System,
        eventType: SystemEventType.TickThrottled,
        tickDurationMs: durationMs,
        tickBudgetMs: this.tickMs,
        activeCombatants: this.roster.size,
      });
    } else if (durationMs > SLOW_TICK_WARNING_MS) {
      logger.warn(
        { tickDurationMs: durationMs, activeCombatants: this.roster.size },
        "Slow combat pulse tick",
      );
    }
  }

  getMetrics(): PulseMetrics {
    return Object.freeze({
      ...this.statistics.snapshot(),
      activeCombatants: this.roster.size,
      throttleEvents: this.throttleEvents,
      faults: this.faults,
    });
  }

  private processCombatant(actor: CombatActor, now: number): void {
    if (actor.deleted) {
      this.evict(actor, "deleted");
      return;
    }

    const { store, resolver } = this.options;
    const state = store.getOrCreate(actor);

    const hit = state.takeDueHit(now);
    if (hit) {
      const defender = hit.defender?.deref();
      if (isActorAvailable(actor) && isActorAvailable(defender)) {
        resolver.resolveHit(actor, defender, hit.implement);
        this.options.events.append({
          ...eventHeader(this.options.clock),
          category: EventCategory.Combat,
          eventType: CombatEventType.SwingHit,
          actorId: actor.id,
          targetId: defender.id,
        });
      }
    }

    if (!isActorAvailable(actor) || state.getSwingBlock(now) !== undefined) {
      return;
    }

    const target = resolver.getCombatTarget(actor);
    if (!isActorAvailable(target)) {
      return;
    }
    state.beginSwing(actor.equipped, target);
  }

  private evictIdle(now: number): void {
    const { store, policy } = this.options;
    for (const actor of [...this.roster.values()]) {
      if (this.persistent.has(actor.id)) {
        continue;
      }
      const state = store.get(actor);
      if (state && now - state.lastActionTimestamp > policy.combatIdleTimeoutMs) {
        this.evict(actor, "idle");
      }
    }
  }

  private evict(actor: CombatActor, reason: EvictionReason): void {
    const { store } = this.options;
    this.roster.delete(actor.id);
    this.persistent.delete(actor.id);

    if (reason === "deleted") {
      store.remove(actor, "caster_invalid");
    } else {
      store.cancel(actor, "swing", "manual");
      // A held cast keeps the state alive until the cast pipeline finishes it.
      if (!store.get(actor)?.activeCast) {
        store.release(actor);
      }
    }

    this.options.events.append({
      ...eventHeader(this.options.clock),
      category: EventCategory.Combat,
      eventType: CombatEventType.CombatantEvicted,
      actorId: actor.id,
      reason,
      activeCombatants: this.roster.size,
    });

    if (this.options.policy.enableDebugLogging) {
      logger.debug({ actorId: actor.id, reason }, "Combatant removed from pulse");
    }
  }

  private recordFault(actor: CombatActor, now: number, error: unknown): void {
    this.faults += 1;
    this.lastFault = { kind: "SchedulerFault", actorId: actor.id, serverTimeMs: now, error };
    logger.error({ err: error, actorId: actor.id }, "Combat pulse failed to process combatant");

    this.options.events.append({
      ...eventHeader(this.options.clock),
      category: EventCategory.System,
      eventType: SystemEventType.SchedulerFault,
      actorId: actor.id,
      message: describeError(error),
    });
  }

  private emitLifecycle(
    eventType: SystemEventType.PulseStarted | SystemEventType.PulseStopped,
  ): void {
    this.options.events.append({
      ...eventHeader(this.options.clock),
      category: EventCategory.System,
      eventType,
      tickMs: this.tickMs,
    });
  }
}
