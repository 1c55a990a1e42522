import type { ActionKind, CastInterruptReason } from "@arena/shared-sim";
import type { CombatPolicy } from "../config/combat-policy";
import type { EventLog } from "../eventLog/event-log";
import type { SimulationClock } from "../sim/simulation-clock";
import {
  CombatantTimingState,
  type BandageResult,
  type CastResult,
  type SwingResult,
  type TimingStateContext,
} from "./combatant-timing-state";
import type { TimingProvider } from "./timing/timing-provider";
import type { CombatActor, Implement, Spell } from "./types";

export interface CombatTimingStoreOptions {
  policy: CombatPolicy;
  timing: TimingProvider;
  clock: SimulationClock;
  events: EventLog;
}

/**
 * Timing state keyed by actor id. States are created on first use and live
 * until the pulse releases them or the actor is removed.
 */
export class CombatTimingStore {
  private readonly states = new Map<string, CombatantTimingState>();
  private readonly context: TimingStateContext;
  private nextCastId = 1;
  private readonly swingListeners = new Set<(actor: CombatActor) => void>();

  constructor(options: CombatTimingStoreOptions) {
    this.context = {
      ...options,
      allocateCastId: () => this.nextCastId++,
      notifySwingStarted: (actor) => {
        for (const listener of this.swingListeners) {
          listener(actor);
        }
      },
    };
  }

  get policy(): CombatPolicy {
    return this.context.policy;
  }

  get size(): number {
    return this.states.size;
  }

  /** Subscribe to committed swings. Returns an unsubscribe function. */
  onSwingStarted(listener: (actor: CombatActor) => void): () => void {
    this.swingListeners.add(listener);
    return () => {
      this.swingListeners.delete(listener);
    };
  }

  get(actor: CombatActor): CombatantTimingState | undefined {
    return this.states.get(actor.id);
  }

  getOrCreate(actor: CombatActor): CombatantTimingState {
    let state = this.states.get(actor.id);
    if (!state) {
      state = new CombatantTimingState(actor, this.context);
      this.states.set(actor.id, state);
    }
    return state;
  }

  beginSwing(
    actor: CombatActor,
    implement: Implement | undefined = actor.equipped,
    target?: CombatActor,
  ): SwingResult {
    return this.getOrCreate(actor).beginSwing(implement, target);
  }

  beginCast(actor: CombatActor, spell: Spell): CastResult {
    return this.getOrCreate(actor).beginCast(spell);
  }

  beginBandage(actor: CombatActor, durationMs?: number): BandageResult {
    return this.getOrCreate(actor).beginBandage(durationMs);
  }

  cancel(actor: CombatActor, kind: ActionKind, reason?: CastInterruptReason): boolean {
    return this.states.get(actor.id)?.cancel(kind, reason) ?? false;
  }

  /** Actors without state have never acted and are always ready. */
  isReady(actor: CombatActor, kind: ActionKind, now: number = this.context.clock.now()): boolean {
    return this.states.get(actor.id)?.isReady(kind, now) ?? true;
  }

  /** Drop state that holds no running action. Returns whether it was dropped. */
  release(actor: CombatActor): boolean {
    const state = this.states.get(actor.id);
    if (!state || state.isBusy(this.context.clock.now())) {
      return false;
    }
    return this.states.delete(actor.id);
  }

  /** Tear down an actor's state, interrupting whatever it was doing. */
  remove(actor: CombatActor, reason: CastInterruptReason = "caster_invalid"): boolean {
    const state = this.states.get(actor.id);
    if (!state) {
      return false;
    }
    state.interruptCast(reason);
    state.cancel("swing", reason);
    return this.states.delete(actor.id);
  }

  clear(): void {
    for (const state of this.states.values()) {
      state.interruptCast("caster_invalid");
    }
    this.states.clear();
  }
}
