import { isTerminalCastStatus, type CastStatus } from "@arena/shared-sim";
import type { TimerHandle } from "../sim/simulation-clock";
import type { CombatActor, Spell } from "./types";

export type TerminalCastStatus = Extract<CastStatus, "applied" | "fizzled" | "interrupted">;

/**
 * One in-flight spell cast. Owned by the caster's timing state; the clock only
 * holds the delay timer, which is cleared on every terminal transition.
 */
export class CastDescriptor {
  status: CastStatus = "awaiting_target";
  resourcesCommitted = false;
  manaSpent = 0;
  scheduledEffectTimeMs: number | undefined;
  delayTimer: TimerHandle | undefined;
  private targetRef: WeakRef<CombatActor> | undefined;

  constructor(
    readonly castId: number,
    readonly caster: CombatActor,
    readonly spell: Spell,
    readonly startedAtMs: number,
  ) {}

  get target(): CombatActor | undefined {
    return this.targetRef?.deref();
  }

  get isTerminal(): boolean {
    return isTerminalCastStatus(this.status);
  }

  setTarget(target: CombatActor): void {
    this.targetRef = new WeakRef(target);
  }

  /** Move to a terminal status once; later calls are ignored. */
  finish(status: TerminalCastStatus): boolean {
    if (this.isTerminal) {
      return false;
    }
    this.status = status;
    this.delayTimer?.clear();
    this.delayTimer = undefined;
    return true;
  }
}
