import { DuelState, getDuelCapacity, isLootDuel, isTeamDuel, type DuelType } from "@arena/shared-sim";
import type { CombatActor } from "../combat/types";
import type { TimerHandle } from "../sim/simulation-clock";
import { DuelParticipant } from "./duel-participant";
import type { DuelArena, DuelRuleset } from "./types";

export interface DuelTimers {
  preTeleport?: TimerHandle;
  countdown?: TimerHandle;
  match?: TimerHandle;
  phase?: TimerHandle;
}

export interface DuelSettlement {
  winnerIds: string[];
  loserIds: string[];
  goldPot: number;
  endedAtMs: number;
}

/** One arena match from creation through cleanup. */
export class DuelContext {
  state: DuelState = DuelState.Waiting;
  startedAtMs: number | undefined;
  settlement: DuelSettlement | undefined;
  readonly timers: DuelTimers = {};
  private readonly members: DuelParticipant[] = [];

  constructor(
    readonly id: string,
    readonly arena: DuelArena,
    readonly type: DuelType,
    readonly entryCost: number,
    readonly ruleset: DuelRuleset,
  ) {}

  get participants(): readonly DuelParticipant[] {
    return this.members;
  }

  get isLoot(): boolean {
    return isLootDuel(this.type);
  }

  get isTeam(): boolean {
    return isTeamDuel(this.type);
  }

  get capacity(): number {
    return getDuelCapacity(this.type);
  }

  get isFull(): boolean {
    return this.members.length >= this.capacity;
  }

  getParticipant(actor: CombatActor | undefined): DuelParticipant | undefined {
    if (!actor) {
      return undefined;
    }
    return this.members.find((participant) => participant.actor.id === actor.id);
  }

  /** Joiners alternate between teams 0 and 1; after a departure the smaller team fills first. */
  addParticipant(actor: CombatActor): DuelParticipant | undefined {
    if (this.isFull || this.getParticipant(actor)) {
      return undefined;
    }
    const teamZero = this.members.filter((participant) => participant.teamId === 0).length;
    const teamId = teamZero <= this.members.length - teamZero ? 0 : 1;
    const participant = new DuelParticipant(actor, teamId);
    this.members.push(participant);
    return participant;
  }

  removeParticipant(actor: CombatActor): DuelParticipant | undefined {
    const index = this.members.findIndex((participant) => participant.actor.id === actor.id);
    if (index < 0) {
      return undefined;
    }
    const [removed] = this.members.splice(index, 1);
    return removed;
  }

  getTeam(teamId: number): DuelParticipant[] {
    return this.members.filter((participant) => participant.teamId === teamId);
  }

  clearTimers(): void {
    this.timers.preTeleport?.clear();
    this.timers.countdown?.clear();
    this.timers.match?.clear();
    this.timers.phase?.clear();
    this.timers.preTeleport = undefined;
    this.timers.countdown = undefined;
    this.timers.match = undefined;
    this.timers.phase = undefined;
  }
}
