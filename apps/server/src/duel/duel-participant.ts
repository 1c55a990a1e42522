import { isActorAvailable, type CombatActor } from "../combat/types";

export class DuelParticipant {
  kills = 0;
  deaths = 0;
  eliminated = false;

  constructor(
    readonly actor: CombatActor,
    readonly teamId: number,
  ) {}

  /** Still fighting: not eliminated, alive and not deleted. */
  get isAlive(): boolean {
    return !this.eliminated && isActorAvailable(this.actor);
  }

  eliminate(): void {
    this.eliminated = true;
    this.deaths += 1;
  }
}
