import type { DuelContext } from "./duel-context";
import type { DuelParticipant } from "./duel-participant";

export type DuelOutcome =
  | { decided: false }
  | { decided: true; winner: DuelParticipant | null };

const UNDECIDED: DuelOutcome = { decided: false };

/**
 * Pure win check. A null winner is a draw; a team win is represented by the
 * first member of that team still standing.
 */
export const evaluateDuelOutcome = (context: DuelContext): DuelOutcome => {
  const alive = context.participants.filter((participant) => participant.isAlive);

  if (!context.isTeam) {
    if (alive.length === 1) {
      return { decided: true, winner: alive[0] };
    }
    return alive.length === 0 ? { decided: true, winner: null } : UNDECIDED;
  }

  const teamZero = alive.filter((participant) => participant.teamId === 0);
  const teamOne = alive.filter((participant) => participant.teamId === 1);
  if (teamZero.length === 0 && teamOne.length === 0) {
    return { decided: true, winner: null };
  }
  if (teamZero.length === 0) {
    return { decided: true, winner: teamOne[0] };
  }
  if (teamOne.length === 0) {
    return { decided: true, winner: teamZero[0] };
  }
  return UNDECIDED;
};
