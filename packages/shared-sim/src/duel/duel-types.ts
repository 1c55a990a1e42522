export enum DuelType {
  Money1v1 = "money_1v1",
  Loot1v1 = "loot_1v1",
  Money2v2 = "money_2v2",
  Loot2v2 = "loot_2v2",
}

export enum DuelState {
  Waiting = "waiting",
  Countdown = "countdown",
  InProgress = "in_progress",
  Ending = "ending",
  LootPhase = "loot_phase",
  Completed = "completed",
}

export const isTeamDuel = (type: DuelType): boolean =>
  type === DuelType.Money2v2 || type === DuelType.Loot2v2;

export const isLootDuel = (type: DuelType): boolean =>
  type === DuelType.Loot1v1 || type === DuelType.Loot2v2;

export const getDuelCapacity = (type: DuelType): number => (isTeamDuel(type) ? 4 : 2);

export const resolveDuelType = (isLoot: boolean, teams: boolean): DuelType => {
  if (teams) {
    return isLoot ? DuelType.Loot2v2 : DuelType.Money2v2;
  }
  return isLoot ? DuelType.Loot1v1 : DuelType.Money1v1;
};

/** Archived outcome of a finished duel. */
export interface DuelResult {
  contextId: string;
  arenaId: string;
  completedAtMs: number;
  type: DuelType;
  winnerIds: string[];
  loserIds: string[];
  durationMs: number;
  goldPot: number;
}
