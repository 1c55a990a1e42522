import type { CombatEvent } from "./combat";
import type { DuelEvent } from "./duel";
import type { SystemEvent } from "./system";

/** Every event the engine writes to its event log. */
export type ArenaEvent = CombatEvent | DuelEvent | SystemEvent;
