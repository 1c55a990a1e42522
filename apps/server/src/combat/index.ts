export * from "./cast-descriptor";
export * from "./combat-pulse";
export * from "./combat-timing-store";
export * from "./combatant-timing-state";
export * from "./tick-statistics";
export * from "./timing";
export * from "./types";
