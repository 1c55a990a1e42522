// Simulation-side types shared between the engine and its consumers.

export * from "./combat";
export * from "./duel";
export * from "./system";
export * from "./constants";
export type { ArenaEvent } from "./events";
export * from "@arena/shared-protocol"; // re-export event log types
