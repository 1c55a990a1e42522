export * from "./duel-context";
export * from "./duel-manager";
export * from "./duel-outcome";
export * from "./duel-participant";
export * from "./rulesets";
export * from "./types";
