export * from "./duel-events";
export * from "./duel-types";
