export * from "./combat";
export * from "./config/combat-policy";
export * from "./config/config-loader";
export * from "./config/duel-settings";
export * from "./duel";
export * from "./errors";
export * from "./eventLog/event-log";
export * from "./runtime";
export * from "./sim/simulation-clock";
export * from "./sim/simulation-loop";
export * from "./spells";
