export * from "./combat-events";
export * from "./timing-types";
