export * from "./combat-runtime";
