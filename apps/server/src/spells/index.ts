export * from "./cast-pipeline";
export * from "./spell-timing-table";
