// Shared event types consumed by presentation and reporting collaborators.

export * from "./event-log";
