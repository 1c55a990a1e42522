/**
 * Base shape of every structured event the engine hands to presentation
 * collaborators. Concrete events narrow `category` and `eventType`.
 */
export interface EventLogEntry {
  eventId: number;
  category: EventCategory;
  eventType: number;
  serverTick: number;
  serverTimeMs: number;
  contextId?: string;
  actorId?: string;
}

export enum EventCategory {
  Combat = 1,
  Duel = 2,
  System = 3,
}

/** A contiguous slice of the event log, used by consumers catching up after a gap. */
export interface EventStreamBatch<T extends EventLogEntry = EventLogEntry> {
  fromEventId: number;
  toEventId: number;
  events: T[];
}
