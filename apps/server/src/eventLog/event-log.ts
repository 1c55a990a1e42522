import { EVENT_LOG_BUFFER_SIZE, type ArenaEvent, type EventStreamBatch } from "@arena/shared-sim";
import { logger } from "@arena/shared-servers";
import type { SimulationClock } from "../sim/simulation-clock";
import { EventLogBuffer } from "./event-log-buffer";

/** An event minus the header and category its emitter fills in. */
export type EventBody<T extends ArenaEvent> = T extends unknown
  ? Omit<T, "eventId" | "serverTick" | "serverTimeMs" | "category">
  : never;

export type EventLogListener = (event: ArenaEvent) => void;

/** Common header for a new event: id is assigned on append. */
export const eventHeader = (
  clock: SimulationClock,
): { eventId: number; serverTick: number; serverTimeMs: number } => ({
  eventId: 0,
  serverTick: clock.serverTick,
  serverTimeMs: clock.now(),
});

/**
 * Structured event stream handed to presentation and reporting collaborators.
 * Keeps recent history for catch-up and pushes each event to subscribers.
 */
export class EventLog {
  private readonly buffer: EventLogBuffer<ArenaEvent>;
  private readonly listeners: EventLogListener[] = [];

  constructor(bufferSize: number = EVENT_LOG_BUFFER_SIZE) {
    this.buffer = new EventLogBuffer<ArenaEvent>(bufferSize);
  }

  /** Subscribe to new events; returns an unsubscribe function. */
  subscribe(listener: EventLogListener): () => void {
    if (!this.listeners.includes(listener)) {
      this.listeners.push(listener);
    }
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  append(event: ArenaEvent): number {
    const id = this.buffer.append(event);
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        logger.error(
          { err: error, eventId: id, category: event.category, eventType: event.eventType },
          "Event log listener failed",
        );
      }
    }
    return id;
  }

  getSince(afterId: number): EventStreamBatch<ArenaEvent> | undefined {
    return this.buffer.getSince(afterId);
  }

  get latestId(): number | undefined {
    return this.buffer.latestId;
  }
}
