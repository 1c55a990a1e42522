import type { EventLogEntry, EventStreamBatch } from "@arena/shared-sim";

/**
 * Fixed-size ring buffer for event log entries.
 * Holds the contiguous id range [oldestId, latestId]; older entries are overwritten.
 */
export class EventLogBuffer<T extends EventLogEntry> {
  private readonly entries: (T | undefined)[];
  private start = 0;
  private size = 0;
  private nextId = 1;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("EventLogBuffer capacity must be a positive integer.");
    }
    this.entries = Array.from({ length: capacity });
  }

  get length(): number {
    return this.size;
  }

  get maxSize(): number {
    return this.capacity;
  }

  get oldestId(): number | undefined {
    return this.size === 0 ? undefined : this.nextId - this.size;
  }

  get latestId(): number | undefined {
    return this.size === 0 ? undefined : this.nextId - 1;
  }

  /** Assign the next event id to `entry` and store it. */
  append(entry: T): number {
    const id = this.nextId;
    this.nextId += 1;

    let index: number;
    if (this.size < this.capacity) {
      index = (this.start + this.size) % this.capacity;
      this.size += 1;
    } else {
      index = this.start;
      this.start = (this.start + 1) % this.capacity;
    }

    entry.eventId = id;
    this.entries[index] = entry;
    return id;
  }

  /**
   * Entries with id in (afterId, latestId].
   * Returns undefined when part of that range has already been overwritten.
   */
  getSince(afterId: number): EventStreamBatch<T> | undefined {
    const oldest = this.oldestId;
    const latest = this.latestId;
    if (oldest === undefined || latest === undefined) {
      return { fromEventId: afterId + 1, toEventId: afterId, events: [] };
    }

    if (afterId < oldest - 1) {
      return undefined;
    }

    const fromId = Math.max(afterId + 1, oldest);
    if (fromId > latest) {
      return { fromEventId: fromId, toEventId: latest, events: [] };
    }

    const events: T[] = [];
    for (let id = fromId; id <= latest; id += 1) {
      const entry = this.entries[(this.start + id - oldest) % this.capacity];
      if (entry) {
        events.push(entry);
      }
    }
    return { fromEventId: fromId, toEventId: latest, events };
  }
}
