import type { EventCategory, EventLogEntry } from "@arena/shared-protocol";

export enum SystemEventType {
  PulseStarted = 1,
  PulseStopped = 2,
  SchedulerFault = 3,
  TickThrottled = 4,
}

export type PulseLifecycleEvent = EventLogEntry & {
  category: EventCategory.System;
  eventType: SystemEventType.PulseStarted | SystemEventType.PulseStopped;
  tickMs: number;
};

export type SchedulerFaultEvent = EventLogEntry & {
  category: EventCategory.System;
  eventType: SystemEventType.SchedulerFault;
  actorId: string;
  message: string;
};

export type TickThrottledEvent = EventLogEntry & {
  category: EventCategory.System;
  eventType: SystemEventType.TickThrottled;
  tickDurationMs: number;
  tickBudgetMs: number;
  activeCombatants: number;
};

export type SystemEvent = PulseLifecycleEvent | SchedulerFaultEvent | TickThrottledEvent;
