/**
 * @module servers/stores/calendar-store
 * @fileoverview Calendar events behind the calendar server.
 *
 * Times are ISO 8601 strings as the caller wrote them (with or without an
 * offset); comparisons go through `Date.parse`, so strings without an
 * offset are read in the server's local time zone.
 */

import { InvalidArgumentsError } from "../../utils/errors.js";

export interface CalendarEvent {
  title: string;
  start: string;
  end: string;
}

export interface EventRange {
  /** Inclusive lower bound on event end. */
  from?: string;
  /** Exclusive upper bound on event start. */
  to?: string;
}

export interface CalendarStore {
  /** Events overlapping `range`, ordered by start time. */
  list(range?: EventRange): Promise<CalendarEvent[]>;
  /** @throws {InvalidArgumentsError} Unparseable times, or `end` not after `start`. */
  add(event: CalendarEvent): Promise<CalendarEvent>;
}

function timeOf(value: string, field: string, tool: string): number {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new InvalidArgumentsError(tool, [`'${field}' is not an ISO 8601 date-time: ${value}`]);
  }
  return time;
}

export class InMemoryCalendarStore implements CalendarStore {
  private readonly events: CalendarEvent[] = [];

  constructor(initial: readonly CalendarEvent[] = []) {
    for (const event of initial) this.events.push({ ...event });
  }

  async list(range: EventRange = {}): Promise<CalendarEvent[]> {
    const from = range.from === undefined ? -Infinity : timeOf(range.from, "from", "get_events");
    const to = range.to === undefined ? Infinity : timeOf(range.to, "to", "get_events");

    return this.events
      .filter((event) => Date.parse(event.end) >= from && Date.parse(event.start) < to)
      .sort((a, b) => Date.parse(a.start) - Date.parse(b.start))
      .map((event) => ({ ...event }));
  }

  async add(event: CalendarEvent): Promise<CalendarEvent> {
    const start = timeOf(event.start, "start", "add_event");
    const end = timeOf(event.end, "end", "add_event");
    if (end <= start) {
      throw new InvalidArgumentsError("add_event", ["'end' must be after 'start'"]);
    }
    this.events.push({ ...event });
    return { ...event };
  }
}
