/**
 * @module tools/calendar
 * @fileoverview MCP tools of the calendar server: `get_events`, `add_event`.
 */

import { z } from "zod";
import type { CalendarStore } from "../servers/stores/calendar-store.js";
import { jsonResult, runTool, textResult, type ToolResponse } from "./result.js";

export const GetEventsSchema = {
  from: z.string().optional().describe("Only events ending at or after this ISO 8601 date-time"),
  to: z.string().optional().describe("Only events starting before this ISO 8601 date-time"),
};

export const AddEventSchema = {
  title: z.string().min(1).describe("Event title"),
  start: z.string().describe("Start, ISO 8601 date-time, e.g. 2025-05-30T10:00:00"),
  end: z.string().describe("End, ISO 8601 date-time"),
};

export interface CalendarHandlers {
  getEvents(params: { from?: string; to?: string }): Promise<ToolResponse>;
  addEvent(params: { title: string; start: string; end: string }): Promise<ToolResponse>;
}

export function createCalendarHandlers(store: CalendarStore): CalendarHandlers {
  return {
    getEvents: ({ from, to }) =>
      runTool(async () => {
        const events = await store.list({ from, to });
        return events.length > 0 ? jsonResult(events) : textResult("No events found");
      }),

    addEvent: (event) =>
      runTool(async () => {
        await store.add(event);
        return textResult(`Added event '${event.title}' (${event.start} - ${event.end})`);
      }),
  };
}
