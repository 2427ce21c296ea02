/**
 * @module servers/calendar-server
 * @fileoverview Calendar backend.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { AddEventSchema, createCalendarHandlers, GetEventsSchema } from "../tools/calendar.js";
import { InMemoryCalendarStore, type CalendarStore } from "./stores/calendar-store.js";

export function createCalendarServer(store: CalendarStore = new InMemoryCalendarStore()): McpServer {
  const server = new McpServer({ name: "calendar", version: "1.0.0" }, { capabilities: { tools: {} } });
  const handlers = createCalendarHandlers(store);

  server.tool(
    "get_events",
    "List calendar events, optionally limited to a time range.",
    GetEventsSchema,
    (params) => handlers.getEvents(params),
  );
  server.tool("add_event", "Add an event to the calendar.", AddEventSchema, (params) => handlers.addEvent(params));

  return server;
}
