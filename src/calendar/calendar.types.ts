import type { EventRequest } from '../temporal/temporal.types';

/** Query parameters of a provider "list events" call. */
export interface EventListRequest {
  calendarId: string;
  timeMin: string; // ISO 8601 UTC
  timeMax: string; // ISO 8601 UTC
  maxResults: number;
  singleEvents: true;
  orderBy: 'startTime';
}

export type EventTime =
  | { dateTime: string; timeZone: string } // local wall time
  | { date: string }; // yyyy-MM-dd, all-day

/** Body of a provider "insert event" call. */
export interface CalendarEventBody {
  summary: string;
  location?: string;
  description?: string;
  start: EventTime;
  end: EventTime;
  recurrence?: string[];
}

/** Body of a provider "patch event" call, plus how to find the event. */
export interface CalendarEventPatch {
  searchQuery: string;
  summary?: string;
  start?: EventTime;
}

export interface CalendarRequestOptions {
  calendarId: string;
  timeZone: string;
  maxResults: number;
}

export interface RangeResponse {
  range: { start: string; end: string; label: string };
  request: EventListRequest;
  defaulted: string[];
}

export interface EventResponse {
  event: {
    title: string;
    start: string;
    end: string;
    isAllDay: boolean;
    recurrence: { frequency: string; count: number } | null;
    location?: string;
    description?: string;
  };
  request: CalendarEventBody;
  defaulted: string[];
}

export interface EventUpdateResponse {
  update: CalendarEventPatch;
  defaulted: string[];
}

/** Recurrence as it arrives from a tool call: a keyword, not yet validated. */
export interface RecurrencePayload {
  frequency: string;
  count?: number;
}

export type EventPayload = Omit<EventRequest, 'recurrence'> & {
  recurrence?: RecurrencePayload | null;
};
