import { format } from 'date-fns';
import { fromZonedTime, toZonedTime } from 'date-fns-tz';
import type {
  DateRange,
  EventSpec,
  EventUpdateSpec,
  RecurrenceSpec,
} from '../temporal/temporal.types';
import type {
  CalendarEventBody,
  CalendarEventPatch,
  CalendarRequestOptions,
  EventListRequest,
  EventTime,
} from './calendar.types';

const DATE_FORMAT = 'yyyy-MM-dd';
const LOCAL_DATE_TIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

/**
 * Dates handed to the temporal engine carry the calendar zone's wall clock in
 * their local fields. These two convert at the boundary.
 */
export function toCalendarWallTime(instant: Date, timeZone: string): Date {
  return toZonedTime(instant, timeZone);
}

/** ISO 8601 UTC instant of a wall time in `timeZone`. */
export function toInstantIso(wall: Date, timeZone: string): string {
  return fromZonedTime(wall, timeZone).toISOString();
}

export function toRRule(spec: RecurrenceSpec): string {
  return `RRULE:FREQ=${spec.frequency};COUNT=${spec.count}`;
}

export function toEventListRequest(
  range: DateRange,
  options: CalendarRequestOptions,
): EventListRequest {
  return {
    calendarId: options.calendarId,
    timeMin: toInstantIso(range.start, options.timeZone),
    timeMax: toInstantIso(range.end, options.timeZone),
    maxResults: options.maxResults,
    singleEvents: true,
    orderBy: 'startTime',
  };
}

function timedAt(instant: Date, timeZone: string): EventTime {
  return { dateTime: format(instant, LOCAL_DATE_TIME_FORMAT), timeZone };
}

export function toEventBody(
  event: EventSpec,
  options: Pick<CalendarRequestOptions, 'timeZone'>,
): CalendarEventBody {
  const [start, end]: [EventTime, EventTime] = event.isAllDay
    ? [{ date: format(event.start, DATE_FORMAT) }, { date: format(event.end, DATE_FORMAT) }]
    : [timedAt(event.start, options.timeZone), timedAt(event.end, options.timeZone)];

  return {
    summary: event.title,
    ...(event.location ? { location: event.location } : {}),
    ...(event.description ? { description: event.description } : {}),
    start,
    end,
    ...(event.recurrence ? { recurrence: [toRRule(event.recurrence)] } : {}),
  };
}

export function toEventPatch(
  update: EventUpdateSpec,
  options: Pick<CalendarRequestOptions, 'timeZone'>,
): CalendarEventPatch {
  return {
    searchQuery: update.searchQuery,
    ...(update.title ? { summary: update.title } : {}),
    ...(update.start ? { start: timedAt(update.start, options.timeZone) } : {}),
  };
}
