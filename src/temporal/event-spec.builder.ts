import { Injectable } from '@nestjs/common';
import {
  addDays,
  addMinutes,
  isBefore,
  set,
  startOfDay,
} from 'date-fns';
import { DateTimeParser, DEFAULT_TIME } from './date-time.parser';
import type {
  BuiltEvent,
  EventRequest,
  EventSpec,
  EventUpdateRequest,
  EventUpdateSpec,
  TimeOfDay,
} from './temporal.types';

export const DEFAULT_EVENT_TITLE = '새 일정';
export const DEFAULT_DURATION_MINUTES = 60;
/** 31 days */
export const MAX_DURATION_MINUTES = 1440 * 31;

function atTime(day: Date, time: TimeOfDay): Date {
  return set(day, {
    hours: time.hour,
    minutes: time.minute,
    seconds: 0,
    milliseconds: 0,
  });
}

@Injectable()
export class EventSpecBuilder {
  constructor(private readonly parser: DateTimeParser) {}

  build(request: EventRequest, now: Date): EventSpec {
    return this.buildDetailed(request, now).event;
  }

  /**
   * - `endDate` given: all-day over [startDate, endDate + 1 day), whatever
   *   `isAllDay` says.
   * - `isAllDay` or no `time`: all-day on startDate.
   * - Otherwise timed, lasting `durationMinutes` (60 by default, 31 days at most).
   */
  buildDetailed(request: EventRequest, now: Date): BuiltEvent {
    const defaulted: string[] = [];
    const day = (input: string | Date, field: string): Date => {
      if (input instanceof Date) return startOfDay(input);
      const parsed = this.parser.parseDateDetailed(input, now);
      if (parsed.source === 'default') defaulted.push(field);
      return parsed.value;
    };

    const title = request.title?.trim() || DEFAULT_EVENT_TITLE;
    const startDay = day(request.startDate, 'startDate');
    const base = {
      title,
      recurrence: request.recurrence ?? null,
      ...(request.location ? { location: request.location } : {}),
      ...(request.description ? { description: request.description } : {}),
    };

    if (request.endDate !== undefined) {
      const endDay = day(request.endDate, 'endDate');
      // An end before the start collapses to a single day
      const lastDay = isBefore(endDay, startDay) ? startDay : endDay;
      return {
        event: { ...base, start: startDay, end: addDays(lastDay, 1), isAllDay: true },
        defaulted,
      };
    }

    if (request.isAllDay || !request.time) {
      return {
        event: { ...base, start: startDay, end: addDays(startDay, 1), isAllDay: true },
        defaulted,
      };
    }

    const time = this.parser.parseTimeDetailed(request.time);
    if (time.source === 'default') defaulted.push('time');

    const duration =
      request.durationMinutes !== undefined &&
      Number.isFinite(request.durationMinutes) &&
      request.durationMinutes > 0
        ? Math.min(request.durationMinutes, MAX_DURATION_MINUTES)
        : DEFAULT_DURATION_MINUTES;

    const start = atTime(startDay, time.value);
    return {
      event: { ...base, start, end: addMinutes(start, duration), isAllDay: false },
      defaulted,
    };
  }

  /**
   * New title and/or start for an existing event. A new start is only set
   * when a new date or time is given; the missing half comes from the
   * current start, or from today at 09:00.
   */
  buildUpdate(request: EventUpdateRequest, now: Date): EventUpdateSpec {
    const defaulted: string[] = [];
    const title = request.newTitle?.trim() || undefined;

    if (!request.newDate && !request.newTime) {
      return {
        searchQuery: request.searchQuery,
        ...(title ? { title } : {}),
        defaulted,
      };
    }

    let day: Date;
    if (request.newDate) {
      const parsed = this.parser.parseDateDetailed(request.newDate, now);
      if (parsed.source === 'default') defaulted.push('newDate');
      day = parsed.value;
    } else {
      day = startOfDay(request.currentStart ?? now);
    }

    let time: TimeOfDay;
    if (request.newTime) {
      const parsed = this.parser.parseTimeDetailed(request.newTime);
      if (parsed.source === 'default') defaulted.push('newTime');
      time = parsed.value;
    } else if (request.currentStart) {
      time = {
        hour: request.currentStart.getHours(),
        minute: request.currentStart.getMinutes(),
      };
    } else {
      time = { ...DEFAULT_TIME };
    }

    return {
      searchQuery: request.searchQuery,
      ...(title ? { title } : {}),
      start: atTime(day, time),
      defaulted,
    };
  }
}
