import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { TemporalRangeResolver } from '../temporal/temporal-range.resolver';
import { EventSpecBuilder } from '../temporal/event-spec.builder';
import { RecurrenceBuilder } from '../temporal/recurrence.builder';
import type {
  EventSpec,
  EventUpdateRequest,
  PeriodQuery,
  RecurrenceSpec,
} from '../temporal/temporal.types';
import {
  toCalendarWallTime,
  toEventBody,
  toEventListRequest,
  toEventPatch,
  toInstantIso,
} from './calendar-request.mapper';
import type {
  CalendarRequestOptions,
  EventPayload,
  EventResponse,
  EventUpdateResponse,
  RangeResponse,
} from './calendar.types';
import {
  ASSISTANT_EVENTS,
  type CalendarRequestBuiltEvent,
} from '../events/assistant.events';

@Injectable()
export class CalendarService {
  private readonly logger = new Logger(CalendarService.name);
  private readonly options: CalendarRequestOptions;
  private readonly defaultDuration: number;

  constructor(
    private readonly config: ConfigService,
    private readonly resolver: TemporalRangeResolver,
    private readonly eventBuilder: EventSpecBuilder,
    private readonly recurrenceBuilder: RecurrenceBuilder,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.options = {
      calendarId: this.config.get<string>('CALENDAR_ID') ?? 'primary',
      timeZone: this.config.get<string>('CALENDAR_TIME_ZONE') ?? 'Asia/Seoul',
      maxResults: Number(this.config.get('CALENDAR_MAX_RESULTS') ?? 10),
    };
    this.defaultDuration = Number(
      this.config.get('EVENT_DEFAULT_DURATION_MINUTES') ?? 60,
    );

    if (Number.isNaN(this.wall(new Date()).getTime())) {
      throw new Error(`Unknown CALENDAR_TIME_ZONE: "${this.options.timeZone}"`);
    }
  }

  /**
   * Period query → concrete range and the matching "list events" request.
   * Day boundaries fall at midnight in the calendar's time zone.
   */
  resolveRange(query: PeriodQuery, now: Date): RangeResponse {
    const { range, defaulted } = this.resolver.resolveDetailed(
      {
        ...query,
        ...(query.startDate instanceof Date
          ? { startDate: this.wall(query.startDate) }
          : {}),
        ...(query.endDate instanceof Date
          ? { endDate: this.wall(query.endDate) }
          : {}),
      },
      this.wall(now),
    );
    this.announce({ kind: 'range', label: range.label, defaulted });

    return {
      range: {
        start: this.instant(range.start),
        end: this.instant(range.end),
        label: range.label,
      },
      request: toEventListRequest(range, this.options),
      defaulted,
    };
  }

  buildRecurrence(
    payload: { frequency: string; count?: number } | null | undefined,
  ): RecurrenceSpec | null {
    if (!payload) return null;
    return this.recurrenceBuilder.build(payload.frequency, payload.count);
  }

  /** Event payload → finished event spec and the "insert event" body. */
  buildEvent(payload: EventPayload, now: Date): EventResponse {
    const { event, defaulted } = this.eventBuilder.buildDetailed(
      {
        ...payload,
        startDate:
          payload.startDate instanceof Date
            ? this.wall(payload.startDate)
            : payload.startDate,
        ...(payload.endDate instanceof Date
          ? { endDate: this.wall(payload.endDate) }
          : {}),
        durationMinutes: payload.durationMinutes ?? this.defaultDuration,
        recurrence: this.buildRecurrence(payload.recurrence),
      },
      this.wall(now),
    );
    this.announce({ kind: 'event', label: event.title, defaulted });

    return {
      event: this.serializeEvent(event),
      request: toEventBody(event, this.options),
      defaulted,
    };
  }

  buildEventUpdate(request: EventUpdateRequest, now: Date): EventUpdateResponse {
    const update = this.eventBuilder.buildUpdate(
      {
        ...request,
        ...(request.currentStart
          ? { currentStart: this.wall(request.currentStart) }
          : {}),
      },
      this.wall(now),
    );
    this.announce({
      kind: 'update',
      label: request.searchQuery,
      defaulted: update.defaulted,
    });

    return {
      update: toEventPatch(update, this.options),
      defaulted: update.defaulted,
    };
  }

  private serializeEvent(event: EventSpec): EventResponse['event'] {
    return {
      title: event.title,
      start: this.instant(event.start),
      end: this.instant(event.end),
      isAllDay: event.isAllDay,
      recurrence: event.recurrence,
      ...(event.location ? { location: event.location } : {}),
      ...(event.description ? { description: event.description } : {}),
    };
  }

  private wall(instant: Date): Date {
    return toCalendarWallTime(instant, this.options.timeZone);
  }

  private instant(wall: Date): string {
    return toInstantIso(wall, this.options.timeZone);
  }

  private announce(event: CalendarRequestBuiltEvent): void {
    this.logger.debug(
      `Built ${event.kind} request "${event.label}"${event.defaulted.length ? ` (defaulted: ${event.defaulted.join(', ')})` : ''}`,
    );
    this.eventEmitter.emit(ASSISTANT_EVENTS.CALENDAR_REQUEST_BUILT, event);
  }
}
