import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CalendarService } from './calendar.service';
import { DateTimeParser } from '../temporal/date-time.parser';
import { TemporalRangeResolver } from '../temporal/temporal-range.resolver';
import { EventSpecBuilder } from '../temporal/event-spec.builder';
import { RecurrenceBuilder } from '../temporal/recurrence.builder';
import { PeriodType, RelativeModifier } from '../temporal/temporal.types';
import { ASSISTANT_EVENTS } from '../events/assistant.events';

describe('CalendarService', () => {
  // Tuesday 15:30 in Seoul
  const now = new Date('2024-12-10T15:30:00+09:00');
  const emit = jest.fn();

  async function createService(config: Record<string, string> = {}) {
    const moduleRef = await Test.createTestingModule({
      providers: [
        CalendarService,
        DateTimeParser,
        TemporalRangeResolver,
        EventSpecBuilder,
        RecurrenceBuilder,
        { provide: ConfigService, useValue: new ConfigService(config) },
        { provide: EventEmitter2, useValue: { emit } },
      ],
    }).compile();
    return moduleRef.get(CalendarService);
  }

  beforeEach(() => emit.mockClear());

  it('resolves a range into a list request', async () => {
    const service = await createService();

    const response = service.resolveRange(
      { periodType: PeriodType.MONTH, relative: RelativeModifier.NEXT },
      now,
    );

    expect(response).toEqual({
      range: {
        start: '2024-12-31T15:00:00.000Z',
        end: '2025-01-31T14:59:59.999Z',
        label: '2025년 1월',
      },
      request: {
        calendarId: 'primary',
        timeMin: '2024-12-31T15:00:00.000Z',
        timeMax: '2025-01-31T14:59:59.999Z',
        maxResults: 10,
        singleEvents: true,
        orderBy: 'startTime',
      },
      defaulted: [],
    });
    expect(emit).toHaveBeenCalledWith(ASSISTANT_EVENTS.CALENDAR_REQUEST_BUILT, {
      kind: 'range',
      label: '2025년 1월',
      defaulted: [],
    });
  });

  describe('calendar time zone', () => {
    // 08:00 on Dec 11 in Seoul, 23:00 on Dec 10 in UTC
    const earlyMorning = new Date('2024-12-11T08:00:00+09:00');

    it('cuts days at midnight in the calendar zone', async () => {
      const service = await createService({ CALENDAR_TIME_ZONE: 'Asia/Seoul' });

      const { range, request } = service.resolveRange(
        { periodType: PeriodType.DAY, relative: RelativeModifier.TODAY },
        earlyMorning,
      );

      expect(range).toEqual({
        start: '2024-12-10T15:00:00.000Z',
        end: '2024-12-11T14:59:59.999Z',
        label: '2024년 12월 11일',
      });
      expect(request.timeMin).toBe('2024-12-10T15:00:00.000Z');
    });

    it('gives another day for the same instant in another zone', async () => {
      const service = await createService({ CALENDAR_TIME_ZONE: 'UTC' });

      const { range } = service.resolveRange(
        { periodType: PeriodType.DAY, relative: RelativeModifier.TODAY },
        earlyMorning,
      );

      expect(range.label).toBe('2024년 12월 10일');
      expect(range.start).toBe('2024-12-10T00:00:00.000Z');
    });

    it('dates an all-day event by the calendar zone', async () => {
      const service = await createService({ CALENDAR_TIME_ZONE: 'Asia/Seoul' });

      const { request } = service.buildEvent({ startDate: '오늘' }, earlyMorning);

      expect(request.start).toEqual({ date: '2024-12-11' });
      expect(request.end).toEqual({ date: '2024-12-12' });
    });

    it('reads the current start of an update in the calendar zone', async () => {
      const service = await createService({ CALENDAR_TIME_ZONE: 'Asia/Seoul' });

      const { update } = service.buildEventUpdate(
        {
          searchQuery: '회의',
          newTime: '오후 4시',
          currentStart: new Date('2024-12-12T06:00:00.000Z'),
        },
        earlyMorning,
      );

      expect(update.start).toEqual({
        dateTime: '2024-12-12T16:00:00',
        timeZone: 'Asia/Seoul',
      });
    });

    it('refuses an unknown zone', async () => {
      await expect(
        createService({ CALENDAR_TIME_ZONE: 'Mars/Olympus_Mons' }),
      ).rejects.toThrow('Unknown CALENDAR_TIME_ZONE: "Mars/Olympus_Mons"');
    });
  });

  it('takes calendar options from configuration', async () => {
    const service = await createService({
      CALENDAR_ID: 'team@example.com',
      CALENDAR_MAX_RESULTS: '25',
    });

    const { request } = service.resolveRange({}, now);

    expect(request.calendarId).toBe('team@example.com');
    expect(request.maxResults).toBe(25);
  });

  it('builds an event with its insert body', async () => {
    const service = await createService();

    const response = service.buildEvent(
      {
        title: '팀 회의',
        startDate: '내일',
        time: '오후 3시',
        recurrence: { frequency: 'weekly', count: 4 },
        location: '3층 회의실',
      },
      now,
    );

    expect(response).toEqual({
      event: {
        title: '팀 회의',
        start: '2024-12-11T06:00:00.000Z',
        end: '2024-12-11T07:00:00.000Z',
        isAllDay: false,
        recurrence: { frequency: 'WEEKLY', count: 4 },
        location: '3층 회의실',
      },
      request: {
        summary: '팀 회의',
        location: '3층 회의실',
        start: { dateTime: '2024-12-11T15:00:00', timeZone: 'Asia/Seoul' },
        end: { dateTime: '2024-12-11T16:00:00', timeZone: 'Asia/Seoul' },
        recurrence: ['RRULE:FREQ=WEEKLY;COUNT=4'],
      },
      defaulted: [],
    });
  });

  it('applies the configured default duration', async () => {
    const service = await createService({ EVENT_DEFAULT_DURATION_MINUTES: '30' });

    const { request } = service.buildEvent(
      { startDate: '내일', time: '오후 3시' },
      now,
    );

    expect(request.end).toEqual({
      dateTime: '2024-12-11T15:30:00',
      timeZone: 'Asia/Seoul',
    });
  });

  it('drops an unknown recurrence keyword', async () => {
    const service = await createService();

    const { event, request } = service.buildEvent(
      { startDate: '내일', recurrence: { frequency: 'hourly' } },
      now,
    );

    expect(event.recurrence).toBeNull();
    expect(request.recurrence).toBeUndefined();
  });

  it('reports defaulted fields on the built event', async () => {
    const service = await createService();

    const { defaulted } = service.buildEvent(
      { title: '회의', startDate: '아무말' },
      now,
    );

    expect(defaulted).toEqual(['startDate']);
    expect(emit).toHaveBeenCalledWith(ASSISTANT_EVENTS.CALENDAR_REQUEST_BUILT, {
      kind: 'event',
      label: '회의',
      defaulted: ['startDate'],
    });
  });

  it('builds an update patch', async () => {
    const service = await createService({ CALENDAR_TIME_ZONE: 'UTC' });

    expect(
      service.buildEventUpdate(
        { searchQuery: '회의', newTitle: '팀 회의', newDate: '모레', newTime: '오후 2시' },
        now,
      ),
    ).toEqual({
      update: {
        searchQuery: '회의',
        summary: '팀 회의',
        start: { dateTime: '2024-12-12T14:00:00', timeZone: 'UTC' },
      },
      defaulted: [],
    });
  });
});
