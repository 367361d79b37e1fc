import { Injectable, Logger } from '@nestjs/common';
import { CalendarService } from '../../calendar/calendar.service';
import type { EventPayload } from '../../calendar/calendar.types';
import { DateTimeParser } from '../../temporal/date-time.parser';
import { detectRecurrenceKeyword } from '../../temporal/recurrence.builder';
import { DEFAULT_EVENT_TITLE } from '../../temporal/event-spec.builder';
import {
  PeriodType,
  RelativeModifier,
  type PeriodQuery,
} from '../../temporal/temporal.types';
import type { Entity, EntityKind } from '../../nlu/entity/entity.types';
import { firstOfKind } from '../../nlu/entity/entity.extractor';
import { IntentType } from '../../nlu/intent/intent.types';
import type { AnalysisResult } from '../../nlu/nlu.types';
import type { TaskDispatch, TaskParams, TaskRoute } from '../agent.types';

export const INTENT_TASK_MAP: Readonly<Partial<Record<IntentType, TaskRoute>>> = {
  [IntentType.SCHEDULE_CHECK]: { handler: 'calendar', action: 'check' },
  [IntentType.SCHEDULE_ADD]: { handler: 'calendar', action: 'add' },
  [IntentType.SCHEDULE_DELETE]: { handler: 'calendar', action: 'delete' },
  [IntentType.SCHEDULE_UPDATE]: { handler: 'calendar', action: 'update' },
  [IntentType.EMAIL_CHECK]: { handler: 'email', action: 'check' },
  [IntentType.EMAIL_SEND]: { handler: 'email', action: 'send' },
  [IntentType.FILE_SEARCH]: { handler: 'file', action: 'search' },
  [IntentType.FILE_OPEN]: { handler: 'file', action: 'open' },
  [IntentType.APP_OPEN]: { handler: 'app', action: 'open' },
  [IntentType.LLM_CHAT]: { handler: 'llm', action: 'chat' },
  [IntentType.WEB_SEARCH]: { handler: 'llm', action: 'search' },
  [IntentType.WEATHER_CHECK]: { handler: 'llm', action: 'weather' },
  [IntentType.TIMER_SET]: { handler: 'timer', action: 'set' },
  [IntentType.REMINDER_SET]: { handler: 'reminder', action: 'set' },
  [IntentType.SYSTEM_CONTROL]: { handler: 'system', action: 'control' },
};

const FALLBACK_ROUTE: TaskRoute = { handler: 'llm', action: 'chat' };

const EVENT_NOUN = /회의|미팅|약속|점심|저녁|출장/;
const THIS_WEEK = /이번\s*주|this\s+week/i;
const NEXT_WEEK = /다음\s*주|next\s+week/i;
const THIS_MONTH = /이번\s*달/;
const NEXT_MONTH = /다음\s*달/;
const LAST_MONTH = /지난\s*달/;
const MONTH_NAME = /^(\d{1,2})월$/;
const DEFAULT_MAIL_COUNT = 5;

type Values = Record<string, string | number>;

function generic(values: Record<string, string | number | undefined | null>): TaskParams {
  const defined: Values = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== null) defined[key] = value;
  }
  return { kind: 'generic', values: defined };
}

function isMonthExpression(value: string): boolean {
  return [THIS_MONTH, NEXT_MONTH, LAST_MONTH, MONTH_NAME].some((pattern) =>
    pattern.test(value),
  );
}

@Injectable()
export class IntentRouterService {
  private readonly logger = new Logger(IntentRouterService.name);

  constructor(
    private readonly calendar: CalendarService,
    private readonly parser: DateTimeParser,
  ) {}

  /** Task handler, action and ready-to-use parameters for an analysis. */
  route(text: string, analysis: AnalysisResult, now: Date): TaskDispatch {
    const intent = analysis.intent.intent;
    const route = INTENT_TASK_MAP[intent] ?? FALLBACK_ROUTE;
    this.logger.debug(`Routing intent: ${intent} → ${route.handler}/${route.action}`);

    return { ...route, params: this.params(intent, text, analysis.entities, now) };
  }

  private params(
    intent: IntentType,
    text: string,
    entities: readonly Entity[],
    now: Date,
  ): TaskParams {
    const first = (kind: EntityKind) => firstOfKind(entities, kind)?.value;

    switch (intent) {
      case IntentType.SCHEDULE_CHECK:
        return {
          kind: 'calendar.check',
          calendar: this.calendar.resolveRange(this.periodFor(first('date')), now),
        };

      case IntentType.SCHEDULE_ADD:
        return {
          kind: 'calendar.add',
          calendar: this.calendar.buildEvent(this.eventFor(text, entities), now),
        };

      case IntentType.SCHEDULE_DELETE:
        return {
          kind: 'calendar.delete',
          searchQuery: this.searchQueryFor(text),
          calendar: this.calendar.resolveRange(this.periodFor(first('date')), now),
        };

      case IntentType.SCHEDULE_UPDATE: {
        const times = entities.filter((entity) => entity.type === 'time');
        const newTime = times[times.length - 1]?.value;
        const newDate = this.dayOf(entities);
        return {
          kind: 'calendar.update',
          calendar: this.calendar.buildEventUpdate(
            {
              searchQuery: this.searchQueryFor(text),
              ...(newDate ? { newDate } : {}),
              ...(newTime ? { newTime } : {}),
            },
            now,
          ),
        };
      }

      case IntentType.EMAIL_CHECK:
        return generic({ maxCount: DEFAULT_MAIL_COUNT });

      case IntentType.EMAIL_SEND:
        return generic({ recipient: first('person'), message: text });

      case IntentType.FILE_SEARCH:
      case IntentType.FILE_OPEN:
        return generic({ fileName: first('file_name'), query: text });

      case IntentType.APP_OPEN:
        return generic({ appName: first('app_name') });

      case IntentType.TIMER_SET:
        return generic({ minutes: this.durationFor(entities) });

      case IntentType.REMINDER_SET:
        return generic({ message: text, date: first('date'), time: first('time') });

      case IntentType.SYSTEM_CONTROL:
        return generic({ command: text });

      case IntentType.LLM_CHAT:
      case IntentType.WEB_SEARCH:
      case IntentType.WEATHER_CHECK:
        return generic({ query: text });

      default:
        return generic({ query: `사용자 의도: ${intent}` });
    }
  }

  private periodFor(date: string | undefined): PeriodQuery {
    const today: PeriodQuery = { periodType: PeriodType.DAY, relative: RelativeModifier.TODAY };
    if (!date) return today;
    if (THIS_WEEK.test(date)) {
      return { periodType: PeriodType.WEEK, relative: RelativeModifier.CURRENT };
    }
    if (NEXT_WEEK.test(date)) {
      return { periodType: PeriodType.WEEK, relative: RelativeModifier.NEXT };
    }
    if (THIS_MONTH.test(date)) {
      return { periodType: PeriodType.MONTH, relative: RelativeModifier.CURRENT };
    }
    if (NEXT_MONTH.test(date)) {
      return { periodType: PeriodType.MONTH, relative: RelativeModifier.NEXT };
    }
    if (LAST_MONTH.test(date)) {
      return { periodType: PeriodType.MONTH, relative: RelativeModifier.PREVIOUS };
    }
    const named = MONTH_NAME.exec(date);
    if (named) {
      const month = Number(named[1]);
      return month >= 1 && month <= 12 ? { periodType: PeriodType.MONTH, month } : today;
    }
    return { periodType: PeriodType.DAY, startDate: date };
  }

  /** First date entity naming a day; month expressions are periods, not days. */
  private dayOf(entities: readonly Entity[]): string | undefined {
    return entities.find(
      (entity) => entity.type === 'date' && !isMonthExpression(entity.value),
    )?.value;
  }

  private eventFor(text: string, entities: readonly Entity[]): EventPayload {
    const date = this.dayOf(entities);
    const time = firstOfKind(entities, 'time')?.value;
    const durationMinutes = this.durationFor(entities);
    const frequency = detectRecurrenceKeyword(text);

    return {
      title: EVENT_NOUN.exec(text)?.[0] ?? DEFAULT_EVENT_TITLE,
      startDate: date ?? '오늘',
      ...(time ? { time } : {}),
      ...(durationMinutes !== undefined ? { durationMinutes } : {}),
      recurrence: frequency ? { frequency } : null,
    };
  }

  private searchQueryFor(text: string): string {
    return EVENT_NOUN.exec(text)?.[0] ?? text;
  }

  /** First duration that is not part of a time span ("3시 30분" is a time). */
  private durationFor(entities: readonly Entity[]): number | undefined {
    const times = entities.filter((entity) => entity.type === 'time');
    const duration = entities.find(
      (entity) =>
        entity.type === 'duration' &&
        !times.some((time) => entity.start >= time.start && entity.end <= time.end),
    );
    if (!duration) return undefined;
    return this.parser.parseDurationMinutes(duration.value) ?? undefined;
  }
}
