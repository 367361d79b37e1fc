import { BadRequestException, Injectable } from '@nestjs/common';
import {
  addDays,
  addWeeks,
  endOfDay,
  format,
  isAfter,
  startOfDay,
  startOfWeek,
  subDays,
} from 'date-fns';
import { DateTimeParser } from './date-time.parser';
import {
  PeriodType,
  RelativeModifier,
  type DateRange,
  type PeriodQuery,
  type ResolvedRange,
} from './temporal.types';

export const MIN_YEAR = 1000;
export const MAX_YEAR = 9999;

const DAY_LABEL = 'yyyy년 M월 d일';
const MONTH_LABEL = 'yyyy년 M월';

const DAY_OFFSETS: Readonly<Record<RelativeModifier, number>> = {
  [RelativeModifier.TODAY]: 0,
  [RelativeModifier.CURRENT]: 0,
  [RelativeModifier.NONE]: 0,
  [RelativeModifier.TOMORROW]: 1,
  [RelativeModifier.NEXT]: 1,
  [RelativeModifier.DAY_AFTER]: 2,
  [RelativeModifier.PREVIOUS]: -1,
};

const PERIOD_TYPES: ReadonlySet<string> = new Set(Object.values(PeriodType));
const RELATIVES: ReadonlySet<string> = new Set(Object.values(RelativeModifier));

function spanLabel(first: Date, last: Date): string {
  return `${format(first, DAY_LABEL)} ~ ${format(last, DAY_LABEL)}`;
}

/** 00:00 on the first of the month; years below 100 stay as given. */
function monthStart(year: number, month: number): Date {
  const first = new Date(0);
  first.setFullYear(year, month - 1, 1);
  first.setHours(0, 0, 0, 0);
  return first;
}

function daySpan(first: Date, last: Date, label: string): DateRange {
  return { start: startOfDay(first), end: endOfDay(last), label };
}

@Injectable()
export class TemporalRangeResolver {
  constructor(private readonly parser: DateTimeParser) {}

  /** Concrete range for a period query, anchored on `now` (never mutated). */
  resolve(query: PeriodQuery, now: Date): DateRange {
    return this.resolveDetailed(query, now).range;
  }

  resolveDetailed(query: PeriodQuery, now: Date): ResolvedRange {
    const periodType = query.periodType;

    if (periodType === undefined) {
      return { range: this.singleDay(now), defaulted: [] };
    }
    if (!PERIOD_TYPES.has(periodType)) {
      throw new BadRequestException(`Unknown period type: "${periodType}"`);
    }
    if (query.relative !== undefined && !RELATIVES.has(query.relative)) {
      throw new BadRequestException(
        `Unknown relative modifier: "${query.relative}"`,
      );
    }

    switch (periodType) {
      case PeriodType.DAY:
        return this.resolveDay(query, now);
      case PeriodType.WEEK:
        return { range: this.resolveWeek(query, now), defaulted: [] };
      case PeriodType.MONTH:
        return { range: this.resolveMonth(query, now), defaulted: [] };
      case PeriodType.RANGE:
        return this.resolveRange(query, now);
    }
  }

  private singleDay(day: Date): DateRange {
    return daySpan(day, day, format(day, DAY_LABEL));
  }

  private resolveDay(query: PeriodQuery, now: Date): ResolvedRange {
    if (query.startDate !== undefined) {
      const { value, defaulted } = this.day(query.startDate, now);
      return {
        range: this.singleDay(value),
        defaulted: defaulted ? ['startDate'] : [],
      };
    }

    const offset = DAY_OFFSETS[query.relative ?? RelativeModifier.TODAY];
    return { range: this.singleDay(addDays(now, offset)), defaulted: [] };
  }

  /** Monday-start weeks. */
  private resolveWeek(query: PeriodQuery, now: Date): DateRange {
    const anchor = startOfWeek(now, { weekStartsOn: 1 });

    let first = anchor;
    if (query.relative === RelativeModifier.NEXT) {
      first = addWeeks(anchor, 1);
    } else if (query.relative === RelativeModifier.PREVIOUS) {
      first = addWeeks(anchor, -1);
    }

    const last = addDays(first, 6);
    return daySpan(first, last, spanLabel(first, last));
  }

  private resolveMonth(query: PeriodQuery, now: Date): DateRange {
    let year = now.getFullYear();
    let month = now.getMonth() + 1;

    if (query.month !== undefined) {
      if (!Number.isInteger(query.month) || query.month < 1 || query.month > 12) {
        throw new BadRequestException(`Month out of range: ${query.month}`);
      }
      if (
        query.year !== undefined &&
        (!Number.isInteger(query.year) ||
          query.year < MIN_YEAR ||
          query.year > MAX_YEAR)
      ) {
        throw new BadRequestException(
          `Year out of range (${MIN_YEAR}-${MAX_YEAR}): ${query.year}`,
        );
      }
      month = query.month;
      year = query.year ?? year;
    } else if (query.relative === RelativeModifier.NEXT) {
      if (month === 12) {
        month = 1;
        year += 1;
      } else {
        month += 1;
      }
    } else if (query.relative === RelativeModifier.PREVIOUS) {
      if (month === 1) {
        month = 12;
        year -= 1;
      } else {
        month -= 1;
      }
    }

    const first = monthStart(year, month);
    const firstOfFollowing =
      month === 12 ? monthStart(year + 1, 1) : monthStart(year, month + 1);
    const last = subDays(firstOfFollowing, 1);

    return daySpan(first, last, format(first, MONTH_LABEL));
  }

  private resolveRange(query: PeriodQuery, now: Date): ResolvedRange {
    const start =
      query.startDate !== undefined ? this.day(query.startDate, now) : null;
    const end =
      query.endDate !== undefined ? this.day(query.endDate, now) : null;

    if (!start || !end || start.defaulted || end.defaulted) {
      const defaulted: string[] = [];
      if (!start || start.defaulted) defaulted.push('startDate');
      if (!end || end.defaulted) defaulted.push('endDate');
      return { range: this.singleDay(now), defaulted };
    }

    const [first, last] = isAfter(start.value, end.value)
      ? [end.value, start.value]
      : [start.value, end.value];

    return { range: daySpan(first, last, spanLabel(first, last)), defaulted: [] };
  }

  private day(
    input: string | Date,
    now: Date,
  ): { value: Date; defaulted: boolean } {
    if (input instanceof Date) {
      return Number.isNaN(input.getTime())
        ? { value: now, defaulted: true }
        : { value: input, defaulted: false };
    }
    const parsed = this.parser.parseDateDetailed(input, now);
    return { value: parsed.value, defaulted: parsed.source === 'default' };
  }
}
