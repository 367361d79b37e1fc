import { Injectable, Logger } from '@nestjs/common';
import * as chrono from 'chrono-node';
import { addDays, startOfDay } from 'date-fns';
import type { Parsed, TimeOfDay } from './temporal.types';

export const DEFAULT_TIME: Readonly<TimeOfDay> = Object.freeze({
  hour: 9,
  minute: 0,
});

type DateFields = { year?: string; month?: string; day?: string };

const EXACT_KEYWORDS: ReadonlyArray<{ words: readonly string[]; days: number }> = [
  { words: ['today', '오늘', '이번 주', '이번주', 'this week'], days: 0 },
  { words: ['tomorrow', '내일'], days: 1 },
  { words: ['모레', '내일 모레', '내일모레', 'day after tomorrow'], days: 2 },
];

const NEXT_WEEK = /다음\s*주|next\s+week/;

// Tried in order; a missing year is the anchor's year, a missing month its month
const DATE_FORMATS: readonly RegExp[] = [
  /^(?<year>\d{4})-(?<month>\d{1,2})-(?<day>\d{1,2})$/,
  /^(?<year>\d{4})\/(?<month>\d{1,2})\/(?<day>\d{1,2})$/,
  /^(?<year>\d{4})년\s*(?<month>\d{1,2})월\s*(?<day>\d{1,2})일$/,
  /^(?<month>\d{1,2})\/(?<day>\d{1,2})$/,
  /^(?<month>\d{1,2})-(?<day>\d{1,2})$/,
  /^(?<month>\d{1,2})월\s*(?<day>\d{1,2})일$/,
  /^(?<day>\d{1,2})일$/,
];

const PM_MARKERS = ['오후', 'pm'];
const AM_MARKERS = ['오전', 'am'];

/** Local calendar day, or null when the fields do not name a real day. */
function calendarDay(year: number, month: number, day: number): Date | null {
  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(0, 0, 0, 0);
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }
  return date;
}

@Injectable()
export class DateTimeParser {
  private readonly logger = new Logger(DateTimeParser.name);

  /**
   * Resolves a loose date token to a calendar day (00:00 local).
   * Unparseable input yields the day of `now`.
   */
  parseDate(token: string, now: Date): Date {
    return this.parseDateDetailed(token, now).value;
  }

  parseDateDetailed(token: string, now: Date): Parsed<Date> {
    const normalized = token.trim().toLowerCase().replace(/\s+/g, ' ');

    for (const { words, days } of EXACT_KEYWORDS) {
      if (words.includes(normalized)) {
        return { value: startOfDay(addDays(now, days)), source: 'keyword' };
      }
    }
    if (NEXT_WEEK.test(normalized)) {
      return { value: startOfDay(addDays(now, 7)), source: 'keyword' };
    }

    for (const format of DATE_FORMATS) {
      const groups: DateFields | undefined = format.exec(normalized)?.groups;
      if (!groups) continue;

      const day = calendarDay(
        groups.year ? Number(groups.year) : now.getFullYear(),
        groups.month ? Number(groups.month) : now.getMonth() + 1,
        Number(groups.day),
      );
      if (day) return { value: day, source: 'format' };
    }

    if (normalized) {
      const natural = chrono.parseDate(normalized, now, { forwardDate: true });
      if (natural) {
        return { value: startOfDay(natural), source: 'natural' };
      }
    }

    this.logger.debug(`Unparseable date "${token}", using anchor day`);
    return { value: startOfDay(now), source: 'default' };
  }

  /** Hour and minute from a time token; 09:00 when it has no usable digits. */
  parseTime(token: string): TimeOfDay {
    return this.parseTimeDetailed(token).value;
  }

  parseTimeDetailed(token: string): Parsed<TimeOfDay> {
    const numbers = token.match(/\d+/g);
    if (!numbers) {
      return { value: { ...DEFAULT_TIME }, source: 'default' };
    }

    const lower = token.toLowerCase();
    const isPm = PM_MARKERS.some((marker) => lower.includes(marker));
    const isAm = AM_MARKERS.some((marker) => lower.includes(marker));

    let hour = Number(numbers[0]);
    const minute = numbers.length > 1 ? Number(numbers[1]) : 0;

    // Exactly one shift per parse
    if (isPm && hour < 12) {
      hour += 12;
    } else if (isAm && hour === 12) {
      hour = 0;
    }

    if (hour > 23 || minute > 59) {
      this.logger.debug(`Out-of-range time "${token}", using 09:00`);
      return { value: { ...DEFAULT_TIME }, source: 'default' };
    }

    return { value: { hour, minute }, source: 'format' };
  }

  /** "30분" → 30, "2시간" → 120, "90초" → 2. Null when no duration is found. */
  parseDurationMinutes(token: string): number | null {
    const match = /(\d+)\s*(시간|분|초)/.exec(token);
    if (!match) return null;

    const amount = Number(match[1]);
    switch (match[2]) {
      case '시간':
        return amount * 60;
      case '분':
        return amount;
      default:
        return Math.ceil(amount / 60);
    }
  }
}
