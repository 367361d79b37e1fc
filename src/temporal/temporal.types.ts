export enum PeriodType {
  DAY = 'day',
  WEEK = 'week',
  MONTH = 'month',
  RANGE = 'range',
}

export enum RelativeModifier {
  CURRENT = 'current',
  NEXT = 'next',
  PREVIOUS = 'previous',
  TODAY = 'today',
  TOMORROW = 'tomorrow',
  DAY_AFTER = 'day_after',
  NONE = 'none',
}

/** A calendar window requested in relative or absolute terms. */
export type PeriodQuery = {
  /** Missing → a single day on `now` */
  periodType?: PeriodType;
  relative?: RelativeModifier;
  /** Only read together with `month` */
  year?: number;
  /** 1-12 */
  month?: number;
  /** Loose date token ("내일", "2024-12-11", "12/11") or an already resolved day */
  startDate?: string | Date;
  endDate?: string | Date;
};

/** `start` is 00:00 of the first day, `end` 23:59:59.999 of the last day. */
export type DateRange = {
  start: Date;
  end: Date;
  /** Display only */
  label: string;
};

export type ResolvedRange = {
  range: DateRange;
  /** Names of query fields that could not be parsed and fell back to `now` */
  defaulted: string[];
};

export type ParseSource = 'keyword' | 'format' | 'natural' | 'default';

export type Parsed<T> = {
  value: T;
  /** `default` means the token was not understood */
  source: ParseSource;
};

export type TimeOfDay = {
  hour: number;
  minute: number;
};

export enum RecurrenceFrequency {
  YEARLY = 'YEARLY',
  MONTHLY = 'MONTHLY',
  WEEKLY = 'WEEKLY',
  DAILY = 'DAILY',
}

/** Always bounded: there is no open-ended repeat. */
export type RecurrenceSpec = {
  frequency: RecurrenceFrequency;
  count: number;
};

export type EventRequest = {
  title?: string;
  startDate: string | Date;
  /** Present → multi-day all-day event, inclusive of this day */
  endDate?: string | Date;
  time?: string;
  durationMinutes?: number;
  isAllDay?: boolean;
  recurrence?: RecurrenceSpec | null;
  location?: string;
  description?: string;
};

export type EventSpec = {
  title: string;
  start: Date;
  /** Exclusive: the day after the last day for all-day events */
  end: Date;
  isAllDay: boolean;
  recurrence: RecurrenceSpec | null;
  location?: string;
  description?: string;
};

export type BuiltEvent = {
  event: EventSpec;
  defaulted: string[];
};

export type EventUpdateRequest = {
  searchQuery: string;
  newTitle?: string;
  newDate?: string;
  newTime?: string;
  /** Start of the event being edited, when the caller already fetched it */
  currentStart?: Date;
};

export type EventUpdateSpec = {
  searchQuery: string;
  title?: string;
  start?: Date;
  defaulted: string[];
};
