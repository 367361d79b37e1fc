import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RecurrenceFrequency, type RecurrenceSpec } from './temporal.types';

export const DEFAULT_RECURRENCE_COUNT = 10;

const DEFAULT_MAX_COUNT = 100;

const FREQUENCIES: ReadonlyMap<string, RecurrenceFrequency> = new Map([
  ['yearly', RecurrenceFrequency.YEARLY],
  ['monthly', RecurrenceFrequency.MONTHLY],
  ['weekly', RecurrenceFrequency.WEEKLY],
  ['daily', RecurrenceFrequency.DAILY],
]);

/** Korean repeat words, mapped before they reach the builder. */
export const KOREAN_RECURRENCE_KEYWORDS: ReadonlyArray<[RegExp, string]> = [
  [/매년/, 'yearly'],
  [/매월|매달/, 'monthly'],
  [/매주/, 'weekly'],
  [/매일/, 'daily'],
];

export function detectRecurrenceKeyword(text: string): string | undefined {
  return KOREAN_RECURRENCE_KEYWORDS.find(([pattern]) => pattern.test(text))?.[1];
}

@Injectable()
export class RecurrenceBuilder {
  private readonly maxCount: number;

  constructor(private readonly config: ConfigService) {
    const configured = Number(
      this.config.get('RECURRENCE_MAX_COUNT') ?? DEFAULT_MAX_COUNT,
    );
    this.maxCount =
      Number.isInteger(configured) && configured > 0
        ? configured
        : DEFAULT_MAX_COUNT;
  }

  /**
   * Bounded repeat rule for a frequency keyword. Unknown keywords mean no
   * recurrence. A missing or non-positive count becomes 10; larger counts are
   * capped at RECURRENCE_MAX_COUNT.
   */
  build(
    keyword: string | null | undefined,
    count?: number | null,
  ): RecurrenceSpec | null {
    if (!keyword) return null;

    const frequency = FREQUENCIES.get(keyword.trim().toLowerCase());
    if (!frequency) return null;

    return { frequency, count: this.boundedCount(count) };
  }

  private boundedCount(count: number | null | undefined): number {
    if (count == null || !Number.isInteger(count) || count < 1) {
      return DEFAULT_RECURRENCE_COUNT;
    }
    return Math.min(count, this.maxCount);
  }
}
