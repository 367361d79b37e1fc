import { Module } from '@nestjs/common';
import { DateTimeParser } from './date-time.parser';
import { TemporalRangeResolver } from './temporal-range.resolver';
import { RecurrenceBuilder } from './recurrence.builder';
import { EventSpecBuilder } from './event-spec.builder';

@Module({
  providers: [
    DateTimeParser,
    TemporalRangeResolver,
    RecurrenceBuilder,
    EventSpecBuilder,
  ],
  exports: [
    DateTimeParser,
    TemporalRangeResolver,
    RecurrenceBuilder,
    EventSpecBuilder,
  ],
})
export class TemporalModule {}
