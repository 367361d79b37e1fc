import {
  IsBoolean,
  IsEnum,
  IsISO8601,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { PeriodType, RelativeModifier } from '../temporal/temporal.types';
import { MAX_YEAR, MIN_YEAR } from '../temporal/temporal-range.resolver';
import { MAX_DURATION_MINUTES } from '../temporal/event-spec.builder';

const STRICT_ISO = { strict: true, strictSeparator: true };

export class PeriodQueryDto {
  @IsOptional()
  @IsEnum(PeriodType)
  periodType?: PeriodType;

  @IsOptional()
  @IsEnum(RelativeModifier)
  relative?: RelativeModifier;

  @IsOptional()
  @IsInt()
  @Min(MIN_YEAR)
  @Max(MAX_YEAR)
  year?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(12)
  month?: number;

  @IsOptional()
  @IsString()
  startDate?: string;

  @IsOptional()
  @IsString()
  endDate?: string;

  /** Anchor instant; the server clock when absent */
  @IsOptional()
  @IsISO8601(STRICT_ISO)
  now?: string;
}

export class RecurrenceDto {
  @IsString()
  frequency!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  count?: number;
}

export class EventDto {
  @IsOptional()
  @IsString()
  title?: string;

  @IsString()
  @MinLength(1)
  startDate!: string;

  @IsOptional()
  @IsString()
  endDate?: string;

  @IsOptional()
  @IsString()
  time?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_DURATION_MINUTES)
  durationMinutes?: number;

  @IsOptional()
  @IsBoolean()
  isAllDay?: boolean;

  @IsOptional()
  @ValidateNested()
  @Type(() => RecurrenceDto)
  recurrence?: RecurrenceDto;

  @IsOptional()
  @IsString()
  location?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsISO8601(STRICT_ISO)
  now?: string;
}

export class EventUpdateDto {
  @IsString()
  @MinLength(1)
  searchQuery!: string;

  @IsOptional()
  @IsString()
  newTitle?: string;

  @IsOptional()
  @IsString()
  newDate?: string;

  @IsOptional()
  @IsString()
  newTime?: string;

  @IsOptional()
  @IsISO8601(STRICT_ISO)
  currentStart?: string;

  @IsOptional()
  @IsISO8601(STRICT_ISO)
  now?: string;
}
