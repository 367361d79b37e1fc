import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { CalendarService } from './calendar.service';
import { EventDto, EventUpdateDto, PeriodQueryDto } from './calendar.dto';
import { anchorFrom, instantFrom } from '../common/clock';
import type {
  EventResponse,
  EventUpdateResponse,
  RangeResponse,
} from './calendar.types';

@Controller('calendar')
export class CalendarController {
  constructor(private readonly calendar: CalendarService) {}

  @Post('range')
  @HttpCode(200)
  range(@Body() dto: PeriodQueryDto): RangeResponse {
    const { now, ...query } = dto;
    return this.calendar.resolveRange(query, anchorFrom(now));
  }

  @Post('events')
  @HttpCode(200)
  event(@Body() dto: EventDto): EventResponse {
    const { now, ...payload } = dto;
    return this.calendar.buildEvent(payload, anchorFrom(now));
  }

  @Post('events/update')
  @HttpCode(200)
  update(@Body() dto: EventUpdateDto): EventUpdateResponse {
    const { now, currentStart, ...request } = dto;
    return this.calendar.buildEventUpdate(
      {
        ...request,
        ...(currentStart
          ? { currentStart: instantFrom(currentStart, 'currentStart') }
          : {}),
      },
      anchorFrom(now),
    );
  }
}
