import { Module } from '@nestjs/common';
import { NluModule } from '../nlu/nlu.module';
import { CalendarModule } from '../calendar/calendar.module';
import { TemporalModule } from '../temporal/temporal.module';
import { AgentController } from './agent.controller';
import { AgentService } from './agent.service';
import { IntentRouterService } from './router/intent-router.service';

@Module({
  imports: [NluModule, CalendarModule, TemporalModule],
  controllers: [AgentController],
  providers: [AgentService, IntentRouterService],
  exports: [AgentService],
})
export class AgentModule {}
