import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { HealthController } from './health/health.controller';
import { NluModule } from './nlu/nlu.module';
import { TemporalModule } from './temporal/temporal.module';
import { CalendarModule } from './calendar/calendar.module';
import { AgentModule } from './agent/agent.module';
import { AssistantEventsListener } from './events/assistant.events.listener';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    EventEmitterModule.forRoot({ wildcard: true }),
    NluModule,
    TemporalModule,
    CalendarModule,
    AgentModule,
  ],
  controllers: [HealthController],
  providers: [AssistantEventsListener],
})
export class AppModule {}
