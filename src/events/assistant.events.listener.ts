import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  ASSISTANT_EVENTS,
  type CalendarRequestBuiltEvent,
  type IntentClassifiedEvent,
  type TaskDispatchedEvent,
} from './assistant.events';

const preview = (text: string) =>
  `${text.slice(0, 60)}${text.length > 60 ? '…' : ''}`;

@Injectable()
export class AssistantEventsListener {
  private readonly logger = new Logger('AssistantEventsListener');

  @OnEvent(ASSISTANT_EVENTS.INTENT_CLASSIFIED)
  onIntentClassified(event: IntentClassifiedEvent) {
    this.logger.log(
      `[nlu.intent.classified] intent=${event.intent} confidence=${event.confidence.toFixed(2)} entities=${event.entityCount} text="${preview(event.rawText)}"`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.CALENDAR_REQUEST_BUILT)
  onCalendarRequestBuilt(event: CalendarRequestBuiltEvent) {
    const message = `[calendar.request.built] kind=${event.kind} label="${event.label}"`;
    if (event.defaulted.length > 0) {
      this.logger.warn(`${message} defaulted=[${event.defaulted.join(', ')}]`);
    } else {
      this.logger.log(message);
    }
  }

  @OnEvent(ASSISTANT_EVENTS.TASK_DISPATCHED)
  onTaskDispatched(event: TaskDispatchedEvent) {
    this.logger.log(
      `[agent.task.dispatched] intent=${event.intent} → ${event.handler}/${event.action}`,
    );
  }
}
