import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { NluService } from '../nlu/nlu.service';
import { IntentRouterService } from './router/intent-router.service';
import type { AgentResponse } from './agent.types';
import {
  ASSISTANT_EVENTS,
  type TaskDispatchedEvent,
} from '../events/assistant.events';

@Injectable()
export class AgentService {
  private readonly logger = new Logger(AgentService.name);

  constructor(
    private readonly nlu: NluService,
    private readonly router: IntentRouterService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  process(text: string, now: Date): AgentResponse {
    // Step 1: Intent + entities
    const analysis = this.nlu.analyze(text);

    // Step 2: Resolve the task and its parameters
    const dispatch = this.router.route(text, analysis, now);

    this.logger.log(
      `"${text.slice(0, 60)}" → ${analysis.intent.intent} (${analysis.intent.confidence.toFixed(2)}) → ${dispatch.handler}/${dispatch.action}`,
    );

    // Step 3: Emit event
    this.eventEmitter.emit(ASSISTANT_EVENTS.TASK_DISPATCHED, {
      intent: analysis.intent.intent,
      handler: dispatch.handler,
      action: dispatch.action,
    } satisfies TaskDispatchedEvent);

    return {
      text,
      intent: analysis.intent.intent,
      confidence: analysis.intent.confidence,
      entities: analysis.entities,
      dispatch,
    };
  }
}
