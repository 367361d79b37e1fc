import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EntityExtractor } from './entity/entity.extractor';
import {
  INTENT_CLASSIFIER,
  INTENT_LABELS,
  IntentType,
  type IntentClassifier,
  type IntentMatch,
} from './intent/intent.types';
import type { AnalysisResult } from './nlu.types';
import {
  ASSISTANT_EVENTS,
  type IntentClassifiedEvent,
} from '../events/assistant.events';

@Injectable()
export class NluService {
  private readonly logger = new Logger(NluService.name);

  constructor(
    @Inject(INTENT_CLASSIFIER) private readonly classifier: IntentClassifier,
    private readonly extractor: EntityExtractor,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /** Intent and entities over the same text; the two passes are independent. */
  analyze(text: string): AnalysisResult {
    const intent = this.classifier.classify(text);
    const entities = this.extractor.extract(text);

    this.logger.debug(
      `"${text.slice(0, 60)}" → ${intent.intent} (${intent.confidence.toFixed(2)}), ${entities.length} entities`,
    );

    this.eventEmitter.emit(ASSISTANT_EVENTS.INTENT_CLASSIFIED, {
      rawText: text,
      intent: intent.intent,
      confidence: intent.confidence,
      entityCount: entities.length,
    } satisfies IntentClassifiedEvent);

    return Object.freeze({
      intent: Object.freeze(intent),
      entities: Object.freeze(entities),
    });
  }

  classify(text: string): IntentMatch {
    return this.classifier.classify(text);
  }

  supportedIntents(): Record<IntentType, string> {
    return { ...INTENT_LABELS };
  }
}
