import { Module } from '@nestjs/common';
import { NluController } from './nlu.controller';
import { NluService } from './nlu.service';
import { EntityExtractor } from './entity/entity.extractor';
import { DEFAULT_ENTITY_PATTERNS } from './entity/entity-patterns';
import { ENTITY_PATTERNS } from './entity/entity.types';
import { DEFAULT_INTENT_RULES } from './intent/intent-rules';
import { INTENT_CLASSIFIER, INTENT_RULES } from './intent/intent.types';
import { RuleIntentClassifier } from './intent/rule-intent.classifier';

@Module({
  controllers: [NluController],
  providers: [
    { provide: INTENT_RULES, useValue: DEFAULT_INTENT_RULES },
    { provide: ENTITY_PATTERNS, useValue: DEFAULT_ENTITY_PATTERNS },
    { provide: INTENT_CLASSIFIER, useClass: RuleIntentClassifier },
    EntityExtractor,
    NluService,
  ],
  exports: [NluService, INTENT_RULES],
})
export class NluModule {}
