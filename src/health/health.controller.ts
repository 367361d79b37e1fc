import { Controller, Get, Inject } from '@nestjs/common';
import {
  INTENT_RULES,
  type IntentRuleTable,
} from '../nlu/intent/intent.types';

@Controller('health')
export class HealthController {
  constructor(@Inject(INTENT_RULES) private readonly rules: IntentRuleTable) {}

  @Get()
  check(): { status: string; service: string; rulesLoaded: boolean } {
    return {
      status: 'healthy',
      service: 'nlu',
      rulesLoaded: this.rules.length > 0,
    };
  }
}
