import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { NluService } from './nlu.service';
import { AnalyzeTextDto } from './nlu.dto';
import type { IntentType } from './intent/intent.types';
import type { AnalyzeResponse, ClassifyResponse } from './nlu.types';

@Controller('nlu')
export class NluController {
  constructor(private readonly nlu: NluService) {}

  @Post('analyze')
  @HttpCode(200)
  analyze(@Body() dto: AnalyzeTextDto): AnalyzeResponse {
    const { intent, entities } = this.nlu.analyze(dto.text);
    return {
      text: dto.text,
      intent: { name: intent.intent, confidence: intent.confidence },
      entities,
    };
  }

  /** Intent only, no entity pass. */
  @Post('classify')
  @HttpCode(200)
  classify(@Body() dto: AnalyzeTextDto): ClassifyResponse {
    const { intent, confidence } = this.nlu.classify(dto.text);
    return { text: dto.text, intent, confidence };
  }

  @Get('intents')
  intents(): { intents: Record<IntentType, string> } {
    return { intents: this.nlu.supportedIntents() };
  }
}
