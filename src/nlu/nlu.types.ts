import type { Entity } from './entity/entity.types';
import type { IntentMatch, IntentType } from './intent/intent.types';

export interface AnalysisResult {
  readonly intent: Readonly<IntentMatch>;
  readonly entities: readonly Entity[];
}

export interface AnalyzeResponse {
  text: string;
  intent: { name: IntentType; confidence: number };
  entities: readonly Entity[];
}

export interface ClassifyResponse {
  text: string;
  intent: IntentType;
  confidence: number;
}
