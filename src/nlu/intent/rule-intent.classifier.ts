import { Inject, Injectable } from '@nestjs/common';
import {
  INTENT_RULES,
  IntentType,
  type IntentClassifier,
  type IntentMatch,
  type IntentRuleTable,
} from './intent.types';

const CONVERSATIONAL_MIN_LENGTH = 5;
const CONVERSATIONAL_SCORE = 0.5;

/** Maps a raw [0, 1] rule score onto the reported [0.3, 0.9] band. */
export function calibrateConfidence(score: number): number {
  return 0.3 + score * 0.6;
}

@Injectable()
export class RuleIntentClassifier implements IntentClassifier {
  constructor(@Inject(INTENT_RULES) private readonly rules: IntentRuleTable) {}

  /**
   * Scores every rule as matched patterns / total patterns and keeps the
   * strictly highest score. Nothing matched: text longer than five characters
   * goes to `llm_chat`, shorter text is `unknown`.
   */
  classify(text: string): IntentMatch {
    const normalized = text.toLowerCase();

    let bestIntent = IntentType.UNKNOWN;
    let bestScore = 0;

    for (const rule of this.rules) {
      if (rule.patterns.length === 0) continue;

      const hits = rule.patterns.filter((pattern) =>
        pattern.test(normalized),
      ).length;
      const score = hits / rule.patterns.length;

      if (score > bestScore) {
        bestScore = score;
        bestIntent = rule.intent;
      }
    }

    if (bestScore === 0) {
      // Code points, so Hangul syllables and emoji count once
      if (Array.from(text).length > CONVERSATIONAL_MIN_LENGTH) {
        bestIntent = IntentType.LLM_CHAT;
        bestScore = CONVERSATIONAL_SCORE;
      } else {
        bestIntent = IntentType.UNKNOWN;
      }
    }

    return { intent: bestIntent, confidence: calibrateConfidence(bestScore) };
  }
}
