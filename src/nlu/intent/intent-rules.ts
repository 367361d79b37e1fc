import rawRules from './intent-rules.json';
import { isIntentType, type IntentRule, type IntentRuleTable } from './intent.types';

export interface RawIntentRule {
  intent: string;
  patterns: string[];
}

/**
 * Compiles the JSON rule table into frozen regex rules. Rules keep file order,
 * which is the tie-break order of the classifier.
 */
export function compileIntentRules(raw: readonly RawIntentRule[]): IntentRuleTable {
  const rules = raw.map((entry): IntentRule => {
    if (!isIntentType(entry.intent)) {
      throw new Error(`Unknown intent in rule table: "${entry.intent}"`);
    }
    // No `g` flag: .test() must not carry lastIndex between calls
    const patterns = entry.patterns.map((source) => new RegExp(source));
    return Object.freeze({
      intent: entry.intent,
      patterns: Object.freeze(patterns),
    });
  });
  return Object.freeze(rules);
}

export const DEFAULT_INTENT_RULES: IntentRuleTable = compileIntentRules(rawRules);
