import { compileIntentRules, DEFAULT_INTENT_RULES } from './intent-rules';
import { calibrateConfidence, RuleIntentClassifier } from './rule-intent.classifier';
import { IntentType } from './intent.types';

describe('RuleIntentClassifier', () => {
  const classifier = new RuleIntentClassifier(DEFAULT_INTENT_RULES);

  it.each([
    ['내일 오후 3시에 회의 잡아줘', IntentType.SCHEDULE_ADD, 0.9],
    ['오늘 일정 알려줘', IntentType.SCHEDULE_CHECK, 0.54],
    ['내일 회의 취소해줘', IntentType.SCHEDULE_DELETE, 0.9],
    ['회의를 오후 4시로 변경해줘', IntentType.SCHEDULE_UPDATE, 0.9],
    ['새 이메일 확인해줘', IntentType.EMAIL_CHECK, 0.75],
    ['크롬 열어줘', IntentType.APP_OPEN, 0.9],
    ['내일 날씨 어때', IntentType.WEATHER_CHECK, 0.45],
    ['15분 후에 알람 맞춰줘', IntentType.TIMER_SET, 0.7],
    ['볼륨 올려줘', IntentType.SYSTEM_CONTROL, 0.42],
  ])('classifies "%s" as %s', (text, intent, confidence) => {
    const result = classifier.classify(text);
    expect(result.intent).toBe(intent);
    expect(result.confidence).toBeCloseTo(confidence, 10);
  });

  it('keeps the earlier rule on a tied score', () => {
    // schedule_check and system_control both score 1/5
    const result = classifier.classify('일정 볼륨');
    expect(result.intent).toBe(IntentType.SCHEDULE_CHECK);
    expect(result.confidence).toBeCloseTo(0.42, 10);
  });

  it('follows table order for ties in a custom table', () => {
    const custom = new RuleIntentClassifier(
      compileIntentRules([
        { intent: 'timer_set', patterns: ['핑'] },
        { intent: 'app_open', patterns: ['핑'] },
      ]),
    );
    expect(custom.classify('핑').intent).toBe(IntentType.TIMER_SET);
  });

  it('sends unmatched text longer than five characters to llm_chat', () => {
    const result = classifier.classify('이건 정말 이상한 문장이네');
    expect(result.intent).toBe(IntentType.LLM_CHAT);
    expect(result.confidence).toBeCloseTo(0.6, 10);
  });

  it('returns unknown for short unmatched text', () => {
    expect(classifier.classify('안녕')).toEqual({
      intent: IntentType.UNKNOWN,
      confidence: 0.3,
    });
    // exactly five characters is still short
    expect(classifier.classify('안녕하세요').intent).toBe(IntentType.UNKNOWN);
    expect(classifier.classify('안녕하세요!').intent).toBe(IntentType.LLM_CHAT);
  });

  it('returns unknown for empty text', () => {
    expect(classifier.classify('')).toEqual({
      intent: IntentType.UNKNOWN,
      confidence: 0.3,
    });
  });

  it('counts characters by code point', () => {
    expect(classifier.classify('👋👋👋👋👋').intent).toBe(IntentType.UNKNOWN);
    expect(classifier.classify('👋👋👋👋👋👋').intent).toBe(IntentType.LLM_CHAT);
  });

  it('matches case-insensitively against lowercased text', () => {
    const custom = new RuleIntentClassifier(
      compileIntentRules([{ intent: 'web_search', patterns: ['google'] }]),
    );
    expect(custom.classify('GOOGLE').intent).toBe(IntentType.WEB_SEARCH);
  });
});

describe('calibrateConfidence', () => {
  it('maps [0, 1] onto [0.3, 0.9]', () => {
    expect(calibrateConfidence(0)).toBeCloseTo(0.3, 10);
    expect(calibrateConfidence(0.5)).toBeCloseTo(0.6, 10);
    expect(calibrateConfidence(1)).toBeCloseTo(0.9, 10);
  });
});

describe('compileIntentRules', () => {
  it('rejects intents outside the catalogue', () => {
    expect(() =>
      compileIntentRules([{ intent: 'dance', patterns: ['춤'] }]),
    ).toThrow('Unknown intent in rule table: "dance"');
  });

  it('loads every intent except llm_chat and unknown from the default table', () => {
    const intents = DEFAULT_INTENT_RULES.map((rule) => rule.intent);
    expect(intents).toHaveLength(14);
    expect(intents).not.toContain(IntentType.LLM_CHAT);
    expect(intents).not.toContain(IntentType.UNKNOWN);
    expect(Object.isFrozen(DEFAULT_INTENT_RULES)).toBe(true);
  });
});
