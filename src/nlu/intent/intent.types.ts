export enum IntentType {
  // Calendar
  SCHEDULE_CHECK = 'schedule_check',
  SCHEDULE_ADD = 'schedule_add',
  SCHEDULE_DELETE = 'schedule_delete',
  SCHEDULE_UPDATE = 'schedule_update',

  // Mail
  EMAIL_CHECK = 'email_check',
  EMAIL_SEND = 'email_send',

  // Desktop
  FILE_SEARCH = 'file_search',
  FILE_OPEN = 'file_open',
  APP_OPEN = 'app_open',

  // Lookups
  WEB_SEARCH = 'web_search',
  WEATHER_CHECK = 'weather_check',

  // Alerts
  TIMER_SET = 'timer_set',
  REMINDER_SET = 'reminder_set',

  // Meta
  LLM_CHAT = 'llm_chat',
  SYSTEM_CONTROL = 'system_control',
  UNKNOWN = 'unknown',
}

export const INTENT_LABELS: Readonly<Record<IntentType, string>> = {
  [IntentType.SCHEDULE_CHECK]: '일정 확인',
  [IntentType.SCHEDULE_ADD]: '일정 추가',
  [IntentType.SCHEDULE_DELETE]: '일정 삭제',
  [IntentType.SCHEDULE_UPDATE]: '일정 수정',
  [IntentType.EMAIL_CHECK]: '이메일 확인',
  [IntentType.EMAIL_SEND]: '이메일 전송',
  [IntentType.FILE_SEARCH]: '파일 검색',
  [IntentType.FILE_OPEN]: '파일 열기',
  [IntentType.APP_OPEN]: '앱 실행',
  [IntentType.WEB_SEARCH]: '웹 검색',
  [IntentType.WEATHER_CHECK]: '날씨 확인',
  [IntentType.TIMER_SET]: '타이머 설정',
  [IntentType.REMINDER_SET]: '리마인더 설정',
  [IntentType.LLM_CHAT]: '일반 대화/질문',
  [IntentType.SYSTEM_CONTROL]: '시스템 제어',
  [IntentType.UNKNOWN]: '알 수 없음',
};

const INTENT_VALUES: ReadonlySet<string> = new Set(Object.values(IntentType));

export function isIntentType(value: string): value is IntentType {
  return INTENT_VALUES.has(value);
}

export interface IntentMatch {
  intent: IntentType;
  confidence: number; // 0.3 - 0.9 for the rule engine
}

/**
 * Anything that can turn an utterance into an intent. The rule engine is the
 * default; a trained model can be bound to {@link INTENT_CLASSIFIER} instead.
 */
export interface IntentClassifier {
  classify(text: string): IntentMatch;
}

export const INTENT_CLASSIFIER = Symbol('INTENT_CLASSIFIER');

export interface IntentRule {
  readonly intent: IntentType;
  readonly patterns: readonly RegExp[];
}

/** Ordered: on equal scores the earlier rule wins. */
export type IntentRuleTable = readonly IntentRule[];

export const INTENT_RULES = Symbol('INTENT_RULES');
