export const ASSISTANT_EVENTS = {
  INTENT_CLASSIFIED: 'nlu.intent.classified',
  CALENDAR_REQUEST_BUILT: 'calendar.request.built',
  TASK_DISPATCHED: 'agent.task.dispatched',
} as const;

export type AssistantEventName =
  (typeof ASSISTANT_EVENTS)[keyof typeof ASSISTANT_EVENTS];

// ── NLU events ────────────────────────────────────────────────────────────────

export interface IntentClassifiedEvent {
  rawText: string;
  intent: string; // IntentType value (e.g. 'schedule_add', 'llm_chat', ...)
  confidence: number;
  entityCount: number;
}

// ── Calendar events ───────────────────────────────────────────────────────────

export interface CalendarRequestBuiltEvent {
  kind: 'range' | 'event' | 'update';
  label: string;
  defaulted: string[];
}

// ── Agent events ──────────────────────────────────────────────────────────────

export interface TaskDispatchedEvent {
  intent: string;
  handler: string;
  action: string;
}
