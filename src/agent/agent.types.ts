import type { Entity } from '../nlu/entity/entity.types';
import type { IntentType } from '../nlu/intent/intent.types';
import type {
  EventResponse,
  EventUpdateResponse,
  RangeResponse,
} from '../calendar/calendar.types';

export type TaskHandler =
  | 'calendar'
  | 'email'
  | 'file'
  | 'app'
  | 'llm'
  | 'timer'
  | 'reminder'
  | 'system';

export interface TaskRoute {
  handler: TaskHandler;
  action: string;
}

/** Parameters handed to a task collaborator, by handler. */
export type TaskParams =
  | { kind: 'calendar.check'; calendar: RangeResponse }
  | { kind: 'calendar.add'; calendar: EventResponse }
  | { kind: 'calendar.update'; calendar: EventUpdateResponse }
  | { kind: 'calendar.delete'; searchQuery: string; calendar: RangeResponse }
  | { kind: 'generic'; values: Record<string, string | number> };

export interface TaskDispatch extends TaskRoute {
  params: TaskParams;
}

export interface AgentResponse {
  text: string;
  intent: IntentType;
  confidence: number;
  entities: readonly Entity[];
  dispatch: TaskDispatch;
}
