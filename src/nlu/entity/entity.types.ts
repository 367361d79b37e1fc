export const ENTITY_KINDS = [
  'time',
  'date',
  'duration',
  'person',
  'app_name',
  'file_name',
] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

/** A span of the original text; `start` inclusive, `end` exclusive. */
export interface Entity {
  readonly type: EntityKind;
  readonly value: string;
  readonly start: number;
  readonly end: number;
}

export interface EntityPatternSet {
  readonly kind: EntityKind;
  readonly patterns: readonly RegExp[];
}

/** Ordered by kind; extraction output follows this order. */
export type EntityPatternTable = readonly EntityPatternSet[];

export const ENTITY_PATTERNS = Symbol('ENTITY_PATTERNS');

const KIND_VALUES: ReadonlySet<string> = new Set(ENTITY_KINDS);

export function isEntityKind(value: string): value is EntityKind {
  return KIND_VALUES.has(value);
}
