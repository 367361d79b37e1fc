import { Inject, Injectable } from '@nestjs/common';
import {
  ENTITY_PATTERNS,
  type Entity,
  type EntityKind,
  type EntityPatternTable,
} from './entity.types';

@Injectable()
export class EntityExtractor {
  constructor(
    @Inject(ENTITY_PATTERNS) private readonly table: EntityPatternTable,
  ) {}

  /**
   * Emits one entity per match, kind by kind, pattern by pattern, left to
   * right. Spans of different kinds may overlap and are all kept.
   */
  extract(text: string): Entity[] {
    const entities: Entity[] = [];

    for (const { kind, patterns } of this.table) {
      for (const pattern of patterns) {
        // matchAll iterates over a copy, the shared regex keeps lastIndex 0
        for (const match of text.matchAll(pattern)) {
          const value = match[0];
          const start = match.index;
          if (start === undefined || value.length === 0) continue;
          entities.push(
            Object.freeze({ type: kind, value, start, end: start + value.length }),
          );
        }
      }
    }

    return entities;
  }
}

/** First entity of a kind, in extraction order. */
export function firstOfKind(
  entities: readonly Entity[],
  kind: EntityKind,
): Entity | undefined {
  return entities.find((entity) => entity.type === kind);
}
