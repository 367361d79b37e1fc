import rawPatterns from './entity-patterns.json';
import {
  isEntityKind,
  type EntityPatternSet,
  type EntityPatternTable,
} from './entity.types';

export interface RawEntityPatternSet {
  kind: string;
  patterns: string[];
}

export function compileEntityPatterns(
  raw: readonly RawEntityPatternSet[],
): EntityPatternTable {
  const sets = raw.map((entry): EntityPatternSet => {
    if (!isEntityKind(entry.kind)) {
      throw new Error(`Unknown entity kind in pattern table: "${entry.kind}"`);
    }
    return Object.freeze({
      kind: entry.kind,
      patterns: Object.freeze(
        entry.patterns.map((source) => new RegExp(source, 'gi')),
      ),
    });
  });
  return Object.freeze(sets);
}

export const DEFAULT_ENTITY_PATTERNS: EntityPatternTable =
  compileEntityPatterns(rawPatterns);
