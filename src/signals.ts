import { DEFAULT_LEXICON, type SignalFamily } from "./lexicon.js";
import { MEMORY_TYPES, type MemoryType } from "./types.js";

export interface SignalHit {
  family: string;
  /** The family's weight when it matched at least once, otherwise 0. */
  weight: number;
  /** Total occurrences across the family's patterns. */
  matches: number;
}

export type SignalHits = Record<MemoryType, SignalHit[]>;

/** Count every occurrence of a pattern, without touching the pattern's own lastIndex. */
export function countMatches(text: string, pattern: RegExp): number {
  const global = pattern.global ? pattern : new RegExp(pattern.source, pattern.flags + "g");
  let count = 0;
  for (const _ of text.matchAll(global)) count++;
  return count;
}

/**
 * Scans text against the lexicon's signal families.
 * Stateless after construction; safe to share.
 */
export class SignalExtractor {
  private readonly families: readonly SignalFamily[];

  constructor(families: readonly SignalFamily[] = DEFAULT_LEXICON.families) {
    this.families = families;
  }

  extract(content: string): SignalHits {
    const hits: SignalHits = { semantic: [], procedural: [], episodic: [] };

    for (const family of this.families) {
      const matches = content.length === 0
        ? 0
        : family.patterns.reduce((sum, pattern) => sum + countMatches(content, pattern), 0);
      hits[family.type].push({
        family: family.name,
        weight: matches > 0 ? family.weight : 0,
        matches,
      });
    }

    return hits;
  }
}

/** Sum of contributed weights per type. */
export function totalWeights(hits: SignalHits): Record<MemoryType, number> {
  const totals = { semantic: 0, procedural: 0, episodic: 0 };
  for (const type of MEMORY_TYPES) {
    totals[type] = hits[type].reduce((sum, hit) => sum + hit.weight, 0);
  }
  return totals;
}

/** Occurrence count of a named family, 0 when the family is unknown. */
export function familyMatches(hits: SignalHits, type: MemoryType, family: string): number {
  return hits[type].find((hit) => hit.family === family)?.matches ?? 0;
}
