/**
 * Reinforcement model for stored memories.
 *
 *   consolidation = clamp(base + accessWeight * ln(1 + accessCount) - decayRate * elapsedDays, 0, 1)
 *
 * Episodic memories follow the steepest forgetting curve, semantic the
 * flattest. Procedural memories gain the most from repeated access.
 */

import { clampUnit } from "./classifier.js";
import type { MemoryType } from "./types.js";

export interface TypeConsolidationParams {
  base: number;
  accessWeight: number;
  /** Consolidation lost per idle day. */
  decayRate: number;
}

export type ConsolidationParams = Readonly<Record<MemoryType, Readonly<TypeConsolidationParams>>>;

export const DEFAULT_CONSOLIDATION_PARAMS: ConsolidationParams = Object.freeze({
  semantic: Object.freeze({ base: 0.6, accessWeight: 0.1, decayRate: 0.01 }),
  procedural: Object.freeze({ base: 0.5, accessWeight: 0.15, decayRate: 0.02 }),
  episodic: Object.freeze({ base: 0.4, accessWeight: 0.1, decayRate: 0.05 }),
});

const MS_PER_DAY = 1000 * 60 * 60 * 24;

export interface AccessState {
  type: MemoryType;
  accessCount: number;
  lastAccessed: string;
}

export interface AccessUpdate {
  accessCount: number;
  lastAccessed: string;
  consolidationScore: number;
  elapsedDays: number;
}

export class ConsolidationScorer {
  private readonly params: ConsolidationParams;

  constructor(params: ConsolidationParams = DEFAULT_CONSOLIDATION_PARAMS) {
    this.params = params;
  }

  computeConsolidation(type: MemoryType, accessCount: number, elapsedDays: number): number {
    const { base, accessWeight, decayRate } = this.params[type];
    const count = Math.max(0, accessCount);
    const days = Math.max(0, elapsedDays);
    return clampUnit(base + accessWeight * Math.log(1 + count) - decayRate * days);
  }

  /** Score a memory starts with, before any access. */
  initialConsolidation(type: MemoryType): number {
    return this.computeConsolidation(type, 0, 0);
  }

  /**
   * Compute the state after one access at `now`. Pure: the caller persists
   * the returned values atomically per memory.
   */
  recordAccess(state: AccessState, now: Date = new Date()): AccessUpdate {
    const previous = Date.parse(state.lastAccessed);
    const elapsedDays = Number.isNaN(previous) ? 0 : Math.max(0, (now.getTime() - previous) / MS_PER_DAY);
    const accessCount = state.accessCount + 1;

    return {
      accessCount,
      lastAccessed: now.toISOString(),
      consolidationScore: this.computeConsolidation(state.type, accessCount, elapsedDays),
      elapsedDays,
    };
  }
}
