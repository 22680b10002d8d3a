/**
 * Contextual retrieval ranking.
 *
 * Blends four signals, each in [0, 1]:
 *   1. Vector similarity supplied by the similarity search
 *   2. Type relevance against the query's type filter
 *   3. Temporal relevance against the query's age window
 *   4. Stored importance
 *
 * Type relevance and importance also act as hard filters, so every surviving
 * candidate has type relevance 1.0 and that weight becomes a constant offset.
 */

import { InvalidInputError, MalformedCandidateError, RankingConfigError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { memorySchema, type Memory, type QueryContext, type RankingCandidate } from "./types.js";

export interface RankingWeights {
  similarity: number;
  typeRelevance: number;
  temporal: number;
  importance: number;
}

export const DEFAULT_RANKING_WEIGHTS: Readonly<RankingWeights> = Object.freeze({
  similarity: 0.4,
  typeRelevance: 0.25,
  temporal: 0.2,
  importance: 0.15,
});

const WEIGHT_SUM_TOLERANCE = 1e-9;
const MS_PER_DAY = 1000 * 60 * 60 * 24;

export interface ScoreComponents {
  similarity: number;
  typeRelevance: number;
  temporal: number;
  importance: number;
}

export interface RankedMemory {
  memory: Memory;
  score: number;
  components: ScoreComponents;
}

export interface RankingOutcome {
  results: RankedMemory[];
  rejected: MalformedCandidateError[];
}

/** Throws RankingConfigError unless every weight is in [0, 1] and they sum to 1. */
export function validateRankingWeights(weights: RankingWeights): Readonly<RankingWeights> {
  const entries = Object.entries(weights);
  for (const [name, value] of entries) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new RankingConfigError(`Ranking weight "${name}" must be in [0, 1], got ${value}`);
    }
  }
  const sum = entries.reduce((total, [, value]) => total + value, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new RankingConfigError(`Ranking weights must sum to 1.0, got ${sum}`);
  }
  return Object.freeze({ ...weights });
}

/** 1 inside the window, exponential falloff past it; 1 when no window is set. */
export function temporalRelevance(ageDays: number, timeframeDays?: number): number {
  if (timeframeDays === undefined) return 1;
  const age = Math.max(0, ageDays);
  if (age <= timeframeDays) return 1;
  return Math.exp(-(age - timeframeDays) / timeframeDays);
}

export class RetrievalRanker {
  private readonly weights: Readonly<RankingWeights>;
  private readonly logger: Logger;

  constructor(weights: RankingWeights = DEFAULT_RANKING_WEIGHTS, logger: Logger = silentLogger) {
    this.weights = validateRankingWeights(weights);
    this.logger = logger;
  }

  rank(context: QueryContext, candidates: readonly RankingCandidate[], now: Date = new Date()): Memory[] {
    return this.rankScored(context, candidates, now).results.map((r) => r.memory);
  }

  rankScored(context: QueryContext, candidates: readonly RankingCandidate[], now: Date = new Date()): RankingOutcome {
    validateContext(context);

    const results: RankedMemory[] = [];
    const rejected: MalformedCandidateError[] = [];
    const nowMs = now.getTime();

    for (const candidate of candidates) {
      const problem = checkCandidate(candidate);
      if (problem) {
        const error = new MalformedCandidateError(candidateId(candidate), problem);
        this.logger.warn("dropping malformed ranking candidate", { id: error.candidateId, reason: problem });
        rejected.push(error);
        continue;
      }

      const { memory } = candidate;
      if (context.typeFilter.size > 0 && !context.typeFilter.has(memory.type)) continue;
      if (memory.importanceScore < context.importanceThreshold) continue;

      const ageDays = (nowMs - Date.parse(memory.createdAt)) / MS_PER_DAY;
      const components: ScoreComponents = {
        similarity: candidate.similarity ?? 0,
        typeRelevance: 1,
        temporal: temporalRelevance(ageDays, context.timeframeDays),
        importance: memory.importanceScore,
      };

      results.push({ memory, score: this.combine(components), components });
    }

    results.sort(compareRanked);
    return { results: results.slice(0, context.limit), rejected };
  }

  combine(components: ScoreComponents): number {
    const w = this.weights;
    return (
      w.similarity * components.similarity +
      w.typeRelevance * components.typeRelevance +
      w.temporal * components.temporal +
      w.importance * components.importance
    );
  }
}

function validateContext(context: QueryContext): void {
  if (!Number.isInteger(context.limit) || context.limit < 1) {
    throw new InvalidInputError(`limit must be a positive integer, got ${context.limit}`);
  }
  const threshold = context.importanceThreshold;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidInputError(`importanceThreshold must be in [0, 1], got ${threshold}`);
  }
  const window = context.timeframeDays;
  if (window !== undefined && (!Number.isFinite(window) || window <= 0)) {
    throw new InvalidInputError(`timeframeDays must be a positive number, got ${window}`);
  }
}

function checkCandidate(candidate: RankingCandidate): string | null {
  const { similarity } = candidate;
  if (similarity === undefined || similarity === null) return "missing similarity score";
  if (!Number.isFinite(similarity) || similarity < 0 || similarity > 1) {
    return `similarity score out of range: ${similarity}`;
  }
  const parsed = memorySchema.safeParse(candidate.memory);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return `invalid memory field ${issue.path.join(".") || "<root>"}: ${issue.message}`;
  }
  return null;
}

function candidateId(candidate: RankingCandidate): string | undefined {
  const id = candidate.memory?.id;
  return typeof id === "string" && id.length > 0 ? id : undefined;
}

function compareRanked(a: RankedMemory, b: RankedMemory): number {
  if (b.score !== a.score) return b.score - a.score;
  const recency = Date.parse(b.memory.lastAccessed) - Date.parse(a.memory.lastAccessed);
  if (recency !== 0) return recency;
  return a.memory.id < b.memory.id ? -1 : a.memory.id > b.memory.id ? 1 : 0;
}
