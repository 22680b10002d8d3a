import { AmbiguousClassificationWarning, InvalidInputError } from "./errors.js";
import { DEFAULT_LEXICON, maxAttainableScores, type Lexicon } from "./lexicon.js";
import { silentLogger, type Logger } from "./logger.js";
import { SignalExtractor, totalWeights, type SignalHits } from "./signals.js";
import { MEMORY_TYPES, type MemoryType, type TypeScores } from "./types.js";

export const DEFAULT_IMPORTANCE = 0.5;

export interface ClassificationResult {
  type: MemoryType;
  confidence: number;
  scores: TypeScores;
  /** Initial importance for the memory, clamped to [0, 1]. */
  importance: number;
  warning?: AmbiguousClassificationWarning;
}

export interface ClassifierOptions {
  lexicon?: Lexicon;
  logger?: Logger;
}

/**
 * Rule-based cognitive type classifier.
 * Deterministic: the same content always produces the same result.
 */
export class TypeClassifier {
  readonly lexicon: Lexicon;
  private readonly extractor: SignalExtractor;
  private readonly maxScores: Record<MemoryType, number>;
  private readonly logger: Logger;

  constructor(options?: ClassifierOptions) {
    this.lexicon = options?.lexicon ?? DEFAULT_LEXICON;
    this.extractor = new SignalExtractor(this.lexicon.families);
    this.maxScores = maxAttainableScores(this.lexicon.families);
    this.logger = options?.logger ?? silentLogger;
  }

  /** Raw per-family hits, exposed for metadata generation and debugging. */
  signals(content: string): SignalHits {
    return this.extractor.extract(content);
  }

  classify(content: unknown, importance: number = DEFAULT_IMPORTANCE): ClassificationResult {
    if (typeof content !== "string") {
      throw new InvalidInputError(`content must be a string, got ${content === null ? "null" : typeof content}`);
    }
    if (!Number.isFinite(importance)) {
      throw new InvalidInputError("importance must be a finite number");
    }
    return this.classifySignals(this.extractor.extract(content), clampUnit(importance));
  }

  classifySignals(hits: SignalHits, importance: number = DEFAULT_IMPORTANCE): ClassificationResult {
    const totals = totalWeights(hits);
    const scores: TypeScores = { semantic: 0, procedural: 0, episodic: 0 };
    for (const type of MEMORY_TYPES) {
      const max = this.maxScores[type];
      scores[type] = max > 0 ? Math.min(1, totals[type] / max) : 0;
    }

    // MEMORY_TYPES is in tie-break order, so a stable sort settles equal scores
    const ranked = [...MEMORY_TYPES].sort((a, b) => scores[b] - scores[a]);
    const [winner, runnerUp] = ranked;

    if (scores[winner] < this.lexicon.activationThreshold) {
      return { type: "semantic", confidence: 0, scores, importance };
    }

    const result: ClassificationResult = { type: winner, confidence: scores[winner], scores, importance };

    const gap = scores[winner] - scores[runnerUp];
    if (gap < this.lexicon.ambiguityMargin) {
      result.warning = new AmbiguousClassificationWarning(winner, runnerUp, gap);
      this.logger.warn("ambiguous memory classification", { winner, runnerUp, gap, scores });
    }

    return result;
  }
}

export function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

const defaultClassifier = new TypeClassifier();

/** Classify with the default lexicon. */
export function classify(content: unknown, importance?: number): ClassificationResult {
  return defaultClassifier.classify(content, importance);
}
