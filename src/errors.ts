import type { MemoryType } from "./types.js";

export type MemoryErrorCode =
  | "INVALID_INPUT"
  | "MALFORMED_CANDIDATE"
  | "RANKING_CONFIG"
  | "CONFIG"
  | "DUPLICATE_MEMORY"
  | "EMBEDDING_FAILED";

export class MemoryError extends Error {
  readonly code: MemoryErrorCode;

  constructor(code: MemoryErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Content or query parameters the core cannot work with. Empty content is valid. */
export class InvalidInputError extends MemoryError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

/** A ranking candidate with no usable similarity score or memory record. */
export class MalformedCandidateError extends MemoryError {
  readonly candidateId: string | undefined;

  constructor(candidateId: string | undefined, reason: string) {
    super("MALFORMED_CANDIDATE", `Candidate ${candidateId ?? "<unknown>"} rejected: ${reason}`);
    this.candidateId = candidateId;
  }
}

export class RankingConfigError extends MemoryError {
  constructor(message: string) {
    super("RANKING_CONFIG", message);
  }
}

export class ConfigError extends MemoryError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

export class DuplicateMemoryError extends MemoryError {
  readonly existingId: string;

  constructor(existingId: string) {
    super("DUPLICATE_MEMORY", `Duplicate content detected (existing memory: ${existingId})`);
    this.existingId = existingId;
  }
}

export class EmbeddingError extends MemoryError {
  constructor(message: string) {
    super("EMBEDDING_FAILED", message);
  }
}

/**
 * Non-fatal: the two best type scores are closer than the ambiguity margin.
 * Attached to the classification result, never thrown.
 */
export class AmbiguousClassificationWarning extends Error {
  readonly candidates: readonly [MemoryType, MemoryType];
  readonly margin: number;

  constructor(winner: MemoryType, runnerUp: MemoryType, margin: number) {
    super(`Ambiguous classification: ${winner} leads ${runnerUp} by ${margin.toFixed(3)}`);
    this.name = "AmbiguousClassificationWarning";
    this.candidates = [winner, runnerUp];
    this.margin = margin;
  }
}
