import { z } from "zod";

/** Cognitive memory types. Order doubles as the classifier's tie-break order. */
export const MEMORY_TYPES = ["semantic", "procedural", "episodic"] as const;
export type MemoryType = (typeof MEMORY_TYPES)[number];

export const memoryTypeSchema = z.enum(MEMORY_TYPES);

// ─── Metadata ────────────────────────────────────────────────────────────────

export const semanticMetadataSchema = z.object({
  domain: z.string(),
  category: z.string(),
  confidence: z.number().min(0).max(1),
  verified: z.boolean(),
});

export const episodicMetadataSchema = z.object({
  timestamp: z.string(),
  context: z.string(),
  outcome: z.enum(["resolved", "unresolved"]),
  emotional_valence: z.enum(["positive", "neutral", "negative"]),
});

export const proceduralMetadataSchema = z.object({
  skill_level: z.enum(["beginner", "intermediate", "advanced", "expert"]),
  complexity: z.enum(["low", "medium", "high"]),
  steps: z.number().int().min(0),
  success_rate: z.number().min(0).max(1).optional(),
});

export type SemanticMetadata = z.infer<typeof semanticMetadataSchema>;
export type EpisodicMetadata = z.infer<typeof episodicMetadataSchema>;
export type ProceduralMetadata = z.infer<typeof proceduralMetadataSchema>;

/** Metadata tagged by the memory type it belongs to. Unknown keys are stripped on parse. */
export const typedMetadataSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("semantic"), metadata: semanticMetadataSchema }),
  z.object({ type: z.literal("episodic"), metadata: episodicMetadataSchema }),
  z.object({ type: z.literal("procedural"), metadata: proceduralMetadataSchema }),
]);
export type TypedMetadata = z.infer<typeof typedMetadataSchema>;

// ─── Memory ──────────────────────────────────────────────────────────────────

const unitInterval = z.number().min(0).max(1);
const timestamp = z.string().refine((s) => !Number.isNaN(Date.parse(s)), "must be an ISO timestamp");

export const memoryBaseSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  confidence: unitInterval,
  importanceScore: unitInterval,
  consolidationScore: unitInterval,
  accessCount: z.number().int().min(0),
  createdAt: timestamp,
  updatedAt: timestamp,
  lastAccessed: timestamp,
});

export const memorySchema = z.intersection(memoryBaseSchema, typedMetadataSchema);

export type MemoryFields = z.infer<typeof memoryBaseSchema>;
export type Memory = MemoryFields & TypedMetadata;

/** A memory as held by the persistence layer. */
export type StoredMemory = Memory & {
  contentHash: string;
  embedding: number[];
};

export interface MemoryRow {
  id: string;
  content: string;
  content_hash: string;
  memory_type: string;
  confidence: number;
  metadata: string;
  embedding: string;
  importance_score: number;
  consolidation_score: number;
  access_count: number;
  created_at: string;
  updated_at: string;
  last_accessed: string;
}

// ─── Classification & retrieval ──────────────────────────────────────────────

export type TypeScores = Record<MemoryType, number>;

export interface QueryContext {
  /** Types to keep. Empty means no filter. */
  typeFilter: ReadonlySet<MemoryType>;
  /** Age window in days. Unset means no temporal preference. */
  timeframeDays?: number;
  importanceThreshold: number;
  limit: number;
}

export interface RankingCandidate {
  memory: Memory;
  similarity?: number | null;
}

export interface SimilarityCandidate {
  memory: StoredMemory;
  similarity: number;
}

export interface MemoryStoreConfig {
  dbPath: string;
}

export interface EmbeddingConfig {
  url: string;
  model: string;
}

/** Anything that turns text into a vector. */
export interface Embedder {
  embed(text: string): Promise<number[]>;
}
