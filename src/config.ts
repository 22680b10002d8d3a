/**
 * Process configuration, resolved from environment variables.
 */

import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { DEFAULT_RANKING_WEIGHTS, validateRankingWeights, type RankingWeights } from "./ranker.js";

export const DEFAULT_DB_DIR = path.join(os.homedir(), ".cognitive-memory-mcp");

export interface ResolvedConfig {
  dbPath: string;
  embeddingUrl: string;
  embeddingModel: string;
  logLevel: LogLevel;
  rankingWeights: Readonly<RankingWeights>;
}

const optionalNumber = z
  .string()
  .trim()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value === "") return undefined;
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be a number, got: "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

const envSchema = z.object({
  MEMORY_DB_PATH: z.string().min(1).optional(),
  EMBEDDING_URL: z.string().url().optional(),
  EMBEDDING_MODEL: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  RANK_WEIGHT_SIMILARITY: optionalNumber,
  RANK_WEIGHT_TYPE: optionalNumber,
  RANK_WEIGHT_TEMPORAL: optionalNumber,
  RANK_WEIGHT_IMPORTANCE: optionalNumber,
});

/**
 * Resolve configuration from the environment. Throws ConfigError for
 * malformed values and RankingConfigError for weights that do not sum to 1.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${issue.path.join(".")}: ${issue.message}`);
  }
  const cfg = parsed.data;

  const rankingWeights = validateRankingWeights({
    similarity: cfg.RANK_WEIGHT_SIMILARITY ?? DEFAULT_RANKING_WEIGHTS.similarity,
    typeRelevance: cfg.RANK_WEIGHT_TYPE ?? DEFAULT_RANKING_WEIGHTS.typeRelevance,
    temporal: cfg.RANK_WEIGHT_TEMPORAL ?? DEFAULT_RANKING_WEIGHTS.temporal,
    importance: cfg.RANK_WEIGHT_IMPORTANCE ?? DEFAULT_RANKING_WEIGHTS.importance,
  });

  return {
    dbPath: cfg.MEMORY_DB_PATH ?? path.join(DEFAULT_DB_DIR, "memories.db"),
    embeddingUrl: cfg.EMBEDDING_URL ?? "http://localhost:11434/api/embed",
    embeddingModel: cfg.EMBEDDING_MODEL ?? "nomic-embed-text",
    logLevel: cfg.LOG_LEVEL ?? "info",
    rankingWeights,
  };
}
