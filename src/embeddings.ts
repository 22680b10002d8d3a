import { EmbeddingError } from "./errors.js";
import type { Embedder, EmbeddingConfig } from "./types.js";

/**
 * HTTP embedding client.
 * Speaks both OpenAI-compatible (/v1/embeddings) and Ollama (/api/embed) endpoints.
 */
export class HttpEmbeddings implements Embedder {
  private readonly url: string;
  private readonly model: string;
  private readonly isOllama: boolean;
  private cache = new Map<string, number[]>();
  private readonly maxCache = 512;

  constructor(config: EmbeddingConfig) {
    this.url = config.url;
    this.model = config.model;
    this.isOllama = config.url.includes("/api/embed");
  }

  /**
   * Generate an embedding vector for the given text.
   */
  async embed(text: string): Promise<number[]> {
    const cached = this.cache.get(text);
    if (cached) return [...cached];

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: this.model, input: text }),
    });
    if (!res.ok) {
      throw new EmbeddingError(`Embedding failed: ${res.status} ${await res.text()}`);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new EmbeddingError(`Embedding response was not valid JSON: ${reason}`);
    }
    const vector = this.parseVector(json);

    if (this.cache.size >= this.maxCache) {
      // Map iterates in insertion order, so the first key is the oldest
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(text, vector);

    return [...vector];
  }

  private parseVector(json: unknown): number[] {
    if (typeof json === "object" && json !== null) {
      // Ollama: { embeddings: [[...]] }
      if (this.isOllama && "embeddings" in json && Array.isArray(json.embeddings)) {
        return toVector(json.embeddings[0]);
      }
      // OpenAI: { data: [{ embedding: [...] }] }
      if ("data" in json && Array.isArray(json.data)) {
        const first: unknown = json.data[0];
        if (typeof first === "object" && first !== null && "embedding" in first) {
          return toVector(first.embedding);
        }
      }
      // Single: { embedding: [...] }
      if ("embedding" in json) {
        return toVector(json.embedding);
      }
    }
    throw new EmbeddingError(`Unexpected embedding response format: ${JSON.stringify(json).slice(0, 200)}`);
  }
}

function toVector(value: unknown): number[] {
  if (!Array.isArray(value) || value.length === 0 || !value.every((v): v is number => typeof v === "number")) {
    throw new EmbeddingError("Embedding response did not contain a numeric vector");
  }
  return value;
}

/**
 * Compute cosine similarity between two vectors.
 * Returns a value between -1 and 1, where 1 means identical direction.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(
      `Vector dimension mismatch: ${a.length} vs ${b.length}`
    );
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

/** Cosine similarity mapped onto [0, 1] for ranking: opposite or orthogonal vectors score 0. */
export function similarityScore(a: number[], b: number[]): number {
  return Math.max(0, Math.min(1, cosineSimilarity(a, b)));
}
