import { afterEach, describe, it, expect, vi } from "vitest";
import { HttpEmbeddings, cosineSimilarity, similarityScore } from "../../src/embeddings.js";
import { EmbeddingError } from "../../src/errors.js";

describe("cosineSimilarity", () => {
  it("returns 1 for identical vectors", () => {
    const v = [1, 0, 0];
    expect(cosineSimilarity(v, v)).toBeCloseTo(1.0);
  });

  it("returns -1 for opposite vectors", () => {
    expect(cosineSimilarity([1, 0, 0], [-1, 0, 0])).toBeCloseTo(-1.0);
  });

  it("returns 0 for orthogonal vectors", () => {
    expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBeCloseTo(0.0);
  });

  it("returns 0 when one vector is all zeros", () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
  });

  it("throws on dimension mismatch", () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow(
      "Vector dimension mismatch"
    );
  });

  it("computes correct similarity for known values", () => {
    const a = [1, 2, 3];
    const b = [4, 5, 6];
    // dot = 4+10+18 = 32, |a| = sqrt(14), |b| = sqrt(77)
    const expected = 32 / (Math.sqrt(14) * Math.sqrt(77));
    expect(cosineSimilarity(a, b)).toBeCloseTo(expected, 10);
  });

  it("handles 384-dim vectors without error", () => {
    const dim = 384;
    const a = Array.from({ length: dim }, (_, i) => Math.sin(i));
    const b = Array.from({ length: dim }, (_, i) => Math.cos(i));
    const result = cosineSimilarity(a, b);
    expect(result).toBeGreaterThanOrEqual(-1);
    expect(result).toBeLessThanOrEqual(1);
  });
});

describe("similarityScore", () => {
  it("clamps negative similarity to 0", () => {
    expect(similarityScore([1, 0], [-1, 0])).toBe(0);
  });

  it("keeps positive similarity unchanged", () => {
    expect(similarityScore([1, 0], [1, 1])).toBeCloseTo(Math.SQRT1_2, 10);
  });
});

describe("HttpEmbeddings", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function stubFetch(body: unknown, status = 200) {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify(body), { status }));
    vi.stubGlobal("fetch", fetchMock);
    return fetchMock;
  }

  it("posts model and input and reads the Ollama response shape", async () => {
    const fetchMock = stubFetch({ embeddings: [[0.1, 0.2, 0.3]] });
    const embedder = new HttpEmbeddings({ url: "http://localhost:11434/api/embed", model: "test-model" });

    await expect(embedder.embed("hello")).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(fetchMock).toHaveBeenCalledWith("http://localhost:11434/api/embed", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: "test-model", input: "hello" }),
    });
  });

  it("reads the OpenAI response shape", async () => {
    stubFetch({ data: [{ embedding: [1, 2] }] });
    const embedder = new HttpEmbeddings({ url: "http://localhost:8080/v1/embeddings", model: "test-model" });
    await expect(embedder.embed("hello")).resolves.toEqual([1, 2]);
  });

  it("reads a bare embedding field", async () => {
    stubFetch({ embedding: [3, 4] });
    const embedder = new HttpEmbeddings({ url: "http://localhost:8080/embed", model: "test-model" });
    await expect(embedder.embed("hello")).resolves.toEqual([3, 4]);
  });

  it("caches vectors per text", async () => {
    const fetchMock = stubFetch({ embedding: [3, 4] });
    const embedder = new HttpEmbeddings({ url: "http://localhost:8080/embed", model: "test-model" });
    await embedder.embed("same");
    await embedder.embed("same");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("throws EmbeddingError on a failed request", async () => {
    stubFetch({ error: "model not found" }, 404);
    const embedder = new HttpEmbeddings({ url: "http://localhost:11434/api/embed", model: "missing" });
    await expect(embedder.embed("hello")).rejects.toThrow(EmbeddingError);
  });

  it("throws on an unknown response shape", async () => {
    stubFetch({ vectors: [] });
    const embedder = new HttpEmbeddings({ url: "http://localhost:8080/embed", model: "test-model" });
    await expect(embedder.embed("hello")).rejects.toThrow("Unexpected embedding response format");
  });

  it("throws EmbeddingError when a successful response is not JSON", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html>gateway</html>", { status: 200 })));
    const embedder = new HttpEmbeddings({ url: "http://localhost:8080/embed", model: "test-model" });
    const result = embedder.embed("hello");
    await expect(result).rejects.toThrow(EmbeddingError);
    await expect(result).rejects.toThrow(/^Embedding response was not valid JSON: /);
  });

  it("hands out copies so callers cannot corrupt the cache", async () => {
    stubFetch({ embedding: [3, 4] });
    const embedder = new HttpEmbeddings({ url: "http://localhost:8080/embed", model: "test-model" });
    const first = await embedder.embed("a");
    first[0] = 99;
    const second = await embedder.embed("a");
    second[1] = 42;
    await expect(embedder.embed("a")).resolves.toEqual([3, 4]);
  });

  it("throws when the vector is not numeric", async () => {
    stubFetch({ embedding: ["a", "b"] });
    const embedder = new HttpEmbeddings({ url: "http://localhost:8080/embed", model: "test-model" });
    await expect(embedder.embed("hello")).rejects.toThrow("Embedding response did not contain a numeric vector");
  });
});
