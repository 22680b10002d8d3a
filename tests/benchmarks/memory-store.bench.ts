import { bench, describe, beforeAll, vi } from "vitest";
import { createMockEmbeddings } from "../helpers/mock-embeddings.js";

// Mock fs so MemoryStore never touches disk (same pattern as unit tests)
vi.mock("fs", () => ({
  default: {
    existsSync: vi.fn().mockReturnValue(false),
    mkdirSync: vi.fn(),
    writeFileSync: vi.fn(),
    readFileSync: vi.fn(),
  },
  existsSync: vi.fn().mockReturnValue(false),
  mkdirSync: vi.fn(),
  writeFileSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { MemoryStore } from "../../src/memory-store.js";

// ── Helpers ──────────────────────────────────────────────────────────────

const TEMPLATES = [
  (i: number) => `Redis provides an in-memory index for cache entry ${i}`,
  (i: number) => `Yesterday we fixed incident ${i} during the on-call shift`,
  (i: number) => `How to rotate key ${i}: 1. open the vault 2. create a key 3. restart the service`,
];

async function createStore(): Promise<MemoryStore> {
  const store = new MemoryStore({ dbPath: "/fake/bench.db" }, { embedder: createMockEmbeddings() });
  await store.init();
  return store;
}

async function populateStore(store: MemoryStore, count: number): Promise<string[]> {
  const ids: string[] = [];
  for (let i = 0; i < count; i++) {
    const { memory } = await store.save(TEMPLATES[i % TEMPLATES.length](i), { importance: (i % 10) / 10 });
    ids.push(memory.id);
  }
  return ids;
}

// ── Save Operations ──────────────────────────────────────────────────────

describe("save - single memory", () => {
  let counter = 0;

  bench("store.save()", async () => {
    const store = await createStore();
    await store.save(`bench-save-single-${counter++}`);
  });
});

describe("save - batch at scale", () => {
  for (const size of [10, 100]) {
    bench(`save ${size} memories sequentially`, async () => {
      const store = await createStore();
      await populateStore(store, size);
    }, { time: 1000 });
  }

  bench("save 500 memories sequentially", async () => {
    const store = await createStore();
    await populateStore(store, 500);
  }, { time: 5000, iterations: 1 });
});

// ── Contextual Search ───────────────────────────────────────────────────

describe("search - contextual ranking", () => {
  for (const size of [10, 100, 500]) {
    describe(`store size: ${size}`, () => {
      let store: MemoryStore;

      beforeAll(async () => {
        store = await createStore();
        await populateStore(store, size);
      });

      bench("search (limit=5, threshold=0.3)", async () => {
        await store.search("rotate the cache key", { limit: 5, threshold: 0.3 });
      });

      bench("search (episodic, week, importance >= 0.5)", async () => {
        await store.search("incident review", {
          typeFilter: ["episodic"],
          timeframeDays: 7,
          importanceThreshold: 0.5,
          limit: 20,
        });
      });
    });
  }
});

// ── Reads ───────────────────────────────────────────────────────────────

describe("getAll", () => {
  for (const size of [10, 100, 500]) {
    describe(`store size: ${size}`, () => {
      let store: MemoryStore;

      beforeAll(async () => {
        store = await createStore();
        await populateStore(store, size);
      });

      bench(`getAll(${size})`, () => {
        store.getAll(size, 0);
      });
    });
  }
});

describe("getById and recordAccess", () => {
  let store: MemoryStore;
  let ids: string[];

  beforeAll(async () => {
    store = await createStore();
    ids = await populateStore(store, 100);
  });

  bench("getById - existing memory", () => {
    store.getById(ids[50]);
  });

  bench("recordAccess", () => {
    store.recordAccess(ids[25]);
  });
});
