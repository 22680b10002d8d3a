import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { MemoryStore } from "./memory-store.js";
import { MEMORY_TYPES, type Memory } from "./types.js";

export const TIMEFRAME_DAYS = {
  day: 1,
  week: 7,
  month: 30,
  year: 365,
} as const;

export interface ServerOptions {
  dbPath?: string;
}

function textResult(value: unknown) {
  return {
    content: [
      {
        type: "text" as const,
        text: typeof value === "string" ? value : JSON.stringify(value, null, 2),
      },
    ],
  };
}

function errorResult(action: string, error: unknown) {
  const msg = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: "text" as const, text: `Error ${action}: ${msg}` }],
    isError: true,
  };
}

function preview(content: string): string {
  return content.length > 120 ? content.slice(0, 120) + "..." : content;
}

function formatMemory(m: Memory) {
  return {
    id: m.id,
    content: m.content,
    memoryType: m.type,
    confidence: m.confidence,
    metadata: m.metadata,
    importance: m.importanceScore,
    consolidation: m.consolidationScore,
    accessCount: m.accessCount,
    createdAt: m.createdAt,
    lastAccessed: m.lastAccessed,
  };
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function createServer(store: MemoryStore, options: ServerOptions = {}): McpServer {
  const server = new McpServer({
    name: "cognitive-memory",
    version: "1.0.0",
  });

  // ─── Tool: save_memory ──────────────────────────────────────────────────────

  server.tool(
    "save_memory",
    "Save information to long-term memory. The content is classified as semantic (facts), episodic (experiences) or procedural (how-to), given type-specific metadata, embedded and indexed for contextual search.",
    {
      content: z.string().describe("The text content to store in memory"),
      importance: z
        .number()
        .min(0)
        .max(1)
        .optional()
        .default(0.5)
        .describe("Importance 0-1 (default: 0.5). Used by contextual ranking and importance thresholds"),
      memory_type: z
        .enum(MEMORY_TYPES)
        .optional()
        .describe("Force a cognitive type instead of classifying the content"),
      timestamp: z.string().datetime().optional().describe("When an episodic memory happened (ISO-8601, defaults to now)"),
      success_rate: z.number().min(0).max(1).optional().describe("Success rate 0-1 of a procedural memory"),
    },
    async ({ content, importance, memory_type, timestamp, success_rate }) => {
      try {
        const { memory, classification } = await store.save(content, {
          importance,
          memoryType: memory_type,
          timestamp,
          successRate: success_rate,
        });
        return textResult({
          status: "saved",
          id: memory.id,
          preview: preview(content),
          memoryType: memory.type,
          confidence: round(memory.confidence),
          ambiguous: classification.warning !== undefined,
          metadata: memory.metadata,
          importance: memory.importanceScore,
          createdAt: memory.createdAt,
        });
      } catch (error) {
        return errorResult("saving memory", error);
      }
    }
  );

  // ─── Tool: classify_memory ──────────────────────────────────────────────────

  server.tool(
    "classify_memory",
    "Classify text into a cognitive memory type without storing it. Returns the type, confidence, per-type scores and the metadata that would be stored.",
    {
      content: z.string().describe("The text to classify"),
    },
    async ({ content }) => {
      try {
        const { classification: result, typed } = store.classify(content);
        return textResult({
          memoryType: result.type,
          confidence: round(result.confidence),
          scores: {
            semantic: round(result.scores.semantic),
            procedural: round(result.scores.procedural),
            episodic: round(result.scores.episodic),
          },
          warning: result.warning?.message ?? null,
          metadata: typed.metadata,
        });
      } catch (error) {
        return errorResult("classifying content", error);
      }
    }
  );

  // ─── Tool: search_memory ────────────────────────────────────────────────────

  server.tool(
    "search_memory",
    "Contextual search over long-term memory. Candidates found by embedding similarity are re-ranked by similarity, memory type, recency and importance.",
    {
      query: z.string().describe("Natural language search query describing what you're looking for"),
      memory_types: z
        .array(z.enum(MEMORY_TYPES))
        .optional()
        .describe("Only return memories of these cognitive types (default: all)"),
      timeframe: z
        .enum(["day", "week", "month", "year"])
        .optional()
        .describe("Prefer memories created within this window"),
      importance_threshold: z
        .number()
        .min(0)
        .max(1)
        .optional()
        .default(0)
        .describe("Drop memories whose importance is below this value (default: 0)"),
      limit: z.number().int().min(1).max(50).optional().default(5).describe("Maximum number of results to return (default: 5)"),
      threshold: z.number().min(0).max(1).optional().default(0.3).describe("Minimum similarity score threshold, 0-1 (default: 0.3)"),
      reinforce: z
        .boolean()
        .optional()
        .default(false)
        .describe("Count returned memories as accessed, reinforcing their consolidation (default: false)"),
    },
    async ({ query, memory_types, timeframe, importance_threshold, limit, threshold, reinforce }) => {
      try {
        const results = await store.search(query, {
          typeFilter: memory_types,
          timeframeDays: timeframe ? TIMEFRAME_DAYS[timeframe] : undefined,
          importanceThreshold: importance_threshold,
          limit,
          threshold,
          reinforce,
        });

        if (results.length === 0) {
          return textResult("No relevant memories found.");
        }

        return textResult(
          results.map((r, i) => ({
            rank: i + 1,
            score: round(r.score),
            similarity: round(r.components.similarity),
            ...formatMemory(r.memory),
          })),
        );
      } catch (error) {
        return errorResult("searching memories", error);
      }
    }
  );

  // ─── Tool: get_memory ───────────────────────────────────────────────────────

  server.tool(
    "get_memory",
    "Retrieve a single memory by ID. Counts as an access unless reinforce is false.",
    {
      id: z.string().uuid().describe("The UUID of the memory"),
      reinforce: z.boolean().optional().default(true).describe("Record this read as an access (default: true)"),
    },
    async ({ id, reinforce }) => {
      try {
        const memory = reinforce ? store.recordAccess(id) : store.getById(id);
        if (!memory) {
          return textResult(`Memory ${id} not found.`);
        }
        return textResult(formatMemory(memory));
      } catch (error) {
        return errorResult("retrieving memory", error);
      }
    }
  );

  // ─── Tool: get_all_memories ─────────────────────────────────────────────────

  server.tool(
    "get_all_memories",
    "Retrieve all stored memories, ordered by most recent first. Results are paginated.",
    {
      limit: z.number().int().min(1).max(500).optional().default(50).describe("Maximum number of memories to return (default: 50)"),
      offset: z.number().int().min(0).optional().default(0).describe("Number of memories to skip for pagination (default: 0)"),
    },
    async ({ limit, offset }) => {
      try {
        const memories = store.getAll(limit, offset).map(formatMemory);
        const total = store.count();
        return textResult({ total, returned: memories.length, offset, memories });
      } catch (error) {
        return errorResult("retrieving memories", error);
      }
    }
  );

  // ─── Tool: update_importance ────────────────────────────────────────────────

  server.tool(
    "update_importance",
    "Change the importance of a memory. Type and metadata are fixed when a memory is created.",
    {
      id: z.string().uuid().describe("The UUID of the memory to update"),
      importance: z.number().min(0).max(1).describe("New importance 0-1"),
    },
    async ({ id, importance }) => {
      try {
        const updated = store.setImportance(id, importance);
        if (!updated) {
          return textResult(`Memory ${id} not found.`);
        }
        return textResult({ status: "updated", id: updated.id, importance: updated.importanceScore, updatedAt: updated.updatedAt });
      } catch (error) {
        return errorResult("updating memory", error);
      }
    }
  );

  // ─── Tool: delete_memory ────────────────────────────────────────────────────

  server.tool(
    "delete_memory",
    "Delete a specific memory by its ID. Only delete when the user explicitly requests it or when a memory is confirmed outdated or incorrect.",
    {
      id: z.string().uuid().describe("The UUID of the memory to delete"),
    },
    async ({ id }) => {
      try {
        const deleted = store.delete(id);
        return textResult(deleted ? `Memory ${id} deleted successfully.` : `Memory ${id} not found.`);
      } catch (error) {
        return errorResult("deleting memory", error);
      }
    }
  );

  // ─── Tool: delete_all_memories ──────────────────────────────────────────────

  server.tool(
    "delete_all_memories",
    "Delete ALL stored memories. This action is irreversible. Only use when the user explicitly asks to clear all memories.",
    {},
    async () => {
      try {
        const count = store.deleteAll();
        return textResult(`Deleted ${count} memories.`);
      } catch (error) {
        return errorResult("deleting memories", error);
      }
    }
  );

  // ─── Tool: memory_stats ─────────────────────────────────────────────────────

  server.tool(
    "memory_stats",
    "Get statistics about the memory store: total count, count per cognitive type and database location.",
    {},
    async () => {
      try {
        return textResult({
          totalMemories: store.count(),
          byType: store.countByType(),
          databasePath: options.dbPath ?? "unknown",
        });
      } catch (error) {
        return errorResult("getting stats", error);
      }
    }
  );

  return server;
}
