import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from "sql.js";
import { randomUUID, createHash } from "crypto";
import path from "path";
import fs from "fs";
import { similarityScore } from "./embeddings.js";
import { TypeClassifier, clampUnit, type ClassificationResult } from "./classifier.js";
import { MetadataGenerator } from "./metadata.js";
import { ConsolidationScorer } from "./consolidation.js";
import { RetrievalRanker, type RankedMemory } from "./ranker.js";
import { DuplicateMemoryError, InvalidInputError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { z } from "zod";
import {
  memoryTypeSchema,
  typedMetadataSchema,
  type Embedder,
  type MemoryRow,
  type MemoryStoreConfig,
  type MemoryType,
  type QueryContext,
  type SimilarityCandidate,
  type StoredMemory,
  type TypedMetadata,
} from "./types.js";

export interface ClassifyOptions {
  /** Initial importance in [0, 1]; defaults to 0.5. */
  importance?: number;
  /** Fix the type instead of taking the classifier's pick. */
  memoryType?: MemoryType;
  timestamp?: string;
  successRate?: number;
}

export type SaveOptions = ClassifyOptions;

export interface ClassifiedContent {
  classification: ClassificationResult;
  typed: TypedMetadata;
}

export interface SaveResult {
  memory: StoredMemory;
  classification: ClassificationResult;
}

export interface SearchOptions extends Partial<Omit<QueryContext, "typeFilter">> {
  typeFilter?: Iterable<MemoryType>;
  /** Minimum raw similarity for a stored memory to become a candidate. */
  threshold?: number;
  /** Record an access on every returned memory. */
  reinforce?: boolean;
}

export interface StoreDependencies {
  embedder: Embedder;
  /** Also supplies the lexicon metadata is generated from. */
  classifier?: TypeClassifier;
  consolidation?: ConsolidationScorer;
  ranker?: RetrievalRanker;
  logger?: Logger;
}

const embeddingSchema = z.array(z.number());

const COLUMNS =
  "id, content, content_hash, memory_type, confidence, metadata, embedding, importance_score, consolidation_score, access_count, created_at, updated_at, last_accessed";

/**
 * SQLite-backed memory store with local vector search.
 * Uses sql.js (WASM); the database is exported to a file after each write.
 */
export class MemoryStore {
  private db!: SqlJsDatabase;
  private dbPath: string;
  private embeddings: Embedder;
  private classifier: TypeClassifier;
  private metadata: MetadataGenerator;
  private consolidation: ConsolidationScorer;
  private ranker: RetrievalRanker;
  private logger: Logger;
  private initialized = false;

  constructor(config: Partial<MemoryStoreConfig> | undefined, deps: StoreDependencies) {
    this.dbPath = config?.dbPath ?? path.join(process.cwd(), "data", "memories.db");
    this.embeddings = deps.embedder;
    this.logger = deps.logger ?? silentLogger;
    this.classifier = deps.classifier ?? new TypeClassifier({ logger: this.logger });
    this.metadata = new MetadataGenerator(this.classifier.lexicon);
    this.consolidation = deps.consolidation ?? new ConsolidationScorer();
    this.ranker = deps.ranker ?? new RetrievalRanker(undefined, this.logger);
  }

  private contentHash(content: string): string {
    return createHash("sha256").update(content).digest("hex");
  }

  /**
   * Initialize the database. Must be called before any operations.
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const SQL = await initSqlJs();

    // Load existing database or create new one
    if (fs.existsSync(this.dbPath)) {
      const buffer = fs.readFileSync(this.dbPath);
      this.db = new SQL.Database(buffer);
    } else {
      this.db = new SQL.Database();
    }

    this.initializeSchema();
    this.initialized = true;
    this.logger.info("memory store ready", { dbPath: this.dbPath, memories: this.count() });
  }

  private initializeSchema(): void {
    this.db.run(`
      CREATE TABLE IF NOT EXISTS memories (
        id TEXT PRIMARY KEY,
        content TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        memory_type TEXT NOT NULL CHECK (memory_type IN ('semantic', 'episodic', 'procedural')),
        confidence REAL NOT NULL,
        metadata TEXT NOT NULL,
        embedding TEXT NOT NULL,
        importance_score REAL NOT NULL DEFAULT 0.5,
        consolidation_score REAL NOT NULL,
        access_count INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        last_accessed TEXT NOT NULL
      )
    `);
    this.db.run(`CREATE INDEX IF NOT EXISTS idx_memories_created_at ON memories(created_at)`);
    this.db.run(`CREATE INDEX IF NOT EXISTS idx_memories_content_hash ON memories(content_hash)`);
    this.db.run(`CREATE INDEX IF NOT EXISTS idx_memories_memory_type ON memories(memory_type)`);
    this.db.run(`CREATE INDEX IF NOT EXISTS idx_memories_importance ON memories(importance_score)`);
  }

  /** Persist the in-memory database to disk. */
  private persist(): void {
    const data = this.db.export();
    const buffer = Buffer.from(data);
    fs.writeFileSync(this.dbPath, buffer);
  }

  /**
   * Classification and metadata exactly as `save` would store them, without storing.
   */
  classify(content: string, options: ClassifyOptions = {}): ClassifiedContent {
    const classification = this.classifier.classify(content, options.importance);
    const effective: ClassificationResult = options.memoryType
      ? { ...classification, type: options.memoryType, confidence: classification.scores[options.memoryType] }
      : classification;
    const typed = this.metadata.generate(content, effective, {
      timestamp: options.timestamp,
      successRate: options.successRate,
    });
    return { classification: effective, typed };
  }

  /**
   * Classify, describe and embed new content, then store it.
   */
  async save(content: string, options: SaveOptions = {}): Promise<SaveResult> {
    const { classification: effective, typed } = this.classify(content, options);

    const hash = this.contentHash(content);
    const existingId = this.findIdByHash(hash);
    if (existingId) throw new DuplicateMemoryError(existingId);

    const id = randomUUID();
    const embedding = await this.embeddings.embed(content);
    const now = new Date().toISOString();
    const consolidationScore = this.consolidation.initialConsolidation(typed.type);

    this.db.run(
      `INSERT INTO memories (${COLUMNS})
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        id, content, hash, typed.type, effective.confidence, JSON.stringify(typed.metadata), JSON.stringify(embedding),
        effective.importance, consolidationScore, 0, now, now, now,
      ],
    );
    this.persist();

    this.logger.info("memory saved", { id, type: typed.type, confidence: effective.confidence });

    const memory: StoredMemory = {
      id, content, contentHash: hash, embedding, ...typed,
      confidence: effective.confidence, importanceScore: effective.importance, consolidationScore,
      accessCount: 0, createdAt: now, updatedAt: now, lastAccessed: now,
    };
    return { memory, classification: effective };
  }

  private findIdByHash(hash: string): string | null {
    const dupStmt = this.db.prepare(`SELECT id FROM memories WHERE content_hash = ?`);
    dupStmt.bind([hash]);
    const id = dupStmt.step() ? String(dupStmt.get()[0]) : null;
    dupStmt.free();
    return id;
  }

  private query(sql: string, params: SqlValue[] = []): StoredMemory[] {
    const stmt = this.db.prepare(sql);
    stmt.bind(params);

    const memories: StoredMemory[] = [];
    while (stmt.step()) {
      memories.push(this.rowToMemory(toMemoryRow(stmt.getAsObject())));
    }
    stmt.free();
    return memories;
  }

  /**
   * Retrieve all memories, ordered by most recent first.
   */
  getAll(limit = 100, offset = 0): StoredMemory[] {
    return this.query(`SELECT ${COLUMNS} FROM memories ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`, [limit, offset]);
  }

  /**
   * Get a single memory by ID. Read-only: does not count as an access.
   */
  getById(id: string): StoredMemory | null {
    return this.query(`SELECT ${COLUMNS} FROM memories WHERE id = ?`, [id])[0] ?? null;
  }

  /**
   * Similarity search: every stored memory whose similarity to the query
   * reaches the threshold, most similar first.
   */
  async findSimilar(query: string, threshold = 0): Promise<SimilarityCandidate[]> {
    const queryEmbedding = await this.embeddings.embed(query);

    return this.query(`SELECT ${COLUMNS} FROM memories`)
      .map((memory) => ({ memory, similarity: similarityScore(queryEmbedding, memory.embedding) }))
      .filter((c) => c.similarity >= threshold)
      .sort((a, b) => b.similarity - a.similarity);
  }

  /**
   * Contextual search: similarity candidates re-ranked with type, recency and importance.
   */
  async search(query: string, options: SearchOptions = {}): Promise<RankedMemory[]> {
    const context: QueryContext = {
      typeFilter: new Set(options.typeFilter ?? []),
      timeframeDays: options.timeframeDays,
      importanceThreshold: options.importanceThreshold ?? 0,
      limit: options.limit ?? 5,
    };
    const candidates = await this.findSimilar(query, options.threshold ?? 0);
    const { results, rejected } = this.ranker.rankScored(context, candidates);

    this.logger.debug("contextual search", {
      candidates: candidates.length,
      returned: results.length,
      rejected: rejected.length,
    });

    if (!options.reinforce) return results;

    return results.map((r) => {
      const updated = this.recordAccess(r.memory.id);
      return updated ? { ...r, memory: updated } : r;
    });
  }

  /**
   * Record one access: bumps the access count and recomputes consolidation.
   * Written as a single UPDATE so the read-modify-write stays per memory.
   */
  recordAccess(id: string, now: Date = new Date()): StoredMemory | null {
    const memory = this.getById(id);
    if (!memory) return null;

    const update = this.consolidation.recordAccess(memory, now);
    this.db.run(
      `UPDATE memories SET access_count = ?, last_accessed = ?, consolidation_score = ? WHERE id = ?`,
      [update.accessCount, update.lastAccessed, update.consolidationScore, id],
    );
    this.persist();

    return {
      ...memory,
      accessCount: update.accessCount,
      lastAccessed: update.lastAccessed,
      consolidationScore: update.consolidationScore,
    };
  }

  /**
   * Change a memory's importance. Type and metadata are fixed at creation.
   */
  setImportance(id: string, importance: number): StoredMemory | null {
    if (!Number.isFinite(importance)) throw new InvalidInputError("importance must be a finite number");
    const memory = this.getById(id);
    if (!memory) return null;

    const importanceScore = clampUnit(importance);
    const now = new Date().toISOString();
    this.db.run(`UPDATE memories SET importance_score = ?, updated_at = ? WHERE id = ?`, [importanceScore, now, id]);
    this.persist();
    return { ...memory, importanceScore, updatedAt: now };
  }

  /**
   * Delete a memory by ID.
   */
  delete(id: string): boolean {
    const before = this.count();
    this.db.run(`DELETE FROM memories WHERE id = ?`, [id]);
    const after = this.count();
    if (before !== after) {
      this.persist();
      return true;
    }
    return false;
  }

  /**
   * Delete all memories.
   */
  deleteAll(): number {
    const before = this.count();
    this.db.run(`DELETE FROM memories`);
    this.persist();
    return before;
  }

  /**
   * Get total memory count.
   */
  count(): number {
    const stmt = this.db.prepare(`SELECT COUNT(*) FROM memories`);
    stmt.step();
    const total = Number(stmt.get()[0]);
    stmt.free();
    return total;
  }

  countByType(): Record<MemoryType, number> {
    const counts: Record<MemoryType, number> = { semantic: 0, procedural: 0, episodic: 0 };
    const stmt = this.db.prepare(`SELECT memory_type, COUNT(*) FROM memories GROUP BY memory_type`);
    while (stmt.step()) {
      const [type, total] = stmt.get();
      const parsed = memoryTypeSchema.safeParse(type);
      if (parsed.success) counts[parsed.data] = Number(total);
    }
    stmt.free();
    return counts;
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.persist();
    this.db.close();
  }

  private rowToMemory(row: MemoryRow): StoredMemory {
    const typed = typedMetadataSchema.parse({ type: row.memory_type, metadata: JSON.parse(row.metadata) });
    return {
      id: row.id,
      content: row.content,
      contentHash: row.content_hash,
      embedding: embeddingSchema.parse(JSON.parse(row.embedding)),
      ...typed,
      confidence: row.confidence,
      importanceScore: row.importance_score,
      consolidationScore: row.consolidation_score,
      accessCount: row.access_count,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      lastAccessed: row.last_accessed,
    };
  }
}

function toMemoryRow(raw: Record<string, SqlValue>): MemoryRow {
  const text = (key: string): string => String(raw[key] ?? "");
  const num = (key: string): number => Number(raw[key] ?? 0);
  return {
    id: text("id"),
    content: text("content"),
    content_hash: text("content_hash"),
    memory_type: text("memory_type"),
    confidence: num("confidence"),
    metadata: text("metadata"),
    embedding: text("embedding"),
    importance_score: num("importance_score"),
    consolidation_score: num("consolidation_score"),
    access_count: num("access_count"),
    created_at: text("created_at"),
    updated_at: text("updated_at"),
    last_accessed: text("last_accessed"),
  };
}
