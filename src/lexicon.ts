import type { EpisodicMetadata, MemoryType, ProceduralMetadata } from "./types.js";

export interface SignalFamily {
  readonly name: string;
  readonly type: MemoryType;
  /** Contributed at most once per text, however often the family matches. */
  readonly weight: number;
  readonly patterns: readonly RegExp[];
}

export interface DomainRule {
  readonly keyword: string;
  readonly domain: string;
  readonly category: string;
}

export interface ContextBucket {
  readonly context: string;
  readonly pattern: RegExp;
}

export interface SkillMarker {
  readonly level: ProceduralMetadata["skill_level"];
  readonly pattern: RegExp;
}

export interface ComplexityThreshold {
  readonly steps: number;
  readonly imperatives: number;
}

/**
 * Every table and tunable constant the classifier and metadata generator read.
 * Built once, frozen, and shared by reference.
 */
export interface Lexicon {
  readonly families: readonly SignalFamily[];
  /** Winning score below this forces semantic with zero confidence. */
  readonly activationThreshold: number;
  /** Top-two score gap below this flags the result as ambiguous. */
  readonly ambiguityMargin: number;
  /** Ordered; first keyword found in the text wins. */
  readonly domains: readonly DomainRule[];
  readonly verificationMarkers: RegExp;
  /** Ordered; the bucket with most hits wins, earlier buckets win ties. */
  readonly episodicContexts: readonly ContextBucket[];
  readonly completionVerbs: RegExp;
  readonly sentiment: Readonly<Record<Exclude<EpisodicMetadata["emotional_valence"], "neutral">, RegExp>>;
  /** Ordered; first match wins, "intermediate" otherwise. */
  readonly skillMarkers: readonly SkillMarker[];
  readonly complexity: Readonly<Record<"high" | "medium", ComplexityThreshold>>;
}

export const IMPERATIVE_FAMILY = "imperative_verbs";
export const SEQUENTIAL_FAMILY = "sequential_markers";

const WEEKDAYS = "monday|tuesday|wednesday|thursday|friday|saturday|sunday";

const FAMILIES: readonly SignalFamily[] = [
  // Episodic
  {
    name: "temporal_markers",
    type: "episodic",
    weight: 3.0,
    patterns: [
      /\b(yesterday|today|tonight|ago|during|earlier\s+today|this\s+morning)\b/i,
      /\blast\s+(night|week|month|year|time|sprint|quarter)\b/i,
      new RegExp(`\\b(on|last)\\s+(${WEEKDAYS})\\b`, "i"),
    ],
  },
  {
    name: "experience_phrases",
    type: "episodic",
    weight: 2.5,
    patterns: [
      /\b(i|we)\s+(fixed|discovered|found|learned|realized|noticed|saw|met|debugged|tried|spent|worked|went|had|decided)\b/i,
    ],
  },
  {
    name: "completed_actions",
    type: "episodic",
    weight: 2.0,
    patterns: [/\b(resolved|deployed|finished|completed|fixed|shipped|launched|happened|attended|migrated)\b/i],
  },

  // Procedural
  {
    name: "process_vocabulary",
    type: "procedural",
    weight: 3.0,
    patterns: [/\b(steps?|procedure|process|how\s+to|workflow|instructions?|checklist|runbook)\b/i],
  },
  {
    name: IMPERATIVE_FAMILY,
    type: "procedural",
    weight: 2.0,
    patterns: [
      /\b(run|execute|configure|deploy|install|check|update|restart|open|click|create|build|enter|select|copy|remove|verify|set\s+up)\b/i,
    ],
  },
  {
    name: SEQUENTIAL_FAMILY,
    type: "procedural",
    weight: 2.5,
    patterns: [
      /(?:^|\s)\d{1,2}[.)](?=\s|$)/,
      /\b(first|firstly|secondly|thirdly|then|next|finally|afterwards|lastly)\b/i,
    ],
  },

  // Semantic
  {
    name: "definitional_verbs",
    type: "semantic",
    weight: 2.5,
    patterns: [/\b(enables|provides|supports|allows|represents|refers\s+to|consists\s+of|is\s+an?|are\s+an?)\b/i],
  },
  {
    name: "technical_nouns",
    type: "semantic",
    weight: 1.5,
    patterns: [
      /\b(database|algorithm|framework|library|protocol|api|language|extension|index|vector|architecture|data\s+structure|compiler|schema)\b/i,
    ],
  },
  {
    name: "definition_markers",
    type: "semantic",
    weight: 2.0,
    patterns: [/\b(definition|defined\s+as|concept|specification|principle|theorem|known\s+as)\b/i],
  },
];

const DOMAINS: readonly DomainRule[] = [
  { keyword: "postgresql", domain: "technology", category: "database" },
  { keyword: "mysql", domain: "technology", category: "database" },
  { keyword: "sqlite", domain: "technology", category: "database" },
  { keyword: "redis", domain: "technology", category: "database" },
  { keyword: "database", domain: "technology", category: "database" },
  { keyword: "sql", domain: "technology", category: "database" },
  { keyword: "docker", domain: "technology", category: "infrastructure" },
  { keyword: "kubernetes", domain: "technology", category: "infrastructure" },
  { keyword: "terraform", domain: "technology", category: "infrastructure" },
  { keyword: "server", domain: "technology", category: "infrastructure" },
  { keyword: "typescript", domain: "technology", category: "programming" },
  { keyword: "javascript", domain: "technology", category: "programming" },
  { keyword: "python", domain: "technology", category: "programming" },
  { keyword: "rust", domain: "technology", category: "programming" },
  { keyword: "api", domain: "technology", category: "integration" },
  { keyword: "http", domain: "technology", category: "networking" },
  { keyword: "encryption", domain: "security", category: "cryptography" },
  { keyword: "authentication", domain: "security", category: "identity" },
  { keyword: "vulnerability", domain: "security", category: "vulnerabilities" },
  { keyword: "machine learning", domain: "ai", category: "machine_learning" },
  { keyword: "neural network", domain: "ai", category: "deep_learning" },
  { keyword: "embedding", domain: "ai", category: "machine_learning" },
  { keyword: "llm", domain: "ai", category: "language_models" },
  { keyword: "algorithm", domain: "computer_science", category: "algorithms" },
  { keyword: "budget", domain: "business", category: "finance" },
  { keyword: "revenue", domain: "business", category: "finance" },
  { keyword: "marketing", domain: "business", category: "marketing" },
  { keyword: "exercise", domain: "health", category: "fitness" },
  { keyword: "nutrition", domain: "health", category: "nutrition" },
];

const EPISODIC_CONTEXTS: readonly ContextBucket[] = [
  { context: "debugging_session", pattern: /\b(debug(ging)?|bug|stack\s+trace|exception|error|breakpoint)\b/i },
  { context: "incident", pattern: /\b(incident|outage|downtime|postmortem|on-call|pager)\b/i },
  { context: "meeting", pattern: /\b(meeting|standup|call|sync|retro(spective)?|1:1)\b/i },
  { context: "deployment", pattern: /\b(deploy(ed|ment)?|release[d]?|rollout|rollback)\b/i },
  { context: "learning", pattern: /\b(learned|tutorial|course|workshop|conference|talk)\b/i },
];

const SKILL_MARKERS: readonly SkillMarker[] = [
  { level: "expert", pattern: /\b(expert|mastery)\b/i },
  { level: "advanced", pattern: /\b(advanced|in-depth|complex)\b/i },
  { level: "beginner", pattern: /\b(beginner|basic|introductory|getting\s+started)\b/i },
];

function freezeAll<T>(items: readonly T[]): readonly T[] {
  for (const item of items) Object.freeze(item);
  return Object.freeze(items);
}

export const DEFAULT_LEXICON: Lexicon = Object.freeze({
  families: freezeAll(FAMILIES.map((f) => ({ ...f, patterns: Object.freeze([...f.patterns]) }))),
  activationThreshold: 0.05,
  ambiguityMargin: 0.1,
  domains: freezeAll(DOMAINS),
  verificationMarkers: /\b(verified|confirmed|official\s+docs?)\b/i,
  episodicContexts: freezeAll(EPISODIC_CONTEXTS),
  completionVerbs: /\b(resolved|fixed|solved|finished|completed|deployed|shipped|succeeded|closed)\b/i,
  sentiment: Object.freeze({
    positive: /\b(great|happy|glad|relieved|excited|success(ful)?|love[d]?|smooth(ly)?)\b/i,
    negative: /\b(frustrat(ed|ing)|angry|annoyed|stressful|painful|sad|disappoint(ed|ing)|awful|terrible)\b/i,
  }),
  skillMarkers: freezeAll(SKILL_MARKERS),
  complexity: Object.freeze({
    high: Object.freeze({ steps: 7, imperatives: 8 }),
    medium: Object.freeze({ steps: 3, imperatives: 4 }),
  }),
});

/** Sum of family weights per type: the score a text would reach by matching every family. */
export function maxAttainableScores(families: readonly SignalFamily[]): Record<MemoryType, number> {
  const totals: Record<MemoryType, number> = { semantic: 0, procedural: 0, episodic: 0 };
  for (const family of families) {
    totals[family.type] += family.weight;
  }
  return totals;
}
