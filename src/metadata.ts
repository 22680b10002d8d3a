import { clampUnit, type ClassificationResult } from "./classifier.js";
import { DEFAULT_LEXICON, IMPERATIVE_FAMILY, SEQUENTIAL_FAMILY, type Lexicon } from "./lexicon.js";
import { SignalExtractor, countMatches, familyMatches } from "./signals.js";
import type {
  EpisodicMetadata,
  ProceduralMetadata,
  SemanticMetadata,
  TypedMetadata,
} from "./types.js";

export interface MetadataOptions {
  /** Episodic timestamp override; ISO-8601. */
  timestamp?: string;
  /** Procedural success rate, only ever caller-supplied. */
  successRate?: number;
  now?: Date;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Derives type-specific metadata from content and its classification.
 * The returned shape always matches `result.type`.
 */
export class MetadataGenerator {
  private readonly lexicon: Lexicon;
  private readonly extractor: SignalExtractor;
  private readonly domainPatterns: ReadonlyArray<{ pattern: RegExp; domain: string; category: string }>;

  constructor(lexicon: Lexicon = DEFAULT_LEXICON) {
    this.lexicon = lexicon;
    this.extractor = new SignalExtractor(lexicon.families);
    this.domainPatterns = lexicon.domains.map(({ keyword, domain, category }) => ({
      pattern: new RegExp(`\\b${escapeRegExp(keyword).replace(/\s+/g, "\\s+")}\\b`, "i"),
      domain,
      category,
    }));
  }

  generate(content: string, result: ClassificationResult, options: MetadataOptions = {}): TypedMetadata {
    switch (result.type) {
      case "semantic":
        return { type: "semantic", metadata: this.semantic(content, result) };
      case "episodic":
        return { type: "episodic", metadata: this.episodic(content, options) };
      case "procedural":
        return { type: "procedural", metadata: this.procedural(content, options) };
    }
  }

  private semantic(content: string, result: ClassificationResult): SemanticMetadata {
    const match = this.domainPatterns.find(({ pattern }) => pattern.test(content));
    return {
      domain: match?.domain ?? "general",
      category: match?.category ?? "general",
      confidence: result.confidence,
      verified: this.lexicon.verificationMarkers.test(content),
    };
  }

  private episodic(content: string, options: MetadataOptions): EpisodicMetadata {
    let context = "general";
    let best = 0;
    for (const bucket of this.lexicon.episodicContexts) {
      const hits = countMatches(content, bucket.pattern);
      if (hits > best) {
        best = hits;
        context = bucket.context;
      }
    }

    const positive = countMatches(content, this.lexicon.sentiment.positive);
    const negative = countMatches(content, this.lexicon.sentiment.negative);

    return {
      timestamp: options.timestamp ?? (options.now ?? new Date()).toISOString(),
      context,
      outcome: this.lexicon.completionVerbs.test(content) ? "resolved" : "unresolved",
      emotional_valence: positive > negative ? "positive" : negative > positive ? "negative" : "neutral",
    };
  }

  private procedural(content: string, options: MetadataOptions): ProceduralMetadata {
    const hits = this.extractor.extract(content);
    const steps = familyMatches(hits, "procedural", SEQUENTIAL_FAMILY);
    const imperatives = familyMatches(hits, "procedural", IMPERATIVE_FAMILY);
    const { high, medium } = this.lexicon.complexity;

    const complexity: ProceduralMetadata["complexity"] =
      steps >= high.steps || imperatives >= high.imperatives
        ? "high"
        : steps >= medium.steps || imperatives >= medium.imperatives
          ? "medium"
          : "low";

    const metadata: ProceduralMetadata = {
      skill_level: this.lexicon.skillMarkers.find(({ pattern }) => pattern.test(content))?.level ?? "intermediate",
      complexity,
      steps,
    };
    if (options.successRate !== undefined) {
      metadata.success_rate = clampUnit(options.successRate);
    }
    return metadata;
  }
}

const defaultGenerator = new MetadataGenerator();

/** Generate metadata with the default lexicon. */
export function generateMetadata(
  content: string,
  result: ClassificationResult,
  options?: MetadataOptions,
): TypedMetadata {
  return defaultGenerator.generate(content, result, options);
}
