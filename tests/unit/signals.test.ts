import { describe, it, expect } from "vitest";
import { SignalExtractor, countMatches, familyMatches, totalWeights } from "../../src/signals.js";
import { DEFAULT_LEXICON, maxAttainableScores, type SignalFamily } from "../../src/lexicon.js";

describe("SignalExtractor", () => {
  const extractor = new SignalExtractor();

  it("reports every family with zero weight for empty content", () => {
    const hits = extractor.extract("");
    expect(hits.episodic.map((h) => h.family)).toEqual(["temporal_markers", "experience_phrases", "completed_actions"]);
    expect(hits.procedural.map((h) => h.family)).toEqual(["process_vocabulary", "imperative_verbs", "sequential_markers"]);
    expect(hits.semantic.map((h) => h.family)).toEqual(["definitional_verbs", "technical_nouns", "definition_markers"]);
    for (const list of Object.values(hits)) {
      for (const hit of list) {
        expect(hit.weight).toBe(0);
        expect(hit.matches).toBe(0);
      }
    }
  });

  it("contributes a family's weight once however often it repeats", () => {
    const hits = extractor.extract("step step step step");
    const process = hits.procedural.find((h) => h.family === "process_vocabulary");
    expect(process).toEqual({ family: "process_vocabulary", weight: 3, matches: 4 });
    expect(totalWeights(hits).procedural).toBe(3);
  });

  it("counts numbered list markers and imperatives", () => {
    const hits = extractor.extract("1. Check logs 2. Update config 3. Deploy");
    expect(familyMatches(hits, "procedural", "sequential_markers")).toBe(3);
    expect(familyMatches(hits, "procedural", "imperative_verbs")).toBe(3);
    expect(totalWeights(hits)).toEqual({ semantic: 0, procedural: 4.5, episodic: 0 });
  });

  it("does not read decimals as list markers", () => {
    const hits = extractor.extract("version 2.5 is out");
    expect(familyMatches(hits, "procedural", "sequential_markers")).toBe(0);
  });

  it("matches episodic temporal markers and completed actions", () => {
    const hits = extractor.extract("Fixed the outage yesterday during the incident call");
    expect(totalWeights(hits)).toEqual({ semantic: 0, procedural: 0, episodic: 5 });
  });

  it("matches semantic definitional verbs and technical nouns", () => {
    const hits = extractor.extract("PostgreSQL supports vector similarity via an extension");
    const technical = hits.semantic.find((h) => h.family === "technical_nouns");
    expect(technical?.matches).toBe(2);
    expect(totalWeights(hits).semantic).toBe(4);
  });

  it("uses an injected family table", () => {
    const families: SignalFamily[] = [
      { name: "greeting", type: "episodic", weight: 1, patterns: [/\bhello\b/i] },
    ];
    const hits = new SignalExtractor(families).extract("Hello hello");
    expect(hits.episodic).toEqual([{ family: "greeting", weight: 1, matches: 2 }]);
    expect(hits.semantic).toEqual([]);
  });

  it("returns 0 for an unknown family", () => {
    expect(familyMatches(extractor.extract("run it"), "procedural", "nope")).toBe(0);
  });
});

describe("countMatches", () => {
  it("counts every occurrence of a non-global pattern", () => {
    expect(countMatches("a-a-a", /a/)).toBe(3);
  });

  it("leaves a global pattern's lastIndex untouched", () => {
    const pattern = /a/g;
    expect(countMatches("aaa", pattern)).toBe(3);
    expect(pattern.lastIndex).toBe(0);
  });
});

describe("maxAttainableScores", () => {
  it("sums family weights per type", () => {
    expect(maxAttainableScores(DEFAULT_LEXICON.families)).toEqual({
      semantic: 6,
      procedural: 7.5,
      episodic: 7.5,
    });
  });
});

describe("DEFAULT_LEXICON", () => {
  it("is frozen", () => {
    expect(Object.isFrozen(DEFAULT_LEXICON)).toBe(true);
    expect(Object.isFrozen(DEFAULT_LEXICON.families)).toBe(true);
    expect(Object.isFrozen(DEFAULT_LEXICON.families[0])).toBe(true);
  });
});
