import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { Logger, silentLogger } from "../../config/logger";
import { SemanticComparator } from "../../matching/index/text-similarity.index";
import { DEFAULT_SCORING_WEIGHTS, MatchScorer, validateWeights } from "../../matching/scoring/match-scorer";
import { ConfigurationError } from "../../shared/errors";
import { CandidateProfile } from "../../shared/types/candidate.types";

function fixedComparator(value: number): SemanticComparator {
  return {
    async compare() {
      return value;
    },
  };
}

function recordingLogger(): { logger: Logger; warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    logger: {
      ...silentLogger,
      warn(message) {
        warnings.push(message);
      },
    },
  };
}

const AVERY: CandidateProfile = {
  name: "Avery Example",
  skills: ["Python", "Django", "Docker"],
  experienceYears: 6,
  education: [{ degree: "BSc Computer Science" }],
};

describe("MatchScorer", () => {
  it("derives the requirement from the job text and uses lexical similarity without an index", async () => {
    const scorer = new MatchScorer({ logger: silentLogger });
    const breakdown = await scorer.score(
      { skills: ["python"], experienceYears: 2, education: [] },
      "Python developer with 4 years of experience",
    );

    assert.deepEqual(breakdown, {
      skillMatchScore: 1,
      experienceScore: 0.5,
      educationScore: 1,
      semanticSimilarityScore: 0.2,
      finalScore: 0.675,
      matchedSkills: ["python"],
      missingSkills: [],
      experienceYears: 2,
      requiredExperience: 4,
      hasRequiredDegree: true,
      semanticSource: "lexical",
    });
    assert.ok(Object.isFrozen(breakdown));
    assert.ok(Object.isFrozen(breakdown.matchedSkills));
  });

  it("lets the experience bonus carry the final score above 1", async () => {
    const scorer = new MatchScorer({ similarityIndex: fixedComparator(1) });
    const breakdown = await scorer.score(AVERY, "Backend role", {
      requiredSkills: ["Python", "Django"],
      requiredExperience: 5,
      requiredDegree: "Bachelor",
    });

    assert.equal(breakdown.experienceScore, 1.2);
    assert.equal(breakdown.educationScore, 1);
    assert.equal(breakdown.semanticSource, "embedding");
    assert.equal(breakdown.finalScore, 1.05);
  });

  it("clamps similarity from the index into [0, 1]", async () => {
    const overrides = { requiredSkills: [] };
    const high = await new MatchScorer({ similarityIndex: fixedComparator(1.4) }).score(AVERY, "x", overrides);
    const low = await new MatchScorer({ similarityIndex: fixedComparator(-0.2) }).score(AVERY, "x", overrides);
    assert.equal(high.semanticSimilarityScore, 1);
    assert.equal(low.semanticSimilarityScore, 0);
  });

  it("falls back to lexical similarity when the index fails", async () => {
    const { logger, warnings } = recordingLogger();
    const failing: SemanticComparator = {
      async compare() {
        throw new Error("embedding service down");
      },
    };
    const scorer = new MatchScorer({ similarityIndex: failing, logger });
    const breakdown = await scorer.score(
      { summary: "Backend developer", skills: ["Python", "Django"], education: [] },
      "Python backend developer",
      { requiredSkills: [] },
    );

    assert.equal(breakdown.semanticSource, "lexical");
    assert.equal(breakdown.semanticSimilarityScore, 0.75);
    assert.deepEqual(warnings, ["Semantic comparison failed, using lexical similarity"]);
  });

  it("ranks a batch by final score and keeps input order on ties", async () => {
    const scorer = new MatchScorer({ similarityIndex: fixedComparator(0.5), batchConcurrency: 2 });
    const candidates: CandidateProfile[] = [
      { name: "First", skills: ["Go"], education: [] },
      { name: "Second", skills: ["Python", "Go"], education: [] },
      { name: "Third", skills: ["Python"], education: [] },
      { name: "Fourth", skills: [], education: [] },
    ];
    const ranked = await scorer.batchScore(candidates, "Any role", { requiredSkills: ["Python", "Go"] });

    assert.deepEqual(
      ranked.map((item) => [item.candidate.name, item.inputIndex, item.breakdown.finalScore]),
      [
        ["Second", 1, 0.875],
        ["First", 0, 0.7],
        ["Third", 2, 0.7],
        ["Fourth", 3, 0.525],
      ],
    );
  });

  it("returns an empty ranking for an empty batch", async () => {
    const scorer = new MatchScorer();
    assert.deepEqual(await scorer.batchScore([], "Python developer"), []);
  });

  it("rejects weights that do not sum to 1", () => {
    assert.throws(
      () => new MatchScorer({ weights: { skill: 0.5, experience: 0.5, education: 0.5, semantic: 0.5 } }),
      (error: unknown) => error instanceof ConfigurationError && error.message === "Weights must sum to 1.0, got 2.",
    );
  });

  it("rejects negative weights and a non-positive concurrency", () => {
    assert.throws(
      () => validateWeights({ skill: 1.25, experience: -0.25, education: 0, semantic: 0 }),
      ConfigurationError,
    );
    assert.throws(() => new MatchScorer({ batchConcurrency: 0 }), ConfigurationError);
  });

  it("accepts weights within floating point tolerance", () => {
    const weights = validateWeights({ skill: 0.1, experience: 0.2, education: 0.3, semantic: 0.4 });
    assert.deepEqual(weights, { skill: 0.1, experience: 0.2, education: 0.3, semantic: 0.4 });
    assert.deepEqual(new MatchScorer().weights, DEFAULT_SCORING_WEIGHTS);
  });
});
