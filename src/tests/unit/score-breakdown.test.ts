import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { freezeBreakdown, fromScoreRecord, toScoreRecord } from "../../matching/scoring/score-breakdown";
import { ScoreBreakdown } from "../../shared/types/scoring.types";

const BREAKDOWN: ScoreBreakdown = {
  skillMatchScore: 0.5,
  experienceScore: 1.2,
  educationScore: 0,
  semanticSimilarityScore: 0.4,
  finalScore: 0.575,
  matchedSkills: ["Python"],
  missingSkills: ["Go"],
  experienceYears: 7,
  requiredExperience: 5,
  hasRequiredDegree: false,
  semanticSource: "embedding",
};

describe("score breakdown records", () => {
  it("flattens a breakdown into snake_case keys", () => {
    assert.deepEqual(toScoreRecord(BREAKDOWN), {
      skill_match_score: 0.5,
      experience_score: 1.2,
      education_score: 0,
      semantic_similarity_score: 0.4,
      final_score: 0.575,
      matched_skills: ["Python"],
      missing_skills: ["Go"],
      experience_years: 7,
      required_experience: 5,
      has_required_degree: false,
      semantic_source: "embedding",
    });
  });

  it("rebuilds an equal frozen breakdown from its record", () => {
    const rebuilt = fromScoreRecord(JSON.parse(JSON.stringify(toScoreRecord(BREAKDOWN))));
    assert.deepEqual(rebuilt, BREAKDOWN);
    assert.ok(Object.isFrozen(rebuilt));
  });

  it("treats absent experience fields as null and unknown sources as lexical", () => {
    const record = {
      ...toScoreRecord(BREAKDOWN),
      experience_years: undefined,
      required_experience: null,
      semantic_source: "other",
    };
    const rebuilt = fromScoreRecord(record);
    assert.equal(rebuilt.experienceYears, null);
    assert.equal(rebuilt.requiredExperience, null);
    assert.equal(rebuilt.semanticSource, "lexical");
  });

  it("rejects malformed records", () => {
    assert.throws(() => fromScoreRecord(null), /must be an object/);
    assert.throws(
      () => fromScoreRecord({ ...toScoreRecord(BREAKDOWN), final_score: "0.5" }),
      /final_score must be a finite number/,
    );
    assert.throws(
      () => fromScoreRecord({ ...toScoreRecord(BREAKDOWN), matched_skills: [1] }),
      /matched_skills must be a list of strings/,
    );
    assert.throws(
      () => fromScoreRecord({ ...toScoreRecord(BREAKDOWN), has_required_degree: "no" }),
      /has_required_degree must be a boolean/,
    );
  });

  it("freezes the skill lists with the breakdown", () => {
    const frozen = freezeBreakdown({ ...BREAKDOWN, matchedSkills: ["Rust"], missingSkills: [] });
    assert.ok(Object.isFrozen(frozen.matchedSkills));
    assert.ok(Object.isFrozen(frozen.missingSkills));
  });
});
