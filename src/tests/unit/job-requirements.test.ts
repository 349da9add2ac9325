import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  deriveJobRequirement,
  extractRequiredDegree,
  extractRequiredExperience,
  extractSkillsFromText,
} from "../../matching/scoring/job-requirements";
import { getDefaultVocabulary } from "../../matching/vocabulary";

const vocabulary = getDefaultVocabulary();

const BACKEND_JOB = [
  "Senior Backend Engineer",
  "We need 5+ years of professional experience with Python and Django.",
  "Nice to have: Docker, AWS and PostgreSQL (postgres).",
  "Bachelor's degree in Computer Science required.",
].join("\n");

describe("job requirement derivation", () => {
  it("extracts skills in vocabulary order with display names", () => {
    assert.deepEqual(extractSkillsFromText(BACKEND_JOB, vocabulary), [
      "Python",
      "Django",
      "PostgreSQL",
      "AWS",
      "Docker",
    ]);
  });

  it("does not match skills inside longer words", () => {
    assert.deepEqual(extractSkillsFromText("JavaScript and TypeScript", vocabulary), [
      "JavaScript",
      "TypeScript",
    ]);
  });

  it("reads required experience from common phrasings", () => {
    assert.equal(extractRequiredExperience(BACKEND_JOB), 5);
    assert.equal(extractRequiredExperience("3-5 years experience in support"), 3);
    assert.equal(extractRequiredExperience("Experience: 4 years"), 4);
    assert.equal(extractRequiredExperience("Minimum of 2.5 years in the field"), 2.5);
    assert.equal(extractRequiredExperience("at least 6 years leading teams"), 6);
    assert.equal(extractRequiredExperience("Fast-paced team, great culture"), undefined);
  });

  it("detects a degree only in a requirement context", () => {
    assert.equal(extractRequiredDegree(BACKEND_JOB, vocabulary), "Bachelor");
    assert.equal(extractRequiredDegree("PhD required for this research role", vocabulary), "Doctorate");
    assert.equal(extractRequiredDegree("Must have a Master's in Statistics", vocabulary), "Master");
    assert.equal(extractRequiredDegree("Our founder holds a bachelor from MIT", vocabulary), undefined);
    assert.equal(extractRequiredDegree("", vocabulary), undefined);
  });

  it("lets explicit overrides win over derived values", () => {
    const derived = deriveJobRequirement(BACKEND_JOB, vocabulary);
    assert.deepEqual(derived, {
      requiredSkills: ["Python", "Django", "PostgreSQL", "AWS", "Docker"],
      requiredExperienceYears: 5,
      requiredDegree: "Bachelor",
    });

    const overridden = deriveJobRequirement(BACKEND_JOB, vocabulary, {
      requiredSkills: ["Go"],
      requiredExperience: 0,
      requiredDegree: "Master",
    });
    assert.deepEqual(overridden, {
      requiredSkills: ["Go"],
      requiredExperienceYears: 0,
      requiredDegree: "Master",
    });
  });

  it("is deterministic for the same input", () => {
    assert.deepEqual(
      deriveJobRequirement(BACKEND_JOB, vocabulary),
      deriveJobRequirement(BACKEND_JOB, vocabulary),
    );
  });
});
