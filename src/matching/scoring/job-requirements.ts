import { JobRequirement, RequirementOverrides } from "../../shared/types/job.types";
import {
  MatchingVocabulary,
  containsPhrase,
  normalizeVocabularyText,
  phrasePattern,
} from "../vocabulary";

const EXPERIENCE_PATTERNS: ReadonlyArray<RegExp> = [
  /(\d+(?:\.\d+)?)\+?\s*(?:-\s*\d+\s*)?years?\s+(?:of\s+)?(?:[a-z-]+\s+){0,2}experience/,
  /experience[:\s]+(\d+(?:\.\d+)?)\+?\s*years?/,
  /minimum\s+(?:of\s+)?(\d+(?:\.\d+)?)\+?\s*years?/,
  /at\s+least\s+(\d+(?:\.\d+)?)\+?\s*years?/,
];

/**
 * Derives the structured requirement for a job description. Pure: the same text,
 * vocabulary and overrides always produce the same requirement.
 */
export function deriveJobRequirement(
  jobText: string,
  vocabulary: MatchingVocabulary,
  overrides?: RequirementOverrides,
): JobRequirement {
  const requiredSkills =
    overrides?.requiredSkills !== undefined
      ? [...overrides.requiredSkills]
      : extractSkillsFromText(jobText, vocabulary);
  const requiredExperienceYears =
    overrides?.requiredExperience !== undefined
      ? overrides.requiredExperience
      : extractRequiredExperience(jobText);
  const requiredDegree =
    overrides?.requiredDegree !== undefined
      ? overrides.requiredDegree
      : extractRequiredDegree(jobText, vocabulary);

  return {
    requiredSkills,
    requiredExperienceYears,
    requiredDegree,
  };
}

export function extractSkillsFromText(text: string, vocabulary: MatchingVocabulary): string[] {
  const normalized = normalizeVocabularyText(text);
  const found: string[] = [];
  for (const skill of vocabulary.skills) {
    if (found.includes(skill.display)) {
      continue;
    }
    if (containsPhrase(normalized, skill.phrase)) {
      found.push(skill.display);
    }
  }
  return found;
}

export function extractRequiredExperience(text: string): number | undefined {
  const lowered = normalizeVocabularyText(text);
  for (const pattern of EXPERIENCE_PATTERNS) {
    const match = pattern.exec(lowered);
    if (match) {
      const years = Number(match[1]);
      if (Number.isFinite(years)) {
        return years;
      }
    }
  }
  return undefined;
}

/**
 * A degree counts as required only when it appears in a requirement context on the
 * same line: "required"/"requires" around it, "must have" before it or "degree" after it.
 * Levels are scanned from the highest rank down.
 */
export function extractRequiredDegree(text: string, vocabulary: MatchingVocabulary): string | undefined {
  const lines = text
    .toLowerCase()
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0);
  if (lines.length === 0) {
    return undefined;
  }

  const levels = [...vocabulary.degreeLevels].sort((left, right) => right.rank - left.rank);
  for (const level of levels) {
    for (const alias of level.requirementAliases) {
      const aliasSource = phrasePattern(alias).source;
      const contexts = [
        new RegExp(`require[ds]?.*${aliasSource}`),
        new RegExp(`${aliasSource}.*require[ds]?`),
        new RegExp(`must have.*${aliasSource}`),
        new RegExp(`${aliasSource}.*degree`),
      ];
      if (lines.some((line) => contexts.some((context) => context.test(line)))) {
        return level.display;
      }
    }
  }
  return undefined;
}
