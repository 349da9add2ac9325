import { readFileSync } from "node:fs";
import path from "node:path";
import { ConfigurationError } from "../shared/errors";
import { isRecord, toStringArray, toText } from "../shared/utils/values";
import bundledDegrees from "../../data/vocabulary/degrees.v1.json";
import bundledSkills from "../../data/vocabulary/skills.v1.json";

const SKILLS_FILE = "skills.v1.json";
const DEGREES_FILE = "degrees.v1.json";

export interface SkillEntry {
  phrase: string;
  display: string;
}

export interface DegreeLevel {
  key: string;
  display: string;
  rank: number;
  aliases: string[];
  /** Aliases that mark a degree requirement when found in a job description. */
  requirementAliases: string[];
}

export interface MatchingVocabulary {
  skillsVersion: string;
  degreesVersion: string;
  skills: SkillEntry[];
  degreeLevels: DegreeLevel[];
}

let defaultVocabulary: MatchingVocabulary | null = null;

export function loadMatchingVocabulary(directory: string): MatchingVocabulary {
  const skillsRaw = readJsonFile(path.join(directory, SKILLS_FILE));
  const degreesRaw = readJsonFile(path.join(directory, DEGREES_FILE));
  return parseMatchingVocabulary(skillsRaw, degreesRaw);
}

export function getDefaultVocabulary(): MatchingVocabulary {
  if (!defaultVocabulary) {
    defaultVocabulary = loadBundledVocabulary();
  }
  return defaultVocabulary;
}

/** Parses the vocabulary compiled into the module graph; independent of the working directory. */
export function loadBundledVocabulary(): MatchingVocabulary {
  return parseMatchingVocabulary(bundledSkills, bundledDegrees);
}

export function parseMatchingVocabulary(skillsRaw: unknown, degreesRaw: unknown): MatchingVocabulary {
  if (!isRecord(skillsRaw) || !Array.isArray(skillsRaw.skills)) {
    throw new ConfigurationError("Skill vocabulary must be an object with a skills array.");
  }
  if (!isRecord(degreesRaw) || !Array.isArray(degreesRaw.levels)) {
    throw new ConfigurationError("Degree vocabulary must be an object with a levels array.");
  }

  const skills = skillsRaw.skills.map((item, index): SkillEntry => {
    if (!isRecord(item) || !toText(item.phrase) || !toText(item.display)) {
      throw new ConfigurationError(`Invalid skill vocabulary entry at index ${index}.`);
    }
    return {
      phrase: normalizePhrase(toText(item.phrase)),
      display: toText(item.display),
    };
  });

  const degreeLevels = degreesRaw.levels.map((item, index): DegreeLevel => {
    if (!isRecord(item) || !toText(item.key) || !toText(item.display)) {
      throw new ConfigurationError(`Invalid degree vocabulary entry at index ${index}.`);
    }
    const rank = Number(item.rank);
    if (!Number.isFinite(rank) || rank <= 0) {
      throw new ConfigurationError(`Degree level ${toText(item.key)} has an invalid rank.`);
    }
    const aliases = toStringArray(item.aliases).map(normalizePhrase);
    if (aliases.length === 0) {
      throw new ConfigurationError(`Degree level ${toText(item.key)} has no aliases.`);
    }
    return {
      key: toText(item.key),
      display: toText(item.display),
      rank,
      aliases,
      requirementAliases: toStringArray(item.requirementAliases).map(normalizePhrase),
    };
  });

  return {
    skillsVersion: toText(skillsRaw.version) || "unversioned",
    degreesVersion: toText(degreesRaw.version) || "unversioned",
    skills,
    degreeLevels,
  };
}

/**
 * Lowercases and collapses whitespace so that phrase lookups work on one canonical form.
 */
export function normalizeVocabularyText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Whole-token phrase lookup. A phrase matches only when it is not glued to a
 * letter, digit, `+` or `#` on either side, so `ma` never matches inside `diploma`.
 */
export function containsPhrase(normalizedText: string, phrase: string): boolean {
  return phrasePattern(phrase).test(normalizedText);
}

export function phrasePattern(phrase: string, flags = ""): RegExp {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
  return new RegExp(`(?<![a-z0-9+#])${escaped}(?![a-z0-9+#])`, flags);
}

/**
 * Highest degree level any alias in the text resolves to, or null when nothing matches.
 */
export function resolveDegreeLevel(text: string, vocabulary: MatchingVocabulary): DegreeLevel | null {
  const normalized = normalizeVocabularyText(text);
  if (!normalized) {
    return null;
  }
  let best: DegreeLevel | null = null;
  for (const level of vocabulary.degreeLevels) {
    if (best !== null && level.rank <= best.rank) {
      continue;
    }
    if (level.aliases.some((alias) => containsPhrase(normalized, alias))) {
      best = level;
    }
  }
  return best;
}

export function resolveDegreeRank(text: string, vocabulary: MatchingVocabulary): number | null {
  return resolveDegreeLevel(text, vocabulary)?.rank ?? null;
}

function normalizePhrase(value: string): string {
  return normalizeVocabularyText(value);
}

function readJsonFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read vocabulary file ${filePath}: ${error instanceof Error ? error.message : "Unknown error"}`,
    );
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new ConfigurationError(`Vocabulary file ${filePath} is not valid JSON.`);
  }
}
