import { CandidateProfile, EducationEntry } from "../shared/types/candidate.types";
import { isRecord, toFiniteNumber, toStringArray, toText } from "../shared/utils/values";

/**
 * Builds a frozen candidate profile from an extracted resume record. Accepts both
 * camelCase and snake_case keys; unusable values become empty fields.
 */
export function normalizeCandidateProfile(raw: unknown): CandidateProfile {
  const source = isRecord(raw) ? raw : {};

  const profile: CandidateProfile = {
    skills: normalizeSkills(source.skills),
    education: normalizeEducation(source.education),
  };

  const name = toText(source.name);
  if (name) {
    profile.name = name;
  }
  const email = toText(source.email);
  if (email) {
    profile.email = email;
  }
  const phone = toText(source.phone);
  if (phone) {
    profile.phone = phone;
  }
  const experienceYears = toFiniteNumber(source.experienceYears ?? source.experience_years);
  if (experienceYears !== undefined && experienceYears >= 0) {
    profile.experienceYears = experienceYears;
  }
  const summary = toText(source.summary);
  if (summary) {
    profile.summary = summary;
  }
  const filename = toText(source.filename);
  if (filename) {
    profile.filename = filename;
  }

  Object.freeze(profile.skills);
  profile.education.forEach((entry) => Object.freeze(entry));
  Object.freeze(profile.education);
  return Object.freeze(profile);
}

function normalizeSkills(value: unknown): string[] {
  const seen = new Set<string>();
  const skills: string[] = [];
  for (const skill of toStringArray(value)) {
    const key = skill.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      skills.push(skill);
    }
  }
  return skills;
}

function normalizeEducation(value: unknown): EducationEntry[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const entries: EducationEntry[] = [];
  for (const item of value) {
    if (typeof item === "string") {
      if (item.trim()) {
        entries.push({ degree: item.trim() });
      }
      continue;
    }
    if (!isRecord(item)) {
      continue;
    }
    const degree = toText(item.degree);
    if (!degree) {
      continue;
    }
    const entry: EducationEntry = { degree };
    const year = toFiniteNumber(item.year);
    if (year !== undefined && Number.isInteger(year)) {
      entry.year = year;
    }
    const institution = toText(item.institution);
    if (institution) {
      entry.institution = institution;
    }
    entries.push(entry);
  }
  return entries;
}
