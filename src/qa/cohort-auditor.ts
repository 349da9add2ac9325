import { Logger, silentLogger } from "../config/logger";
import { ConfigurationError } from "../shared/errors";
import { BiasFlag } from "../shared/types/bias.types";
import { CandidateProfile } from "../shared/types/candidate.types";
import { ScoreBreakdown, ScoreRecord } from "../shared/types/scoring.types";
import { round } from "../shared/utils/values";
import { MatchingVocabulary, getDefaultVocabulary, resolveDegreeLevel } from "../matching/vocabulary";
import { BiasReport } from "./bias-report";

export interface CohortAuditorOptions {
  missingFieldThreshold?: number;
  varianceThreshold?: number;
  scoreSpreadThreshold?: number;
  vocabulary?: MatchingVocabulary;
  logger?: Logger;
}

/** Either a live breakdown or its flat persisted record. */
export type AuditedScore = Pick<ScoreBreakdown, "finalScore"> | Pick<ScoreRecord, "final_score">;

export type EducationBucket = "doctorate" | "master" | "bachelor" | "associate" | "other" | "none";

type CriticalField = "name" | "email" | "skills" | "experienceYears";

const CRITICAL_FIELDS: ReadonlyArray<CriticalField> = ["name", "email", "skills", "experienceYears"];
const CRITICAL_MISSING_RATE = 0.5;
const DOMINANT_EDUCATION_RATE = 0.8;
const MIN_SKILLS_PER_CANDIDATE = 3;
const NEAR_PERFECT_SCORE = 0.99;
const NEAR_PERFECT_RATE = 0.3;
const DOMINANT_DOMAIN_RATE = 0.7;
const MIN_PATTERN_COHORT = 5;
const MIN_SCORED_COHORT = 3;
const MIN_POPULATED_FIELDS = 3;
const PUBLIC_EMAIL_DOMAINS: ReadonlySet<string> = new Set([
  "gmail.com",
  "yahoo.com",
  "hotmail.com",
  "outlook.com",
]);

/**
 * Cohort-level data quality and pattern checks. Works only on the structured
 * records and their scores; never infers demographic attributes.
 */
export class CohortAuditor {
  private readonly missingFieldThreshold: number;
  private readonly varianceThreshold: number;
  private readonly scoreSpreadThreshold: number;
  private readonly vocabulary: MatchingVocabulary;
  private readonly logger: Logger;

  constructor(options: CohortAuditorOptions = {}) {
    this.missingFieldThreshold = readThreshold("missingFieldThreshold", options.missingFieldThreshold, 0.3);
    this.varianceThreshold = readThreshold("varianceThreshold", options.varianceThreshold, 0.7);
    this.scoreSpreadThreshold = readThreshold("scoreSpreadThreshold", options.scoreSpreadThreshold, 0.6);
    this.vocabulary = options.vocabulary ?? getDefaultVocabulary();
    this.logger = options.logger ?? silentLogger;
  }

  generateReport(
    candidates: ReadonlyArray<CandidateProfile>,
    scores?: ReadonlyArray<AuditedScore>,
  ): BiasReport {
    const flags: BiasFlag[] = [];
    if (candidates.length > 0) {
      flags.push(...this.checkMissingFields(candidates));
      flags.push(...this.checkExperienceVariance(candidates));
      flags.push(...this.checkEducationPatterns(candidates));
      flags.push(...this.checkSkillDiversity(candidates));
      if (scores && scores.length > 0) {
        flags.push(...this.checkScoringPatterns(candidates, scores));
      }
      flags.push(...this.checkParsingQuality(candidates));
      flags.push(...this.checkConsistency(candidates));
    }

    const report = new BiasReport(candidates.length, flags, buildSummary(candidates.length, flags));
    this.logger.info("Cohort audit completed", {
      candidates: candidates.length,
      flags: flags.length,
      critical: report.getFlagsBySeverity("critical").length,
    });
    return report;
  }

  private checkMissingFields(candidates: ReadonlyArray<CandidateProfile>): BiasFlag[] {
    const flags: BiasFlag[] = [];
    for (const field of CRITICAL_FIELDS) {
      const missing = candidates.filter((candidate) => isFieldMissing(candidate, field)).map(displayName);
      if (missing.length === 0) {
        continue;
      }
      const rate = missing.length / candidates.length;
      if (rate < this.missingFieldThreshold) {
        continue;
      }
      flags.push({
        severity: rate >= CRITICAL_MISSING_RATE ? "critical" : "warning",
        category: "missing_data",
        message: `High rate of missing '${field}' field (${formatPercent(rate)} of candidates)`,
        affectedCandidates: missing,
        recommendation: `Review resume parsing for '${field}' extraction. Missing data may lead to unfair evaluation.`,
        details: {
          field,
          missing_count: missing.length,
          missing_rate: rate,
        },
      });
    }
    return flags;
  }

  private checkExperienceVariance(candidates: ReadonlyArray<CandidateProfile>): BiasFlag[] {
    const years = candidates
      .map((candidate) => candidate.experienceYears)
      .filter((value): value is number => value !== undefined);
    if (years.length < 2) {
      return [];
    }

    const avg = mean(years);
    if (avg <= 0) {
      return [];
    }
    const stdev = sampleStdev(years, avg);
    const cv = stdev / avg;
    if (cv <= this.varianceThreshold) {
      return [];
    }

    const min = Math.min(...years);
    const max = Math.max(...years);
    return [
      {
        severity: "warning",
        category: "variance",
        message: `Extreme variance in experience distribution (CV=${cv.toFixed(2)})`,
        affectedCandidates: [],
        recommendation:
          "Review if job requirements are clearly defined. Large experience spread may indicate unclear requirements or over-broad candidate pool.",
        details: {
          mean_experience: round(avg, 1),
          std_dev: round(stdev, 1),
          coefficient_of_variation: round(cv, 2),
          min_experience: min,
          max_experience: max,
          range: max - min,
        },
      },
    ];
  }

  private checkEducationPatterns(candidates: ReadonlyArray<CandidateProfile>): BiasFlag[] {
    const flags: BiasFlag[] = [];
    const total = candidates.length;
    const withoutEducation = candidates
      .filter((candidate) => candidate.education.length === 0)
      .map(displayName);

    if (withoutEducation.length / total >= this.missingFieldThreshold) {
      flags.push({
        severity: "warning",
        category: "missing_data",
        message: `High rate of missing education data (${withoutEducation.length}/${total} candidates)`,
        affectedCandidates: withoutEducation,
        recommendation:
          "Verify if education requirements are clearly stated. Missing education data may disadvantage qualified candidates.",
        details: {
          missing_count: withoutEducation.length,
          missing_rate: withoutEducation.length / total,
        },
      });
    }

    const distribution = countBy(candidates.map((candidate) => this.educationBucket(candidate)));
    const [dominantLevel, dominantCount] = mostCommon(distribution);
    if (total >= MIN_PATTERN_COHORT && dominantCount / total > DOMINANT_EDUCATION_RATE) {
      flags.push({
        severity: "info",
        category: "pattern",
        message: `Education distribution heavily skewed toward ${dominantLevel} level (${dominantCount}/${total} candidates)`,
        affectedCandidates: [],
        recommendation:
          "Review if job requirements may be excluding qualified candidates with different education backgrounds.",
        details: {
          dominant_level: dominantLevel,
          dominant_count: dominantCount,
          dominant_percentage: dominantCount / total,
          distribution: Object.fromEntries(distribution),
        },
      });
    }
    return flags;
  }

  private checkSkillDiversity(candidates: ReadonlyArray<CandidateProfile>): BiasFlag[] {
    const uniqueSkills = new Set(candidates.flatMap((candidate) => candidate.skills));
    if (uniqueSkills.size === 0) {
      return [
        {
          severity: "critical",
          category: "missing_data",
          message: "No skills extracted from any candidate",
          affectedCandidates: candidates.map(displayName),
          recommendation: "Critical: Review resume parsing. Skills are essential for evaluation.",
          details: {
            total_unique_skills: 0,
            candidates_affected: candidates.length,
          },
        },
      ];
    }

    const average = mean(candidates.map((candidate) => candidate.skills.length));
    if (average >= MIN_SKILLS_PER_CANDIDATE || candidates.length < MIN_SCORED_COHORT) {
      return [];
    }
    const fewSkills = candidates
      .filter((candidate) => candidate.skills.length < MIN_SKILLS_PER_CANDIDATE)
      .map(displayName);
    return [
      {
        severity: "warning",
        category: "missing_data",
        message: `Low skill extraction rate (avg ${average.toFixed(1)} skills per candidate)`,
        affectedCandidates: fewSkills,
        recommendation:
          "Review resume parsing quality. Low skill counts may indicate parsing issues or overly strict extraction.",
        details: {
          avg_skills_per_candidate: round(average, 1),
          total_unique_skills: uniqueSkills.size,
          candidates_with_few_skills: fewSkills.length,
        },
      },
    ];
  }

  /** Scores pair with candidates by position. */
  private checkScoringPatterns(
    candidates: ReadonlyArray<CandidateProfile>,
    scores: ReadonlyArray<AuditedScore>,
  ): BiasFlag[] {
    if (scores.length < MIN_SCORED_COHORT) {
      return [];
    }
    const flags: BiasFlag[] = [];
    const finalScores = scores.map(readFinalScore);
    const min = Math.min(...finalScores);
    const max = Math.max(...finalScores);
    const spread = max - min;

    if (spread < this.scoreSpreadThreshold && candidates.length >= MIN_PATTERN_COHORT) {
      flags.push({
        severity: "warning",
        category: "pattern",
        message: `Scores clustered in narrow range (spread: ${formatPercent(spread)})`,
        affectedCandidates: [],
        recommendation:
          "Review scoring methodology. Narrow score distribution may indicate system is not differentiating candidates effectively.",
        details: {
          score_range: round(spread, 3),
          min_score: round(min, 3),
          max_score: round(max, 3),
          mean_score: round(mean(finalScores), 3),
        },
      });
    }

    const pairedCount = Math.min(candidates.length, finalScores.length);
    const nearPerfect: string[] = [];
    for (let index = 0; index < pairedCount; index += 1) {
      if (finalScores[index] >= NEAR_PERFECT_SCORE) {
        nearPerfect.push(displayName(candidates[index]));
      }
    }
    if (candidates.length >= MIN_PATTERN_COHORT && nearPerfect.length > candidates.length * NEAR_PERFECT_RATE) {
      flags.push({
        severity: "info",
        category: "pattern",
        message: `Unusually high rate of near-perfect scores (${nearPerfect.length}/${candidates.length})`,
        affectedCandidates: nearPerfect,
        recommendation:
          "Verify scoring is differentiating candidates. Very high scores may indicate overly lenient criteria.",
        details: {
          perfect_score_count: nearPerfect.length,
          perfect_score_rate: nearPerfect.length / candidates.length,
        },
      });
    }
    return flags;
  }

  private checkParsingQuality(candidates: ReadonlyArray<CandidateProfile>): BiasFlag[] {
    const incomplete = candidates
      .filter((candidate) => countPopulatedFields(candidate) < MIN_POPULATED_FIELDS)
      .map(displayName);
    if (incomplete.length === 0) {
      return [];
    }
    return [
      {
        severity: "warning",
        category: "parsing_quality",
        message: `${incomplete.length} candidates have incomplete data (< 50% key fields)`,
        affectedCandidates: incomplete,
        recommendation:
          "Review resume formats and parsing logic. Incomplete parsing may unfairly disadvantage candidates.",
        details: {
          incomplete_count: incomplete.length,
          incomplete_rate: incomplete.length / candidates.length,
        },
      },
    ];
  }

  private checkConsistency(candidates: ReadonlyArray<CandidateProfile>): BiasFlag[] {
    const flags: BiasFlag[] = [];

    const nameCounts = countBy(
      candidates
        .filter((candidate) => Boolean(candidate.name))
        .map((candidate) => (candidate.name ?? "").toLowerCase().trim()),
    );
    const duplicates = Array.from(nameCounts.entries()).filter(([, count]) => count > 1);
    if (duplicates.length > 0) {
      flags.push({
        severity: "warning",
        category: "consistency",
        message: `Potential duplicate candidates detected (${duplicates.length} names appear multiple times)`,
        affectedCandidates: duplicates.map(([name]) => name),
        recommendation:
          "Review for duplicate submissions. Multiple entries for same candidate may skew statistics.",
        details: {
          duplicates: Object.fromEntries(duplicates),
        },
      });
    }

    const emails = candidates
      .map((candidate) => (candidate.email ?? "").toLowerCase())
      .filter((email) => email.length > 0);
    if (emails.length === 0) {
      return flags;
    }
    const [domain, domainCount] = mostCommon(
      countBy(emails.map((email) => (email.includes("@") ? email.split("@")[1] : ""))),
    );
    if (
      !PUBLIC_EMAIL_DOMAINS.has(domain) &&
      domainCount / emails.length > DOMINANT_DOMAIN_RATE &&
      candidates.length >= MIN_PATTERN_COHORT
    ) {
      flags.push({
        severity: "info",
        category: "pattern",
        message: `Email addresses concentrated in one domain (${domain}: ${domainCount}/${emails.length})`,
        affectedCandidates: [],
        recommendation: "This may be normal for internal referrals, but verify candidate pool diversity.",
        details: {
          dominant_domain: domain,
          domain_count: domainCount,
          domain_rate: domainCount / emails.length,
        },
      });
    }
    return flags;
  }

  educationBucket(candidate: CandidateProfile): EducationBucket {
    if (candidate.education.length === 0) {
      return "none";
    }
    let best: { key: string; rank: number } | null = null;
    for (const entry of candidate.education) {
      const level = resolveDegreeLevel(entry.degree, this.vocabulary);
      if (level && (best === null || level.rank > best.rank)) {
        best = level;
      }
    }
    switch (best?.key) {
      case "doctorate":
        return "doctorate";
      case "master":
      case "mba":
        return "master";
      case "bachelor":
        return "bachelor";
      case "associate":
        return "associate";
      default:
        return "other";
    }
  }
}

export function buildSummary(totalCandidates: number, flags: ReadonlyArray<BiasFlag>): string {
  if (flags.length === 0) {
    return `No bias concerns detected across ${totalCandidates} candidates.`;
  }
  const critical = flags.filter((flag) => flag.severity === "critical").length;
  const warnings = flags.filter((flag) => flag.severity === "warning").length;
  const info = flags.filter((flag) => flag.severity === "info").length;

  const parts = [`Analyzed ${totalCandidates} candidates.`];
  if (critical > 0) {
    parts.push(`${critical} critical issue(s) found.`);
  }
  if (warnings > 0) {
    parts.push(`${warnings} warning(s) identified.`);
  }
  if (info > 0) {
    parts.push(`${info} informational notice(s).`);
  }
  parts.push("Review flags below for details and recommendations.");
  return parts.join(" ");
}

function readThreshold(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a finite non-negative number, got ${value}.`);
  }
  return value;
}

function isFieldMissing(candidate: CandidateProfile, field: CriticalField): boolean {
  const value = candidate[field];
  if (value === undefined) {
    return true;
  }
  if (typeof value === "string" || Array.isArray(value)) {
    return value.length === 0;
  }
  return false;
}

function countPopulatedFields(candidate: CandidateProfile): number {
  return [
    Boolean(candidate.name),
    Boolean(candidate.email),
    Boolean(candidate.phone),
    candidate.skills.length > 0,
    Boolean(candidate.experienceYears),
    candidate.education.length > 0,
  ].filter(Boolean).length;
}

function displayName(candidate: CandidateProfile): string {
  return candidate.name ?? "Unknown";
}

function readFinalScore(score: AuditedScore): number {
  const value = "finalScore" in score ? score.finalScore : score.final_score;
  return Number.isFinite(value) ? value : 0;
}

function countBy<T>(values: ReadonlyArray<T>): Map<T, number> {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

/** First-seen entry wins ties. */
function mostCommon<T>(counts: Map<T, number>): [T, number] {
  let best: [T, number] | null = null;
  for (const entry of counts) {
    if (best === null || entry[1] > best[1]) {
      best = entry;
    }
  }
  if (best === null) {
    throw new Error("Cannot pick the most common value of an empty list.");
  }
  return best;
}

function mean(values: ReadonlyArray<number>): number {
  return values.reduce((total, value) => total + value, 0) / values.length;
}

function sampleStdev(values: ReadonlyArray<number>, avg: number): number {
  const squared = values.reduce((total, value) => total + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}
