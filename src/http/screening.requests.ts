import { AuditedScore } from "../qa/cohort-auditor";
import { normalizeCandidateProfile } from "../profiles/candidate-profile.normalizer";
import { CandidateProfile } from "../shared/types/candidate.types";
import { RequirementOverrides } from "../shared/types/job.types";
import { isRecord, toFiniteNumber, toStringArray } from "../shared/utils/values";
import { ScreeningRequest } from "../matching/screening.pipeline";

export const MAX_CANDIDATES_PER_REQUEST = 500;
const MAX_LIST_LIMIT = 1000;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface AuditRequest {
  candidates: CandidateProfile[];
  scores?: AuditedScore[];
}

export type AnalysesQuery =
  | { kind: "recent"; limit?: number; offset?: number }
  | { kind: "candidate"; candidateName: string }
  | { kind: "score"; minScore: number; maxScore?: number }
  | { kind: "time"; from: Date; to: Date };

export function parseScreeningBody(body: unknown): ParseResult<ScreeningRequest> {
  if (!isRecord(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }
  if (typeof body.job_description !== "string" || !body.job_description.trim()) {
    return { ok: false, error: "job_description must be a non-empty string" };
  }
  const candidates = parseCandidates(body.candidates);
  if (!candidates.ok) {
    return candidates;
  }

  const overrides: RequirementOverrides = {};
  if (body.required_skills !== undefined) {
    if (!Array.isArray(body.required_skills)) {
      return { ok: false, error: "required_skills must be an array of strings" };
    }
    overrides.requiredSkills = toStringArray(body.required_skills);
  }
  if (body.required_experience !== undefined) {
    const years = toFiniteNumber(body.required_experience);
    if (years === undefined || years < 0) {
      return { ok: false, error: "required_experience must be a non-negative number" };
    }
    overrides.requiredExperience = years;
  }
  if (body.required_degree !== undefined) {
    if (typeof body.required_degree !== "string") {
      return { ok: false, error: "required_degree must be a string" };
    }
    overrides.requiredDegree = body.required_degree.trim();
  }

  return {
    ok: true,
    value: {
      jobText: body.job_description,
      candidates: candidates.value,
      overrides,
      explain: body.explain === true,
      persist: body.persist === true,
    },
  };
}

export function parseAuditBody(body: unknown): ParseResult<AuditRequest> {
  if (!isRecord(body)) {
    return { ok: false, error: "Request body must be a JSON object" };
  }
  const candidates = parseCandidates(body.candidates);
  if (!candidates.ok) {
    return candidates;
  }
  if (body.score_breakdowns === undefined) {
    return { ok: true, value: { candidates: candidates.value } };
  }
  if (!Array.isArray(body.score_breakdowns)) {
    return { ok: false, error: "score_breakdowns must be an array" };
  }

  const scores: AuditedScore[] = [];
  for (const [index, item] of body.score_breakdowns.entries()) {
    const finalScore = isRecord(item) ? toFiniteNumber(item.final_score) : undefined;
    if (finalScore === undefined) {
      return { ok: false, error: `score_breakdowns[${index}].final_score must be a number` };
    }
    scores.push({ final_score: finalScore });
  }
  return { ok: true, value: { candidates: candidates.value, scores } };
}

export function parseAnalysesQuery(query: Record<string, unknown>): ParseResult<AnalysesQuery> {
  const minScore = readQueryNumber(query.min_score);
  const maxScore = readQueryNumber(query.max_score);
  if (minScore === null || maxScore === null) {
    return { ok: false, error: "min_score and max_score must be numbers" };
  }
  if (minScore !== undefined) {
    return { ok: true, value: { kind: "score", minScore, maxScore } };
  }
  if (maxScore !== undefined) {
    return { ok: true, value: { kind: "score", minScore: 0, maxScore } };
  }

  const from = readQueryText(query.from);
  const to = readQueryText(query.to);
  if (from || to) {
    const fromDate = new Date(from ?? 0);
    const toDate = to ? new Date(to) : new Date();
    if (Number.isNaN(fromDate.getTime()) || Number.isNaN(toDate.getTime())) {
      return { ok: false, error: "from and to must be ISO-8601 timestamps" };
    }
    return { ok: true, value: { kind: "time", from: fromDate, to: toDate } };
  }

  const candidateName = readQueryText(query.candidate);
  if (candidateName) {
    return { ok: true, value: { kind: "candidate", candidateName } };
  }

  const limit = readQueryNumber(query.limit);
  const offset = readQueryNumber(query.offset);
  if (
    limit === null ||
    offset === null ||
    (limit !== undefined && (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT)) ||
    (offset !== undefined && (!Number.isInteger(offset) || offset < 0))
  ) {
    return { ok: false, error: `limit must be an integer in 1..${MAX_LIST_LIMIT} and offset a non-negative integer` };
  }
  return { ok: true, value: { kind: "recent", limit, offset } };
}

function parseCandidates(value: unknown): ParseResult<CandidateProfile[]> {
  if (!Array.isArray(value)) {
    return { ok: false, error: "candidates must be an array" };
  }
  if (value.length > MAX_CANDIDATES_PER_REQUEST) {
    return { ok: false, error: `At most ${MAX_CANDIDATES_PER_REQUEST} candidates per request` };
  }
  if (value.some((item) => !isRecord(item))) {
    return { ok: false, error: "Every candidate must be an object" };
  }
  return { ok: true, value: value.map(normalizeCandidateProfile) };
}

function readQueryText(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** undefined when absent, null when present but not a number. */
function readQueryNumber(value: unknown): number | null | undefined {
  const text = readQueryText(value);
  if (text === undefined) {
    return undefined;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}
