export type BiasSeverity = "critical" | "warning" | "info";

export type BiasCategory =
  | "missing_data"
  | "variance"
  | "pattern"
  | "parsing_quality"
  | "consistency";

export interface BiasFlag {
  severity: BiasSeverity;
  category: BiasCategory;
  message: string;
  affectedCandidates: string[];
  recommendation: string;
  details: Record<string, unknown>;
}

/** A flag as exposed by a finished report: deeply frozen. */
export interface FrozenBiasFlag {
  readonly severity: BiasSeverity;
  readonly category: BiasCategory;
  readonly message: string;
  readonly affectedCandidates: ReadonlyArray<string>;
  readonly recommendation: string;
  readonly details: Readonly<Record<string, unknown>>;
}

export interface BiasReportJson {
  total_candidates: number;
  flags: Array<{
    severity: BiasSeverity;
    category: BiasCategory;
    message: string;
    affected_candidates: string[];
    recommendation: string;
    details: Record<string, unknown>;
  }>;
  summary: string;
  has_critical_flags: boolean;
  has_warnings: boolean;
}
