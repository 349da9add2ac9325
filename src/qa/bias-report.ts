import { BiasFlag, BiasReportJson, BiasSeverity, FrozenBiasFlag } from "../shared/types/bias.types";

export class BiasReport {
  readonly flags: ReadonlyArray<FrozenBiasFlag>;

  constructor(
    readonly totalCandidates: number,
    flags: ReadonlyArray<BiasFlag>,
    readonly summary: string,
  ) {
    this.flags = Object.freeze(
      flags.map(
        (flag): FrozenBiasFlag =>
          deepFreeze({
            ...flag,
            affectedCandidates: [...flag.affectedCandidates],
            details: structuredClone(flag.details),
          }),
      ),
    );
  }

  hasCriticalFlags(): boolean {
    return this.flags.some((flag) => flag.severity === "critical");
  }

  hasWarnings(): boolean {
    return this.flags.some((flag) => flag.severity === "warning");
  }

  getFlagsBySeverity(severity: BiasSeverity): FrozenBiasFlag[] {
    return this.flags.filter((flag) => flag.severity === severity);
  }

  /** Plain mutable copy; the report itself stays frozen. */
  toJSON(): BiasReportJson {
    return {
      total_candidates: this.totalCandidates,
      flags: this.flags.map((flag) => ({
        severity: flag.severity,
        category: flag.category,
        message: flag.message,
        affected_candidates: [...flag.affectedCandidates],
        recommendation: flag.recommendation,
        details: structuredClone(flag.details),
      })),
      summary: this.summary,
      has_critical_flags: this.hasCriticalFlags(),
      has_warnings: this.hasWarnings(),
    };
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
