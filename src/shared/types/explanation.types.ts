export const MATCH_RECOMMENDATIONS = [
  "Strong Match",
  "Good Match",
  "Moderate Match",
  "Weak Match",
] as const;

export type MatchRecommendation = (typeof MATCH_RECOMMENDATIONS)[number];

export interface MatchExplanation {
  summary: string;
  topReasons: [string, string, string];
  recommendation: MatchRecommendation;
}
