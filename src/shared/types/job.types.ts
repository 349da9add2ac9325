export interface JobRequirement {
  requiredSkills: string[];
  requiredExperienceYears?: number;
  requiredDegree?: string;
}

/** Explicit requirement values that take precedence over those derived from the job text. */
export interface RequirementOverrides {
  requiredSkills?: string[];
  requiredExperience?: number;
  requiredDegree?: string;
}
