export interface EducationEntry {
  degree: string;
  year?: number;
  institution?: string;
}

export interface CandidateProfile {
  name?: string;
  email?: string;
  phone?: string;
  skills: string[];
  experienceYears?: number;
  education: EducationEntry[];
  summary?: string;
  filename?: string;
}
