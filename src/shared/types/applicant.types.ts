export type ShortlistStatus = "Pending" | "Shortlisted" | "Rejected";

export interface ApplicantRow {
  id: string;
  compressedJson: string | null;
  shortlistStatus: ShortlistStatus | null;
  llmSummary: string | null;
  llmScore: number | null;
  llmIssues: string | null;
  llmFollowUps: string | null;
}

export interface PersonalDetailsRow {
  id: string;
  fullName: string | null;
  email: string | null;
  location: string | null;
  linkedin: string | null;
}

export interface WorkExperienceRow {
  id: string;
  company: string | null;
  title: string | null;
  startDate: string | null;
  endDate: string | null;
  technologies: string | null;
  description: string | null;
}

export interface SalaryPreferenceRow {
  id: string;
  preferredRate: number | null;
  minimumRate: number | null;
  currency: string | null;
  availability: number | null;
}

export interface PersonalDetailsInput {
  fullName: string;
  email: string;
  location: string;
  linkedin: string;
}

export interface WorkExperienceInput {
  company: string;
  title: string;
  startDate: string;
  endDate: string;
  technologies: string;
  description: string;
}

export interface SalaryPreferenceInput {
  preferredRate: number;
  minimumRate: number;
  currency: string;
  availability: number;
}

export interface EnrichmentFieldsInput {
  summary: string;
  score: number | null;
  issues: string;
  followUps: string;
}

export interface ShortlistedLeadInput {
  applicantId: string;
  compressedJson: string;
  scoreReason: string;
  createdAt: string;
}
