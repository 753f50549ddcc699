export const APPLICANTS_TABLE = "Applicants";
export const PERSONAL_DETAILS_TABLE = "Personal Details";
export const WORK_EXPERIENCE_TABLE = "Work Experience";
export const SALARY_PREFERENCES_TABLE = "Salary Preferences";
export const SHORTLISTED_LEADS_TABLE = "Shortlisted Leads";

export const APPLICANT_LINK_FIELD = "Applicant ID";

export const APPLICANT_FIELDS = {
  compressedJson: "Compressed JSON",
  shortlistStatus: "Shortlist Status",
  llmSummary: "LLM Summary",
  llmScore: "LLM Score",
  llmIssues: "LLM Issues",
  llmFollowUps: "LLM Follow-Ups",
} as const;

export const PERSONAL_DETAILS_FIELDS = {
  fullName: "Full Name",
  email: "Email",
  location: "Location",
  linkedin: "LinkedIn",
} as const;

export const WORK_EXPERIENCE_FIELDS = {
  company: "Company",
  title: "Title",
  startDate: "Start Date",
  endDate: "End Date",
  technologies: "Technologies",
  description: "Description",
} as const;

export const SALARY_PREFERENCE_FIELDS = {
  preferredRate: "Preferred Rate",
  minimumRate: "Minimum Rate",
  currency: "Currency",
  availability: "Availability (hrs/wk)",
} as const;

export const SHORTLISTED_LEAD_FIELDS = {
  applicant: "Applicant",
  compressedJson: "Compressed JSON",
  scoreReason: "Score Reason",
  createdAt: "Created At",
} as const;
