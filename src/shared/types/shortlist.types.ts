export interface ShortlistCriteria {
  minYears: number;
  tier1Companies: string[];
  maxRate: number;
  minAvailability: number;
  approvedLocations: string[];
}

export type ShortlistCriterionName = "experience" | "compensation" | "location";

export interface ShortlistCriterionResult {
  criterion: ShortlistCriterionName;
  passed: boolean;
  reason: string;
}

export interface ShortlistDecision {
  passed: boolean;
  reasoning: string;
  criteria: ShortlistCriterionResult[];
}
