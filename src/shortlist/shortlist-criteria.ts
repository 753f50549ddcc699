import { coerceNumber, coerceString, isPlainObject } from "../compression/compressed-document";
import {
  ShortlistCriteria,
  ShortlistCriterionResult,
  ShortlistDecision,
} from "../shared/types/shortlist.types";
import { matchApprovedLocation, matchTier1Companies } from "./matchers";

export interface ShortlistInput {
  totalExperienceYears: number | null;
  companies: string[];
  preferredRate: number | null;
  availability: number | null;
  currency: string;
  location: string;
}

/**
 * Pulls the evaluated fields out of a parsed compressed document. Numbers that are missing or
 * unparseable stay null so the matching criterion fails instead of defaulting to a passing value.
 */
export function extractShortlistInput(data: Record<string, unknown>): ShortlistInput {
  const personal = isPlainObject(data.personal) ? data.personal : {};
  const salary = isPlainObject(data.salary) ? data.salary : {};
  const experience = Array.isArray(data.experience) ? data.experience : [];

  return {
    totalExperienceYears: coerceNumber(data.total_experience_years),
    companies: experience
      .map((entry) => (isPlainObject(entry) ? coerceString(entry.company) : ""))
      .filter((company) => company.trim().length > 0),
    preferredRate: positiveOrNull(coerceNumber(salary.preferred_rate)),
    availability: positiveOrNull(coerceNumber(salary.availability)),
    currency: coerceString(salary.currency).trim().toUpperCase(),
    location: coerceString(personal.location),
  };
}

export function evaluateShortlist(input: ShortlistInput, criteria: ShortlistCriteria): ShortlistDecision {
  const results = [
    evaluateExperience(input, criteria),
    evaluateCompensation(input, criteria),
    evaluateLocation(input, criteria),
  ];
  return {
    passed: results.every((result) => result.passed),
    reasoning: results.map((result) => `${capitalize(result.criterion)}: ${result.reason}`).join("\n"),
    criteria: results,
  };
}

export function evaluateExperience(
  input: ShortlistInput,
  criteria: ShortlistCriteria,
): ShortlistCriterionResult {
  const total = input.totalExperienceYears;
  if (total !== null && total >= criteria.minYears) {
    return {
      criterion: "experience",
      passed: true,
      reason: `${formatYears(total)} years total experience (minimum ${formatNumber(criteria.minYears)})`,
    };
  }

  const tier1 = matchTier1Companies(input.companies, criteria.tier1Companies);
  if (tier1.length) {
    return {
      criterion: "experience",
      passed: true,
      reason: `Tier-1 company experience: ${tier1.join(", ")}`,
    };
  }

  const totalText =
    total === null
      ? "Total experience missing or invalid"
      : `${formatYears(total)} years total experience is below the ${formatNumber(criteria.minYears)} year minimum`;
  return {
    criterion: "experience",
    passed: false,
    reason: `${totalText} and no Tier-1 company experience`,
  };
}

export function evaluateCompensation(
  input: ShortlistInput,
  criteria: ShortlistCriteria,
): ShortlistCriterionResult {
  const failures: string[] = [];
  const rate = input.preferredRate;
  const availability = input.availability;

  if (rate === null) {
    failures.push("Preferred rate missing or invalid");
  } else if (rate > criteria.maxRate) {
    failures.push(`Rate $${formatNumber(rate)}/hr exceeds $${formatNumber(criteria.maxRate)} cap`);
  }

  if (availability === null) {
    failures.push("Availability missing or invalid");
  } else if (availability < criteria.minAvailability) {
    failures.push(
      `Availability ${formatNumber(availability)} hrs/wk below ${formatNumber(criteria.minAvailability)} hrs/wk minimum`,
    );
  }

  if (failures.length || rate === null || availability === null) {
    return { criterion: "compensation", passed: false, reason: failures.join("; ") };
  }

  return {
    criterion: "compensation",
    passed: true,
    reason:
      `Rate $${formatNumber(rate)}/hr within $${formatNumber(criteria.maxRate)} cap; ` +
      `availability ${formatNumber(availability)} hrs/wk meets ${formatNumber(criteria.minAvailability)} hrs/wk minimum`,
  };
}

export function evaluateLocation(
  input: ShortlistInput,
  criteria: ShortlistCriteria,
): ShortlistCriterionResult {
  const location = input.location.trim();
  if (!location) {
    return { criterion: "location", passed: false, reason: "Location missing" };
  }

  const approved = matchApprovedLocation(location, criteria.approvedLocations);
  if (approved) {
    return { criterion: "location", passed: true, reason: `Approved location: ${approved}` };
  }
  return {
    criterion: "location",
    passed: false,
    reason: `Location '${location}' is not in the approved list`,
  };
}

function positiveOrNull(value: number | null): number | null {
  return value !== null && value > 0 ? value : null;
}

function formatYears(value: number): string {
  return value.toFixed(1);
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Math.round(value * 100) / 100);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
