import {
  CompressedDocument,
  CompressedExperience,
  CompressedPersonal,
  CompressedSalary,
  CompressedSections,
} from "../shared/types/compressed-document.types";
import { fail, OperationResult, succeed } from "../shared/types/result.types";

export const DEFAULT_CURRENCY = "USD";

export function serializeCompressedDocument(document: CompressedDocument): string {
  // Key order is fixed by construction so re-compression stays byte-identical.
  const ordered: CompressedDocument = {
    personal: {
      name: document.personal.name,
      email: document.personal.email,
      location: document.personal.location,
      linkedin: document.personal.linkedin,
    },
    experience: document.experience.map((entry) => ({
      company: entry.company,
      title: entry.title,
      start_date: entry.start_date,
      end_date: entry.end_date,
      technologies: entry.technologies,
      description: entry.description,
    })),
    total_experience_years: document.total_experience_years,
    salary: {
      preferred_rate: document.salary.preferred_rate,
      minimum_rate: document.salary.minimum_rate,
      currency: document.salary.currency,
      availability: document.salary.availability,
    },
  };
  return JSON.stringify(ordered, null, 2);
}

export function parseCompressedJson(
  raw: string | null | undefined,
): OperationResult<Record<string, unknown>> {
  if (typeof raw !== "string" || !raw.trim()) {
    return fail("empty_document", "Compressed JSON is empty");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return fail(
      "malformed_document",
      `Compressed JSON is not valid JSON: ${error instanceof Error ? error.message : "Unknown error"}`,
    );
  }

  if (!isPlainObject(parsed)) {
    return fail("malformed_document", "Compressed JSON must be a JSON object");
  }
  return succeed(parsed);
}

/**
 * Reads a parsed document with full-replace semantics inside each section that is present:
 * absent or mistyped string fields become "", absent or non-numeric numbers become 0.
 * A section whose key is missing is left undefined. Unknown keys are ignored.
 */
export function normalizeCompressedDocument(data: Record<string, unknown>): CompressedSections {
  const sections: CompressedSections = {};
  if (data.personal !== undefined) {
    sections.personal = normalizePersonal(isPlainObject(data.personal) ? data.personal : {});
  }
  if (data.experience !== undefined) {
    const experience = Array.isArray(data.experience) ? data.experience : [];
    sections.experience = experience.map((entry) => normalizeExperience(isPlainObject(entry) ? entry : {}));
  }
  if (data.salary !== undefined) {
    sections.salary = normalizeSalary(isPlainObject(data.salary) ? data.salary : {});
  }
  return sections;
}

function normalizePersonal(value: Record<string, unknown>): CompressedPersonal {
  return {
    name: coerceString(value.name),
    email: coerceString(value.email),
    location: coerceString(value.location),
    linkedin: coerceString(value.linkedin),
  };
}

function normalizeExperience(value: Record<string, unknown>): CompressedExperience {
  return {
    company: coerceString(value.company),
    title: coerceString(value.title),
    start_date: coerceString(value.start_date),
    end_date: coerceString(value.end_date),
    technologies: coerceString(value.technologies),
    description: coerceString(value.description),
  };
}

function normalizeSalary(value: Record<string, unknown>): CompressedSalary {
  return {
    preferred_rate: coerceNumber(value.preferred_rate) ?? 0,
    minimum_rate: coerceNumber(value.minimum_rate) ?? 0,
    currency: coerceString(value.currency) || DEFAULT_CURRENCY,
    availability: coerceNumber(value.availability) ?? 0,
  };
}

export function coerceString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return String(value);
  }
  return "";
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim().replace(/^\$/, ""));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
