import { errorMessage, Logger, logContext } from "../config/logger";
import { ApplicantsRepository } from "../db/repositories/applicants.repo";
import { PersonalDetailsRepository } from "../db/repositories/personal-details.repo";
import { SalaryPreferencesRepository } from "../db/repositories/salary-preferences.repo";
import { WorkExperienceRepository } from "../db/repositories/work-experience.repo";
import { runSequentialBatch } from "../pipeline/batch.runner";
import { ApplicantRow, WorkExperienceInput } from "../shared/types/applicant.types";
import {
  CompressedExperience,
  CompressedPersonal,
  CompressedSalary,
} from "../shared/types/compressed-document.types";
import { BatchSummary, fail, OperationResult, succeed } from "../shared/types/result.types";
import { normalizeCompressedDocument, parseCompressedJson } from "./compressed-document";

export interface ChildReconciliation {
  ok: boolean;
  created: number;
  updated: number;
  deleted: number;
  failed: number;
}

export interface DecompressionReport {
  personal: ChildReconciliation;
  experience: ChildReconciliation;
  salary: ChildReconciliation;
}

const REPORT_STEPS: ReadonlyArray<keyof DecompressionReport> = ["personal", "experience", "salary"];

export type ReconciliationStep = "create" | "update" | "delete";

/**
 * Index-based plan: position i of the JSON array maps onto the i-th existing record in store
 * query order. Reordering entries is therefore indistinguishable from editing them in place.
 */
export function planPositionalReconciliation(
  existingCount: number,
  desiredCount: number,
): ReconciliationStep[] {
  const steps: ReconciliationStep[] = [];
  const length = Math.max(existingCount, desiredCount);
  for (let index = 0; index < length; index += 1) {
    if (index < desiredCount && index < existingCount) {
      steps.push("update");
    } else if (index < desiredCount) {
      steps.push("create");
    } else {
      steps.push("delete");
    }
  }
  return steps;
}

export class DecompressionService {
  constructor(
    private readonly applicantsRepository: ApplicantsRepository,
    private readonly personalDetailsRepository: PersonalDetailsRepository,
    private readonly workExperienceRepository: WorkExperienceRepository,
    private readonly salaryPreferencesRepository: SalaryPreferencesRepository,
    private readonly logger: Logger,
  ) {}

  async decompress(applicantId: string): Promise<OperationResult<DecompressionReport>> {
    let applicant: ApplicantRow | null;
    try {
      applicant = await this.applicantsRepository.getById(applicantId);
    } catch (error) {
      this.logFailure(applicantId, "read_failure", "Failed to read applicant", error);
      return fail("read_failure", `Failed to read applicant: ${errorMessage(error)}`);
    }
    if (!applicant) {
      this.logFailure(applicantId, "not_found", "Applicant not found");
      return fail("not_found", `Applicant ${applicantId} not found`);
    }

    const parsed = parseCompressedJson(applicant.compressedJson);
    if (!parsed.ok) {
      this.logFailure(applicantId, parsed.error_code, parsed.message);
      return parsed;
    }
    const document = normalizeCompressedDocument(parsed.data);

    // The three reconciliations are independent; one failing does not stop the others.
    // A section missing from the document leaves its table untouched.
    const report: DecompressionReport = {
      personal: document.personal
        ? await this.upsertPersonalDetails(applicantId, document.personal)
        : emptyReconciliation(),
      experience: document.experience
        ? await this.reconcileWorkExperience(applicantId, document.experience)
        : emptyReconciliation(),
      salary: document.salary
        ? await this.upsertSalaryPreferences(applicantId, document.salary)
        : emptyReconciliation(),
    };
    const skippedSections = REPORT_STEPS.filter((key) => document[key] === undefined);

    const failedSteps = REPORT_STEPS.filter((key) => !report[key].ok);
    if (failedSteps.length) {
      logContext(this.logger, "warn", "Applicant partially decompressed", {
        applicant_id: applicantId,
        operation: "decompress",
        ok: false,
        error_code: "write_failure",
      }, { failedSteps, skippedSections, report });
      return fail("write_failure", `Decompression failed for: ${failedSteps.join(", ")}`);
    }

    logContext(this.logger, "info", "Applicant decompressed", {
      applicant_id: applicantId,
      operation: "decompress",
      ok: true,
    }, { report, skippedSections });
    return succeed(report);
  }

  async decompressAll(): Promise<OperationResult<BatchSummary>> {
    let applicantIds: string[];
    try {
      applicantIds = (await this.applicantsRepository.listAll()).map((applicant) => applicant.id);
    } catch (error) {
      this.logger.error("Failed to list applicants for decompression", { error: errorMessage(error) });
      return fail("read_failure", `Failed to list applicants: ${errorMessage(error)}`);
    }

    const summary = await runSequentialBatch({
      operation: "decompress",
      applicantIds,
      logger: this.logger,
      process: async (applicantId) => ((await this.decompress(applicantId)).ok ? "succeeded" : "failed"),
    });
    return succeed(summary);
  }

  private async upsertPersonalDetails(
    applicantId: string,
    personal: CompressedPersonal,
  ): Promise<ChildReconciliation> {
    const result = emptyReconciliation();
    const input = {
      fullName: personal.name,
      email: personal.email,
      location: personal.location,
      linkedin: personal.linkedin,
    };
    try {
      const existing = await this.personalDetailsRepository.findByApplicant(applicantId);
      if (existing) {
        await this.personalDetailsRepository.update(existing.id, applicantId, input);
        result.updated += 1;
      } else {
        await this.personalDetailsRepository.create(applicantId, input);
        result.created += 1;
      }
    } catch (error) {
      this.logFailure(applicantId, "write_failure", "Failed to upsert personal details", error);
      result.ok = false;
      result.failed += 1;
    }
    return result;
  }

  private async reconcileWorkExperience(
    applicantId: string,
    entries: CompressedExperience[],
  ): Promise<ChildReconciliation> {
    const result = emptyReconciliation();
    let existing: Array<{ id: string }>;
    try {
      existing = await this.workExperienceRepository.listByApplicant(applicantId);
    } catch (error) {
      this.logFailure(applicantId, "read_failure", "Failed to list work experience", error);
      result.ok = false;
      return result;
    }

    const steps = planPositionalReconciliation(existing.length, entries.length);
    for (const [index, step] of steps.entries()) {
      try {
        if (step === "update") {
          await this.workExperienceRepository.update(
            existing[index].id,
            applicantId,
            toWorkExperienceInput(entries[index]),
          );
          result.updated += 1;
        } else if (step === "create") {
          await this.workExperienceRepository.create(applicantId, toWorkExperienceInput(entries[index]));
          result.created += 1;
        } else {
          await this.workExperienceRepository.delete(existing[index].id, applicantId);
          result.deleted += 1;
        }
      } catch (error) {
        this.logFailure(applicantId, "write_failure", `Failed to ${step} work experience`, error, { index });
        result.ok = false;
        result.failed += 1;
      }
    }
    return result;
  }

  private async upsertSalaryPreferences(
    applicantId: string,
    salary: CompressedSalary,
  ): Promise<ChildReconciliation> {
    const result = emptyReconciliation();
    const input = {
      preferredRate: salary.preferred_rate,
      minimumRate: salary.minimum_rate,
      currency: salary.currency,
      availability: salary.availability,
    };
    try {
      const existing = await this.salaryPreferencesRepository.findByApplicant(applicantId);
      if (existing) {
        await this.salaryPreferencesRepository.update(existing.id, applicantId, input);
        result.updated += 1;
      } else {
        await this.salaryPreferencesRepository.create(applicantId, input);
        result.created += 1;
      }
    } catch (error) {
      this.logFailure(applicantId, "write_failure", "Failed to upsert salary preferences", error);
      result.ok = false;
      result.failed += 1;
    }
    return result;
  }

  private logFailure(
    applicantId: string,
    errorCode: string,
    message: string,
    error?: unknown,
    fields?: Record<string, unknown>,
  ): void {
    logContext(this.logger, "error", message, {
      applicant_id: applicantId,
      operation: "decompress",
      ok: false,
      error_code: errorCode,
    }, {
      ...(fields ?? {}),
      ...(error === undefined ? {} : { error: errorMessage(error) }),
    });
  }
}

function toWorkExperienceInput(entry: CompressedExperience): WorkExperienceInput {
  return {
    company: entry.company,
    title: entry.title,
    startDate: entry.start_date,
    endDate: entry.end_date,
    technologies: entry.technologies,
    description: entry.description,
  };
}

function emptyReconciliation(): ChildReconciliation {
  return { ok: true, created: 0, updated: 0, deleted: 0, failed: 0 };
}
