import { errorMessage, Logger, logContext } from "../config/logger";
import { ApplicantsRepository } from "../db/repositories/applicants.repo";
import { PersonalDetailsRepository } from "../db/repositories/personal-details.repo";
import { SalaryPreferencesRepository } from "../db/repositories/salary-preferences.repo";
import { WorkExperienceRepository } from "../db/repositories/work-experience.repo";
import { runSequentialBatch } from "../pipeline/batch.runner";
import {
  PersonalDetailsRow,
  SalaryPreferenceRow,
  WorkExperienceRow,
} from "../shared/types/applicant.types";
import {
  CompressedDocument,
  CompressedExperience,
} from "../shared/types/compressed-document.types";
import { BatchSummary, fail, OperationResult, succeed } from "../shared/types/result.types";
import { DEFAULT_CURRENCY, serializeCompressedDocument } from "./compressed-document";
import { calculateTotalExperienceYears } from "./experience-duration";

export interface CompressionOutcome {
  document: CompressedDocument;
  json: string;
}

export class CompressionService {
  constructor(
    private readonly applicantsRepository: ApplicantsRepository,
    private readonly personalDetailsRepository: PersonalDetailsRepository,
    private readonly workExperienceRepository: WorkExperienceRepository,
    private readonly salaryPreferencesRepository: SalaryPreferencesRepository,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async compress(applicantId: string): Promise<OperationResult<CompressionOutcome>> {
    const built = await this.buildDocument(applicantId);
    if (!built.ok) {
      return built;
    }

    const json = serializeCompressedDocument(built.data);
    try {
      await this.applicantsRepository.saveCompressedJson(applicantId, json);
    } catch (error) {
      logContext(this.logger, "error", "Failed to persist compressed JSON", {
        applicant_id: applicantId,
        operation: "compress",
        error_code: "write_failure",
      }, { error: errorMessage(error) });
      return fail("write_failure", `Failed to write compressed JSON: ${errorMessage(error)}`);
    }

    logContext(this.logger, "info", "Compressed JSON updated", {
      applicant_id: applicantId,
      operation: "compress",
      ok: true,
    }, {
      experienceEntries: built.data.experience.length,
      totalExperienceYears: built.data.total_experience_years,
    });
    return succeed({ document: built.data, json });
  }

  async buildDocument(applicantId: string): Promise<OperationResult<CompressedDocument>> {
    let personal: PersonalDetailsRow | null;
    let experiences: WorkExperienceRow[];
    let salary: SalaryPreferenceRow | null;
    try {
      const applicant = await this.applicantsRepository.getById(applicantId);
      if (!applicant) {
        logContext(this.logger, "error", "Applicant not found", {
          applicant_id: applicantId,
          operation: "compress",
          error_code: "not_found",
        });
        return fail("not_found", `Applicant ${applicantId} not found`);
      }

      personal = await this.personalDetailsRepository.findByApplicant(applicantId);
      experiences = await this.workExperienceRepository.listByApplicant(applicantId);
      salary = await this.salaryPreferencesRepository.findByApplicant(applicantId);
    } catch (error) {
      logContext(this.logger, "error", "Failed to read applicant records", {
        applicant_id: applicantId,
        operation: "compress",
        error_code: "read_failure",
      }, { error: errorMessage(error) });
      return fail("read_failure", `Failed to read applicant records: ${errorMessage(error)}`);
    }

    if (!personal) {
      this.logger.warn("No personal details found for applicant", { applicant_id: applicantId });
    }
    if (!experiences.length) {
      this.logger.warn("No work experience found for applicant", { applicant_id: applicantId });
    }
    if (!salary) {
      this.logger.warn("No salary preferences found for applicant", { applicant_id: applicantId });
    }

    const experience = experiences.map(toCompressedExperience);
    const totalExperienceYears = calculateTotalExperienceYears(experience, this.now(), (warning) => {
      this.logger.warn("Experience entry contributes zero years", {
        applicant_id: applicantId,
        ...warning,
      });
    });

    return succeed({
      personal: {
        name: personal?.fullName ?? "",
        email: personal?.email ?? "",
        location: personal?.location ?? "",
        linkedin: personal?.linkedin ?? "",
      },
      experience,
      total_experience_years: totalExperienceYears,
      salary: {
        preferred_rate: salary?.preferredRate ?? 0,
        minimum_rate: salary?.minimumRate ?? 0,
        currency: salary?.currency || DEFAULT_CURRENCY,
        availability: salary?.availability ?? 0,
      },
    });
  }

  async compressAll(): Promise<OperationResult<BatchSummary>> {
    let applicantIds: string[];
    try {
      applicantIds = (await this.applicantsRepository.listAll()).map((applicant) => applicant.id);
    } catch (error) {
      this.logger.error("Failed to list applicants for compression", { error: errorMessage(error) });
      return fail("read_failure", `Failed to list applicants: ${errorMessage(error)}`);
    }

    const summary = await runSequentialBatch({
      operation: "compress",
      applicantIds,
      logger: this.logger,
      process: async (applicantId) => ((await this.compress(applicantId)).ok ? "succeeded" : "failed"),
    });
    return succeed(summary);
  }
}

function toCompressedExperience(row: WorkExperienceRow): CompressedExperience {
  return {
    company: row.company ?? "",
    title: row.title ?? "",
    start_date: row.startDate ?? "",
    end_date: row.endDate ?? "",
    technologies: row.technologies ?? "",
    description: row.description ?? "",
  };
}
