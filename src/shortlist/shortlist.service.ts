import { DuplicateLeadPolicy } from "../config/env";
import { errorMessage, Logger, logContext } from "../config/logger";
import { parseCompressedJson } from "../compression/compressed-document";
import { ApplicantsRepository } from "../db/repositories/applicants.repo";
import { ShortlistedLeadsRepository } from "../db/repositories/shortlisted-leads.repo";
import { runSequentialBatch } from "../pipeline/batch.runner";
import { ApplicantRow } from "../shared/types/applicant.types";
import { BatchSummary, fail, OperationResult, succeed } from "../shared/types/result.types";
import { ShortlistCriteria, ShortlistDecision } from "../shared/types/shortlist.types";
import { evaluateShortlist, extractShortlistInput } from "./shortlist-criteria";

export interface ShortlistOutcome extends ShortlistDecision {
  leadId: string | null;
  leadSkipped: boolean;
}

export interface ShortlistBatchSummary extends BatchSummary {
  shortlisted: number;
}

export class ShortlistService {
  constructor(
    private readonly applicantsRepository: ApplicantsRepository,
    private readonly leadsRepository: ShortlistedLeadsRepository,
    private readonly criteria: ShortlistCriteria,
    private readonly logger: Logger,
    private readonly duplicateLeadPolicy: DuplicateLeadPolicy = "skip",
    private readonly now: () => Date = () => new Date(),
  ) {}

  async evaluate(applicantId: string): Promise<OperationResult<ShortlistOutcome>> {
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

    const compressedJson = applicant.compressedJson ?? "";
    const parsed = parseCompressedJson(compressedJson);
    if (!parsed.ok) {
      this.logFailure(applicantId, parsed.error_code, parsed.message);
      return parsed;
    }

    const input = extractShortlistInput(parsed.data);
    if (input.currency && input.currency !== "USD") {
      this.logger.warn("Non-USD currency compared against USD rate cap as-is", {
        applicant_id: applicantId,
        currency: input.currency,
      });
    }
    const decision = evaluateShortlist(input, this.criteria);

    try {
      await this.applicantsRepository.saveShortlistStatus(
        applicantId,
        decision.passed ? "Shortlisted" : "Rejected",
      );
    } catch (error) {
      this.logFailure(applicantId, "write_failure", "Failed to update shortlist status", error);
      return fail("write_failure", `Failed to update shortlist status: ${errorMessage(error)}`);
    }

    if (!decision.passed) {
      logContext(this.logger, "info", "Applicant rejected", {
        applicant_id: applicantId,
        operation: "shortlist",
        ok: true,
      }, { reasoning: decision.reasoning });
      return succeed({ ...decision, leadId: null, leadSkipped: false });
    }

    try {
      if (this.duplicateLeadPolicy === "skip" && (await this.leadsRepository.existsForApplicant(applicantId))) {
        logContext(this.logger, "info", "Applicant already has a shortlisted lead", {
          applicant_id: applicantId,
          operation: "shortlist",
          ok: true,
        });
        return succeed({ ...decision, leadId: null, leadSkipped: true });
      }

      const leadId = await this.leadsRepository.create({
        applicantId,
        compressedJson,
        scoreReason: decision.reasoning,
        createdAt: this.now().toISOString(),
      });
      logContext(this.logger, "info", "Applicant shortlisted", {
        applicant_id: applicantId,
        operation: "shortlist",
        ok: true,
      }, { leadId });
      return succeed({ ...decision, leadId, leadSkipped: false });
    } catch (error) {
      this.logFailure(applicantId, "write_failure", "Failed to create shortlisted lead", error);
      return fail("write_failure", `Failed to create shortlisted lead: ${errorMessage(error)}`);
    }
  }

  async shortlistAll(): Promise<OperationResult<ShortlistBatchSummary>> {
    let applicantIds: string[];
    try {
      applicantIds = (await this.applicantsRepository.listAll()).map((applicant) => applicant.id);
    } catch (error) {
      this.logger.error("Failed to list applicants for shortlisting", { error: errorMessage(error) });
      return fail("read_failure", `Failed to list applicants: ${errorMessage(error)}`);
    }

    let shortlisted = 0;
    const summary = await runSequentialBatch({
      operation: "shortlist",
      applicantIds,
      logger: this.logger,
      process: async (applicantId) => {
        const result = await this.evaluate(applicantId);
        if (!result.ok) {
          return "failed";
        }
        if (result.data.passed) {
          shortlisted += 1;
        }
        return "succeeded";
      },
    });
    return succeed({ ...summary, shortlisted });
  }

  private logFailure(applicantId: string, errorCode: string, message: string, error?: unknown): void {
    logContext(this.logger, "error", message, {
      applicant_id: applicantId,
      operation: "shortlist",
      ok: false,
      error_code: errorCode,
    }, error === undefined ? undefined : { error: errorMessage(error) });
  }
}
