import { callPromptWithBackoff } from "../ai/llm.safe";
import { LlmProvider } from "../ai/llm.provider";
import { buildApplicantEvaluationV1Prompt } from "../ai/prompts/applicant/applicant-evaluation.v1.prompt";
import { errorMessage, logContext, Logger } from "../config/logger";
import { ApplicantsRepository } from "../db/repositories/applicants.repo";
import { runSequentialBatch } from "../pipeline/batch.runner";
import { ApplicantRow } from "../shared/types/applicant.types";
import { EnrichmentResult } from "../shared/types/enrichment.types";
import { fail, succeed, BatchSummary, OperationResult } from "../shared/types/result.types";
import { SleepFn } from "../shared/utils/sleep";
import { parseEnrichmentResponse } from "./enrichment-response.parser";

export interface EnrichmentOptions {
  maxAttempts: number;
  retryBaseDelayMs: number;
  batchDelayMs: number;
  timeoutMs?: number;
  sleep?: SleepFn;
}

export interface EnrichmentOutcome {
  skipped: boolean;
  result: EnrichmentResult | null;
  warnings: string[];
}

const PROMPT_NAME = "applicant_evaluation_v1";

export class EnrichmentService {
  constructor(
    private readonly applicantsRepository: ApplicantsRepository,
    private readonly provider: LlmProvider,
    private readonly logger: Logger,
    private readonly options: EnrichmentOptions,
  ) {}

  async enrich(applicantId: string, force = false): Promise<OperationResult<EnrichmentOutcome>> {
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

    const compressedJson = applicant.compressedJson?.trim() ?? "";
    if (!compressedJson) {
      this.logFailure(applicantId, "empty_document", "No compressed JSON to evaluate");
      return fail("empty_document", "Compressed JSON is empty");
    }

    if (!force && isEnriched(applicant)) {
      logContext(this.logger, "info", "Applicant already enriched, skipping", {
        applicant_id: applicantId,
        operation: "enrich",
        ok: true,
      });
      return succeed({ skipped: true, result: null, warnings: [] });
    }

    const call = await callPromptWithBackoff({
      provider: this.provider,
      prompt: buildApplicantEvaluationV1Prompt(compressedJson),
      promptName: PROMPT_NAME,
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.retryBaseDelayMs,
      timeoutMs: this.options.timeoutMs,
      sleep: this.options.sleep,
      logger: this.logger,
      applicantId,
    });
    if (!call.ok) {
      this.logFailure(applicantId, "transport_error", "Evaluation call failed", undefined, {
        reason: call.error_code,
        attempts: call.attempts,
        error: call.message,
      });
      return fail("transport_error", `Evaluation call failed (${call.error_code}): ${call.message}`);
    }

    const parsed = parseEnrichmentResponse(call.text);
    if (!parsed.ok) {
      this.logFailure(applicantId, parsed.error_code, parsed.message, undefined, {
        responsePreview: call.text.slice(0, 200),
      });
      return fail(parsed.error_code, parsed.message);
    }
    for (const warning of parsed.warnings) {
      this.logger.warn("Enrichment response data quality warning", {
        applicant_id: applicantId,
        warning,
      });
    }

    try {
      await this.applicantsRepository.saveEnrichment(applicantId, {
        summary: parsed.data.summary,
        score: parsed.data.score,
        issues: formatIssues(parsed.data.issues),
        followUps: formatFollowUps(parsed.data.followUps),
      });
    } catch (error) {
      this.logFailure(applicantId, "write_failure", "Failed to write enrichment fields", error);
      return fail("write_failure", `Failed to write enrichment fields: ${errorMessage(error)}`);
    }

    logContext(this.logger, "info", "Applicant enriched", {
      applicant_id: applicantId,
      operation: "enrich",
      provider: this.provider.name,
      model_name: this.provider.getModelName(),
      ok: true,
    }, { score: parsed.data.score, attempts: call.attempts });
    return succeed({ skipped: false, result: parsed.data, warnings: parsed.warnings });
  }

  async enrichAll(force = false): Promise<OperationResult<BatchSummary>> {
    let applicants: ApplicantRow[];
    try {
      applicants = await this.applicantsRepository.listAll();
    } catch (error) {
      this.logger.error("Failed to list applicants for enrichment", { error: errorMessage(error) });
      return fail("read_failure", `Failed to list applicants: ${errorMessage(error)}`);
    }

    // Already-enriched applicants are skipped from the listing without an extra fetch.
    const byId = new Map<string, ApplicantRow>();
    for (const applicant of applicants) {
      byId.set(applicant.id, applicant);
    }
    const summary = await runSequentialBatch({
      operation: "enrich",
      applicantIds: applicants.map((applicant) => applicant.id),
      logger: this.logger,
      delayMs: this.options.batchDelayMs,
      sleep: this.options.sleep,
      shouldSkip: (applicantId) => {
        const listed = byId.get(applicantId);
        return !force && listed !== undefined && isEnriched(listed);
      },
      process: async (applicantId) => {
        const result = await this.enrich(applicantId, force);
        if (!result.ok) {
          return "failed";
        }
        return result.data.skipped ? "skipped" : "succeeded";
      },
    });
    return succeed(summary);
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
      operation: "enrich",
      ok: false,
      error_code: errorCode,
    }, {
      ...(fields ?? {}),
      ...(error === undefined ? {} : { error: errorMessage(error) }),
    });
  }
}

export function isEnriched(applicant: ApplicantRow): boolean {
  return Boolean(applicant.llmSummary?.trim());
}

export function formatIssues(issues: string[]): string {
  return issues.length ? issues.join("; ") : "None";
}

export function formatFollowUps(followUps: string[]): string {
  return followUps.map((question) => `- ${question}`).join("\n");
}
