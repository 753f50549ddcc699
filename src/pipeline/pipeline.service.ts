import { CompressionService } from "../compression/compression.service";
import { logContext, Logger } from "../config/logger";
import { EnrichmentService } from "../enrichment/enrichment.service";
import { ShortlistService } from "../shortlist/shortlist.service";
import { BatchSummary, OperationErrorCode } from "../shared/types/result.types";

export type PipelineStep = "compress" | "shortlist" | "enrich";

export interface PipelineStepReport {
  step: PipelineStep;
  ok: boolean;
  skipped?: boolean;
  error_code?: OperationErrorCode;
  message?: string;
}

export interface ApplicantPipelineReport {
  applicantId: string;
  ok: boolean;
  shortlisted: boolean | null;
  steps: PipelineStepReport[];
}

export interface PipelineRunOptions {
  forceLlm?: boolean;
}

export type PipelineBatchReport = Partial<Record<PipelineStep, BatchSummary>> & {
  ok: boolean;
  failedStep?: PipelineStep;
  message?: string;
};

/**
 * Runs compress, shortlist and enrich in that order. For a single applicant the first
 * failing step stops the run; the batch form runs each step over every applicant.
 */
export class PipelineService {
  constructor(
    private readonly compressionService: CompressionService,
    private readonly shortlistService: ShortlistService,
    private readonly enrichmentService: EnrichmentService,
    private readonly logger: Logger,
  ) {}

  async runForApplicant(
    applicantId: string,
    options: PipelineRunOptions = {},
  ): Promise<ApplicantPipelineReport> {
    const report: ApplicantPipelineReport = {
      applicantId,
      ok: false,
      shortlisted: null,
      steps: [],
    };

    const compressed = await this.compressionService.compress(applicantId);
    if (!compressed.ok) {
      report.steps.push({ step: "compress", ok: false, error_code: compressed.error_code, message: compressed.message });
      return this.finish(report);
    }
    report.steps.push({ step: "compress", ok: true });

    const shortlisted = await this.shortlistService.evaluate(applicantId);
    if (!shortlisted.ok) {
      report.steps.push({ step: "shortlist", ok: false, error_code: shortlisted.error_code, message: shortlisted.message });
      return this.finish(report);
    }
    report.shortlisted = shortlisted.data.passed;
    report.steps.push({ step: "shortlist", ok: true });

    const enriched = await this.enrichmentService.enrich(applicantId, options.forceLlm ?? false);
    if (!enriched.ok) {
      report.steps.push({ step: "enrich", ok: false, error_code: enriched.error_code, message: enriched.message });
      return this.finish(report);
    }
    report.steps.push({ step: "enrich", ok: true, skipped: enriched.data.skipped });

    report.ok = true;
    return this.finish(report);
  }

  async runForAll(options: PipelineRunOptions = {}): Promise<PipelineBatchReport> {
    const compressed = await this.compressionService.compressAll();
    if (!compressed.ok) {
      return { ok: false, failedStep: "compress", message: compressed.message };
    }

    const shortlisted = await this.shortlistService.shortlistAll();
    if (!shortlisted.ok) {
      return { ok: false, compress: compressed.data, failedStep: "shortlist", message: shortlisted.message };
    }

    const enriched = await this.enrichmentService.enrichAll(options.forceLlm ?? false);
    if (!enriched.ok) {
      return {
        ok: false,
        compress: compressed.data,
        shortlist: shortlisted.data,
        failedStep: "enrich",
        message: enriched.message,
      };
    }

    this.logger.info("pipeline.batch.completed", {
      compress: compressed.data,
      shortlist: shortlisted.data,
      enrich: enriched.data,
    });
    return {
      ok: compressed.data.failed + shortlisted.data.failed + enriched.data.failed === 0,
      compress: compressed.data,
      shortlist: shortlisted.data,
      enrich: enriched.data,
    };
  }

  private finish(report: ApplicantPipelineReport): ApplicantPipelineReport {
    const failed = report.steps.find((step) => !step.ok);
    logContext(this.logger, report.ok ? "info" : "warn", "Applicant pipeline finished", {
      applicant_id: report.applicantId,
      operation: "pipeline",
      step: failed?.step,
      ok: report.ok,
      error_code: failed?.error_code,
    }, { shortlisted: report.shortlisted });
    return report;
  }
}
