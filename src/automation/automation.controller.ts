import { Router, Request, Response } from "express";
import { errorMessage, Logger } from "../config/logger";
import { ApplicantServices } from "../app";
import { OperationErrorCode, OperationResult } from "../shared/types/result.types";

interface AutomationControllerDeps {
  services: ApplicantServices;
  logger: Logger;
  secret?: string;
}

export type AutomationOperation = "compress" | "decompress" | "shortlist" | "enrich" | "pipeline";

const AUTOMATION_OPERATIONS: readonly AutomationOperation[] = [
  "compress",
  "decompress",
  "shortlist",
  "enrich",
  "pipeline",
];

function isSecretValid(request: Request, expectedSecret?: string): boolean {
  if (!expectedSecret) {
    return true;
  }

  const header = request.header("x-automation-secret");
  return header === expectedSecret;
}

function parseOperation(value: string): AutomationOperation | null {
  return AUTOMATION_OPERATIONS.find((operation) => operation === value) ?? null;
}

export function statusForErrorCode(errorCode: OperationErrorCode): number {
  if (errorCode === "not_found") {
    return 404;
  }
  if (errorCode === "empty_document" || errorCode === "malformed_document" || errorCode === "parse_failure") {
    return 422;
  }
  return 502;
}

function isForced(request: Request): boolean {
  const query = request.query.force;
  if (query === "true" || query === "1") {
    return true;
  }
  const body: unknown = request.body;
  return typeof body === "object" && body !== null && "force" in body && body.force === true;
}

/**
 * Record-automation entry point: the store's "run script" automations call
 * POST /automation/applicants/:applicantId/:operation after a form submission or an edit.
 */
export function buildAutomationController(deps: AutomationControllerDeps): Router {
  const router = Router();

  router.post("/applicants/:applicantId/:operation", async (request: Request, response: Response) => {
    if (!isSecretValid(request, deps.secret)) {
      response.status(401).json({ ok: false, error: "Invalid automation secret" });
      return;
    }

    const applicantId = request.params.applicantId.trim();
    const operation = parseOperation(request.params.operation);
    if (!operation || !applicantId) {
      response.status(400).json({ ok: false, error: `Unsupported operation: ${request.params.operation}` });
      return;
    }

    try {
      if (operation === "pipeline") {
        const report = await deps.services.pipeline.runForApplicant(applicantId, {
          forceLlm: isForced(request),
        });
        const failed = report.steps.find((step) => !step.ok);
        const status = failed?.error_code ? statusForErrorCode(failed.error_code) : 200;
        response.status(status).json({ ...report });
        return;
      }

      const result = await runOperation(deps.services, operation, applicantId, isForced(request));
      if (!result.ok) {
        response
          .status(statusForErrorCode(result.error_code))
          .json({ ok: false, error_code: result.error_code, error: result.message });
        return;
      }
      response.status(200).json({ ok: true, data: result.data });
    } catch (error) {
      deps.logger.error("Automation request failed", {
        applicant_id: applicantId,
        operation,
        error: errorMessage(error),
      });
      response.status(500).json({ ok: false, error: "Internal error" });
    }
  });

  return router;
}

async function runOperation(
  services: ApplicantServices,
  operation: Exclude<AutomationOperation, "pipeline">,
  applicantId: string,
  force: boolean,
): Promise<OperationResult<unknown>> {
  if (operation === "compress") {
    return services.compression.compress(applicantId);
  }
  if (operation === "decompress") {
    return services.decompression.decompress(applicantId);
  }
  if (operation === "shortlist") {
    return services.shortlist.evaluate(applicantId);
  }
  return services.enrichment.enrich(applicantId, force);
}
