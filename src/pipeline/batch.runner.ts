import { errorMessage, Logger } from "../config/logger";
import { BatchSummary } from "../shared/types/result.types";
import { sleep as defaultSleep, SleepFn } from "../shared/utils/sleep";

export type BatchItemStatus = "succeeded" | "failed" | "skipped";

export interface SequentialBatchArgs {
  operation: string;
  applicantIds: string[];
  process: (applicantId: string) => Promise<BatchItemStatus>;
  shouldSkip?: (applicantId: string) => boolean;
  logger: Logger;
  delayMs?: number;
  sleep?: SleepFn;
}

/**
 * Processes applicants one at a time. A failing or throwing item is counted and logged,
 * never allowed to abort the rest of the batch. The optional delay is applied between
 * processed items only; items rejected by `shouldSkip` do not wait.
 */
export async function runSequentialBatch(args: SequentialBatchArgs): Promise<BatchSummary> {
  const sleep = args.sleep ?? defaultSleep;
  const delayMs = Math.max(0, args.delayMs ?? 0);
  const summary: BatchSummary = {
    total: args.applicantIds.length,
    succeeded: 0,
    failed: 0,
    skipped: 0,
  };

  args.logger.info(`${args.operation}.batch.started`, {
    operation: args.operation,
    total: summary.total,
  });

  let processedBefore = false;
  for (const applicantId of args.applicantIds) {
    if (args.shouldSkip?.(applicantId)) {
      summary.skipped += 1;
      continue;
    }

    let status: BatchItemStatus;
    try {
      if (processedBefore && delayMs > 0) {
        await sleep(delayMs);
      }
      status = await args.process(applicantId);
    } catch (error) {
      args.logger.error(`${args.operation}.batch.item_threw`, {
        applicant_id: applicantId,
        operation: args.operation,
        error: errorMessage(error),
      });
      status = "failed";
    }

    processedBefore = true;
    if (status === "skipped") {
      summary.skipped += 1;
      continue;
    }
    if (status === "succeeded") {
      summary.succeeded += 1;
    } else {
      summary.failed += 1;
    }
  }

  args.logger.info(`${args.operation}.batch.completed`, {
    operation: args.operation,
    ...summary,
  });
  return summary;
}
