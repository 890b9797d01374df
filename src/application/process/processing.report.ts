import { ItemProcessingError, toErrorMessage } from "../../core/errors";
import type { MutationResult } from "../../ports/MutationAction";

export type ProcessingReport = {
  updated: number;
  skippedAlreadySatisfied: number;
  skippedNoSource: number;
  errors: number;
  remaining: number;
  dryRun: boolean;
};

export type SkipReason = "already_satisfied" | "no_source";

/**
 * Normalizes a failed result or a thrown value from the mutation action into one
 * error carrying the item id.
 */
export const toItemProcessingError = (
  itemId: string,
  failure: Extract<MutationResult, { success: false }> | { thrown: unknown }
): ItemProcessingError => {
  if ("thrown" in failure) {
    const reason = failure.thrown;
    const cause = reason instanceof Error ? reason.cause ?? reason : reason;
    return new ItemProcessingError({
      message: `Mutation failed for ${itemId}: ${toErrorMessage(reason)}`,
      context: { itemId },
      cause
    });
  }

  const detail = failure.message ? `${failure.reason}: ${failure.message}` : failure.reason;
  return new ItemProcessingError({
    message: `Mutation failed for ${itemId}: ${detail}`,
    context: { itemId }
  });
};

export const createProcessingReportTracker = (dryRun: boolean) => {
  let updated = 0;
  let skippedAlreadySatisfied = 0;
  let skippedNoSource = 0;
  let errors = 0;

  return {
    updated: () => updated,
    addUpdated: () => {
      updated += 1;
    },
    addSkipped: (reason: SkipReason) => {
      if (reason === "already_satisfied") skippedAlreadySatisfied += 1;
      else skippedNoSource += 1;
    },
    addError: () => {
      errors += 1;
    },
    report: (remaining: number): ProcessingReport => ({
      updated,
      skippedAlreadySatisfied,
      skippedNoSource,
      errors,
      remaining,
      dryRun
    })
  };
};
