import type { ItemRecord } from "../../core/items/item.types";
import { removeQueuedItem, type ScanState } from "../../core/scan/ScanState";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import type { MutationAction } from "../../ports/MutationAction";
import { consoleEventLogger, type EventLogger } from "../../shared/logging/eventLogger";
import { jitterDelayMs, SlidingWindowRateLimiter } from "../../shared/rate-limit/slidingWindow";
import { systemClock, type Clock, type RandomFn } from "../../shared/time/clock";
import { createPreviewAction } from "./previewAction";
import {
  createProcessingReportTracker,
  toItemProcessingError,
  type ProcessingReport,
  type SkipReason
} from "./processing.report";
import type { ProcessorConfigInput } from "./processor.config";
import { resolveProcessorConfig } from "./processor.config";

export const shuffle = <T>(items: readonly T[], random: RandomFn): T[] => {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i -= 1) {
    const j = Math.min(i, Math.floor(random() * (i + 1)));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
};

// Queued records can be resolved by independent edits after they were scanned.
const revalidate = (item: ItemRecord): SkipReason | undefined => {
  if (!item.hasAltCoordinateSource) return "no_source";
  if (item.hasEmbeddedCoordinate) return "already_satisfied";
  return undefined;
};

/**
 * Drains the mutation queue in random order. Every item is retired from the
 * queue (updated, skipped or failed) and the checkpoint saved before the next one
 * starts. Mutation starts are capped per sliding minute and spaced by jitter.
 */
export const processQueue = async (deps: {
  state: ScanState;
  store: CheckpointStore;
  action: MutationAction;
  config?: ProcessorConfigInput;
  logger?: EventLogger;
  clock?: Clock;
  random?: RandomFn;
}): Promise<ProcessingReport> => {
  const { state, store } = deps;
  const config = resolveProcessorConfig(deps.config);
  const logger = deps.logger ?? consoleEventLogger;
  const clock = deps.clock ?? systemClock;
  const random = deps.random ?? Math.random;
  const action = config.dryRun ? createPreviewAction(logger) : deps.action;
  const throttled = !action.simulated;

  const limiter = new SlidingWindowRateLimiter({ maxPerWindow: config.maxPerMinute, clock });
  const tracker = createProcessingReportTracker(action.simulated);
  const items = shuffle(state.needsMutation, random);
  const total = items.length;

  const retire = async (item: ItemRecord) => {
    removeQueuedItem(state, item.id);
    await store.save(state);
  };

  logger.info("process.started", {
    queued: total,
    maxEdits: config.maxEdits,
    maxPerMinute: config.maxPerMinute,
    dryRun: action.simulated
  });

  for (const [index, item] of items.entries()) {
    const position = `${index + 1}/${total}`;

    const skip = revalidate(item);
    if (skip) {
      tracker.addSkipped(skip);
      await retire(item);
      logger.info("process.item_skipped", { itemId: item.id, position, reason: skip });
      continue;
    }

    if (throttled) {
      const waitedMs = await limiter.acquire();
      if (waitedMs > 0) logger.info("process.rate_limited", { waitedMs, inWindow: limiter.inWindow() });
    }

    let failure: ReturnType<typeof toItemProcessingError> | undefined;
    try {
      const result = await action.apply(item);
      if (result.success) {
        tracker.addUpdated();
        logger.info("process.item_updated", { itemId: item.id, position, published: result.published });
      } else {
        failure = toItemProcessingError(item.id, result);
      }
    } catch (err) {
      failure = toItemProcessingError(item.id, { thrown: err });
    }

    if (failure) {
      tracker.addError();
      logger.error("process.item_failed", { itemId: item.id, position, message: failure.message });
    }

    // Failed items are retired too; they come back only through a fresh scan.
    await retire(item);

    if (tracker.updated() >= config.maxEdits) {
      logger.info("process.budget_exhausted", { maxEdits: config.maxEdits, remaining: state.needsMutation.length });
      break;
    }
    if (throttled && config.baseSleepMs > 0) {
      await clock.sleep(jitterDelayMs(config.baseSleepMs, random));
    }
  }

  const report = tracker.report(state.needsMutation.length);
  logger.info("process.completed", report);
  return report;
};
