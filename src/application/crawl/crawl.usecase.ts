import { TransientFetchError } from "../../core/errors";
import { stripFilePrefix } from "../../core/items/classifyItem";
import type { RawEntry } from "../../core/items/item.types";
import { isCrawlComplete, knownIds, type ScanState } from "../../core/scan/ScanState";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import type { ListingGateway, ListingScope } from "../../ports/ListingGateway";
import { consoleEventLogger, type EventLogger } from "../../shared/logging/eventLogger";
import { systemClock, type Clock } from "../../shared/time/clock";
import type { CrawlerConfigInput } from "./crawler.config";
import { resolveCrawlerConfig } from "./crawler.config";
import type { ItemClassifier } from "./itemClassifier";

export type CrawlStatus = "complete" | "interrupted" | "skipped";

export type CrawlOutcome = {
  status: CrawlStatus;
  state: ScanState;
  pagesProcessed: number;
  queuedForMutation: number;
  queuedForAlternateAction: number;
  excluded: number;
  dropped: number;
  duplicates: number;
  prunedStale: number;
  error?: TransientFetchError;
};

type CrawlCounters = Omit<CrawlOutcome, "status" | "state" | "error">;

export const describeScope = (scope: ListingScope): string => {
  switch (scope.kind) {
    case "user":
      return `user:${scope.user}`;
    case "category":
      return `category:${scope.category} (depth ${scope.maxDepth})`;
    case "titles":
      return `titles:${scope.titles.length}`;
  }
};

/**
 * Walks the listing page by page, classifying entries not seen before and
 * persisting the checkpoint (queues and cursor) after every page, before the
 * next page is requested.
 */
export const crawl = async (deps: {
  gateway: ListingGateway;
  classifier: ItemClassifier;
  store: CheckpointStore;
  scope: ListingScope;
  state: ScanState;
  config?: CrawlerConfigInput;
  logger?: EventLogger;
  clock?: Clock;
}): Promise<CrawlOutcome> => {
  const { gateway, classifier, store, scope, state } = deps;
  const config = resolveCrawlerConfig(deps.config);
  const logger = deps.logger ?? consoleEventLogger;
  const clock = deps.clock ?? systemClock;
  const scopeLabel = describeScope(scope);

  const counters: CrawlCounters = {
    pagesProcessed: 0,
    queuedForMutation: 0,
    queuedForAlternateAction: 0,
    excluded: 0,
    dropped: 0,
    duplicates: 0,
    prunedStale: 0
  };
  const outcome = (status: CrawlStatus, error?: TransientFetchError): CrawlOutcome =>
    error ? { status, state, ...counters, error } : { status, state, ...counters };

  // Records queued by an older session may have lost their page coordinate since.
  const before = state.needsMutation.length;
  state.needsMutation = state.needsMutation.filter((item) => item.hasAltCoordinateSource);
  counters.prunedStale = before - state.needsMutation.length;
  if (counters.prunedStale > 0) {
    await store.save(state);
  }

  if (config.rescan) {
    state.continuationToken = null;
  } else if (isCrawlComplete(state)) {
    logger.info("crawl.skipped", {
      scope: scopeLabel,
      reason: "previous_scan_complete",
      needsMutation: state.needsMutation.length,
      needsAlternateAction: state.needsAlternateAction.length
    });
    return outcome("skipped");
  }

  const seen = knownIds(state);
  logger.info("crawl.started", {
    scope: scopeLabel,
    resumed: state.continuationToken !== null,
    known: seen.size
  });

  while (true) {
    let entries: RawEntry[] = [];
    let nextCursor: ScanState["continuationToken"] = null;
    try {
      const page = await gateway.listPage(scope, state.continuationToken);
      nextCursor = page.nextCursor;
      entries = page.entries;

      const fresh: RawEntry[] = [];
      for (const entry of entries) {
        const id = stripFilePrefix(entry.id);
        if (seen.has(id)) {
          counters.duplicates += 1;
          continue;
        }
        seen.add(id);
        fresh.push({ id });
      }

      const classified = await classifier.classifyMany(fresh);
      for (const item of classified) {
        switch (item.route) {
          case "needsMutation":
            state.needsMutation.push(item.record);
            counters.queuedForMutation += 1;
            break;
          case "needsAlternateAction":
            state.needsAlternateAction.push(item.record.id);
            counters.queuedForAlternateAction += 1;
            break;
          case "excluded":
            counters.excluded += 1;
            break;
          case "dropped":
            counters.dropped += 1;
            break;
        }
      }
    } catch (err) {
      if (err instanceof TransientFetchError) {
        logger.warn("crawl.interrupted", {
          scope: scopeLabel,
          pagesProcessed: counters.pagesProcessed,
          message: err.message,
          status: err.status ?? null
        });
        return outcome("interrupted", err);
      }
      throw err;
    }

    state.continuationToken = nextCursor;
    await store.save(state);
    counters.pagesProcessed += 1;
    logger.info("crawl.page_saved", {
      scope: scopeLabel,
      page: counters.pagesProcessed,
      entries: entries.length,
      needsMutation: state.needsMutation.length,
      needsAlternateAction: state.needsAlternateAction.length,
      hasMore: nextCursor !== null
    });

    if (nextCursor === null || entries.length === 0) break;
    if (config.pageDelayMs > 0) await clock.sleep(config.pageDelayMs);
  }

  logger.info("crawl.completed", { scope: scopeLabel, ...counters });
  return outcome("complete");
};
