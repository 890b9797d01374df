import type { ItemRecord } from "../items/item.types";

/** Opaque, gateway-owned resume position. Must survive a JSON round-trip. */
export type ContinuationCursor = JsonValue;

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ScanState = {
  needsMutation: ItemRecord[];
  needsAlternateAction: string[];
  continuationToken: ContinuationCursor | null;
};

export const createEmptyScanState = (): ScanState => ({
  needsMutation: [],
  needsAlternateAction: [],
  continuationToken: null
});

export const knownIds = (state: ScanState): Set<string> =>
  new Set([...state.needsMutation.map((item) => item.id), ...state.needsAlternateAction]);

/**
 * Collapses duplicate ids, keeping the first occurrence. An id queued for mutation
 * is removed from the alternate-action list.
 */
export const dedupeScanState = (state: ScanState): ScanState => {
  const mutationIds = new Set<string>();
  const needsMutation = state.needsMutation.filter((item) => {
    if (mutationIds.has(item.id)) return false;
    mutationIds.add(item.id);
    return true;
  });

  const alternateIds = new Set<string>();
  const needsAlternateAction = state.needsAlternateAction.filter((id) => {
    if (mutationIds.has(id) || alternateIds.has(id)) return false;
    alternateIds.add(id);
    return true;
  });

  return { needsMutation, needsAlternateAction, continuationToken: state.continuationToken };
};

export const removeQueuedItem = (state: ScanState, id: string): boolean => {
  const index = state.needsMutation.findIndex((item) => item.id === id);
  if (index === -1) return false;
  state.needsMutation.splice(index, 1);
  return true;
};

/**
 * A previous crawl ran to the end: both queues still hold work and there is no
 * cursor left to follow. Once either queue has been drained the listing runs again.
 */
export const isCrawlComplete = (state: ScanState): boolean =>
  state.continuationToken === null && state.needsMutation.length > 0 && state.needsAlternateAction.length > 0;
