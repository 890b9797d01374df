import type { RawEntry } from "../core/items/item.types";
import type { ContinuationCursor } from "../core/scan/ScanState";

export type ListingScope =
  | { kind: "user"; user: string }
  | { kind: "category"; category: string; maxDepth: number }
  | { kind: "titles"; titles: readonly string[] };

export type ListingPage = {
  entries: RawEntry[];
  nextCursor: ContinuationCursor | null; // null: listing exhausted
};

/**
 * One paginated listing call. Throws TransientFetchError on network/5xx/429 and
 * FatalAuthError on authorization failures.
 */
export interface ListingGateway {
  listPage(scope: ListingScope, cursor: ContinuationCursor | null): Promise<ListingPage>;
}
