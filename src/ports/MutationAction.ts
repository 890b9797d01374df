import type { ItemRecord } from "../core/items/item.types";

export type MutationFailureReason =
  | "no_source_url"
  | "invalid_coordinates"
  | "download_failed"
  | "transform_failed"
  | "upload_failed";

export type MutationResult =
  | { success: true; published: boolean }
  | { success: false; reason: MutationFailureReason; message?: string };

/**
 * Applies the coordinate to one item. Must tolerate being invoked more than once
 * for the same item.
 */
export interface MutationAction {
  readonly simulated: boolean;
  apply(item: ItemRecord): Promise<MutationResult>;
}
