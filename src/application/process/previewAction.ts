import type { ItemRecord } from "../../core/items/item.types";
import type { MutationAction, MutationResult } from "../../ports/MutationAction";
import type { EventLogger } from "../../shared/logging/eventLogger";

/** Stands in for the real action on dry runs: reports what would be written. */
export const createPreviewAction = (logger: EventLogger): MutationAction => ({
  simulated: true,
  apply: async (item: ItemRecord): Promise<MutationResult> => {
    logger.info("process.dry_run_item", {
      itemId: item.id,
      lat: item.lat ?? null,
      lon: item.lon ?? null,
      sourceUrl: item.sourceUrl ?? null
    });
    return { success: true, published: false };
  }
});
