import { classifyItem, stripFilePrefix, type EligibilityFilter } from "../../core/items/classifyItem";
import type { ClassifiedItem, ItemDetail, RawEntry } from "../../core/items/item.types";
import type { ItemDetailSource } from "../../ports/ItemDetailSource";

const missingDetail = (id: string): ItemDetail => ({
  id,
  missing: true,
  isRedirect: false,
  hasPageCoordinates: false,
  hasEmbeddedCoordinate: false
});

/**
 * Fetches item details in fixed-size batches and routes each entry.
 * Results come back in the order of the input entries.
 */
export class ItemClassifier {
  constructor(
    private readonly source: ItemDetailSource,
    private readonly filter: EligibilityFilter = {},
    private readonly batchSize = 50
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error("batchSize must be an integer >= 1");
    }
  }

  async classify(entry: RawEntry): Promise<ClassifiedItem> {
    const [result] = await this.classifyMany([entry]);
    return result;
  }

  async classifyMany(entries: RawEntry[]): Promise<ClassifiedItem[]> {
    const ids = entries.map((entry) => stripFilePrefix(entry.id));
    const details = new Map<string, ItemDetail>();

    for (let i = 0; i < ids.length; i += this.batchSize) {
      const batch = ids.slice(i, i + this.batchSize);
      const fetched = await this.source.fetchDetails(batch);
      for (const detail of fetched) {
        details.set(detail.id, detail);
      }
    }

    return ids.map((id) => classifyItem(details.get(id) ?? missingDetail(id), this.filter));
  }
}
