import type { ItemDetail } from "../core/items/item.types";

export interface ItemDetailSource {
  /** Details for up to one batch of ids; ids the remote does not know come back with `missing: true`. */
  fetchDetails(ids: string[]): Promise<ItemDetail[]>;
}
