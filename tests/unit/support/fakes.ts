import type { ItemDetail } from "../../../src/core/items/item.types";
import type { ScanState } from "../../../src/core/scan/ScanState";
import type { CheckpointStore } from "../../../src/ports/CheckpointStore";
import type { ItemDetailSource } from "../../../src/ports/ItemDetailSource";

/**
 * Details derived from the id: "geo-*" has a page coordinate, "exif-*" has EXIF GPS,
 * "both-*" has both, "gone-*" is missing, anything else has neither.
 */
export const detailFromName = (id: string): ItemDetail => ({
  id,
  missing: id.startsWith("gone-"),
  isRedirect: false,
  mime: "image/jpeg",
  sourceUrl: `https://upload.example.org/${id}`,
  hasPageCoordinates: id.startsWith("geo-") || id.startsWith("both-"),
  pageLat: id.startsWith("geo-") ? 48.1 : undefined,
  pageLon: id.startsWith("geo-") ? 11.6 : undefined,
  hasEmbeddedCoordinate: id.startsWith("exif-") || id.startsWith("both-")
});

export class FakeDetailSource implements ItemDetailSource {
  readonly batches: string[][] = [];

  constructor(private readonly log: string[] = []) {}

  async fetchDetails(ids: string[]): Promise<ItemDetail[]> {
    this.batches.push([...ids]);
    this.log.push(`details:${ids.length}`);
    return ids.map(detailFromName);
  }
}

export class RecordingStore implements CheckpointStore {
  readonly saved: ScanState[] = [];
  current: ScanState;

  constructor(initial: ScanState, private readonly log: string[] = []) {
    this.current = initial;
  }

  async load(): Promise<ScanState> {
    return this.current;
  }

  async save(state: ScanState): Promise<void> {
    const copy: ScanState = JSON.parse(JSON.stringify(state));
    this.saved.push(copy);
    this.current = copy;
    this.log.push("save");
  }
}
