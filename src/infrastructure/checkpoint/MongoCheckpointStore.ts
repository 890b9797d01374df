import { MongoClient, type Collection } from "mongodb";
import { CorruptCheckpointError, StorageIOError, toErrorMessage } from "../../core/errors";
import { parseCheckpointDocument, toCheckpointDocument } from "../../core/scan/checkpoint.codec";
import { createEmptyScanState, type ScanState } from "../../core/scan/ScanState";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import { consoleEventLogger, type EventLogger } from "../../shared/logging/eventLogger";
import { compactUtcTimestamp, systemClock, type Clock } from "../../shared/time/clock";

export type CheckpointRecord = {
  _id: string;
  document: unknown;
  updatedAt: Date;
};

/**
 * Checkpoint kept as a single document per key. A replace of one document is
 * atomic, which gives the same all-or-nothing visibility as the file store when
 * scanning and processing run on different hosts.
 */
export class MongoCheckpointStore implements CheckpointStore {
  private client?: MongoClient;
  private collection?: Collection<CheckpointRecord>;
  private readonly logger: EventLogger;
  private readonly clock: Pick<Clock, "now">;
  private readonly dbName: string;
  private readonly collectionName: string;

  constructor(
    private readonly mongoUri: string,
    private readonly key = "default",
    opts: { dbName?: string; collectionName?: string; logger?: EventLogger; clock?: Pick<Clock, "now"> } = {}
  ) {
    this.dbName = opts.dbName ?? "geotagger";
    this.collectionName = opts.collectionName ?? "checkpoints";
    this.logger = opts.logger ?? consoleEventLogger;
    this.clock = opts.clock ?? systemClock;
  }

  private async getCollection(): Promise<Collection<CheckpointRecord>> {
    if (this.collection) return this.collection;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();
    this.collection = this.client.db(this.dbName).collection<CheckpointRecord>(this.collectionName);
    return this.collection;
  }

  async load(): Promise<ScanState> {
    const col = await this.getCollection();
    const record = await col.findOne({ _id: this.key });
    if (!record) return createEmptyScanState();

    try {
      return parseCheckpointDocument(record.document);
    } catch (err) {
      if (!(err instanceof CorruptCheckpointError)) throw err;
      const backupKey = `${this.key}.corrupt.${compactUtcTimestamp(this.clock.now())}`;
      await col.replaceOne(
        { _id: backupKey },
        { document: record.document, updatedAt: new Date(this.clock.now()) },
        { upsert: true }
      );
      await col.deleteOne({ _id: this.key });
      this.logger.warn("checkpoint.corrupt_quarantined", { key: this.key, backupKey, reason: err.message });
      return createEmptyScanState();
    }
  }

  async save(state: ScanState): Promise<void> {
    try {
      const col = await this.getCollection();
      await col.replaceOne(
        { _id: this.key },
        { document: toCheckpointDocument(state), updatedAt: new Date(this.clock.now()) },
        { upsert: true }
      );
    } catch (err) {
      throw new StorageIOError({
        message: `Checkpoint write failed for key ${this.key}: ${toErrorMessage(err)}`,
        context: { path: this.key },
        cause: err
      });
    }
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
