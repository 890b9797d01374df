import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import path from "path";
import { CorruptCheckpointError, StorageIOError, toErrorMessage } from "../../core/errors";
import { parseCheckpointJson, toCheckpointDocument } from "../../core/scan/checkpoint.codec";
import { createEmptyScanState, type ScanState } from "../../core/scan/ScanState";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import { consoleEventLogger, type EventLogger } from "../../shared/logging/eventLogger";
import { compactUtcTimestamp, systemClock, type Clock } from "../../shared/time/clock";

const hasErrnoCode = (err: unknown, code: string): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === code;

/**
 * JSON checkpoint on local disk. Saves go through a temp file in the same
 * directory (write, fsync, rename), so the destination is always either the
 * previous or the new complete document.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly logger: EventLogger;
  private readonly clock: Pick<Clock, "now">;

  constructor(
    readonly filePath: string,
    opts: { logger?: EventLogger; clock?: Pick<Clock, "now"> } = {}
  ) {
    this.logger = opts.logger ?? consoleEventLogger;
    this.clock = opts.clock ?? systemClock;
  }

  async load(): Promise<ScanState> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (hasErrnoCode(err, "ENOENT")) return createEmptyScanState();
      throw new StorageIOError({
        message: `Checkpoint read failed for ${this.filePath}: ${toErrorMessage(err)}`,
        context: { path: this.filePath },
        cause: err
      });
    }

    try {
      return parseCheckpointJson(text);
    } catch (err) {
      if (err instanceof CorruptCheckpointError) return this.quarantine(err);
      throw err;
    }
  }

  async save(state: ScanState): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);
    const body = `${JSON.stringify(toCheckpointDocument(state), null, 2)}\n`;
    let handle: FileHandle | undefined;

    try {
      await fs.mkdir(dir, { recursive: true });
      handle = await fs.open(tmpPath, "w");
      await handle.writeFile(body, "utf8");
      await handle.sync();
      await handle.close();
      handle = undefined;
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await handle?.close().catch(() => undefined);
      await fs.rm(tmpPath, { force: true }).catch(() => undefined);
      throw new StorageIOError({
        message: `Checkpoint write failed for ${this.filePath}: ${toErrorMessage(err)}`,
        context: { path: this.filePath },
        cause: err
      });
    }
  }

  private async quarantine(reason: CorruptCheckpointError): Promise<ScanState> {
    const backupPath = `${this.filePath}.corrupt.${compactUtcTimestamp(this.clock.now())}`;
    try {
      await fs.rename(this.filePath, backupPath);
    } catch (err) {
      throw new StorageIOError({
        message: `Could not move corrupt checkpoint ${this.filePath} aside: ${toErrorMessage(err)}`,
        context: { path: this.filePath },
        cause: err
      });
    }
    this.logger.warn("checkpoint.corrupt_quarantined", {
      path: this.filePath,
      backupPath,
      reason: reason.message
    });
    return createEmptyScanState();
  }
}
