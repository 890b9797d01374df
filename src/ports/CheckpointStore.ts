import type { ScanState } from "../core/scan/ScanState";

export interface CheckpointStore {
  /** Never throws on an unreadable checkpoint: it is quarantined and an empty state returned. */
  load(): Promise<ScanState>;
  /** Atomic: a concurrent reader sees either the previous or the new state. Throws StorageIOError. */
  save(state: ScanState): Promise<void>;
  close?(): Promise<void>;
}
