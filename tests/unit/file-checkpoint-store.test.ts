import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { StorageIOError } from "../../src/core/errors";
import type { ScanState } from "../../src/core/scan/ScanState";
import { FileCheckpointStore } from "../../src/infrastructure/checkpoint/FileCheckpointStore";
import { silentEventLogger } from "../../src/shared/logging/eventLogger";

const fixedClock = { now: () => Date.UTC(2026, 0, 2, 3, 4, 5) };

const sampleState = (): ScanState => ({
  needsMutation: [
    {
      id: "Harbour at dusk.jpg",
      hasAltCoordinateSource: true,
      hasEmbeddedCoordinate: false,
      lat: 54.3,
      lon: 10.1,
      sourceUrl: "https://upload.example.org/Harbour_at_dusk.jpg"
    }
  ],
  needsAlternateAction: ["Old map.jpg"],
  continuationToken: { kind: "user", continue: { lecontinue: "20260101|7", continue: "-||" } }
});

describe("FileCheckpointStore", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "geotag-checkpoint-"));
    filePath = path.join(dir, "gps_scan.json");
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns an empty state when no checkpoint exists", async () => {
    const store = new FileCheckpointStore(filePath, { logger: silentEventLogger });
    await expect(store.load()).resolves.toEqual({ needsMutation: [], needsAlternateAction: [], continuationToken: null });
  });

  it("reads back what it saved and leaves no temp files behind", async () => {
    const store = new FileCheckpointStore(filePath, { logger: silentEventLogger });

    await store.save(sampleState());

    await expect(store.load()).resolves.toEqual(sampleState());
    expect(await fs.readdir(dir)).toEqual(["gps_scan.json"]);
  });

  it("creates the parent directory on first save", async () => {
    const nested = path.join(dir, "state", "scan.json");
    const store = new FileCheckpointStore(nested, { logger: silentEventLogger });

    await store.save(sampleState());

    await expect(fs.readFile(nested, "utf8")).resolves.toContain('"needs_alternate_action"');
  });

  it("quarantines an unreadable checkpoint and starts empty", async () => {
    await fs.writeFile(filePath, "");
    const logger = { info: jest.fn(), warn: jest.fn(), error: jest.fn() };
    const store = new FileCheckpointStore(filePath, { logger, clock: fixedClock });

    await expect(store.load()).resolves.toEqual({ needsMutation: [], needsAlternateAction: [], continuationToken: null });

    const backupPath = `${filePath}.corrupt.20260102030405`;
    expect((await fs.readdir(dir)).sort()).toEqual(["gps_scan.json.corrupt.20260102030405"]);
    expect(logger.warn).toHaveBeenCalledWith("checkpoint.corrupt_quarantined", {
      path: filePath,
      backupPath,
      reason: "Invalid checkpoint: not valid JSON"
    });
  });

  it("ignores a stray temp file from an interrupted save", async () => {
    const store = new FileCheckpointStore(filePath, { logger: silentEventLogger });
    await store.save(sampleState());
    await fs.writeFile(path.join(dir, ".gps_scan.json.999.deadbeef.tmp"), '{"needs_mut');

    await expect(store.load()).resolves.toEqual(sampleState());
  });

  it("keeps the previous checkpoint when the rename fails", async () => {
    const store = new FileCheckpointStore(filePath, { logger: silentEventLogger });
    await store.save(sampleState());
    const before = await fs.readFile(filePath, "utf8");

    jest.spyOn(fs, "rename").mockRejectedValueOnce(Object.assign(new Error("EXDEV: cross-device link"), { code: "EXDEV" }));

    const next = sampleState();
    next.needsMutation = [];
    const failure = store.save(next);

    await expect(failure).rejects.toBeInstanceOf(StorageIOError);
    await expect(failure).rejects.toThrow(`Checkpoint write failed for ${filePath}: EXDEV: cross-device link`);
    expect(await fs.readFile(filePath, "utf8")).toBe(before);
    expect(await fs.readdir(dir)).toEqual(["gps_scan.json"]);
  });
});
