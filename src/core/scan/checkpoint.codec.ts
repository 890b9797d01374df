import { CorruptCheckpointError } from "../errors";
import type { ItemRecord } from "../items/item.types";
import { stripFilePrefix } from "../items/classifyItem";
import { createEmptyScanState, dedupeScanState, type JsonValue, type ScanState } from "./ScanState";

export type CheckpointItem = {
  id: string;
  has_alt_source: boolean;
  has_embedded: boolean;
  lat: number | null;
  lon: number | null;
  source_url: string | null;
  author: string | null;
};

export type CheckpointDocument = {
  needs_mutation: CheckpointItem[];
  needs_alternate_action: string[];
  continuation: JsonValue;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
};

const optionalNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() !== "" ? value : undefined;

const corrupt = (message: string) => new CorruptCheckpointError({ message: `Invalid checkpoint: ${message}` });

const parseItem = (raw: unknown, index: number): ItemRecord => {
  // Older checkpoints may hold a bare title instead of an item object.
  if (typeof raw === "string") {
    const id = stripFilePrefix(raw.trim());
    if (id === "") throw corrupt(`needs_mutation[${index}] has an empty id`);
    return { id, hasAltCoordinateSource: false, hasEmbeddedCoordinate: false };
  }
  if (!isRecord(raw)) throw corrupt(`needs_mutation[${index}] is not an object`);

  const rawId = optionalString(raw.id) ?? optionalString(raw.title);
  if (!rawId) throw corrupt(`needs_mutation[${index}] has no id`);

  const record: ItemRecord = {
    id: stripFilePrefix(rawId),
    hasAltCoordinateSource: (raw.has_alt_source ?? raw.has_coords) === true,
    hasEmbeddedCoordinate: (raw.has_embedded ?? raw.has_exif_gps) === true
  };
  const lat = optionalNumber(raw.lat);
  const lon = optionalNumber(raw.lon);
  const sourceUrl = optionalString(raw.source_url) ?? optionalString(raw.url);
  const author = optionalString(raw.author);
  if (lat != null) record.lat = lat;
  if (lon != null) record.lon = lon;
  if (sourceUrl) record.sourceUrl = sourceUrl;
  if (author) record.author = author;
  return record;
};

const parseIdList = (raw: unknown): string[] => {
  if (raw == null) return [];
  if (!Array.isArray(raw)) throw corrupt("needs_alternate_action is not an array");
  return raw.map((value, index) => {
    if (typeof value !== "string" || value.trim() === "") {
      throw corrupt(`needs_alternate_action[${index}] is not a title`);
    }
    return stripFilePrefix(value.trim());
  });
};

/**
 * Validates a parsed checkpoint. Accepts both the current field names and the
 * needs_exif / needs_template / scan_continue layout written by earlier releases.
 * Throws CorruptCheckpointError on any shape mismatch.
 */
export const parseCheckpointDocument = (raw: unknown): ScanState => {
  if (raw == null) return createEmptyScanState();
  if (!isRecord(raw)) throw corrupt("top-level value is not an object");

  const rawItems = raw.needs_mutation ?? raw.needs_exif ?? [];
  if (!Array.isArray(rawItems)) throw corrupt("needs_mutation is not an array");

  const continuation = raw.continuation !== undefined ? raw.continuation : raw.scan_continue;
  let continuationToken: JsonValue = null;
  if (continuation !== undefined) {
    if (!isJsonValue(continuation)) throw corrupt("continuation is not JSON-serializable");
    continuationToken = continuation;
  }

  return dedupeScanState({
    needsMutation: rawItems.map(parseItem),
    needsAlternateAction: parseIdList(raw.needs_alternate_action ?? raw.needs_template),
    continuationToken
  });
};

export const parseCheckpointJson = (text: string): ScanState => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new CorruptCheckpointError({ message: "Invalid checkpoint: not valid JSON", cause: err });
  }
  return parseCheckpointDocument(parsed);
};

export const toCheckpointDocument = (state: ScanState): CheckpointDocument => ({
  needs_mutation: state.needsMutation.map((item) => ({
    id: item.id,
    has_alt_source: item.hasAltCoordinateSource,
    has_embedded: item.hasEmbeddedCoordinate,
    lat: item.lat ?? null,
    lon: item.lon ?? null,
    source_url: item.sourceUrl ?? null,
    author: item.author ?? null
  })),
  needs_alternate_action: [...state.needsAlternateAction],
  continuation: state.continuationToken
});
