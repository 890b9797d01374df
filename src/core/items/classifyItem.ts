import type { ClassifiedItem, ExclusionReason, ItemDetail, ItemRecord } from "./item.types";

export type EligibilityFilter = {
  authorFilter?: string;
};

const JPEG_EXTENSIONS = [".jpg", ".jpeg"];

export const stripFilePrefix = (title: string): string =>
  title.startsWith("File:") ? title.slice("File:".length) : title;

const isJpeg = (detail: ItemDetail): boolean => {
  if (detail.mime) return detail.mime.toLowerCase() === "image/jpeg";
  const lower = detail.id.toLowerCase();
  return JPEG_EXTENSIONS.some((ext) => lower.endsWith(ext));
};

// Unknown author passes; only a known author that does not contain the filter is excluded.
const authorMatches = (detail: ItemDetail, filter: EligibilityFilter): boolean => {
  const wanted = filter.authorFilter?.trim().toLowerCase();
  if (!wanted || !detail.author) return true;
  return detail.author.toLowerCase().includes(wanted);
};

const exclusionReason = (detail: ItemDetail, filter: EligibilityFilter): ExclusionReason | undefined => {
  if (detail.missing) return "missing";
  if (detail.isRedirect) return "redirect";
  if (!isJpeg(detail)) return "not_jpeg";
  if (!authorMatches(detail, filter)) return "author_mismatch";
  return undefined;
};

export const toItemRecord = (detail: ItemDetail): ItemRecord => {
  const record: ItemRecord = {
    id: detail.id,
    hasAltCoordinateSource: detail.hasPageCoordinates,
    hasEmbeddedCoordinate: detail.hasEmbeddedCoordinate
  };
  if (detail.pageLat != null) record.lat = detail.pageLat;
  if (detail.pageLon != null) record.lon = detail.pageLon;
  if (detail.sourceUrl) record.sourceUrl = detail.sourceUrl;
  if (detail.author) record.author = detail.author;
  return record;
};

export const isEligibleForMutation = (record: Pick<ItemRecord, "hasAltCoordinateSource" | "hasEmbeddedCoordinate">) =>
  record.hasAltCoordinateSource && !record.hasEmbeddedCoordinate;

/**
 * Routes one item:
 * - fails eligibility (missing, redirect, not JPEG, author mismatch) -> excluded
 * - page coordinate without EXIF GPS -> needsMutation
 * - EXIF GPS without page coordinate -> needsAlternateAction
 * - both or neither -> dropped
 */
export const classifyItem = (detail: ItemDetail, filter: EligibilityFilter = {}): ClassifiedItem => {
  const reason = exclusionReason(detail, filter);
  if (reason) return { route: "excluded", id: detail.id, reason };

  const record = toItemRecord(detail);
  if (isEligibleForMutation(record)) return { route: "needsMutation", record };
  if (record.hasEmbeddedCoordinate && !record.hasAltCoordinateSource) {
    return { route: "needsAlternateAction", record };
  }
  return { route: "dropped", record };
};
