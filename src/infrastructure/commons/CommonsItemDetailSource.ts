import { stripFilePrefix } from "../../core/items/classifyItem";
import type { ItemDetail } from "../../core/items/item.types";
import type { ItemDetailSource } from "../../ports/ItemDetailSource";
import { isRecord, type CommonsApiClient } from "./CommonsApiClient";

const toFiniteNumber = (value: unknown): number | undefined => {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

/** Reads a numeric entry from the extracted EXIF metadata list (`[{ name, value }]`). */
export const readMetadataNumber = (metadata: unknown, name: string): number | undefined => {
  if (!Array.isArray(metadata)) return undefined;
  const entry = metadata.find((item) => isRecord(item) && item.name === name);
  return isRecord(entry) ? toFiniteNumber(entry.value) : undefined;
};

export const hasEmbeddedGps = (metadata: unknown): boolean =>
  readMetadataNumber(metadata, "GPSLatitude") !== undefined && readMetadataNumber(metadata, "GPSLongitude") !== undefined;

export const toItemDetail = (page: Record<string, unknown>, id: string): ItemDetail => {
  const coordinates = Array.isArray(page.coordinates) ? page.coordinates.filter(isRecord) : [];
  const primary = coordinates[0];
  const imageinfo = Array.isArray(page.imageinfo) ? page.imageinfo.filter(isRecord) : [];
  const info = imageinfo[0] ?? {};

  const detail: ItemDetail = {
    id,
    missing: page.missing === true || page.invalid === true,
    isRedirect: page.redirect === true,
    hasPageCoordinates: primary !== undefined,
    hasEmbeddedCoordinate: hasEmbeddedGps(info.metadata)
  };

  const lat = primary ? toFiniteNumber(primary.lat) : undefined;
  const lon = primary ? toFiniteNumber(primary.lon) : undefined;
  if (lat !== undefined) detail.pageLat = lat;
  if (lon !== undefined) detail.pageLon = lon;
  if (typeof info.url === "string") detail.sourceUrl = info.url;
  if (typeof info.user === "string") detail.author = info.user;
  if (typeof info.mime === "string") detail.mime = info.mime;
  return detail;
};

/**
 * One `prop=imageinfo|coordinates` query per batch of titles. Titles the API
 * normalizes are mapped back to the id they were requested under.
 */
export class CommonsItemDetailSource implements ItemDetailSource {
  constructor(private readonly api: Pick<CommonsApiClient, "get">) {}

  async fetchDetails(ids: string[]): Promise<ItemDetail[]> {
    if (ids.length === 0) return [];

    const response = await this.api.get({
      action: "query",
      prop: "imageinfo|coordinates",
      iiprop: "url|metadata|user|mime",
      titles: ids.map((id) => `File:${id}`).join("|")
    });

    const query = isRecord(response.query) ? response.query : {};
    const requestedAs = new Map<string, string>();
    if (Array.isArray(query.normalized)) {
      for (const entry of query.normalized.filter(isRecord)) {
        if (typeof entry.from === "string" && typeof entry.to === "string") {
          requestedAs.set(stripFilePrefix(entry.to), stripFilePrefix(entry.from));
        }
      }
    }

    const pages = Array.isArray(query.pages) ? query.pages.filter(isRecord) : [];
    return pages
      .filter((page) => typeof page.title === "string")
      .map((page) => {
        const title = stripFilePrefix(String(page.title));
        return toItemDetail(page, requestedAs.get(title) ?? title);
      });
  }
}
