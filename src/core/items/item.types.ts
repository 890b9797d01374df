export type ItemRecord = {
  id: string;                       // file title without the "File:" namespace prefix
  hasAltCoordinateSource: boolean;  // description page carries a coordinate
  hasEmbeddedCoordinate: boolean;   // EXIF block already carries GPS
  lat?: number;
  lon?: number;
  sourceUrl?: string;
  author?: string;
};

/**
 * Per-item detail as returned by the remote API, before classification.
 */
export type ItemDetail = {
  id: string;
  missing: boolean;
  isRedirect: boolean;
  mime?: string;
  author?: string;
  sourceUrl?: string;
  pageLat?: number;
  pageLon?: number;
  hasPageCoordinates: boolean;
  hasEmbeddedCoordinate: boolean;
};

export type RawEntry = {
  id: string;
};

export type ItemRoute = "needsMutation" | "needsAlternateAction" | "excluded" | "dropped";

export type ExclusionReason = "missing" | "redirect" | "not_jpeg" | "author_mismatch";

export type ClassifiedItem =
  | { route: "needsMutation"; record: ItemRecord }
  | { route: "needsAlternateAction"; record: ItemRecord }
  | { route: "dropped"; record: ItemRecord }
  | { route: "excluded"; id: string; reason: ExclusionReason };
