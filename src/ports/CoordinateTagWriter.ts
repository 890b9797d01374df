import type { Coordinate } from "../core/items/coordinates";

export interface CoordinateTagWriter {
  /** Returns the payload with its GPS tag set to `coordinate`; other metadata is preserved. */
  writeCoordinate(payload: Buffer, coordinate: Coordinate): Buffer;
}
