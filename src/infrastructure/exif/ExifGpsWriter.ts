import * as piexif from "piexifjs";
import { toDmsRational, type Coordinate, type DmsRational } from "../../core/items/coordinates";
import type { CoordinateTagWriter } from "../../ports/CoordinateTagWriter";

// GPS IFD tag numbers (EXIF 2.3, section 4.6.6)
const GPS_TAGS = {
  versionId: 0,
  latitudeRef: 1,
  latitude: 2,
  longitudeRef: 3,
  longitude: 4
} as const;

export type GpsFields = {
  latitudeRef: "N" | "S";
  latitude: DmsRational;
  longitudeRef: "E" | "W";
  longitude: DmsRational;
};

export const toGpsFields = (coordinate: Coordinate): GpsFields => ({
  latitudeRef: coordinate.lat >= 0 ? "N" : "S",
  latitude: toDmsRational(coordinate.lat),
  longitudeRef: coordinate.lon >= 0 ? "E" : "W",
  longitude: toDmsRational(coordinate.lon)
});

/**
 * Writes the GPS IFD of a JPEG through piexifjs, which works on binary strings.
 * Existing 0th/Exif/1st data is carried over unchanged.
 */
export class ExifGpsWriter implements CoordinateTagWriter {
  writeCoordinate(payload: Buffer, coordinate: Coordinate): Buffer {
    const jpeg = payload.toString("binary");
    const fields = toGpsFields(coordinate);
    const exif = piexif.load(jpeg);

    const updated = {
      ...exif,
      GPS: {
        [GPS_TAGS.versionId]: [2, 3, 0, 0],
        [GPS_TAGS.latitudeRef]: fields.latitudeRef,
        [GPS_TAGS.latitude]: fields.latitude,
        [GPS_TAGS.longitudeRef]: fields.longitudeRef,
        [GPS_TAGS.longitude]: fields.longitude
      }
    };

    return Buffer.from(piexif.insert(piexif.dump(updated), jpeg), "binary");
  }
}
