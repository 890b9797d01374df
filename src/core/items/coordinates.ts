export type Coordinate = {
  lat: number;
  lon: number;
};

export const isValidCoordinate = (lat: number | undefined, lon: number | undefined): boolean =>
  typeof lat === "number" &&
  typeof lon === "number" &&
  Number.isFinite(lat) &&
  Number.isFinite(lon) &&
  lat >= -90 &&
  lat <= 90 &&
  lon >= -180 &&
  lon <= 180;

export const toCoordinate = (lat: number | undefined, lon: number | undefined): Coordinate | undefined => {
  if (lat == null || lon == null || !isValidCoordinate(lat, lon)) return undefined;
  return { lat, lon };
};

export type DmsRational = [[number, number], [number, number], [number, number]];

const HUNDREDTHS_PER_MINUTE = 60 * 100;
const HUNDREDTHS_PER_DEGREE = 60 * HUNDREDTHS_PER_MINUTE;

/**
 * Degrees/minutes/seconds as EXIF rationals; seconds keep two decimals (denominator 100).
 * Rounded once on the whole value: seconds and minutes stay below 60.
 */
export const toDmsRational = (decimal: number): DmsRational => {
  const total = Math.round(Math.abs(decimal) * HUNDREDTHS_PER_DEGREE);
  const degrees = Math.floor(total / HUNDREDTHS_PER_DEGREE);
  const remainder = total - degrees * HUNDREDTHS_PER_DEGREE;
  const minutes = Math.floor(remainder / HUNDREDTHS_PER_MINUTE);
  return [
    [degrees, 1],
    [minutes, 1],
    [remainder - minutes * HUNDREDTHS_PER_MINUTE, 100]
  ];
};
