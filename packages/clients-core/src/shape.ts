import type { Coordinate, Leg, ShapeFormat, Trip } from "@valroute/types";
import { PRECISION_5, PRECISION_6, decodePolyline, encodePolyline } from "./polyline.js";

/** Precision factor for a polyline shape format */
export function precisionForShapeFormat(format: ShapeFormat): number {
  switch (format) {
    case "polyline5":
      return PRECISION_5;
    case "polyline6":
      return PRECISION_6;
    default:
      throw new RangeError(`Shape format "${format}" is not an encoded polyline`);
  }
}

/** Coordinates of a leg's shape, or an empty list when the leg has none */
export function decodeLegShape(leg: Leg, precision: number = PRECISION_6): Coordinate[] {
  return leg.shape ? decodePolyline(leg.shape, precision) : [];
}

/**
 * Coordinates of a whole trip. Consecutive legs share their junction
 * point, which is kept once.
 */
export function decodeTripShape(trip: Trip, precision: number = PRECISION_6): Coordinate[] {
  const coordinates: Coordinate[] = [];
  for (const leg of trip.legs ?? []) {
    const points = decodeLegShape(leg, precision);
    const last = coordinates[coordinates.length - 1];
    const first = points[0];
    const start = last && first && last.lat === first.lat && last.lon === first.lon ? 1 : 0;
    coordinates.push(...points.slice(start));
  }
  return coordinates;
}

/** Encode a GPS trace for a request's `encodedPolyline` field (always polyline6) */
export function encodeTrace(coordinates: readonly Coordinate[]): string {
  return encodePolyline(coordinates, PRECISION_6);
}
