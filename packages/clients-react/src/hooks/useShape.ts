import { useMemo } from "react";
import {
  PRECISION_6,
  decodePolyline,
  decodeTripShape,
  type Coordinate,
  type Trip,
} from "@valroute/clients-core";

/**
 * Decoded coordinates of an encoded shape, recomputed only when the shape
 * or precision changes. A malformed shape throws during render.
 */
export function useDecodedShape(
  shape: string | undefined,
  precision: number = PRECISION_6,
): Coordinate[] {
  return useMemo(() => (shape ? decodePolyline(shape, precision) : []), [shape, precision]);
}

/** Decoded coordinates of every leg of a trip */
export function useTripShape(trip: Trip | undefined, precision: number = PRECISION_6): Coordinate[] {
  return useMemo(() => (trip ? decodeTripShape(trip, precision) : []), [trip, precision]);
}
