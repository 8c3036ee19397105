/**
 * Encoded polyline codec.
 *
 * Coordinates are scaled to integers by the precision factor, delta-coded
 * against the previous point, zig-zag mapped to unsigned values and packed
 * into 5-bit groups (least significant first). Every group is offset by 63
 * to land in printable ASCII; all but the last group of a value carry the
 * 0x20 continuation bit. Latitude precedes longitude in each pair.
 *
 * Arithmetic is done with regular numbers rather than 32-bit bitwise
 * operators so values are exact up to 2^53.
 */

import type { Coordinate } from "@valroute/types";
import { MalformedPolylineError } from "./errors.js";

/** Degrees per unit for five decimal digits ("polyline5") */
export const PRECISION_5 = 1e-5;
/** Degrees per unit for six decimal digits ("polyline6", the service default) */
export const PRECISION_6 = 1e-6;

const CHAR_OFFSET = 63;
const MAX_CHAR = 126;
const CHUNK_SIZE = 32;
const CHUNK_MASK = 0x1f;
const CONTINUATION = 0x20;
/** A 53-bit value never needs a chunk beyond this weight */
const MAX_MULTIPLIER = 2 ** 50;

/**
 * Integer units per degree for a precision factor.
 * `1 / 1e-5` is not exactly 100000 in floating point, so a scale within
 * rounding distance of an integer is snapped to it.
 */
function unitsPerDegree(precision: number): number {
  if (!Number.isFinite(precision) || precision <= 0) {
    throw new RangeError(`Polyline precision must be a positive number, got ${precision}`);
  }
  const scale = 1 / precision;
  const rounded = Math.round(scale);
  return rounded > 0 && Math.abs(scale - rounded) < rounded * 1e-9 ? rounded : scale;
}

/** Reads one zig-zag value starting at `start`; returns the signed delta and the next offset */
function readDelta(encoded: string, start: number): [delta: number, next: number] {
  let result = 0;
  let multiplier = 1;
  let index = start;
  let chunk = 0;

  do {
    if (index >= encoded.length) {
      throw new MalformedPolylineError(
        `Polyline ends before the value starting at offset ${start} is complete`,
        index,
        encoded,
      );
    }
    if (multiplier > MAX_MULTIPLIER) {
      throw new MalformedPolylineError(
        `Polyline value starting at offset ${start} has too many chunks`,
        index,
        encoded,
      );
    }
    const code = encoded.charCodeAt(index);
    if (code < CHAR_OFFSET || code > MAX_CHAR) {
      throw new MalformedPolylineError(
        `Invalid polyline character ${JSON.stringify(encoded.charAt(index))} at offset ${index}`,
        index,
        encoded,
      );
    }
    chunk = code - CHAR_OFFSET;
    result += (chunk & CHUNK_MASK) * multiplier;
    if (!Number.isSafeInteger(result)) {
      throw new MalformedPolylineError(
        `Polyline value starting at offset ${start} is too large`,
        index,
        encoded,
      );
    }
    multiplier *= CHUNK_SIZE;
    index++;
  } while ((chunk & CONTINUATION) !== 0);

  // Odd values are negative: ~(result >> 1)
  const delta = result % 2 === 1 ? -(result + 1) / 2 : result / 2;
  return [delta, index];
}

/**
 * Decode an encoded polyline into coordinates.
 *
 * @param precision - degrees per encoded unit; must match the format the
 *   string was produced with. A mismatch does not throw, it scales the result.
 * @throws {MalformedPolylineError} on a character outside `?`..`~`, or a string
 *   that ends in the middle of a value or a coordinate pair
 */
export function decodePolyline(encoded: string, precision: number = PRECISION_6): Coordinate[] {
  const factor = unitsPerDegree(precision);
  const coordinates: Coordinate[] = [];
  let index = 0;
  let lat = 0;
  let lon = 0;

  while (index < encoded.length) {
    const [latDelta, afterLat] = readDelta(encoded, index);
    const [lonDelta, afterLon] = readDelta(encoded, afterLat);
    lat += latDelta;
    lon += lonDelta;
    index = afterLon;
    coordinates.push({ lat: lat / factor, lon: lon / factor });
  }

  return coordinates;
}

function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

function encodeDelta(delta: number): string {
  let remaining = delta < 0 ? -delta * 2 - 1 : delta * 2;
  if (!Number.isSafeInteger(remaining)) {
    throw new RangeError(`Polyline delta ${delta} is too large to encode`);
  }
  let out = "";
  while (remaining >= CONTINUATION) {
    out += String.fromCharCode(((remaining % CHUNK_SIZE) | CONTINUATION) + CHAR_OFFSET);
    remaining = Math.floor(remaining / CHUNK_SIZE);
  }
  return out + String.fromCharCode(remaining + CHAR_OFFSET);
}

/**
 * Encode coordinates as a polyline.
 * Values are rounded half away from zero to the nearest unit of `precision`.
 * @throws {RangeError} for a non-finite coordinate, or one whose scaled value
 *   or delta from the previous point does not fit in 53 bits
 */
export function encodePolyline(
  coordinates: readonly Coordinate[],
  precision: number = PRECISION_6,
): string {
  const factor = unitsPerDegree(precision);
  let prevLat = 0;
  let prevLon = 0;
  let out = "";

  for (const [i, { lat, lon }] of coordinates.entries()) {
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      throw new RangeError(`Coordinate ${i} is not finite: (${lat}, ${lon})`);
    }
    const latUnits = roundHalfAwayFromZero(lat * factor);
    const lonUnits = roundHalfAwayFromZero(lon * factor);
    if (!Number.isSafeInteger(latUnits) || !Number.isSafeInteger(lonUnits)) {
      throw new RangeError(`Coordinate ${i} is out of range at this precision: (${lat}, ${lon})`);
    }
    out += encodeDelta(latUnits - prevLat) + encodeDelta(lonUnits - prevLon);
    prevLat = latUnits;
    prevLon = lonUnits;
  }

  return out;
}
