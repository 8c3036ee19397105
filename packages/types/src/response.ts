/**
 * Response models: what the routing service returns, after parsing.
 *
 * A trip is made of legs, one per pair of consecutive break locations.
 * Each leg carries its geometry as an encoded polyline (`shape`) plus the
 * maneuvers that index into that geometry.
 */

import type { Coordinate } from "./geo.js";
import type {
  BicycleType,
  PedestrianType,
  SideOfStreet,
  TraceType,
  TransitStopType,
  TransitType,
  TravelMode,
  VehicleType,
  ManeuverType,
} from "./enums.js";

/** A location echoed back by the service */
export interface ResponseLocation extends Coordinate {
  type?: TraceType;
  /** Index of this location in the request */
  originalIndex?: number;
  sideOfStreet?: SideOfStreet;
  name?: string;
  street?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
  dateTime?: string;
}

/** Totals for a trip or a leg */
export interface Summary {
  /** Seconds */
  time: number;
  /** Distance in the request's units */
  length: number;
  hasToll: boolean;
  hasFerry: boolean;
  hasHighway: boolean;
  hasTimeRestrictions: boolean;
  minLat: number;
  minLon: number;
  maxLat: number;
  maxLon: number;
  cost?: number;
}

// ---------------------------------------------------------------------------
// Maneuvers
// ---------------------------------------------------------------------------

/** The travel type of a maneuver, keyed by its travel mode */
export type TravelType =
  | { mode: "drive"; type: VehicleType }
  | { mode: "pedestrian"; type: PedestrianType }
  | { mode: "bicycle"; type: BicycleType }
  | { mode: "transit"; type: TransitType };

export interface SignElement {
  text: string;
  /** How many consecutive maneuvers share this sign text */
  consecutiveCount: number;
}

export interface Sign {
  exitNumberElements?: SignElement[];
  exitBranchElements?: SignElement[];
  exitTowardElements?: SignElement[];
  exitNameElements?: SignElement[];
}

/** Lane guidance; every field is a bitmask of `LaneDirection` values */
export interface Lane {
  directions: number;
  active?: number;
  valid?: number;
}

export interface TransitStop {
  type: TransitStopType;
  name: string;
  arrivalTime: string;
  departureTime: string;
  assumedSchedule: boolean;
  lat: number;
  lon: number;
}

export interface TransitInfo {
  onestopId: string;
  shortName: string;
  longName: string;
  headsign: string;
  color: number;
  textColor: number;
  description: string;
  operatorOnestopId: string;
  operatorName: string;
  operatorUrl: string;
  transitStops: TransitStop[];
}

export interface Maneuver {
  type: ManeuverType;
  instruction?: string;
  verbalSuccinctTransitionInstruction?: string;
  verbalPreTransitionInstruction?: string;
  verbalPostTransitionInstruction?: string;
  streetNames: string[];
  beginStreetNames?: string[];
  /** Seconds */
  time: number;
  length: number;
  cost?: number;
  /** Index into the leg's decoded shape where this maneuver starts */
  beginShapeIndex: number;
  endShapeIndex: number;
  verbalMultiCue: boolean;
  travelMode: TravelMode;
  travelType: TravelType;
  toll: boolean;
  highway: boolean;
  ferry: boolean;
  sign?: Sign;
  roundaboutExitCount?: number;
  departInstruction?: string;
  verbalDepartInstruction?: string;
  arriveInstruction?: string;
  verbalArriveInstruction?: string;
  transitInfo?: TransitInfo;
  bearingBefore?: number;
  bearingAfter?: number;
  lanes?: Lane[];
}

// ---------------------------------------------------------------------------
// Trips
// ---------------------------------------------------------------------------

export interface Leg {
  maneuvers?: Maneuver[];
  summary?: Summary;
  /** Encoded polyline, precision set by the request's shape format */
  shape?: string;
}

export interface Trip {
  /** 0 on success */
  status: number;
  statusMessage: string;
  units: string;
  language: string;
  summary?: Summary;
  legs?: Leg[];
  locations?: ResponseLocation[];
}

/** Response of route, optimized_route and trace_route */
export interface TripResponse {
  trip: Trip;
  alternates?: { trip: Trip }[];
  id?: string;
}

export type RouteResponse = TripResponse;
export type MapMatchingResponse = TripResponse;

// ---------------------------------------------------------------------------
// Matrix
// ---------------------------------------------------------------------------

export interface MatrixElement {
  /** Seconds */
  time: number;
  distance: number;
  fromIndex?: number;
  toIndex?: number;
  toEdgeDistance?: number;
  fromEdgeDistance?: number;
}

export interface MatrixResponse {
  sources: ResponseLocation[];
  targets: ResponseLocation[];
  /** `null` where a target is unreachable from a source */
  sourcesToTargets: (MatrixElement | null)[][];
  targetsToSources?: (MatrixElement | null)[][];
  units: string;
  shape?: string;
  warnings?: string[];
  id?: string;
}

// ---------------------------------------------------------------------------
// Status / errors
// ---------------------------------------------------------------------------

export interface StatusResponse {
  version: string;
  tilesetLastModified?: number;
  availableActions?: string[];
  hasTiles?: boolean;
}

/** Body of a non-2xx response */
export interface ServiceErrorBody {
  errorCode?: number;
  error: string;
  statusCode?: number;
  status?: string;
}
