/**
 * Request models: what a client sends to the routing service.
 *
 * Field names are the camelCase form of the service's snake_case keys;
 * the core client serializes them. Unset optional fields are left out of
 * the wire request so the server applies its own defaults.
 */

import type { Coordinate } from "./geo.js";
import type {
  CostingModel,
  DirectionsType,
  FilterAction,
  Language,
  PreferredSide,
  PrioritizeBy,
  ResponseFormat,
  RoadClass,
  ShapeFormat,
  ShapeMatch,
  SideOfStreet,
  TraceAttribute,
  TraceType,
  Units,
} from "./enums.js";

// ---------------------------------------------------------------------------
// Locations
// ---------------------------------------------------------------------------

/** Restricts which edges a location may snap to */
export interface SearchFilter {
  excludeTunnel?: boolean;
  excludeBridge?: boolean;
  excludeToll?: boolean;
  excludeFerry?: boolean;
  excludeRamp?: boolean;
  /** Server default is true */
  excludeClosures?: boolean;
  /** Lowest road class allowed */
  minRoadClass?: RoadClass;
  /** Highest road class allowed */
  maxRoadClass?: RoadClass;
}

/** A location in a request (route stop, matrix source/target or trace point) */
export interface Location extends Coordinate {
  type?: TraceType;
  /** Epoch seconds; only used for trace points */
  time?: number;
  /** Preferred heading of travel (0-360) */
  heading?: number;
  headingTolerance?: number;
  street?: string;
  wayId?: number;
  minimumReachability?: number;
  /** Meters around the location in which edges are considered */
  radius?: number;
  rankCandidates?: boolean;
  preferredSide?: PreferredSide;
  /** Display position; sent only together with `displayLon` */
  displayLat?: number;
  displayLon?: number;
  searchCutoff?: number;
  nodeSnapTolerance?: number;
  streetSideTolerance?: number;
  streetSideMaxDistance?: number;
  streetSideCutoff?: RoadClass;
  searchFilter?: SearchFilter;
  dateTime?: string;
  name?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
  phone?: string;
  url?: string;
  /** Seconds spent at this stop */
  waiting?: number;
  sideOfStreet?: SideOfStreet;
}

// ---------------------------------------------------------------------------
// Costing
// ---------------------------------------------------------------------------

/**
 * Costing options. Only the options relevant to the chosen costing model
 * have an effect; the client nests them under that model's name.
 */
export interface CostingOptions {
  // Avoidance
  avoidTolls?: boolean;
  avoidHighways?: boolean;
  avoidFerries?: boolean;
  /** Route by distance instead of time */
  shortest?: boolean;

  // Maneuvers and turns
  maneuverPenalty?: number;
  gateCost?: number;
  gateAccessCost?: number;
  tollBoothCost?: number;
  tollBoothAccessCost?: number;
  countryChangingPenalty?: number;

  // Vehicle dimensions (auto/truck)
  length?: number;
  width?: number;
  height?: number;
  weight?: number;
  axleLoad?: number;
  axleCount?: number;
  hazmat?: boolean;

  // Road type preferences
  motorwayFactor?: number;
  trunkFactor?: number;
  primaryFactor?: number;
  secondaryFactor?: number;
  tertiaryFactor?: number;
  unclassifiedFactor?: number;
  residentialFactor?: number;
  serviceRoadFactor?: number;

  // Speed and time
  topSpeed?: number;
  speedFactor?: number;
  uturnPenalty?: number;
  useTraffic?: boolean;

  // Pedestrian
  walkingSpeed?: number;
  walkwayFactor?: number;
  sidewalkFactor?: number;
  alleyFactor?: number;
  drivewayFactor?: number;
  crossingPenalty?: number;
  maxGrade?: number;

  // Bicycle
  cyclingSpeed?: number;
  bicycleLaneFactor?: number;
  cyclewayFactor?: number;
  mountainBikeFactor?: number;
  avoidBadSurfaces?: number;

  // Transit
  /** Passed through to the server untouched */
  transitModeFilters?: Record<string, unknown>;
  transitWalkingDistance?: number;
}

// ---------------------------------------------------------------------------
// Directions / trace options
// ---------------------------------------------------------------------------

export interface DirectionsOptions {
  units?: Units;
  language?: Language;
  directionsType?: DirectionsType;
  format?: ResponseFormat;
  /** Only sent with `format: "osrm"`, where it defaults to polyline6 */
  shapeFormat?: ShapeFormat;
  /** Only sent with `format: "osrm"`, where it defaults to true */
  bannerInstructions?: boolean;
  /** Only sent with `format: "osrm"`, where it defaults to true */
  voiceInstructions?: boolean;
  /** Number of alternate routes to request */
  alternates?: number;
}

/** Tuning of the map-matching search, all distances in meters */
export interface TraceOptions {
  searchRadius?: number;
  gpsAccuracy?: number;
  breakageDistance?: number;
  interpolationDistance?: number;
}

export interface TraceAttributesFilter {
  action: FilterAction;
  attributes: TraceAttribute[];
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface RouteRequest {
  /** At least two locations, in travel order */
  locations: Location[];
  costing: CostingModel;
  costingOptions?: CostingOptions;
  directionsOptions?: DirectionsOptions;
  excludeLocations?: Location[];
  /** Echoed back in the response */
  id?: string;
}

export interface MatrixRequest {
  sources: Location[];
  /** Defaults to the sources on the server */
  targets?: Location[];
  costing: CostingModel;
  costingOptions?: CostingOptions;
  units?: Units;
  verbose?: boolean;
  matrixLocations?: number;
  shapeFormat?: ShapeFormat;
  prioritizeBy?: PrioritizeBy;
  id?: string;
}

interface MapMatchingOptions {
  shapeMatch?: ShapeMatch;
  costing: CostingModel;
  costingOptions?: CostingOptions;
  useTimestamps?: boolean;
  directionsOptions?: DirectionsOptions;
  traceOptions?: TraceOptions;
  /** Epoch seconds of the first point; sent only together with `durations` */
  beginTime?: number;
  /** Seconds between consecutive points; sent only together with `beginTime` */
  durations?: number[];
  filters?: TraceAttributesFilter;
  id?: string;
}

/** A map-matching request carries the trace either as points or as a polyline6 string */
export type MapMatchingRequest = MapMatchingOptions &
  (
    | { shape: Location[]; encodedPolyline?: never }
    | { encodedPolyline: string; shape?: never }
  );
