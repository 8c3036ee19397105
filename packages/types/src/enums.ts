/**
 * Enumerated values of the routing service API.
 *
 * String unions carry the exact wire value. The two numeric families
 * (maneuver types and lane direction bits) are exported as constant maps
 * so callers can compare against names instead of magic numbers.
 */

// ---------------------------------------------------------------------------
// Costing
// ---------------------------------------------------------------------------

/** Costing model used to compute a route, matrix or match */
export type CostingModel =
  | "auto"
  | "bicycle"
  | "pedestrian"
  | "bus"
  | "bikeshare"
  | "truck"
  | "taxi"
  | "motor_scooter"
  | "motorcycle"
  | "multimodal";

/** Road classes, highest to lowest */
export type RoadClass =
  | "motorway"
  | "trunk"
  | "primary"
  | "secondary"
  | "tertiary"
  | "unclassified"
  | "residential"
  | "service_other";

export type PrioritizeBy = "time" | "distance";

// ---------------------------------------------------------------------------
// Directions output
// ---------------------------------------------------------------------------

export type Units = "kilometers" | "miles";

/** What the narrative part of the response contains */
export type DirectionsType = "none" | "maneuvers" | "instructions";

export type ResponseFormat = "json" | "gpx" | "osrm" | "pbf";

/** Encoding of the geometry in `shape` fields */
export type ShapeFormat = "polyline6" | "polyline5" | "geojson" | "no_shape";

/** IETF BCP 47 tags the narrative service speaks */
export type Language =
  | "bg-BG"
  | "ca-ES"
  | "cs-CZ"
  | "da-DK"
  | "de-DE"
  | "el-GR"
  | "en-US"
  | "en-GB"
  | "en-US-x-pirate"
  | "es-ES"
  | "et-EE"
  | "fi-FI"
  | "fr-FR"
  | "hi-IN"
  | "hu-HU"
  | "it-IT"
  | "ja-JP"
  | "nb-NO"
  | "nl-NL"
  | "pl-PL"
  | "pt-PT"
  | "pt-BR"
  | "ro-RO"
  | "ru-RU"
  | "sk-SK"
  | "sl-SI"
  | "sv-SE"
  | "tr-TR"
  | "uk-UA";

// ---------------------------------------------------------------------------
// Locations & map matching
// ---------------------------------------------------------------------------

/** How a location behaves as a stop along the route */
export type TraceType = "break" | "via" | "through" | "break_through";

export type PreferredSide = "same" | "opposite" | "either";

export type SideOfStreet = "left" | "right" | "both";

/** Matching algorithm for trace_route */
export type ShapeMatch = "edge_walk" | "map_snap" | "walk_or_snap";

export type MatchType = "unmatched" | "interpolated" | "matched";

export type FilterAction = "include" | "exclude";

/** Keys accepted in a trace attribute filter, e.g. `edge.names` or `node.type` */
export type TraceAttribute =
  | `edge.${string}`
  | `node.${string}`
  | `admin.${string}`
  | `matched.${string}`
  | "osm_changeset"
  | "shape";

// ---------------------------------------------------------------------------
// Travel
// ---------------------------------------------------------------------------

export type TravelMode = "drive" | "pedestrian" | "bicycle" | "transit";

export type VehicleType = "car" | "motorcycle" | "bus" | "tractor_trailer" | "motor_scooter";

export type PedestrianType = "foot" | "wheelchair" | "segway";

export type BicycleType = "road" | "cross" | "hybrid" | "mountain";

export type TransitType =
  | "tram"
  | "metro"
  | "rail"
  | "bus"
  | "ferry"
  | "cable_car"
  | "gondola"
  | "funicular";

export type TransitStopType = "stop" | "station";

// ---------------------------------------------------------------------------
// Edge & node attributes
// ---------------------------------------------------------------------------

export type Surface =
  | "paved_smooth"
  | "paved"
  | "paved_rough"
  | "compacted"
  | "dirt"
  | "gravel"
  | "path"
  | "impassable";

export type Use =
  | "tram"
  | "road"
  | "ramp"
  | "turn_channel"
  | "track"
  | "driveway"
  | "alley"
  | "parking_aisle"
  | "emergency_access"
  | "drive_through"
  | "culdesac"
  | "cycleway"
  | "mountain_bike"
  | "sidewalk"
  | "footway"
  | "steps"
  | "other"
  | "rail-ferry"
  | "ferry"
  | "rail"
  | "bus"
  | "egress_connection"
  | "platform_connection"
  | "transit_connection";

export type NodeType =
  | "street_intersection"
  | "gate"
  | "bollard"
  | "toll_booth"
  | "multi_use_transit_stop"
  | "bike_share"
  | "parking"
  | "motor_way_junction"
  | "border_control";

/** SAC hiking scale, "0" (none) to "6" (difficult alpine) */
export type SacScale = "0" | "1" | "2" | "3" | "4" | "5" | "6";

/** Direction(s) in which an edge can be driven, cycled or walked */
export type Traversability = "forward" | "backward" | "both";

export type FlowSpeeds =
  | "current_flow"
  | "constrained_flow"
  | "free_flow"
  | "predicted_flow"
  | "no_flow";

// ---------------------------------------------------------------------------
// Maneuvers
// ---------------------------------------------------------------------------

export const ManeuverType = {
  None: 0,
  Start: 1,
  StartRight: 2,
  StartLeft: 3,
  Destination: 4,
  DestinationRight: 5,
  DestinationLeft: 6,
  Becomes: 7,
  Continue: 8,
  SlightRight: 9,
  Right: 10,
  SharpRight: 11,
  UturnRight: 12,
  UturnLeft: 13,
  SharpLeft: 14,
  Left: 15,
  SlightLeft: 16,
  RampStraight: 17,
  RampRight: 18,
  RampLeft: 19,
  ExitRight: 20,
  ExitLeft: 21,
  StayStraight: 22,
  StayRight: 23,
  StayLeft: 24,
  Merge: 25,
  RoundaboutEnter: 26,
  RoundaboutExit: 27,
  FerryEnter: 28,
  FerryExit: 29,
  Transit: 30,
  TransitTransfer: 31,
  TransitRemainOn: 32,
  TransitConnectionStart: 33,
  TransitConnectionTransfer: 34,
  TransitConnectionDestination: 35,
  PostTransitConnectionDestination: 36,
  MergeRight: 37,
  MergeLeft: 38,
  ElevatorEnter: 39,
  StepsEnter: 40,
  EscalatorEnter: 41,
  BuildingEnter: 42,
  BuildingExit: 43,
} as const;

export type ManeuverType = (typeof ManeuverType)[keyof typeof ManeuverType];

/**
 * Lane direction bits. A lane's `directions`, `active` and `valid` fields
 * are bitwise ORs of these values.
 */
export const LaneDirection = {
  Empty: 0,
  None: 1,
  Through: 2,
  SharpLeft: 4,
  Left: 8,
  SlightLeft: 16,
  SlightRight: 32,
  Right: 64,
  SharpRight: 128,
  Reverse: 256,
  MergeToLeft: 512,
  MergeToRight: 1024,
} as const;

export type LaneDirectionName = Exclude<keyof typeof LaneDirection, "Empty">;
