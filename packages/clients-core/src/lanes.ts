import { LaneDirection, type LaneDirectionName } from "@valroute/types";

const DIRECTION_ORDER: readonly LaneDirectionName[] = [
  "None",
  "Through",
  "SharpLeft",
  "Left",
  "SlightLeft",
  "SlightRight",
  "Right",
  "SharpRight",
  "Reverse",
  "MergeToLeft",
  "MergeToRight",
];

/** Directions set in a lane bitmask, lowest bit first */
export function laneDirections(mask: number): LaneDirectionName[] {
  return DIRECTION_ORDER.filter((name) => (mask & LaneDirection[name]) !== 0);
}

/** Human-readable lane directions, e.g. "Through + Right" */
export function describeLaneDirections(mask: number): string {
  const names = laneDirections(mask);
  return names.length === 0 ? "Empty" : names.join(" + ");
}
