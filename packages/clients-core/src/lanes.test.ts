import { describe, it, expect } from "vitest";
import { LaneDirection } from "@valroute/types";
import { describeLaneDirections, laneDirections } from "./lanes.js";

describe("laneDirections", () => {
  it("lists the directions in a mask, lowest bit first", () => {
    expect(laneDirections(LaneDirection.Right | LaneDirection.Through)).toEqual(["Through", "Right"]);
  });

  it("returns nothing for an empty mask", () => {
    expect(laneDirections(LaneDirection.Empty)).toEqual([]);
  });

  it("recognizes every direction", () => {
    expect(laneDirections(0x7ff)).toHaveLength(11);
  });
});

describe("describeLaneDirections", () => {
  it("joins direction names", () => {
    expect(describeLaneDirections(LaneDirection.Left | LaneDirection.Through)).toBe("Through + Left");
  });

  it("describes an empty mask", () => {
    expect(describeLaneDirections(0)).toBe("Empty");
  });

  it("describes a single direction", () => {
    expect(describeLaneDirections(LaneDirection.MergeToRight)).toBe("MergeToRight");
  });
});
