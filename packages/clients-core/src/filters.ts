import { z } from "zod";
import type { TraceAttribute, TraceAttributesFilter } from "@valroute/types";
import attributeKeys from "../data/trace-attributes.json" with { type: "json" };

const ATTRIBUTE_PREFIXES = ["edge.", "node.", "admin.", "matched."];

export function isTraceAttribute(value: string): value is TraceAttribute {
  if (value === "shape" || value === "osm_changeset") return true;
  return ATTRIBUTE_PREFIXES.some(
    (prefix) => value.startsWith(prefix) && value.length > prefix.length,
  );
}

let attributes: readonly TraceAttribute[] | undefined;

/** Every attribute key the service can report for a matched trace */
export function listTraceAttributes(): readonly TraceAttribute[] {
  if (!attributes) {
    const raw = z.array(z.string()).parse(attributeKeys);
    const invalid = raw.filter((key) => !isTraceAttribute(key));
    if (invalid.length > 0) {
      throw new Error(`Unknown trace attribute(s) in trace-attributes.json: ${invalid.join(", ")}`);
    }
    attributes = raw.filter(isTraceAttribute);
  }
  return attributes;
}

/** Filter that asks for every attribute */
export function includeAllAttributes(): TraceAttributesFilter {
  return { action: "include", attributes: [...listTraceAttributes()] };
}

/** Filter that suppresses every attribute */
export function excludeAllAttributes(): TraceAttributesFilter {
  return { action: "exclude", attributes: [...listTraceAttributes()] };
}
