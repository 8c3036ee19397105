/** Query keys per service action. No two keys share an element. */
export const QUERY_KEYS = {
  route: ["route"],
  optimizedRoute: ["optimized_route"],
  matrix: ["sources_to_targets"],
  status: ["status"],
  traceRoute: ["trace_route"],
};
