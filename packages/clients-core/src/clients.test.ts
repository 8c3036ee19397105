import { describe, it, expect, vi, afterEach } from "vitest";
import axios, { AxiosHeaders, type AxiosResponse } from "axios";
import type { MapMatchingRequest } from "@valroute/types";
import { RouteClient } from "./routeClient.js";
import { MatrixClient } from "./matrixClient.js";
import { MapMatchingClient } from "./mapMatchingClient.js";
import { StatusClient } from "./statusClient.js";
import { ValhallaClient } from "./valhallaClient.js";

const config = { baseUrl: "http://localhost:8002" };

function response(data: unknown): AxiosResponse<unknown> {
  return { data, status: 200, statusText: "OK", headers: {}, config: { headers: new AxiosHeaders() } };
}

const TRIP_BODY = {
  trip: {
    status: 0,
    status_message: "Found route between points",
    units: "kilometers",
    language: "en-US",
    legs: [{ shape: "_p~iF~ps|U" }],
  },
};

function stubAxios(data: unknown) {
  return vi.spyOn(axios, "request").mockResolvedValue(response(data));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("RouteClient", () => {
  it("posts a serialized route request", async () => {
    const request = stubAxios(TRIP_BODY);
    const client = new RouteClient(config);

    const result = await client.route({
      locations: [
        { lat: 1, lon: 2 },
        { lat: 3, lon: 4 },
      ],
      costing: "auto",
      directionsOptions: { units: "miles" },
    });

    expect(result.trip.legs?.[0]?.shape).toBe("_p~iF~ps|U");
    expect(request.mock.calls[0]?.[0]).toMatchObject({
      url: "/route",
      data: {
        costing: "auto",
        units: "miles",
        locations: [
          { lat: 1, lon: 2 },
          { lat: 3, lon: 4 },
        ],
      },
    });
  });

  it("calls optimized_route", async () => {
    const request = stubAxios(TRIP_BODY);
    await new RouteClient(config).optimizedRoute({ locations: [{ lat: 1, lon: 2 }], costing: "pedestrian" });
    expect(request.mock.calls[0]?.[0]).toMatchObject({ url: "/optimized_route" });
  });
});

describe("MatrixClient", () => {
  it("calls sources_to_targets", async () => {
    const request = stubAxios({
      sources: [{ lat: 1, lon: 2 }],
      targets: [{ lat: 3, lon: 4 }],
      sources_to_targets: [[{ time: 30, distance: 0.4 }]],
      units: "kilometers",
    });

    const result = await new MatrixClient(config).sourcesToTargets({
      sources: [{ lat: 1, lon: 2 }],
      targets: [{ lat: 3, lon: 4 }],
      costing: "auto",
    });

    expect(result.sourcesToTargets[0]?.[0]).toMatchObject({ time: 30, distance: 0.4 });
    expect(request.mock.calls[0]?.[0]).toMatchObject({ url: "/sources_to_targets" });
  });
});

describe("MapMatchingClient", () => {
  it("calls trace_route", async () => {
    const request = stubAxios(TRIP_BODY);
    await new MapMatchingClient(config).traceRoute({ encodedPolyline: "_p~iF~ps|U", costing: "auto" });
    expect(request.mock.calls[0]?.[0]).toMatchObject({
      url: "/trace_route",
      data: { costing: "auto", encoded_polyline: "_p~iF~ps|U" },
    });
  });

  it("fails before sending a request without a trace", async () => {
    const request = stubAxios(TRIP_BODY);
    const incomplete: MapMatchingRequest = JSON.parse('{"costing":"auto"}');
    await expect(new MapMatchingClient(config).traceRoute(incomplete)).rejects.toBeInstanceOf(TypeError);
    expect(request).not.toHaveBeenCalled();
  });
});

describe("StatusClient", () => {
  it("sends no body unless verbose", async () => {
    const request = stubAxios({ version: "3.4.0" });
    const client = new StatusClient(config);

    await client.status();
    await client.status({ verbose: true });

    expect(request.mock.calls[0]?.[0]).not.toHaveProperty("data");
    expect(request.mock.calls[1]?.[0]).toMatchObject({ url: "/status", data: { verbose: true } });
  });
});

describe("ValhallaClient", () => {
  it("shares one token across every client", async () => {
    const request = stubAxios(TRIP_BODY);
    const client = new ValhallaClient(config);
    client.setToken("test-token");

    await client.routes.route({ locations: [{ lat: 1, lon: 2 }], costing: "auto" });
    await client.mapMatching.traceRoute({ encodedPolyline: "??", costing: "auto" });

    for (const [call] of request.mock.calls) {
      expect(call.headers).toMatchObject({ Authorization: "Bearer test-token" });
    }
    expect(request).toHaveBeenCalledTimes(2);
  });
});
