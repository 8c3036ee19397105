import { describe, it, expect, vi, afterEach } from "vitest";
import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import { BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";
import { ValhallaConfigError, ValhallaRequestError, ValhallaResponseError } from "./errors.js";
import { statusResponseSchema } from "./schemas.js";

// Expose protected methods for testing via a thin subclass
class TestClient extends BaseClient {
  constructor(config: ClientConfig) {
    super(config);
  }
  public exposedBuildPath(params: RequestParams) {
    return this.buildPath(params);
  }
  public exposedBuildConfig(params: RequestParams) {
    return this.buildConfig(params);
  }
}

function response(status: number, data: unknown, statusText = "OK"): AxiosResponse<unknown> {
  return { data, status, statusText, headers: {}, config: { headers: new AxiosHeaders() } };
}

function quietLogger() {
  return { log: vi.fn(), warn: vi.fn() };
}

const STATUS_BODY = { version: "3.4.0" };

afterEach(() => {
  vi.restoreAllMocks();
});

describe("BaseClient", () => {
  describe("constructor", () => {
    it("rejects a base URL that does not parse", () => {
      expect(() => new BaseClient({ baseUrl: "not a url" })).toThrow(ValhallaConfigError);
    });

    it("rejects a base URL that is not http(s)", () => {
      expect(() => new BaseClient({ baseUrl: "ftp://localhost" })).toThrow(ValhallaConfigError);
    });
  });

  describe("buildPath", () => {
    it("prefixes the action with a slash", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002" });
      expect(client.exposedBuildPath({ path: "route" })).toBe("/route");
    });
  });

  describe("buildConfig", () => {
    it("sets baseURL and default timeout", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002/" });
      const config = client.exposedBuildConfig({ path: "route" });
      expect(config.baseURL).toBe("http://localhost:8002");
      expect(config.url).toBe("/route");
      expect(config.timeout).toBe(30000);
    });

    it("uses custom timeout when provided", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002", timeout: 5000 });
      expect(client.exposedBuildConfig({ path: "route" }).timeout).toBe(5000);
    });

    it("sets JSON content headers and extra headers", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002", headers: { "X-Api-Key": "test-key" } });
      expect(client.exposedBuildConfig({ path: "route" }).headers).toEqual({
        "Content-Type": "application/json",
        Accept: "application/json",
        "X-Api-Key": "test-key",
      });
    });

    it("includes Authorization header when token is set", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002", token: "test-token" });
      expect(client.exposedBuildConfig({ path: "route" }).headers).toMatchObject({
        Authorization: "Bearer test-token",
      });
    });

    it("omits Authorization header when no token", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002" });
      expect(client.exposedBuildConfig({ path: "route" }).headers).not.toHaveProperty("Authorization");
    });

    it("posts the body as JSON by default", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002" });
      const config = client.exposedBuildConfig({ path: "route", body: { costing: "auto" } });
      expect(config.method).toBe("post");
      expect(config.data).toEqual({ costing: "auto" });
      expect(config.params).toBeUndefined();
    });

    it("sends the body as the json query parameter for GET", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002", method: "get" });
      const config = client.exposedBuildConfig({ path: "route", body: { costing: "auto" } });
      expect(config.method).toBe("get");
      expect(config.params).toEqual({ json: '{"costing":"auto"}' });
      expect(config.data).toBeUndefined();
    });
  });

  describe("setToken", () => {
    it("updates the token used in subsequent requests", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002" });
      expect(client.exposedBuildConfig({ path: "route" }).headers).not.toHaveProperty("Authorization");

      client.setToken("new-token");
      expect(client.exposedBuildConfig({ path: "route" }).headers).toMatchObject({
        Authorization: "Bearer new-token",
      });
    });

    it("clears the token when set to undefined", () => {
      const client = new TestClient({ baseUrl: "http://localhost:8002", token: "initial" });
      client.setToken(undefined);
      expect(client.exposedBuildConfig({ path: "route" }).headers).not.toHaveProperty("Authorization");
    });
  });

  describe("send", () => {
    it("returns the parsed body of a 2xx response", async () => {
      const request = vi.spyOn(axios, "request").mockResolvedValue(response(200, STATUS_BODY));
      const client = new BaseClient({ baseUrl: "http://localhost:8002" });

      await expect(client.send({ path: "status" }, statusResponseSchema)).resolves.toEqual({
        version: "3.4.0",
        tilesetLastModified: undefined,
        availableActions: undefined,
        hasTiles: undefined,
      });
      expect(request).toHaveBeenCalledTimes(1);
      expect(request.mock.calls[0]?.[0]).toMatchObject({ url: "/status", method: "post" });
    });

    it("maps an error body to ValhallaRequestError", async () => {
      vi.spyOn(axios, "request").mockResolvedValue(
        response(400, { error_code: 171, error: "No suitable edges near location", status_code: 400 }, "Bad Request"),
      );
      const logger = quietLogger();
      const client = new BaseClient({ baseUrl: "http://localhost:8002", logger });

      const err = await client.send({ path: "route" }, statusResponseSchema).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ValhallaRequestError);
      expect(err).toMatchObject({
        status: 400,
        body: { errorCode: 171, error: "No suitable edges near location", statusCode: 400 },
        message: "POST http://localhost:8002/route failed: No suitable edges near location (error 171)",
      });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it("falls back to the status line when the error body is not JSON", async () => {
      vi.spyOn(axios, "request").mockResolvedValue(response(502, "<html>", "Bad Gateway"));
      const client = new BaseClient({ baseUrl: "http://localhost:8002", logger: quietLogger() });

      const err = await client.send({ path: "route" }, statusResponseSchema).catch((e: unknown) => e);
      expect(err).toMatchObject({ status: 502, body: undefined });
      expect(err).toHaveProperty("message", "POST http://localhost:8002/route failed: 502 Bad Gateway");
    });

    it("retries a 503 and then succeeds", async () => {
      const request = vi
        .spyOn(axios, "request")
        .mockResolvedValueOnce(response(503, "", "Service Unavailable"))
        .mockResolvedValueOnce(response(200, STATUS_BODY));
      const logger = quietLogger();
      const client = new BaseClient({ baseUrl: "http://localhost:8002", retries: 2, retryDelaysMs: [0], logger });

      await expect(client.send({ path: "status" }, statusResponseSchema)).resolves.toMatchObject(STATUS_BODY);
      expect(request).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledWith("[valhalla] 503 Service Unavailable, retrying in 0s");
    });

    it("does not retry a 400", async () => {
      const request = vi.spyOn(axios, "request").mockResolvedValue(response(400, { error: "bad" }, "Bad Request"));
      const client = new BaseClient({
        baseUrl: "http://localhost:8002",
        retries: 3,
        retryDelaysMs: [0],
        logger: quietLogger(),
      });

      await expect(client.send({ path: "route" }, statusResponseSchema)).rejects.toBeInstanceOf(ValhallaRequestError);
      expect(request).toHaveBeenCalledTimes(1);
    });

    it("gives up after the configured retries", async () => {
      const request = vi.spyOn(axios, "request").mockResolvedValue(response(429, "", "Too Many Requests"));
      const client = new BaseClient({
        baseUrl: "http://localhost:8002",
        retries: 2,
        retryDelaysMs: [0],
        logger: quietLogger(),
      });

      await expect(client.send({ path: "route" }, statusResponseSchema)).rejects.toMatchObject({ status: 429 });
      expect(request).toHaveBeenCalledTimes(3);
    });

    it("wraps network errors", async () => {
      const cause = new AxiosError("connect ECONNREFUSED", "ECONNREFUSED");
      const request = vi.spyOn(axios, "request").mockRejectedValue(cause);
      const client = new BaseClient({
        baseUrl: "http://localhost:8002",
        retries: 1,
        retryDelaysMs: [0],
        logger: quietLogger(),
      });

      const err = await client.send({ path: "route" }, statusResponseSchema).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ValhallaRequestError);
      expect(err).toMatchObject({ status: undefined, cause });
      expect(request).toHaveBeenCalledTimes(2);
    });

    it("rejects a 2xx body that does not match the schema", async () => {
      vi.spyOn(axios, "request").mockResolvedValue(response(200, { version: 3 }));
      const client = new BaseClient({ baseUrl: "http://localhost:8002" });

      await expect(client.send({ path: "status" }, statusResponseSchema)).rejects.toBeInstanceOf(ValhallaResponseError);
    });

    it("logs requests in debug mode", async () => {
      vi.spyOn(axios, "request").mockResolvedValue(response(200, STATUS_BODY));
      const logger = quietLogger();
      const client = new BaseClient({ baseUrl: "http://localhost:8002", debug: true, logger });

      await client.send({ path: "status" }, statusResponseSchema);
      expect(logger.log.mock.calls).toEqual([
        ["[valhalla] POST http://localhost:8002/status (attempt 1)"],
        ["[valhalla] Response: 200 from POST http://localhost:8002/status"],
      ]);
    });
  });
});
