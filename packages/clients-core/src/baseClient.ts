import axios, { type AxiosRequestConfig, type AxiosResponse } from "axios";
import type { z } from "zod";
import type { ServiceErrorBody } from "@valroute/types";
import { ValhallaConfigError, ValhallaRequestError } from "./errors.js";
import { parseResponse, serviceErrorSchema } from "./schemas.js";

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

export type HttpMethod = "post" | "get";

export interface ClientConfig {
  /** Base URL of the routing service (e.g., "http://localhost:8002") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Optional auth token, sent as a Bearer Authorization header */
  token?: string;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** "get" sends the request body as the `json` query parameter (default: "post") */
  method?: HttpMethod;
  /** Retries after a network error or a status >= 429 (default: 0) */
  retries?: number;
  /** Wait before each retry; the last entry is reused (default: 2s, 5s, 10s) */
  retryDelaysMs?: number[];
  /** Log every request and response */
  debug?: boolean;
  logger?: Logger;
}

export interface RequestParams {
  /** Service action, e.g. "route" or "sources_to_targets" */
  path: string;
  body?: unknown;
}

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_RETRY_DELAYS_MS = [2000, 5000, 10000];
const LOG_TAG = "[valhalla]";

function parseBaseUrl(baseUrl: string): string {
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch {
    throw new ValhallaConfigError(`Invalid base URL: "${baseUrl}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValhallaConfigError(`Base URL must use http or https: "${baseUrl}"`);
  }
  return baseUrl.replace(/\/+$/, "");
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class BaseClient {
  protected baseUrl: string;
  protected timeout: number;
  protected token?: string;
  protected headers: Record<string, string>;
  protected method: HttpMethod;
  protected retries: number;
  protected retryDelays: number[];
  protected debug: boolean;
  protected logger: Logger;

  constructor(config: ClientConfig) {
    this.baseUrl = parseBaseUrl(config.baseUrl);
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.token = config.token;
    this.headers = config.headers ?? {};
    this.method = config.method ?? "post";
    this.retries = config.retries ?? 0;
    this.retryDelays = config.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.debug = config.debug ?? false;
    this.logger = config.logger ?? console;
  }

  /** Update the auth token (e.g., after login/refresh) */
  public setToken(token: string | undefined): void {
    this.token = token;
  }

  protected buildPath(params: RequestParams): string {
    return "/" + params.path;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      url: this.buildPath(params),
      method: this.method,
      timeout: this.timeout,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...this.headers,
      },
      // Non-2xx responses are handled below, with their error body
      validateStatus: () => true,
    };

    if (this.token) {
      config.headers = {
        ...config.headers,
        Authorization: "Bearer " + this.token,
      };
    }

    if (params.body !== undefined) {
      if (this.method === "get") {
        config.params = { json: JSON.stringify(params.body) };
      } else {
        config.data = params.body;
      }
    }

    return config;
  }

  /**
   * Send a request and validate its response body.
   * @throws {ValhallaRequestError} on a network error or a non-2xx status
   * @throws {ValhallaResponseError} when the body does not match the schema
   */
  public async send<T>(
    params: RequestParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const data = await this.execute(this.buildConfig(params));
    return parseResponse(schema, data, params.path);
  }

  protected async execute(config: AxiosRequestConfig): Promise<unknown> {
    const label = `${(config.method ?? "get").toUpperCase()} ${this.baseUrl}${config.url ?? ""}`;

    for (let attempt = 0; ; attempt++) {
      let res: AxiosResponse<unknown>;
      try {
        this.trace(`${label} (attempt ${attempt + 1})`);
        res = await axios.request<unknown>(config);
      } catch (err) {
        if (attempt < this.retries) {
          const delay = this.retryDelay(attempt);
          this.logger.warn(
            `${LOG_TAG} Network error: ${describeError(err)}, retrying in ${delay / 1000}s`,
          );
          await new Promise((r) => setTimeout(r, delay));
          continue;
        }
        throw new ValhallaRequestError(
          `${label} failed: ${describeError(err)}`,
          undefined,
          undefined,
          { cause: err },
        );
      }

      this.trace(`Response: ${res.status} from ${label}`);

      if (res.status >= 200 && res.status < 300) {
        return res.data;
      }

      if (res.status >= 429 && attempt < this.retries) {
        const delay = this.retryDelay(attempt);
        this.logger.warn(`${LOG_TAG} ${res.status} ${res.statusText}, retrying in ${delay / 1000}s`);
        await new Promise((r) => setTimeout(r, delay));
        continue;
      }

      throw this.requestError(label, res);
    }
  }

  private retryDelay(attempt: number): number {
    return this.retryDelays[attempt] ?? this.retryDelays[this.retryDelays.length - 1] ?? 0;
  }

  private requestError(label: string, res: AxiosResponse<unknown>): ValhallaRequestError {
    const parsed = serviceErrorSchema.safeParse(res.data);
    const body: ServiceErrorBody | undefined = parsed.success ? parsed.data : undefined;
    const reason = body
      ? body.errorCode !== undefined
        ? `${body.error} (error ${body.errorCode})`
        : body.error
      : `${res.status} ${res.statusText}`;
    this.logger.warn(`${LOG_TAG} ${label} -> ${res.status}: ${reason}`);
    return new ValhallaRequestError(`${label} failed: ${reason}`, res.status, body);
  }

  private trace(message: string): void {
    if (this.debug) this.logger.log(`${LOG_TAG} ${message}`);
  }
}
