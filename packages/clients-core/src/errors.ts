import type { ServiceErrorBody } from "@valroute/types";

/** An encoded polyline that does not follow the format */
export class MalformedPolylineError extends Error {
  constructor(
    message: string,
    /** Byte offset where decoding failed */
    public readonly position: number,
    public readonly input: string,
  ) {
    super(message);
    this.name = "MalformedPolylineError";
  }
}

/** Client configuration that cannot be used */
export class ValhallaConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValhallaConfigError";
  }
}

/**
 * A request that did not produce a successful response: either the server
 * answered with a non-2xx status, or the request never got an answer
 * (`status` is undefined).
 */
export class ValhallaRequestError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    /** Parsed error body, when the server sent one */
    public readonly body?: ServiceErrorBody,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ValhallaRequestError";
  }
}

export interface ResponseIssue {
  path: (string | number)[];
  message: string;
}

/** A 2xx response whose body does not match the expected shape */
export class ValhallaResponseError extends Error {
  constructor(
    message: string,
    public readonly issues: ResponseIssue[],
  ) {
    super(message);
    this.name = "ValhallaResponseError";
  }
}
