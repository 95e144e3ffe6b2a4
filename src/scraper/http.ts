/**
 * Thin HTTP transport over fetch with per-request timeout and logging
 */

import { TransportError } from "../errors.js";
import { httpLogger } from "../logger.js";

import type { JsonValue } from "../types/index.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH";

export type QueryParams = Record<string, string | number | boolean>;

export interface HttpClientOptions {
  /** Default timeout for every request, in milliseconds */
  timeoutMs?: number;
  defaultHeaders?: Record<string, string>;
  /** Replacement for the global fetch (tests) */
  fetch?: typeof fetch;
}

export interface RequestOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface BodyRequestOptions extends RequestOptions {
  /** Sent as-is when a string, JSON-encoded otherwise */
  body?: unknown;
}

/**
 * Fully read response
 */
export class HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  readonly body: Buffer;

  constructor(status: number, statusText: string, url: string, body: Buffer) {
    this.status = status;
    this.statusText = statusText;
    this.url = url;
    this.body = body;
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  text(): string {
    return this.body.toString("utf-8");
  }

  json(): JsonValue {
    return JSON.parse(this.text());
  }
}

const DEFAULT_TIMEOUT_MS = 3000;
const LOGGED_BODY_LIMIT = 500;

export function buildUrl(url: string, params?: QueryParams): string {
  if (params === undefined || Object.keys(params).length === 0) {
    return url;
  }

  const query = new URLSearchParams(
    Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
  );
  return `${url}${url.includes("?") ? "&" : "?"}${query.toString()}`;
}

// Binary payloads (archives) are not worth logging
function bodyForLogging(body: Buffer): string | undefined {
  const text = body.subarray(0, LOGGED_BODY_LIMIT).toString("utf-8");
  return text.includes("�") ? undefined : text;
}

export class HttpClient {
  private readonly timeoutMs: number;
  private readonly defaultHeaders: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultHeaders = { ...options.defaultHeaders };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request("GET", buildUrl(url, options.params), options);
  }

  post(url: string, options: BodyRequestOptions = {}): Promise<HttpResponse> {
    return this.request("POST", buildUrl(url, options.params), options);
  }

  put(url: string, options: BodyRequestOptions = {}): Promise<HttpResponse> {
    return this.request("PUT", buildUrl(url, options.params), options);
  }

  patch(url: string, options: BodyRequestOptions = {}): Promise<HttpResponse> {
    return this.request("PATCH", buildUrl(url, options.params), options);
  }

  private async request(
    method: HttpMethod,
    url: string,
    options: BodyRequestOptions
  ): Promise<HttpResponse> {
    const headers = { ...this.defaultHeaders, ...options.headers };
    const body =
      options.body === undefined || typeof options.body === "string"
        ? options.body
        : JSON.stringify(options.body);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    httpLogger.debug({ method, url, body }, "Sending request");

    const startTime = performance.now();
    let response: Response;
    let content: Buffer;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(timeoutMs),
      });
      content = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      const duration = Math.round(performance.now() - startTime);
      httpLogger.error(
        { method, url, timeoutMs, duration: `${String(duration)}ms`, err: error },
        "Request failed"
      );
      throw new TransportError(method, url, error);
    }
    const duration = Math.round(performance.now() - startTime);

    const logContext = {
      method,
      url,
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    };
    if (response.status >= 400) {
      httpLogger.error(
        { ...logContext, responseBody: bodyForLogging(content) },
        "Received error response"
      );
    } else {
      httpLogger.debug(logContext, "Received response");
    }

    return new HttpResponse(response.status, response.statusText, url, content);
  }
}
