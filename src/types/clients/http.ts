/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * How the response body is consumed
 * - json: parse as JSON (falls back to text for non-JSON content types)
 * - text: raw text
 * - none: body discarded, resolves to undefined
 */
export type HttpResponseType = "json" | "text" | "none";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  json?: unknown;
  timeoutMs?: number;
  /** Statuses treated as success; defaults to any 2xx */
  acceptStatus?: readonly number[];
  responseType?: HttpResponseType;
  /** Redirect handling; "manual" turns 3xx into an HttpError */
  redirect?: "follow" | "manual";
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = <T>(req: HttpRequest) => Promise<T>;
