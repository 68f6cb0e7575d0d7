/**
 * HttpError: non-2xx outcome of a single request
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Raised by httpRequest for any non-2xx response, including 3xx when the
 * request asked for manual redirects. Carries enough to log the failure
 * without the original Response.
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    const snippet = details.bodySnippet ? ` - ${details.bodySnippet}` : "";
    super(`HTTP ${details.status} ${details.statusText} - ${details.url}${snippet}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
  }

  /** 3xx that was not followed */
  get isRedirect(): boolean {
    return this.status >= 300 && this.status < 400;
  }

  /** Redirect target, when the server sent one */
  get location(): string | null {
    return this.headers?.get("location") ?? null;
  }
}
