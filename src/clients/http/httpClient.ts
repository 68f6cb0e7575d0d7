/**
 * HTTP client wrapper: one fetch per call, with timeout and structured errors
 *
 * There is no retry layer. Each remote call in this tool is attempted once
 * and the caller decides what a failure means.
 */

import type { HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    // Body already consumed or stream aborted; the status alone is reported
    return undefined;
  }
}

function isAccepted(req: HttpRequest, response: Response): boolean {
  return req.acceptStatus ? req.acceptStatus.includes(response.status) : response.ok;
}

/**
 * Read the response body according to the requested response type
 */
async function readBody<T>(req: HttpRequest, response: Response): Promise<T> {
  const responseType = req.responseType ?? "json";

  if (responseType === "none" || response.status === 204 || req.method === "HEAD") {
    return undefined as T;
  }

  if (responseType === "text") {
    return (await response.text()) as T;
  }

  const contentType = response.headers.get("content-type");
  const isJson =
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"));

  if (!isJson) {
    logger.warn("Non-JSON response received", {
      method: req.method,
      url: req.url,
      status: response.status,
      contentType: contentType || "none",
    });
    // Return text content as fallback, let caller handle it
    return (await response.text()) as T;
  }

  return (await response.json()) as T;
}

/**
 * Perform a single HTTP request with a timeout
 *
 * @template T - Expected response type
 * @param req - HTTP request configuration
 * @returns Parsed response body (undefined for HEAD or responseType "none")
 * @throws {HttpError} When the status is not accepted (non-2xx by default,
 *   3xx included under redirect "manual")
 * @throws {Error} On network errors or timeouts
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {};
    if (req.json !== undefined) {
      Object.assign(headers, DEFAULT_JSON_HEADERS);
    }
    Object.assign(headers, req.headers);

    const options: RequestInit = {
      method: req.method,
      headers,
      signal: controller.signal,
      redirect: req.redirect ?? "follow",
    };

    if (req.json !== undefined) {
      options.body = JSON.stringify(req.json);
    }

    const response = await fetch(req.url, options);

    if (!isAccepted(req, response)) {
      const bodySnippet = req.method === "HEAD" ? undefined : await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url: req.url,
        bodySnippet,
        headers: response.headers,
      });
    }

    return await readBody<T>(req, response);
  } finally {
    clearTimeout(timeoutId);
  }
}
