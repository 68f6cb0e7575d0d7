/**
 * RemoteAssetVerifier: HEAD probe against the video host
 *
 * Sign videos are sharded by the first two digits of their 5-digit id:
 *   hund-00222-tecken.mp4 → <base>/00/hund-00222-tecken.mp4
 */

import type { AssetVerifier } from "@/interfaces";
import type { HttpRequestFn } from "@/types";
import { HttpError, httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  ASSET_PROBE_TIMEOUT_MS,
  ASSET_SHARD_PREFIX_LENGTH,
  DEFAULT_VIDEO_BASE_URL,
  SIGN_VIDEO_FILENAME_PATTERN,
} from "@/constants";
import * as logger from "@/logger";

export interface RemoteAssetVerifierConfig {
  /** Video host directory, without trailing slash */
  baseUrl?: string;
  timeoutMs?: number;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

/**
 * Build the remote URL of a sign video
 *
 * @returns The URL, or null when the filename carries no video id
 */
export function assetUrl(baseUrl: string, filename: string): string | null {
  const match = SIGN_VIDEO_FILENAME_PATTERN.exec(filename);
  if (!match) {
    return null;
  }
  const prefix = match[1].slice(0, ASSET_SHARD_PREFIX_LENGTH);
  return `${baseUrl}/${prefix}/${filename}`;
}

export class RemoteAssetVerifier implements AssetVerifier {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly httpRequest: HttpRequestFn;

  constructor(config?: RemoteAssetVerifierConfig) {
    this.baseUrl = (config?.baseUrl ?? DEFAULT_VIDEO_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config?.timeoutMs ?? ASSET_PROBE_TIMEOUT_MS;
    this.httpRequest = config?.httpRequest ?? defaultHttpRequest;
  }

  /**
   * Single HEAD request; only a 200 counts as present, a redirect as missing.
   * Never throws.
   */
  async exists(filename: string): Promise<boolean> {
    const url = assetUrl(this.baseUrl, filename);
    if (!url) {
      logger.debug("Video filename has no video id", { filename });
      return false;
    }

    try {
      await this.httpRequest<void>({
        method: "HEAD",
        url,
        timeoutMs: this.timeoutMs,
        acceptStatus: [200],
        responseType: "none",
        redirect: "manual",
      });
      return true;
    } catch (error) {
      if (error instanceof HttpError && error.isRedirect) {
        logger.debug("Video probe redirected", { url, location: error.location });
      } else {
        logger.debug("Video probe failed", {
          url,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return false;
    }
  }
}
