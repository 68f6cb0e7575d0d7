/**
 * Video asset verification constants
 */

/**
 * Remote directory holding the sign videos, sharded by the first two
 * digits of the video id: <base>/<prefix>/<filename>
 */
export const DEFAULT_VIDEO_BASE_URL = "https://teckensprakslexikon.su.se/movies";

/**
 * Sign video filename; group 1 is the 5-digit video id.
 */
export const SIGN_VIDEO_FILENAME_PATTERN = /-(\d{5})-tecken\.mp4$/;

export const ASSET_SHARD_PREFIX_LENGTH = 2;

/**
 * Timeout per existence probe (10 seconds)
 */
export const ASSET_PROBE_TIMEOUT_MS = 10_000;

/**
 * Default number of probes in flight
 */
export const DEFAULT_VERIFY_CONCURRENCY = 1;
