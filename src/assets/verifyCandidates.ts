/**
 * Candidate verification: runs the asset probe for every candidate
 */

import type { AssetVerifier } from "@/interfaces";
import type { Candidate, Logger, WordEntry } from "@/types";
import { DEFAULT_VERIFY_CONCURRENCY } from "@/constants";
import { videoFilename } from "@/utils";
import * as defaultLogger from "@/logger";

export type VerificationResult = {
  /** Entries whose video exists, in candidate order */
  entries: WordEntry[];
  /** Candidates whose video is missing, in candidate order */
  missing: WordEntry[];
};

export type VerifyOptions = {
  /** Probes in flight at once (default 1: strictly sequential) */
  concurrency?: number;
  logger?: Logger;
};

export function toWordEntry(candidate: Candidate): WordEntry {
  return { word: candidate.word, video: videoFilename(candidate.row.videoPath) };
}

/**
 * Probes every candidate's video and splits them into present and missing.
 *
 * Probes may complete in any order; results are stored by candidate index
 * so both output lists keep the candidate order.
 */
export async function verifyCandidates(
  candidates: readonly Candidate[],
  verifier: AssetVerifier,
  options: VerifyOptions = {},
): Promise<VerificationResult> {
  const log = options.logger ?? defaultLogger;
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_VERIFY_CONCURRENCY));
  const entries = candidates.map(toWordEntry);
  const found: boolean[] = new Array<boolean>(entries.length).fill(false);

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < entries.length) {
      const index = next++;
      const entry = entries[index];
      found[index] = await verifier.exists(entry.video);
      log.info(`Checking: ${entry.word} -> ${entry.video} ... ${found[index] ? "OK" : "MISSING"}`);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, entries.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return {
    entries: entries.filter((_, i) => found[i]),
    missing: entries.filter((_, i) => !found[i]),
  };
}
