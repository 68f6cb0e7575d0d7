/**
 * AssetVerifier interface: existence check for demonstration videos
 *
 * Implementations must never throw: any failure means "not available".
 */

export interface AssetVerifier {
  /**
   * Check whether the video with the given filename is reachable
   *
   * @param filename - Video basename (e.g. "hund-00222-tecken.mp4")
   * @returns true when the remote host serves the file
   */
  exists(filename: string): Promise<boolean>;
}
