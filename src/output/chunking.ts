/**
 * Balanced chunk splitting
 */

/**
 * Splits items into contiguous chunks of near-equal size.
 *
 * chunkCount = ceil(total / chunkSize), size = ceil(total / chunkCount),
 * so 101 items with chunkSize 50 become 34 + 34 + 33 rather than 50 + 50 + 1.
 * A non-positive chunkSize or total <= chunkSize yields a single chunk.
 *
 * @example
 * splitIntoChunks([1, 2, 3, 4, 5], 2) // [[1, 2], [3, 4], [5]]
 * splitIntoChunks([1, 2, 3, 4, 5, 6, 7], 3) // [[1, 2, 3], [4, 5, 6], [7]]
 * splitIntoChunks([1, 2, 3, 4], 3) // [[1, 2], [3, 4]]
 */
export function splitIntoChunks<T>(items: readonly T[], chunkSize: number): T[][] {
  const total = items.length;
  if (!Number.isFinite(chunkSize) || chunkSize <= 0 || total <= chunkSize) {
    return [[...items]];
  }

  const chunkCount = Math.ceil(total / chunkSize);
  const size = Math.ceil(total / chunkCount);

  const chunks: T[][] = [];
  for (let start = 0; start < total; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}
