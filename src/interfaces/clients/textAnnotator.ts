/**
 * TextAnnotator interface: external keyword bracketing
 *
 * Covers inflections the local pattern misses (prefix changes, compounds).
 * The returned text is used verbatim.
 */

export interface TextAnnotator {
  /**
   * Bracket every form of `word` occurring in `phrase`
   *
   * @param word - Base form of the target word
   * @param phrase - Cleaned phrase text
   * @returns Phrase with the keyword forms wrapped in square brackets
   * @throws {AnnotationError} When the service call fails
   */
  annotate(word: string, phrase: string): Promise<string>;
}
