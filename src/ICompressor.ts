/**
 * Anything that turns text into a smaller equivalent text: the markup
 * compressors themselves and the pluggable script/style minifiers.
 */
export interface ICompressor {
  /**
   * Compresses the given source.
   * @param source The text to compress
   * @returns The compressed text
   */
  compress(source: string): string;
}
