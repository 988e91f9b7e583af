import { REGEX_CDATA_WRAPPER, REGEX_JAVASCRIPT_PROTOCOL } from "../constants.js";
import { CompressorError, errorMessage } from "../errors.js";
import type { ICompressor } from "../ICompressor.js";

/**
 * Wraps a pluggable minifier for use on extracted script or style blocks.
 *
 * A block wrapped in `<![CDATA[...]]>` is unwrapped before minification and
 * wrapped again afterwards. Failures never escape: the block is returned as it
 * was and the failure is logged. Once the minifier reports itself unavailable
 * it is not called again by this adapter.
 */
export class SubCompressor {
  private unavailable = false;

  constructor(
    private readonly compressor: ICompressor,
    private readonly label: string
  ) {}

  compress(block: string): string {
    if (this.unavailable) return block;

    const cdata = REGEX_CDATA_WRAPPER.exec(block);
    const source = cdata ? (cdata[1] ?? "") : block;

    try {
      const result = this.compressor.compress(source);
      return cdata ? `<![CDATA[${result}]]>` : result;
    } catch (error: unknown) {
      if (error instanceof CompressorError && error.code === "ERR_COMPRESSOR_UNAVAILABLE") {
        this.unavailable = true;
        console.warn(`HtmlCompressor: ${this.label} minifier unavailable, leaving blocks as-is: ${error.message}`);
      } else {
        console.error(
          `HtmlCompressor: ${this.label} minification failed, keeping original block: ${errorMessage(error)}`,
          error instanceof Error ? error : undefined
        );
      }
      return block;
    }
  }
}

/**
 * Strips a leading `javascript:` from an inline event handler value.
 */
export function removeJavaScriptProtocol(handler: string): string {
  const match = REGEX_JAVASCRIPT_PROTOCOL.exec(handler);
  return match ? (match[1] ?? handler) : handler;
}
