import type { HtmlMetrics } from "./types.js";
import { REGEX_WHITESPACE_CHAR } from "./constants.js";

export function emptyMetrics(): HtmlMetrics {
  return { filesize: 0, emptyChars: 0, inlineScriptSize: 0, inlineStyleSize: 0, inlineEventSize: 0 };
}

export function countWhitespace(text: string): number {
  return text.match(REGEX_WHITESPACE_CHAR)?.length ?? 0;
}

/**
 * Figures collected over one HtmlCompressor.compress() call.
 */
export class HtmlCompressorStatistics {
  readonly originalMetrics: HtmlMetrics = emptyMetrics();
  readonly compressedMetrics: HtmlMetrics = emptyMetrics();
  /** Start timestamp while running; elapsed milliseconds once finished. */
  time = 0;
  /** Characters kept verbatim across all protected blocks. */
  preservedSize = 0;

  toString(): string {
    return (
      `Time=${this.time}, Preserved=${this.preservedSize}, ` +
      `Original={${formatMetrics(this.originalMetrics)}}, Compressed={${formatMetrics(this.compressedMetrics)}}`
    );
  }
}

function formatMetrics(metrics: HtmlMetrics): string {
  return (
    `Filesize=${metrics.filesize}, Empty Chars=${metrics.emptyChars}, Script Size=${metrics.inlineScriptSize}, ` +
    `Style Size=${metrics.inlineStyleSize}, Event Handler Size=${metrics.inlineEventSize}`
  );
}
