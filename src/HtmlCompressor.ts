import type { ICompressor } from "./ICompressor.js";
import type { BlockCategory, HtmlCompressorOptions, ResolvedHtmlCompressorOptions } from "./types.js";
import { PLACEHOLDER_NAMESPACE } from "./constants.js";
import { EsbuildJavaScriptCompressor } from "./EsbuildJavaScriptCompressor.js";
import { CssoCssCompressor } from "./CssoCssCompressor.js";
import { HtmlCompressorStatistics, countWhitespace } from "./HtmlCompressorStatistics.js";
import { HtmlCompressorOptionsSchema, compilePreservePatterns, validateOptions } from "./options.js";
import { BlockStore } from "./utils/block-store.js";
import { buildHtmlRules, extractBlocks } from "./utils/block-extractor.js";
import { transformSkeleton } from "./utils/skeleton-transformer.js";
import { restoreBlocks } from "./utils/block-restorer.js";
import { SubCompressor, removeJavaScriptProtocol } from "./utils/sub-compressor.js";

// Blocks that are always kept verbatim
const VERBATIM_CATEGORIES: ReadonlyArray<BlockCategory> = ["PRE", "TEXTAREA", "COND", "SKIP", "LT"];

/**
 * HtmlCompressor - removes comments, whitespace and redundant syntax from
 * HTML while keeping preformatted text, scripts, styles, event handlers,
 * conditional comments and user-defined regions intact.
 *
 * Each call extracts the protected regions into placeholders, rewrites the
 * remaining skeleton, optionally minifies scripts and styles, and puts the
 * regions back in reverse order.
 *
 * Options are fixed at construction. With `generateStatistics` on, the
 * instance keeps the figures of its last call and must not be shared between
 * concurrent callers.
 */
export class HtmlCompressor implements ICompressor {
  private readonly options: ResolvedHtmlCompressorOptions;
  private readonly javaScript: SubCompressor;
  private readonly css: SubCompressor;
  private statistics: HtmlCompressorStatistics | null = null;

  /**
   * Creates an instance of HtmlCompressor.
   * @param options Configuration options for the HtmlCompressor.
   * @throws {CompressorError} ERR_INVALID_OPTIONS or ERR_INVALID_PRESERVE_PATTERN.
   */
  constructor(options: HtmlCompressorOptions = {}) {
    const { preservePatterns, javaScriptCompressor, cssCompressor, ...flags } = validateOptions(
      HtmlCompressorOptionsSchema,
      options
    );
    this.options = Object.freeze({
      ...flags,
      javaScriptCompressor: javaScriptCompressor ?? new EsbuildJavaScriptCompressor(),
      cssCompressor: cssCompressor ?? new CssoCssCompressor(),
      preservePatterns: compilePreservePatterns(preservePatterns),
    });
    this.javaScript = new SubCompressor(this.options.javaScriptCompressor, "JavaScript");
    this.css = new SubCompressor(this.options.cssCompressor, "CSS");
  }

  /**
   * Compresses an HTML document or fragment.
   * @param html The markup to compress.
   * @returns The compressed markup, or the input itself when disabled or empty.
   */
  compress(html: string): string {
    return this.compressScoped(html, 0);
  }

  /**
   * Figures from the last compress() call, or null when statistics are off.
   */
  getStatistics(): HtmlCompressorStatistics | null {
    return this.statistics;
  }

  /** The effective, frozen options. */
  getOptions(): ResolvedHtmlCompressorOptions {
    return this.options;
  }

  private compressScoped(html: string, depth: number): string {
    if (!this.options.enabled || !html) {
      return html;
    }

    // Conditional comment bodies are compressed one level down, in their own
    // placeholder namespace and without touching the statistics
    const topLevel = depth === 0;
    const statistics = topLevel ? this.startStatistics(html) : null;
    const blocks = new BlockStore(topLevel ? PLACEHOLDER_NAMESPACE : `${PLACEHOLDER_NAMESPACE}${depth}`);
    const compressNested = (body: string): string => this.compressScoped(body, depth + 1);

    const rules = buildHtmlRules({
      preservePatterns: this.options.preservePatterns,
      preserveLineBreaks: this.options.preserveLineBreaks,
      compressNested,
    });
    const extracted = extractBlocks(html, rules, blocks);
    const skeleton = transformSkeleton(extracted.skeleton, this.options, topLevel);
    this.processBlocks(blocks, statistics);
    const result = restoreBlocks(skeleton, blocks, extracted.categoryOrder);

    if (statistics) {
      statistics.time = Date.now() - statistics.time;
      statistics.compressedMetrics.filesize = result.length;
      statistics.compressedMetrics.emptyChars = countWhitespace(result);
    }
    return result;
  }

  private startStatistics(html: string): HtmlCompressorStatistics | null {
    if (!this.options.generateStatistics) {
      this.statistics = null;
      return null;
    }
    const statistics = new HtmlCompressorStatistics();
    statistics.time = Date.now();
    statistics.originalMetrics.filesize = html.length;
    statistics.originalMetrics.emptyChars = countWhitespace(html);
    this.statistics = statistics;
    return statistics;
  }

  /**
   * Minifies scripts and styles and rewrites event handlers, as configured,
   * before the blocks are restored.
   */
  private processBlocks(blocks: BlockStore, statistics: HtmlCompressorStatistics | null): void {
    const { compressJavaScript, compressCss, removeJavaScriptProtocol: stripProtocol } = this.options;
    const userCategories = this.options.preservePatterns.map((_, index): BlockCategory => `USER${index}`);

    if (statistics) {
      statistics.preservedSize += blocks.size([...VERBATIM_CATEGORIES, ...userCategories]);
      statistics.originalMetrics.inlineScriptSize = blocks.size(["SCRIPT"]);
      statistics.originalMetrics.inlineStyleSize = blocks.size(["STYLE"]);
      statistics.originalMetrics.inlineEventSize = blocks.size(["EVENT"]);
    }

    if (compressJavaScript) {
      blocks.update("SCRIPT", (block) => this.javaScript.compress(block));
    }
    if (compressCss) {
      blocks.update("STYLE", (block) => this.css.compress(block));
    }
    if (stripProtocol) {
      blocks.update("EVENT", removeJavaScriptProtocol);
    }

    if (statistics) {
      // Unminified blocks count as preserved, and so do rewritten event handlers
      if (!compressJavaScript) statistics.preservedSize += blocks.size(["SCRIPT"]);
      if (!compressCss) statistics.preservedSize += blocks.size(["STYLE"]);
      statistics.preservedSize += blocks.size(["EVENT"]);
      statistics.compressedMetrics.inlineScriptSize = blocks.size(["SCRIPT"]);
      statistics.compressedMetrics.inlineStyleSize = blocks.size(["STYLE"]);
      statistics.compressedMetrics.inlineEventSize = blocks.size(["EVENT"]);
    }
  }
}
