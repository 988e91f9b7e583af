import type { ICompressor } from "./ICompressor.js";

/**
 * Categories of protected content. Each has its own placeholder namespace
 * and its own ordered block list.
 */
export type BlockCategory =
  | "SKIP"
  | "COND"
  | "EVENT"
  | "PRE"
  | "SCRIPT"
  | "STYLE"
  | "TEXTAREA"
  | "LT"
  | "CDATA"
  | `USER${number}`;

/**
 * Configuration options for the HtmlCompressor.
 */
export interface HtmlCompressorOptions {
  /**
   * When false, compress() returns its input unchanged.
   * @default true
   */
  enabled?: boolean;
  /**
   * Removes HTML comments. Conditional comments are never removed.
   * @default true
   */
  removeComments?: boolean;
  /**
   * Collapses runs of whitespace into a single space.
   * @default true
   */
  removeMultiSpaces?: boolean;
  /**
   * Removes spaces around `=` in attributes and before a tag's closing `>` or `/>`.
   * @default true
   */
  removeSpacesInsideTags?: boolean;
  /**
   * Removes whitespace between adjacent tags.
   * @default false
   */
  removeIntertagSpaces?: boolean;
  /**
   * Removes quotes around attribute values made only of letters, digits, `-` and `_`.
   * @default false
   */
  removeQuotes?: boolean;
  /**
   * Keeps line breaks so that whitespace collapsing cannot join lines.
   * @default false
   */
  preserveLineBreaks?: boolean;
  /**
   * Replaces any doctype declaration with `<!DOCTYPE html>`.
   * @default false
   */
  simpleDoctype?: boolean;
  /**
   * Drops `type="text/javascript"` and `language="javascript"` from script tags.
   * @default false
   */
  removeScriptAttributes?: boolean;
  /**
   * Drops `type="text/css"` from style tags.
   * @default false
   */
  removeStyleAttributes?: boolean;
  /**
   * Drops `type="text/css"` from link tags whose `rel` is a stylesheet.
   * @default false
   */
  removeLinkAttributes?: boolean;
  /**
   * Drops `method="get"` from form tags.
   * @default false
   */
  removeFormAttributes?: boolean;
  /**
   * Drops `type="text"` from input tags.
   * @default false
   */
  removeInputAttributes?: boolean;
  /**
   * Reduces `checked`, `selected`, `disabled` and `readonly` to bare attribute names.
   * @default false
   */
  simpleBooleanAttributes?: boolean;
  /**
   * Removes a leading `javascript:` from inline event handlers.
   * @default false
   */
  removeJavaScriptProtocol?: boolean;
  /**
   * Removes `http:` from href, src, cite and action URLs unless the tag has `rel="external"`.
   * @default false
   */
  removeHttpProtocol?: boolean;
  /**
   * Removes `https:` from href, src, cite and action URLs unless the tag has `rel="external"`.
   * @default false
   */
  removeHttpsProtocol?: boolean;
  /**
   * Tags around which surrounding whitespace is removed: "min", "max", "all",
   * one of the preset lists, or a comma-separated list of tag names.
   * An empty string disables the step.
   * @default ""
   */
  removeSurroundingSpaces?: string;
  /**
   * Extra regions to keep verbatim, checked before any built-in region.
   * Strings are compiled with the `s` flag.
   * @default []
   */
  preservePatterns?: (RegExp | string)[];
  /**
   * Minifies inline `<script>` content with `javaScriptCompressor`.
   * @default false
   */
  compressJavaScript?: boolean;
  /**
   * Minifies inline `<style>` content with `cssCompressor`.
   * @default false
   */
  compressCss?: boolean;
  /**
   * Minifier used for inline scripts.
   * @default EsbuildJavaScriptCompressor
   */
  javaScriptCompressor?: ICompressor;
  /**
   * Minifier used for inline styles.
   * @default CssoCssCompressor
   */
  cssCompressor?: ICompressor;
  /**
   * Collects size and timing figures for each compress() call.
   * Makes the instance unsafe to share between concurrent callers.
   * @default false
   */
  generateStatistics?: boolean;
}

/** Options after defaults are applied and preserve patterns are compiled. */
export type ResolvedHtmlCompressorOptions = Readonly<
  Required<Omit<HtmlCompressorOptions, "preservePatterns">> & {
    preservePatterns: ReadonlyArray<RegExp>;
  }
>;

/**
 * Configuration options for the XmlCompressor.
 */
export interface XmlCompressorOptions {
  /** @default true */
  enabled?: boolean;
  /** @default true */
  removeComments?: boolean;
  /** @default true */
  removeIntertagSpaces?: boolean;
}

/**
 * Options for the esbuild-backed JavaScript minifier.
 */
export interface JavaScriptCompressorOptions {
  /** Shortens local variable names. @default true */
  minifyIdentifiers?: boolean;
  /** Rewrites syntax into shorter equivalents. @default true */
  minifySyntax?: boolean;
  /** @default true */
  minifyWhitespace?: boolean;
}

/**
 * Options for the csso-backed CSS minifier.
 */
export interface CssCompressorOptions {
  /** Merges and reorders rules where safe. @default true */
  restructure?: boolean;
}

/**
 * Size figures for one side (before or after) of a compress() call.
 */
export interface HtmlMetrics {
  filesize: number;
  emptyChars: number;
  inlineScriptSize: number;
  inlineStyleSize: number;
  inlineEventSize: number;
}
