import type { ICompressor } from "./ICompressor.js";
import { HtmlCompressor } from "./HtmlCompressor.js";
import { XmlCompressor } from "./XmlCompressor.js";
import type {
  HtmlCompressorOptions,
  ResolvedHtmlCompressorOptions,
  XmlCompressorOptions,
  JavaScriptCompressorOptions,
  CssCompressorOptions,
  HtmlMetrics,
  BlockCategory,
} from "./types.js";

export type {
  ICompressor,
  HtmlCompressorOptions,
  ResolvedHtmlCompressorOptions,
  XmlCompressorOptions,
  JavaScriptCompressorOptions,
  CssCompressorOptions,
  HtmlMetrics,
  BlockCategory,
};
export { HtmlCompressor, XmlCompressor };
export { EsbuildJavaScriptCompressor } from "./EsbuildJavaScriptCompressor.js";
export { CssoCssCompressor } from "./CssoCssCompressor.js";
export { HtmlCompressorStatistics } from "./HtmlCompressorStatistics.js";
export { CompressorError } from "./errors.js";
export type { CompressorErrorCode, CompressorErrorDetails } from "./errors.js";
export {
  PHP_TAG_PATTERN,
  SERVER_SCRIPT_TAG_PATTERN,
  SERVER_SIDE_INCLUDE_PATTERN,
  BLOCK_TAGS_MIN,
  BLOCK_TAGS_MAX,
  ALL_TAGS,
} from "./constants.js";
