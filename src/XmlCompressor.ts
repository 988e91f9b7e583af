import type { ICompressor } from "./ICompressor.js";
import type { XmlCompressorOptions } from "./types.js";
import {
  REGEX_INTERTAG_SPACE,
  REGEX_SPACE_INSIDE_TAG,
  REGEX_TAG_END_SPACE,
  REGEX_TAG_PROPERTY,
  REGEX_XML_COMMENT,
} from "./constants.js";
import { XmlCompressorOptionsSchema, validateOptions } from "./options.js";
import { cdataRule, extractBlocks } from "./utils/block-extractor.js";
import { restoreBlocks } from "./utils/block-restorer.js";

/**
 * XmlCompressor - removes comments and insignificant whitespace from XML.
 * CDATA sections are kept verbatim. Whitespace in text content is only
 * touched between tags when `removeIntertagSpaces` is on.
 */
export class XmlCompressor implements ICompressor {
  private readonly options: Readonly<Required<XmlCompressorOptions>>;

  /**
   * @throws {CompressorError} ERR_INVALID_OPTIONS for unknown or mistyped options.
   */
  constructor(options: XmlCompressorOptions = {}) {
    this.options = Object.freeze(validateOptions(XmlCompressorOptionsSchema, options));
  }

  compress(xml: string): string {
    if (!this.options.enabled || !xml) {
      return xml;
    }

    const { skeleton, blocks, categoryOrder } = extractBlocks(xml, [cdataRule]);
    let result = skeleton;
    if (this.options.removeComments) {
      result = result.replace(REGEX_XML_COMMENT, "");
    }
    if (this.options.removeIntertagSpaces) {
      result = result.replace(REGEX_INTERTAG_SPACE, "><");
    }
    result = result
      .replace(REGEX_SPACE_INSIDE_TAG, " ")
      .replace(REGEX_TAG_PROPERTY, "$1=")
      .replace(REGEX_TAG_END_SPACE, "$1$2");

    return restoreBlocks(result, blocks, categoryOrder).trim();
  }
}
