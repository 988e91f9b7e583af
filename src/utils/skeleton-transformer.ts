import {
  ALL_TAGS,
  BLOCK_TAGS_MAX,
  BLOCK_TAGS_MIN,
  CANONICAL_DOCTYPE,
  PLACEHOLDER_CLOSE,
  PLACEHOLDER_OPEN,
  REGEX_BOOLEAN_ATTR,
  REGEX_COMMENT,
  REGEX_DOCTYPE,
  REGEX_EXTERNAL_REL,
  REGEX_FORM_METHOD_ATTR,
  REGEX_HTTPS_URL_ATTR,
  REGEX_HTTP_URL_ATTR,
  REGEX_INPUT_TYPE_ATTR,
  REGEX_INTERTAG_SPACE,
  REGEX_JS_LANGUAGE_ATTR,
  REGEX_JS_TYPE_ATTR,
  REGEX_LINK_TYPE_ATTR,
  REGEX_MULTI_SPACE,
  REGEX_STYLESHEET_REL,
  REGEX_STYLE_TYPE_ATTR,
  REGEX_TAG_END_SPACE,
  REGEX_TAG_LAST_UNQUOTED_VALUE,
  REGEX_TAG_PROPERTY,
  REGEX_TAG_QUOTED_VALUE,
} from "../constants.js";
import type { ResolvedHtmlCompressorOptions } from "../types.js";
import { hasRel } from "./attributes.js";
import { escapeRegExp } from "./block-store.js";
import { group, replaceMatches } from "./replace.js";

type TransformOptions = Pick<
  ResolvedHtmlCompressorOptions,
  | "removeComments"
  | "simpleDoctype"
  | "removeScriptAttributes"
  | "removeStyleAttributes"
  | "removeLinkAttributes"
  | "removeFormAttributes"
  | "removeInputAttributes"
  | "simpleBooleanAttributes"
  | "removeHttpProtocol"
  | "removeHttpsProtocol"
  | "removeIntertagSpaces"
  | "removeMultiSpaces"
  | "removeSpacesInsideTags"
  | "removeQuotes"
  | "removeSurroundingSpaces"
>;

/**
 * A single rewrite of the skeleton, applied only when `enabled` says so.
 */
export interface SkeletonStep {
  readonly name: string;
  enabled(options: TransformOptions): boolean;
  apply(html: string, options: TransformOptions): string;
}

const OPEN = escapeRegExp(PLACEHOLDER_OPEN);
const CLOSE = escapeRegExp(PLACEHOLDER_CLOSE);
const REGEX_TAG_BEFORE_PLACEHOLDER = new RegExp(`>\\s+${OPEN}`, "g");
const REGEX_PLACEHOLDER_BEFORE_TAG = new RegExp(`${CLOSE}\\s+<`, "g");
const REGEX_PLACEHOLDER_BEFORE_PLACEHOLDER = new RegExp(`${CLOSE}\\s+${OPEN}`, "g");

export function removeComments(html: string): string {
  return html.replace(REGEX_COMMENT, "");
}

export function simplifyDoctype(html: string): string {
  return html.replace(REGEX_DOCTYPE, CANONICAL_DOCTYPE);
}

export function removeScriptAttributes(html: string): string {
  return html.replace(REGEX_JS_TYPE_ATTR, "$1$3").replace(REGEX_JS_LANGUAGE_ATTR, "$1$3");
}

export function removeStyleAttributes(html: string): string {
  return html.replace(REGEX_STYLE_TYPE_ATTR, "$1$3");
}

export function removeLinkAttributes(html: string): string {
  return replaceMatches(html, REGEX_LINK_TYPE_ATTR, (match) =>
    hasRel(match[0], REGEX_STYLESHEET_REL) ? group(match, 1) + group(match, 3) : match[0]
  );
}

export function removeFormAttributes(html: string): string {
  return html.replace(REGEX_FORM_METHOD_ATTR, "$1$3");
}

export function removeInputAttributes(html: string): string {
  return html.replace(REGEX_INPUT_TYPE_ATTR, "$1$3");
}

export function simplifyBooleanAttributes(html: string): string {
  return html.replace(REGEX_BOOLEAN_ATTR, "$1$2$4");
}

/**
 * Drops the scheme matched by `pattern` from URL attributes, except on tags
 * marked `rel="external"`.
 */
export function removeUrlScheme(html: string, pattern: RegExp): string {
  return replaceMatches(html, pattern, (match) =>
    hasRel(match[0], REGEX_EXTERNAL_REL) ? match[0] : group(match, 1) + group(match, 2)
  );
}

/**
 * Placeholders count as tag boundaries on either side.
 */
export function removeIntertagSpaces(html: string): string {
  return html
    .replace(REGEX_INTERTAG_SPACE, "><")
    .replace(REGEX_TAG_BEFORE_PLACEHOLDER, `>${PLACEHOLDER_OPEN}`)
    .replace(REGEX_PLACEHOLDER_BEFORE_TAG, `${PLACEHOLDER_CLOSE}<`)
    .replace(REGEX_PLACEHOLDER_BEFORE_PLACEHOLDER, `${PLACEHOLDER_CLOSE}${PLACEHOLDER_OPEN}`);
}

export function removeMultiSpaces(html: string): string {
  return html.replace(REGEX_MULTI_SPACE, " ");
}

/**
 * Removes spaces around `=` and before a tag's `>` or `/>`. A space is kept
 * between an unquoted value and `/>`, otherwise the slash would join the value.
 */
export function removeSpacesInsideTags(html: string): string {
  const tight = html.replace(REGEX_TAG_PROPERTY, "$1=");
  return replaceMatches(tight, REGEX_TAG_END_SPACE, (match) => {
    const head = group(match, 1);
    const end = group(match, 2);
    const keepSpace = end.startsWith("/") && REGEX_TAG_LAST_UNQUOTED_VALUE.test(head);
    return keepSpace ? `${head} ${end}` : head + end;
  });
}

export function removeQuotes(html: string): string {
  return replaceMatches(html, REGEX_TAG_QUOTED_VALUE, (match) => {
    const value = group(match, 2);
    const slash = group(match, 3);
    return slash.length === 0 ? `=${value}` : `=${value} ${slash}`;
  });
}

/**
 * Builds the pattern for surrounding-space removal from an option value.
 * Returns undefined when the option is blank.
 */
export function surroundingSpacesPattern(tagList: string): RegExp | undefined {
  const value = tagList.trim().toLowerCase();
  if (!value) return undefined;
  if (value === ALL_TAGS) return /\s*(<[^>]+>)\s*/gs;

  const list = value === "min" ? BLOCK_TAGS_MIN : value === "max" ? BLOCK_TAGS_MAX : value;
  const tags = list
    .split(",")
    .map((tag) => tag.trim())
    .filter(Boolean)
    .map(escapeRegExp);
  if (tags.length === 0) return undefined;
  return new RegExp(`\\s*(</?(?:${tags.join("|")})(?:>|[\\s/][^>]*>))\\s*`, "gis");
}

export function removeSurroundingSpaces(html: string, tagList: string): string {
  const pattern = surroundingSpacesPattern(tagList);
  return pattern ? html.replace(pattern, "$1") : html;
}

/**
 * The skeleton rewrites in the order they are applied.
 */
export const SKELETON_STEPS: ReadonlyArray<SkeletonStep> = [
  { name: "remove-comments", enabled: (o) => o.removeComments, apply: removeComments },
  { name: "simple-doctype", enabled: (o) => o.simpleDoctype, apply: simplifyDoctype },
  { name: "remove-script-attributes", enabled: (o) => o.removeScriptAttributes, apply: removeScriptAttributes },
  { name: "remove-style-attributes", enabled: (o) => o.removeStyleAttributes, apply: removeStyleAttributes },
  { name: "remove-link-attributes", enabled: (o) => o.removeLinkAttributes, apply: removeLinkAttributes },
  { name: "remove-form-attributes", enabled: (o) => o.removeFormAttributes, apply: removeFormAttributes },
  { name: "remove-input-attributes", enabled: (o) => o.removeInputAttributes, apply: removeInputAttributes },
  { name: "simple-boolean-attributes", enabled: (o) => o.simpleBooleanAttributes, apply: simplifyBooleanAttributes },
  {
    name: "remove-http-protocol",
    enabled: (o) => o.removeHttpProtocol,
    apply: (html) => removeUrlScheme(html, REGEX_HTTP_URL_ATTR),
  },
  {
    name: "remove-https-protocol",
    enabled: (o) => o.removeHttpsProtocol,
    apply: (html) => removeUrlScheme(html, REGEX_HTTPS_URL_ATTR),
  },
  { name: "remove-intertag-spaces", enabled: (o) => o.removeIntertagSpaces, apply: removeIntertagSpaces },
  { name: "remove-multi-spaces", enabled: (o) => o.removeMultiSpaces, apply: removeMultiSpaces },
  { name: "remove-spaces-inside-tags", enabled: (o) => o.removeSpacesInsideTags, apply: removeSpacesInsideTags },
  { name: "remove-quotes", enabled: (o) => o.removeQuotes, apply: removeQuotes },
  {
    name: "remove-surrounding-spaces",
    enabled: (o) => o.removeSurroundingSpaces.trim().length > 0,
    apply: (html, o) => removeSurroundingSpaces(html, o.removeSurroundingSpaces),
  },
];

/**
 * Applies every enabled step in order, then trims the result unless
 * `trimResult` is false (conditional comment bodies keep their edges).
 */
export function transformSkeleton(skeleton: string, options: TransformOptions, trimResult = true): string {
  let html = skeleton;
  for (const step of SKELETON_STEPS) {
    if (step.enabled(options)) {
      html = step.apply(html, options);
    }
  }
  return trimResult ? html.trim() : html;
}
