import {
  JAVASCRIPT_TYPES,
  REGEX_CDATA_SECTION,
  REGEX_CONDITIONAL_COMMENT,
  REGEX_EVENT_DOUBLE_QUOTED,
  REGEX_EVENT_SINGLE_QUOTED,
  REGEX_LINE_BREAK,
  REGEX_PRE,
  REGEX_SCRIPT,
  REGEX_SKIP_BLOCK,
  REGEX_STYLE,
  REGEX_TEXTAREA,
  TEMPLATE_SCRIPT_TYPES,
} from "../constants.js";
import type { BlockCategory } from "../types.js";
import { scriptType } from "./attributes.js";
import { BlockStore } from "./block-store.js";
import { group, isBlank, replaceMatches } from "./replace.js";

/**
 * What a rule decided to do with one match: store `content` under
 * `category` and put `before + placeholder + after` in its place.
 */
export interface Preservation {
  category: BlockCategory;
  content: string;
  before?: string;
  after?: string;
}

/**
 * One extraction pass. Rules run in list order, each over the output of the
 * previous one, so placeholders written by an earlier rule are opaque text
 * to every later rule.
 */
export interface PreservationRule {
  readonly name: string;
  /** Global pattern scanned over the current skeleton. */
  readonly pattern: RegExp;
  /** Categories this rule may write to, in the order they should be restored last-first. */
  readonly categories: ReadonlyArray<BlockCategory>;
  /** Returns undefined to leave the match untouched. */
  preserve(match: RegExpMatchArray): Preservation | undefined;
}

export interface ExtractionResult {
  skeleton: string;
  blocks: BlockStore;
  /** Every category the rules could write to, in extraction order. */
  categoryOrder: ReadonlyArray<BlockCategory>;
}

export interface HtmlRuleOptions {
  preservePatterns: ReadonlyArray<RegExp>;
  preserveLineBreaks: boolean;
  /** Compresses the body of a conditional comment with an independent compressor. */
  compressNested: (body: string) => string;
}

/**
 * Runs the rules over the source in order, collecting the protected regions.
 */
export function extractBlocks(
  source: string,
  rules: ReadonlyArray<PreservationRule>,
  blocks: BlockStore = new BlockStore()
): ExtractionResult {
  let skeleton = source;
  for (const rule of rules) {
    skeleton = replaceMatches(skeleton, rule.pattern, (match) => {
      const preserved = rule.preserve(match);
      if (!preserved) return match[0];
      const placeholder = blocks.add(preserved.category, preserved.content);
      return `${preserved.before ?? ""}${placeholder}${preserved.after ?? ""}`;
    });
  }
  return { skeleton, blocks, categoryOrder: categoryOrder(rules) };
}

/**
 * Distinct categories of the rules, first appearance wins.
 */
export function categoryOrder(rules: ReadonlyArray<PreservationRule>): BlockCategory[] {
  const order: BlockCategory[] = [];
  for (const rule of rules) {
    for (const category of rule.categories) {
      if (!order.includes(category)) order.push(category);
    }
  }
  return order;
}

// --- Rule factories ---

/** Replaces the whole match; the stored block is `match[contentGroup]`. */
function wholeMatchRule(name: string, pattern: RegExp, category: BlockCategory, contentGroup: number): PreservationRule {
  return {
    name,
    pattern,
    categories: [category],
    preserve: (match) => {
      const content = group(match, contentGroup);
      return isBlank(content) ? undefined : { category, content };
    },
  };
}

/** Keeps groups 1 and 3 (open and close delimiters) and protects group 2. */
function enclosedRule(name: string, pattern: RegExp, category: BlockCategory): PreservationRule {
  return {
    name,
    pattern,
    categories: [category],
    preserve: (match) => {
      const content = group(match, 2);
      if (isBlank(content)) return undefined;
      return { category, content, before: group(match, 1), after: group(match, 3) };
    },
  };
}

export function userPatternRule(pattern: RegExp, ruleIndex: number): PreservationRule {
  return wholeMatchRule(`user-pattern-${ruleIndex}`, pattern, `USER${ruleIndex}`, 0);
}

export const skipBlockRule: PreservationRule = wholeMatchRule("skip", REGEX_SKIP_BLOCK, "SKIP", 1);

export function conditionalCommentRule(compressNested: (body: string) => string): PreservationRule {
  return {
    name: "conditional-comment",
    pattern: REGEX_CONDITIONAL_COMMENT,
    categories: ["COND"],
    preserve: (match) => {
      const body = group(match, 2);
      if (isBlank(body)) return undefined;
      return { category: "COND", content: group(match, 1) + compressNested(body) + group(match, 3) };
    },
  };
}

export const doubleQuotedEventRule = enclosedRule("event-double-quoted", REGEX_EVENT_DOUBLE_QUOTED, "EVENT");
export const singleQuotedEventRule = enclosedRule("event-single-quoted", REGEX_EVENT_SINGLE_QUOTED, "EVENT");
export const preRule = enclosedRule("pre", REGEX_PRE, "PRE");
export const styleRule = enclosedRule("style", REGEX_STYLE, "STYLE");
export const textareaRule = enclosedRule("textarea", REGEX_TEXTAREA, "TEXTAREA");

/**
 * Scripts are routed by their `type`: JavaScript goes to SCRIPT (eligible for
 * minification), template types stay in the skeleton, anything else is kept
 * opaque under SKIP.
 */
export const scriptRule: PreservationRule = {
  name: "script",
  pattern: REGEX_SCRIPT,
  categories: ["SCRIPT", "SKIP"],
  preserve: (match) => {
    const content = group(match, 2);
    if (isBlank(content)) return undefined;
    const openTag = group(match, 1);
    const type = scriptType(openTag);
    if (TEMPLATE_SCRIPT_TYPES.includes(type)) return undefined;
    const category: BlockCategory = JAVASCRIPT_TYPES.includes(type) ? "SCRIPT" : "SKIP";
    return { category, content, before: openTag, after: group(match, 3) };
  },
};

/** Stores the last newline of each run; the surrounding blanks are dropped. */
export const lineBreakRule: PreservationRule = {
  name: "line-break",
  pattern: REGEX_LINE_BREAK,
  categories: ["LT"],
  preserve: (match) => ({ category: "LT", content: group(match, 1) }),
};

export const cdataRule: PreservationRule = wholeMatchRule("cdata", REGEX_CDATA_SECTION, "CDATA", 0);

/**
 * The HTML extraction passes in priority order.
 */
export function buildHtmlRules(options: HtmlRuleOptions): PreservationRule[] {
  const rules: PreservationRule[] = options.preservePatterns.map((pattern, index) => userPatternRule(pattern, index));
  rules.push(
    skipBlockRule,
    conditionalCommentRule(options.compressNested),
    doubleQuotedEventRule,
    singleQuotedEventRule,
    preRule,
    scriptRule,
    styleRule,
    textareaRule
  );
  if (options.preserveLineBreaks) {
    rules.push(lineBreakRule);
  }
  return rules;
}
