import { parse, HTMLElement as NHPHTMLElement } from "node-html-parser";

/**
 * Reads one attribute from the first element of a tag fragment such as
 * `<script type="text/template">` or `<link rel=stylesheet href=x>`.
 * The lookup is case-insensitive on the attribute name.
 *
 * @returns The attribute value, or undefined when the fragment has no element
 *   or the element lacks the attribute.
 */
export function readTagAttribute(fragment: string, name: string): string | undefined {
  const root = parse(fragment);
  const element = root.childNodes.find((node): node is NHPHTMLElement => node instanceof NHPHTMLElement);
  return element?.getAttribute(name);
}

/**
 * Lowercased, trimmed `type` of a `<script>` open tag; empty when absent.
 */
export function scriptType(openTag: string): string {
  return (readTagAttribute(`${openTag}</script>`, "type") ?? "").trim().toLowerCase();
}

/**
 * Whether the tag's `rel` attribute matches the given pattern.
 */
export function hasRel(tag: string, pattern: RegExp): boolean {
  const rel = readTagAttribute(tag, "rel");
  return rel !== undefined && pattern.test(rel.trim());
}
