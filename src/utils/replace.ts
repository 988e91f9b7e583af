/**
 * Replaces every match of a global pattern with the value the callback
 * returns for it. The callback sees the full match array, so it can pick
 * groups by position regardless of how many the pattern has.
 *
 * The result is inserted literally; `$` sequences are not expanded.
 */
export function replaceMatches(text: string, pattern: RegExp, replacer: (match: RegExpMatchArray) => string): string {
  let result = "";
  let lastIndex = 0;
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    result += text.slice(lastIndex, start) + replacer(match);
    lastIndex = start + match[0].length;
  }
  return result + text.slice(lastIndex);
}

/**
 * Returns a captured group, or the empty string when it did not participate.
 */
export function group(match: RegExpMatchArray, index: number): string {
  return match[index] ?? "";
}

export function isBlank(text: string): boolean {
  return text.trim().length === 0;
}
