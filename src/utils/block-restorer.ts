import type { BlockCategory } from "../types.js";
import type { BlockStore } from "./block-store.js";
import { placeholderPattern } from "./block-store.js";
import { group, replaceMatches } from "./replace.js";

/**
 * Puts stored blocks back in place of their placeholders, walking the
 * categories in the reverse of their extraction order so that a block
 * holding another category's placeholder is restored before that placeholder
 * is resolved.
 *
 * A placeholder whose index has no stored block is left as it is.
 */
export function restoreBlocks(
  skeleton: string,
  blocks: BlockStore,
  categoryOrder: ReadonlyArray<BlockCategory>
): string {
  let html = skeleton;
  for (let i = categoryOrder.length - 1; i >= 0; i--) {
    html = restoreCategory(html, blocks, categoryOrder[i]);
  }
  return html;
}

export function restoreCategory(html: string, blocks: BlockStore, category: BlockCategory): string {
  if (blocks.count(category) === 0) return html;
  return replaceMatches(html, placeholderPattern(blocks.namespace, category), (match) => {
    const block = blocks.get(category, Number.parseInt(group(match, 1), 10));
    return block ?? match[0];
  });
}
