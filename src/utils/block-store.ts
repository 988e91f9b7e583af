import { PLACEHOLDER_CLOSE, PLACEHOLDER_NAMESPACE, PLACEHOLDER_OPEN } from "../constants.js";
import type { BlockCategory } from "../types.js";

/**
 * Ordered storage for the regions pulled out of a document during one
 * compress() call. Each category keeps its own list; a block's position in
 * that list is the index embedded in its placeholder.
 */
export class BlockStore {
  private readonly blocks = new Map<BlockCategory, string[]>();

  /**
   * @param namespace Distinguishes placeholders of nested compress() calls
   *   from those of the enclosing call.
   */
  constructor(public readonly namespace: string = PLACEHOLDER_NAMESPACE) {}

  /**
   * Stores a block and returns the placeholder that stands in for it.
   */
  add(category: BlockCategory, content: string): string {
    const list = this.blocks.get(category) ?? [];
    list.push(content);
    this.blocks.set(category, list);
    return formatPlaceholder(this.namespace, category, list.length - 1);
  }

  get(category: BlockCategory, index: number): string | undefined {
    const list = this.blocks.get(category);
    return list && index < list.length ? list[index] : undefined;
  }

  list(category: BlockCategory): ReadonlyArray<string> {
    return this.blocks.get(category) ?? [];
  }

  count(category: BlockCategory): number {
    return this.list(category).length;
  }

  /**
   * Rewrites every stored block of a category in place, keeping the order.
   */
  update(category: BlockCategory, rewrite: (block: string) => string): void {
    const list = this.blocks.get(category);
    if (!list) return;
    for (let i = 0; i < list.length; i++) {
      list[i] = rewrite(list[i]);
    }
  }

  /** Total length of every block in the given categories. */
  size(categories: ReadonlyArray<BlockCategory>): number {
    let total = 0;
    for (const category of categories) {
      for (const block of this.list(category)) total += block.length;
    }
    return total;
  }
}

export function formatPlaceholder(namespace: string, category: BlockCategory, index: number): string {
  return `${PLACEHOLDER_OPEN}${namespace}~${category}~${index}${PLACEHOLDER_CLOSE}`;
}

/**
 * Matches placeholders of one category, capturing the index.
 */
export function placeholderPattern(namespace: string, category: BlockCategory): RegExp {
  return new RegExp(
    `${escapeRegExp(PLACEHOLDER_OPEN)}${escapeRegExp(namespace)}~${escapeRegExp(category)}~(\\d+)${escapeRegExp(PLACEHOLDER_CLOSE)}`,
    "g"
  );
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
