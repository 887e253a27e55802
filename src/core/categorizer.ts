import { DEFAULT_FALLBACK_CATEGORY } from './types.js';
import type { CategorizedBlock, CategoryTable, DeclarationBlock } from './types.js';

export interface Categorizer {
  readonly fallback: string;
  categoryOf(name: string): string;
  categorize(blocks: readonly DeclarationBlock[]): CategorizedBlock[];
}

/**
 * Build a categorizer over an inverse index of the table. When a name is
 * listed under several labels, the first label in iteration order owns it.
 */
export function createCategorizer(
  table: CategoryTable,
  fallback: string = DEFAULT_FALLBACK_CATEGORY,
): Categorizer {
  const owners = new Map<string, string>();

  for (const [label, names] of Object.entries(table)) {
    for (const name of names) {
      if (!owners.has(name)) owners.set(name, label);
    }
  }

  const categoryOf = (name: string): string => owners.get(name) ?? fallback;

  return {
    fallback,
    categoryOf,
    categorize: blocks => blocks.map(block => ({ ...block, category: categoryOf(block.name) })),
  };
}
