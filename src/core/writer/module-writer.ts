import { join } from 'node:path';
import { ensureDir, writeGeneratedFile } from './files.js';
import type { CategorizedBlock, LanguageProfile, ModuleWriteResult, WrittenFile } from '../types.js';

/**
 * Group blocks by category. Categories keep the order they were first seen
 * in, blocks keep input order within a category.
 */
export function groupByCategory(blocks: readonly CategorizedBlock[]): Map<string, CategorizedBlock[]> {
  const groups = new Map<string, CategorizedBlock[]>();

  for (const block of blocks) {
    const group = groups.get(block.category);
    if (group) {
      group.push(block);
    } else {
      groups.set(block.category, [block]);
    }
  }

  return groups;
}

export function renderModule(preamble: string, contents: readonly string[]): string {
  const body = contents.join('\n\n');
  return preamble ? `${preamble}\n\n${body}\n` : `${body}\n`;
}

export function moduleFileName(category: string, profile: LanguageProfile): string {
  return `${category}.${profile.extension}`;
}

/**
 * Write one file per non-empty category into `outputDir`, creating it when
 * absent. Existing files are overwritten.
 */
export function writeModuleFiles(
  groups: ReadonlyMap<string, readonly CategorizedBlock[]>,
  outputDir: string,
  profile: LanguageProfile,
  preamble: string = profile.preamble,
): ModuleWriteResult {
  ensureDir(outputDir);

  const files: WrittenFile[] = [];

  for (const [category, blocks] of groups) {
    if (blocks.length === 0) continue;

    const path = join(outputDir, moduleFileName(category, profile));
    const changed = writeGeneratedFile(path, renderModule(preamble, blocks.map(b => b.content)));
    files.push({ category, path, blockCount: blocks.length, changed });
  }

  return {
    categories: files.map(f => f.category),
    files,
  };
}
