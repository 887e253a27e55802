import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { extractDeclarations } from './extractor/span-extractor.js';
import { createCategorizer } from './categorizer.js';
import { assertCategoryLabel, getLanguageProfile } from './language/index.js';
import { groupByCategory, moduleFileName, renderModule, writeModuleFiles } from './writer/module-writer.js';
import { renderManifest, writeManifest } from './writer/index-generator.js';
import { differsOnDisk } from './writer/files.js';
import type { DeclarationBlock, SplitConfig, SplitPlan, SplitResult, StaleFile } from './types.js';

export type PlanOptions = Pick<SplitConfig, 'sourceFile' | 'language' | 'taxonomy' | 'fallbackCategory' | 'lookahead' | 'onDuplicate'>;

export type ExecuteOptions = Pick<SplitConfig, 'outputDir' | 'language' | 'preamble'>;

/**
 * Extract, categorize and group the declarations of `source` without
 * touching the filesystem. Fails on duplicate identifiers unless the
 * policy is `last-wins`.
 */
export function planSplit(source: string, options: PlanOptions): SplitPlan {
  const profile = getLanguageProfile(options.language);
  assertCategoryLabel(options.fallbackCategory, profile, 'fallbackCategory');
  for (const label of Object.keys(options.taxonomy)) {
    assertCategoryLabel(label, profile, 'taxonomy');
  }

  const { blocks, skippedLines } = extractDeclarations(source, {
    profile,
    lookahead: options.lookahead,
  });

  const duplicates = findDuplicates(blocks);
  if (duplicates.length > 0 && options.onDuplicate === 'error') {
    throw new Error(
      `Duplicate declarations in ${options.sourceFile}: ${duplicates.join(', ')}` +
      ' (set onDuplicate to "last-wins" to write them anyway)',
    );
  }

  const categorizer = createCategorizer(options.taxonomy, options.fallbackCategory);
  const categorized = categorizer.categorize(blocks);

  return {
    sourceFile: options.sourceFile,
    blocks: categorized,
    groups: groupByCategory(categorized),
    skippedLines,
    duplicates,
    uncategorized: categorized
      .filter(b => b.category === categorizer.fallback)
      .map(b => b.name),
  };
}

/**
 * Write one module per category plus the manifest.
 */
export function executeSplit(plan: SplitPlan, options: ExecuteOptions): SplitResult {
  const profile = getLanguageProfile(options.language);
  const { categories, files } = writeModuleFiles(plan.groups, options.outputDir, profile, options.preamble);
  const manifestPath = writeManifest(categories, options.outputDir, profile);

  return {
    blockCount: plan.blocks.length,
    files,
    manifestPath,
    categories,
  };
}

/**
 * Read the source once, then plan and execute.
 */
export function splitFile(config: SplitConfig): { plan: SplitPlan; result: SplitResult } {
  const source = readSourceFile(config.sourceFile);
  const plan = planSplit(source, config);
  return { plan, result: executeSplit(plan, config) };
}

/**
 * Files a split would create or change, without writing anything.
 */
export function checkSplit(plan: SplitPlan, options: ExecuteOptions): StaleFile[] {
  const profile = getLanguageProfile(options.language);
  const preamble = options.preamble ?? profile.preamble;
  const expected = new Map<string, string>();

  for (const [category, blocks] of plan.groups) {
    expected.set(
      join(options.outputDir, moduleFileName(category, profile)),
      renderModule(preamble, blocks.map(b => b.content)),
    );
  }
  expected.set(join(options.outputDir, profile.manifestFile), renderManifest(plan.groups.keys(), profile));

  const stale: StaleFile[] = [];
  for (const [path, content] of expected) {
    if (differsOnDisk(path, content)) {
      stale.push({ path, reason: existsSync(path) ? 'outdated' : 'missing' });
    }
  }
  return stale;
}

export function findDuplicates(blocks: readonly DeclarationBlock[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const block of blocks) {
    if (seen.has(block.name)) duplicates.add(block.name);
    seen.add(block.name);
  }

  return [...duplicates];
}

export function readSourceFile(sourceFile: string): string {
  try {
    return readFileSync(sourceFile, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read source file ${sourceFile}: ${reason}`);
  }
}
