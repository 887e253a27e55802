export type LanguageId = 'rust' | 'typescript';

export type DuplicatePolicy = 'error' | 'last-wins';

/** Category label -> identifiers filed under it. */
export type CategoryTable = Record<string, readonly string[]>;

export interface DeclarationBlock {
  name: string;
  content: string;
  /** 0-based, inclusive */
  startLine: number;
  declarationLine: number;
  endLine: number;
  category?: string;
}

export interface CategorizedBlock extends DeclarationBlock {
  category: string;
}

export interface ExtractionResult {
  blocks: DeclarationBlock[];
  skippedLines: number[];
}

export interface LanguageProfile {
  id: LanguageId;
  extension: string;
  manifestFile: string;
  preamble: string;
  /** Cheap test for a declaration-start line, identifier or not. */
  declarationKeyword: RegExp;
  /** Captures the identifier in group 1. */
  declarationPattern: RegExp;
  /** Lines that end the behavior-block lookahead. */
  boundaryPattern: RegExp;
  /** Lines opening a behavior block of `name`; consecutive ones all attach. */
  behaviorBlockPattern(name: string): RegExp;
  /** Labels that cannot name a category module (manifest stem, keywords). */
  reservedLabels: ReadonlySet<string>;
  isLeadingLine(trimmed: string): boolean;
  renderManifest(sortedLabels: readonly string[]): string;
}

export interface SplitConfig {
  projectRoot: string;
  sourceFile: string;
  outputDir: string;
  language: LanguageId;
  taxonomy: CategoryTable;
  fallbackCategory: string;
  lookahead: number;
  preamble?: string;
  onDuplicate: DuplicatePolicy;
}

export interface WrittenFile {
  category: string;
  path: string;
  blockCount: number;
  changed: boolean;
}

export interface ModuleWriteResult {
  categories: string[];
  files: WrittenFile[];
}

export interface SplitPlan {
  sourceFile: string;
  blocks: CategorizedBlock[];
  groups: Map<string, CategorizedBlock[]>;
  skippedLines: number[];
  duplicates: string[];
  uncategorized: string[];
}

export interface SplitResult {
  blockCount: number;
  files: WrittenFile[];
  manifestPath: string;
  categories: string[];
}

export interface StaleFile {
  path: string;
  reason: 'missing' | 'outdated';
}

export const DEFAULT_LOOKAHEAD = 200;
export const DEFAULT_FALLBACK_CATEGORY = 'other';
