import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { LABEL_RE, assertCategoryLabel, getLanguageProfile, getSupportedLanguages, isLanguageId } from './language/index.js';
import { DEFAULT_FALLBACK_CATEGORY, DEFAULT_LOOKAHEAD } from './types.js';
import type { CategoryTable, DuplicatePolicy, LanguageId, SplitConfig } from './types.js';

export const CONFIG_FILE = 'modsplit.json';

/** Fields a config file or CLI flags may set. Paths are project-relative. */
export interface ConfigOverrides {
  sourceFile?: string;
  outputDir?: string;
  language?: LanguageId;
  /** Inline table, or a path to a JSON file holding one. */
  taxonomy?: CategoryTable | string;
  fallbackCategory?: string;
  lookahead?: number;
  preamble?: string;
  onDuplicate?: DuplicatePolicy;
}

export function getConfigPath(projectRoot: string): string {
  return join(resolve(projectRoot), CONFIG_FILE);
}

/**
 * Defaults, then `modsplit.json` in the project root, then `overrides`.
 */
export function resolveConfig(projectRoot?: string, overrides: ConfigOverrides = {}): SplitConfig {
  const root = projectRoot ? resolve(projectRoot) : process.cwd();
  const configPath = getConfigPath(root);

  const merged: ConfigOverrides = {
    sourceFile: 'src/types.rs',
    outputDir: 'src/types',
    language: 'rust',
    fallbackCategory: DEFAULT_FALLBACK_CATEGORY,
    lookahead: DEFAULT_LOOKAHEAD,
    onDuplicate: 'error',
  };

  if (existsSync(configPath)) {
    Object.assign(merged, parseConfigFile(readJson(configPath), configPath));
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }

  const language = merged.language ?? 'rust';
  const profile = getLanguageProfile(language);
  const taxonomy = loadTaxonomy(merged.taxonomy ?? {}, root);
  const fallbackCategory = merged.fallbackCategory ?? DEFAULT_FALLBACK_CATEGORY;

  assertCategoryLabel(fallbackCategory, profile, 'fallbackCategory');
  for (const label of Object.keys(taxonomy)) {
    assertCategoryLabel(label, profile, 'taxonomy');
  }

  const lookahead = merged.lookahead ?? DEFAULT_LOOKAHEAD;
  if (!Number.isInteger(lookahead) || lookahead < 0) {
    throw new Error(`Invalid lookahead ${lookahead}: must be a non-negative integer`);
  }

  return {
    projectRoot: root,
    sourceFile: resolve(root, merged.sourceFile ?? 'src/types.rs'),
    outputDir: resolve(root, merged.outputDir ?? 'src/types'),
    language,
    taxonomy,
    fallbackCategory,
    lookahead,
    preamble: merged.preamble,
    onDuplicate: merged.onDuplicate ?? 'error',
  };
}

export function saveConfig(projectRoot: string, config: ConfigOverrides): string {
  const configPath = getConfigPath(projectRoot);
  writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return configPath;
}

export function loadTaxonomy(taxonomy: CategoryTable | string, projectRoot: string): CategoryTable {
  if (typeof taxonomy !== 'string') return parseTaxonomy(taxonomy, 'taxonomy');

  const taxonomyPath = resolve(projectRoot, taxonomy);
  if (!existsSync(taxonomyPath)) {
    throw new Error(`Taxonomy file not found: ${taxonomyPath}`);
  }
  return parseTaxonomy(readJson(taxonomyPath), taxonomyPath);
}

/**
 * Validate a `{ label: [identifier, ...] }` table.
 */
export function parseTaxonomy(raw: unknown, origin: string): CategoryTable {
  if (!isRecord(raw)) {
    throw new Error(`${origin}: taxonomy must be an object of label -> identifier list`);
  }

  const table: Record<string, string[]> = {};

  for (const [label, names] of Object.entries(raw)) {
    if (!LABEL_RE.test(label)) {
      throw new Error(`${origin}: invalid category label "${label}"`);
    }
    if (!Array.isArray(names) || !names.every((n): n is string => typeof n === 'string')) {
      throw new Error(`${origin}: category "${label}" must be a list of identifier strings`);
    }
    table[label] = names;
  }

  return table;
}

function parseConfigFile(raw: unknown, origin: string): ConfigOverrides {
  if (!isRecord(raw)) {
    throw new Error(`${origin}: config must be a JSON object`);
  }

  const config: ConfigOverrides = {};

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'sourceFile':
      case 'outputDir':
      case 'fallbackCategory':
      case 'preamble':
        config[key] = expectString(value, key, origin);
        break;
      case 'language':
        if (!isLanguageId(value)) {
          throw new Error(`${origin}: "language" must be one of ${getSupportedLanguages().join(', ')}`);
        }
        config.language = value;
        break;
      case 'taxonomy':
        config.taxonomy = typeof value === 'string' ? value : parseTaxonomy(value, `${origin} (taxonomy)`);
        break;
      case 'lookahead':
        if (typeof value !== 'number') {
          throw new Error(`${origin}: "lookahead" must be a number`);
        }
        config.lookahead = value;
        break;
      case 'onDuplicate':
        if (value !== 'error' && value !== 'last-wins') {
          throw new Error(`${origin}: "onDuplicate" must be "error" or "last-wins"`);
        }
        config.onDuplicate = value;
        break;
      default:
        throw new Error(`${origin}: unknown key "${key}"`);
    }
  }

  return config;
}

function readJson(filePath: string): unknown {
  const text = readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${filePath}: invalid JSON (${reason})`);
  }
}

function expectString(value: unknown, key: string, origin: string): string {
  if (typeof value !== 'string') {
    throw new Error(`${origin}: "${key}" must be a string`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
