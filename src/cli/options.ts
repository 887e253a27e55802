import { Command, InvalidArgumentError } from 'commander';
import { isLanguageId, getSupportedLanguages } from '../core/language/index.js';
import type { ConfigOverrides } from '../core/config.js';
import type { LanguageId } from '../core/types.js';

export interface SourceOptions {
  project: string;
  source?: string;
  out?: string;
  taxonomy?: string;
  language?: LanguageId;
  lookahead?: number;
  fallback?: string;
  allowDuplicates?: boolean;
}

/**
 * Options shared by every command that reads the source file.
 */
export function withSourceOptions(command: Command): Command {
  return command
    .option('-p, --project <path>', 'Project root path', process.cwd())
    .option('-s, --source <file>', 'Source file to split (relative to project)')
    .option('-o, --out <dir>', 'Output directory (relative to project)')
    .option('-t, --taxonomy <file>', 'JSON file mapping category -> identifiers')
    .option('-l, --language <id>', `Source language: ${getSupportedLanguages().join(', ')}`, parseLanguage)
    .option('--lookahead <lines>', 'Lines searched for an associated behavior block', parseLookahead)
    .option('--fallback <label>', 'Category for identifiers missing from the taxonomy')
    .option('--allow-duplicates', 'Write duplicate declarations instead of failing');
}

export function toOverrides(options: SourceOptions): ConfigOverrides {
  return {
    sourceFile: options.source,
    outputDir: options.out,
    taxonomy: options.taxonomy,
    language: options.language,
    lookahead: options.lookahead,
    fallbackCategory: options.fallback,
    onDuplicate: options.allowDuplicates ? 'last-wins' : undefined,
  };
}

function parseLanguage(value: string): LanguageId {
  if (!isLanguageId(value)) {
    throw new InvalidArgumentError(`Expected one of ${getSupportedLanguages().join(', ')}.`);
  }
  return value;
}

function parseLookahead(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}
