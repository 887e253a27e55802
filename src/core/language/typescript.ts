import type { LanguageProfile } from '../types.js';
import { escapeRegExp } from './utils.js';

/**
 * `export enum` declarations, each optionally followed by a merged
 * `export namespace` of the same name holding its helpers.
 */
export const typescriptProfile: LanguageProfile = {
  id: 'typescript',
  extension: 'ts',
  manifestFile: 'index.ts',
  preamble: '',
  declarationKeyword: /^\s*export\s+(?:declare\s+)?(?:const\s+)?enum\b/,
  declarationPattern: /^\s*export\s+(?:declare\s+)?(?:const\s+)?enum\s+([A-Za-z_$][\w$]*)/,
  boundaryPattern: /^\s*export\s+(?:declare\s+)?(?:(?:const\s+)?enum|interface|(?:abstract\s+)?class|type)\b/,

  behaviorBlockPattern(name: string): RegExp {
    return new RegExp(`^\\s*export\\s+(?:declare\\s+)?namespace\\s+${escapeRegExp(name)}(?![\\w$])`);
  },

  reservedLabels: new Set(['index']),

  isLeadingLine(trimmed: string): boolean {
    return trimmed.startsWith('/*') || trimmed.startsWith('*') || trimmed.startsWith('//') || trimmed.startsWith('@');
  },

  renderManifest(sortedLabels: readonly string[]): string {
    const lines = ['// Re-export all types from sub-modules', ''];
    for (const label of sortedLabels) {
      lines.push(`export * from './${label}.js';`);
    }
    return lines.join('\n') + '\n';
  },
};
