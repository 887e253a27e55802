import type { LanguageProfile } from '../types.js';
import { escapeRegExp } from './utils.js';

export const rustProfile: LanguageProfile = {
  id: 'rust',
  extension: 'rs',
  manifestFile: 'mod.rs',
  preamble: 'use serde::{Deserialize, Serialize};',
  declarationKeyword: /\bpub enum\s/,
  declarationPattern: /\bpub enum\s+([A-Za-z_]\w*)/,
  boundaryPattern: /\bpub (?:enum|struct)\s/,

  behaviorBlockPattern(name: string): RegExp {
    // `impl Name`, `impl<T> Name<T>` and `impl Trait for Name`, but not `impl NameSuffix`
    return new RegExp(
      `^\\s*impl(?:<[^>]*>)?\\s+(?:[\\w:]+(?:<[^>]*>)?\\s+for\\s+)?${escapeRegExp(name)}\\b`,
    );
  },

  reservedLabels: new Set([
    'mod', 'as', 'async', 'await', 'break', 'const', 'continue', 'crate', 'dyn', 'else',
    'enum', 'extern', 'false', 'fn', 'for', 'if', 'impl', 'in', 'let', 'loop', 'match',
    'move', 'mut', 'pub', 'ref', 'return', 'self', 'Self', 'static', 'struct', 'super',
    'trait', 'true', 'type', 'unsafe', 'use', 'where', 'while', 'abstract', 'become',
    'box', 'do', 'final', 'macro', 'override', 'priv', 'try', 'typeof', 'unsized',
    'virtual', 'yield',
  ]),

  isLeadingLine(trimmed: string): boolean {
    return trimmed.startsWith('///') || trimmed.startsWith('//!') || trimmed.startsWith('#[');
  },

  renderManifest(sortedLabels: readonly string[]): string {
    const lines = ['// Re-export all types from sub-modules', ''];
    for (const label of sortedLabels) {
      lines.push(`mod ${label};`);
    }

    lines.push('', '// Re-export all public types');
    for (const label of sortedLabels) {
      lines.push(`pub use ${label}::*;`);
    }

    return lines.join('\n') + '\n';
  },
};
