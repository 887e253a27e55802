import { join } from 'node:path';
import { ensureDir, writeGeneratedFile } from './files.js';
import type { LanguageProfile } from '../types.js';

export function sortLabels(labels: Iterable<string>): string[] {
  // Code-unit order, independent of the host locale
  return [...new Set(labels)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function renderManifest(labels: Iterable<string>, profile: LanguageProfile): string {
  return profile.renderManifest(sortLabels(labels));
}

/**
 * Write the manifest declaring and re-exporting every category module.
 * Returns its path.
 */
export function writeManifest(
  labels: Iterable<string>,
  outputDir: string,
  profile: LanguageProfile,
): string {
  ensureDir(outputDir);
  const manifestPath = join(outputDir, profile.manifestFile);
  writeGeneratedFile(manifestPath, renderManifest(labels, profile));
  return manifestPath;
}
