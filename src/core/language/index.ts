import type { LanguageId, LanguageProfile } from '../types.js';
import { rustProfile } from './rust.js';
import { typescriptProfile } from './typescript.js';

const profiles: Record<LanguageId, LanguageProfile> = {
  rust: rustProfile,
  typescript: typescriptProfile,
};

export function getLanguageProfile(id: LanguageId): LanguageProfile {
  return profiles[id];
}

export function isLanguageId(value: unknown): value is LanguageId {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(profiles, value);
}

export const LABEL_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Throw unless `label` can name a category module next to the manifest.
 */
export function assertCategoryLabel(label: string, profile: LanguageProfile, origin: string): void {
  if (!LABEL_RE.test(label)) {
    throw new Error(`${origin}: invalid category label "${label}" (must match ${LABEL_RE})`);
  }
  if (profile.reservedLabels.has(label)) {
    throw new Error(`${origin}: category label "${label}" is reserved for ${profile.id} (manifest is ${profile.manifestFile})`);
  }
}

export function getSupportedLanguages(): LanguageId[] {
  return Object.values(profiles).map(p => p.id);
}

export { rustProfile, typescriptProfile };
