import { createHash } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';

export function digest(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Whether `filePath` is missing or holds something other than `content`.
 */
export function differsOnDisk(filePath: string, content: string): boolean {
  if (!existsSync(filePath)) return true;
  return digest(readFileSync(filePath, 'utf-8')) !== digest(content);
}

/**
 * Write unconditionally, overwriting any previous file. Returns whether the
 * bytes on disk changed.
 */
export function writeGeneratedFile(filePath: string, content: string): boolean {
  const changed = differsOnDisk(filePath, content);
  writeFileSync(filePath, content, 'utf-8');
  return changed;
}
