import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { groupByCategory, renderModule, writeModuleFiles } from '../../../src/core/writer/module-writer.js';
import { rustProfile } from '../../../src/core/language/rust.js';
import type { CategorizedBlock } from '../../../src/core/types.js';

function block(name: string, category: string): CategorizedBlock {
  return {
    name,
    category,
    content: `pub enum ${name} {\n    A,\n}`,
    startLine: 0,
    declarationLine: 0,
    endLine: 2,
  };
}

describe('groupByCategory', () => {
  it('should keep first-seen category order and input order within groups', () => {
    const groups = groupByCategory([
      block('B1', 'beta'),
      block('A1', 'alpha'),
      block('B2', 'beta'),
    ]);

    expect([...groups.keys()]).toEqual(['beta', 'alpha']);
    expect(groups.get('beta')?.map(b => b.name)).toEqual(['B1', 'B2']);
  });
});

describe('renderModule', () => {
  it('should join blocks with a blank line after the preamble', () => {
    expect(renderModule('use x;', ['one', 'two'])).toBe('use x;\n\none\n\ntwo\n');
  });

  it('should omit an empty preamble', () => {
    expect(renderModule('', ['one'])).toBe('one\n');
  });
});

describe('writeModuleFiles', () => {
  let outDir: string;

  beforeEach(() => {
    outDir = join(mkdtempSync(join(tmpdir(), 'modsplit-writer-')), 'nested', 'types');
  });

  afterEach(() => {
    rmSync(join(outDir, '..', '..'), { recursive: true, force: true });
  });

  it('should create the directory and write one file per category', () => {
    const groups = groupByCategory([block('Side', 'order'), block('Thing', 'other')]);
    const result = writeModuleFiles(groups, outDir, rustProfile);

    expect(result.categories).toEqual(['order', 'other']);
    expect(result.files.map(f => f.blockCount)).toEqual([1, 1]);
    expect(readFileSync(join(outDir, 'order.rs'), 'utf-8')).toBe(
      'use serde::{Deserialize, Serialize};\n\npub enum Side {\n    A,\n}\n',
    );
  });

  it('should skip empty groups', () => {
    const groups = new Map<string, CategorizedBlock[]>([
      ['empty', []],
      ['order', [block('Side', 'order')]],
    ]);
    const result = writeModuleFiles(groups, outDir, rustProfile);

    expect(result.categories).toEqual(['order']);
    expect(existsSync(join(outDir, 'empty.rs'))).toBe(false);
  });

  it('should overwrite stale files and report unchanged ones', () => {
    const groups = groupByCategory([block('Side', 'order')]);

    writeModuleFiles(groups, outDir, rustProfile);
    const second = writeModuleFiles(groups, outDir, rustProfile);
    expect(second.files[0].changed).toBe(false);

    writeFileSync(join(outDir, 'order.rs'), 'stale', 'utf-8');
    const third = writeModuleFiles(groups, outDir, rustProfile, '');
    expect(third.files[0].changed).toBe(true);
    expect(readFileSync(join(outDir, 'order.rs'), 'utf-8')).toBe('pub enum Side {\n    A,\n}\n');
  });
});
