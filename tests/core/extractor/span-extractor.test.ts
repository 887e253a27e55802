import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { extractDeclarations, findBalancedEnd } from '../../../src/core/extractor/span-extractor.js';
import { rustProfile } from '../../../src/core/language/rust.js';
import { typescriptProfile } from '../../../src/core/language/typescript.js';

const FIXTURES_DIR = join(__dirname, '../../fixtures');

function rust(lines: string[], lookahead?: number) {
  return extractDeclarations(lines.join('\n'), { profile: rustProfile, lookahead });
}

describe('extractDeclarations', () => {
  it('should capture docs, attributes and the impl block of each enum', () => {
    const source = readFileSync(join(FIXTURES_DIR, 'types.rs'), 'utf-8');
    const { blocks, skippedLines } = extractDeclarations(source, { profile: rustProfile });

    expect(skippedLines).toEqual([]);
    expect(blocks.map(b => b.name)).toEqual(['Heading', 'Color', 'Marker']);

    const heading = blocks[0];
    expect(heading.startLine).toBe(1);
    expect(heading.declarationLine).toBe(4);
    expect(heading.endLine).toBe(16);
    expect(heading.content.split('\n')[1]).toBe('/// Direction of travel.');
    expect(heading.content.endsWith('    }\n}')).toBe(true);
    expect(heading.content).toContain('impl Heading {');
  });

  it('should not attach an impl block that follows another declaration', () => {
    const source = readFileSync(join(FIXTURES_DIR, 'types.rs'), 'utf-8');
    const { blocks } = extractDeclarations(source, { profile: rustProfile });

    const color = blocks[1];
    expect(color.startLine).toBe(17);
    expect(color.endLine).toBe(22);
    expect(color.content).toBe([
      '',
      '#[derive(Debug, Clone, Copy)]',
      'pub enum Color {',
      '    Red,',
      '    Green,',
      '}',
    ].join('\n'));
  });

  it('should extract two enums independently when the impl comes after both', () => {
    const { blocks } = rust([
      'pub enum A {',
      '    One,',
      '}',
      '',
      'pub enum B {',
      '    Two,',
      '}',
      '',
      'impl A {',
      '}',
    ]);

    expect(blocks.map(b => [b.name, b.startLine, b.endLine])).toEqual([
      ['A', 0, 2],
      ['B', 3, 6],
    ]);
  });

  it('should end at the closing line when no impl lies within the lookahead', () => {
    const lines = [
      'pub enum Z {',
      '    C,',
      '}',
      '',
      '',
      '',
      'impl Z {',
      '}',
    ];

    expect(rust(lines, 3).blocks[0].endLine).toBe(2);
    expect(rust(lines, 4).blocks[0].endLine).toBe(7);
  });

  it('should not treat an impl of a longer name as the associated block', () => {
    const { blocks } = rust([
      'pub enum Side {',
      '    Buy,',
      '}',
      '',
      'impl SideValue {',
      '}',
    ]);

    expect(blocks[0].endLine).toBe(2);
  });

  it('should attach a generic impl block', () => {
    const { blocks } = rust([
      'pub enum Slot<T> {',
      '    Empty,',
      '    Full(T),',
      '}',
      'impl<T> Slot<T> {',
      '    pub fn is_empty(&self) -> bool { matches!(self, Slot::Empty) }',
      '}',
    ]);

    expect(blocks[0].endLine).toBe(6);
  });

  it('should attach trait impls that follow the inherent impl', () => {
    const { blocks } = rust([
      'pub enum S { A }',
      'impl S {}',
      'impl std::fmt::Display for S {',
      '    fn fmt(&self, f: &mut std::fmt::Formatter) -> std::fmt::Result {',
      '        write!(f, "A")',
      '    }',
      '}',
      'impl From<S> for u8 {',
      '    fn from(_: S) -> u8 { 0 }',
      '}',
      'pub enum T { B }',
    ]);

    expect(blocks.map(b => [b.name, b.startLine, b.endLine])).toEqual([
      ['S', 0, 6],
      ['T', 10, 10],
    ]);
    expect(blocks[0].content).toContain('impl std::fmt::Display for S {');
  });

  it('should attach a trait impl with no inherent impl before it', () => {
    const { blocks } = rust([
      'pub enum Level { Low }',
      '',
      'impl Default for Level {',
      '    fn default() -> Self { Level::Low }',
      '}',
    ]);

    expect(blocks[0].endLine).toBe(4);
  });

  it('should reproduce CRLF input byte for byte', () => {
    const source = 'pub enum A {\r\n    X,\r\n}\r\n\r\nimpl A {\r\n}\r\n';
    const { blocks } = extractDeclarations(source, { profile: rustProfile });

    expect(blocks).toHaveLength(1);
    expect(blocks[0].content + '\n').toBe(source);
  });

  it('should skip a declaration line without an identifier', () => {
    const { blocks, skippedLines } = rust([
      'pub enum {',
      '}',
      'pub enum Ok {',
      '    Yes,',
      '}',
    ]);

    expect(skippedLines).toEqual([0]);
    expect(blocks.map(b => b.name)).toEqual(['Ok']);
    expect(blocks[0].startLine).toBe(2);
  });

  it('should clamp an unterminated declaration to the last line', () => {
    const { blocks } = rust([
      'pub enum Open {',
      '    A,',
      '    B,',
    ]);

    expect(blocks).toHaveLength(1);
    expect(blocks[0].endLine).toBe(2);
  });

  it('should walk leading lines back to the start of the file', () => {
    const { blocks } = rust([
      '',
      '/// First.',
      '#[repr(u8)]',
      'pub enum First { A }',
    ]);

    expect(blocks[0].startLine).toBe(0);
    expect(blocks[0].endLine).toBe(3);
  });

  it('should cover every declaration without overlapping spans', () => {
    const source = readFileSync(join(FIXTURES_DIR, 'types.rs'), 'utf-8');
    const { blocks } = extractDeclarations(source, { profile: rustProfile });

    for (let i = 1; i < blocks.length; i++) {
      expect(blocks[i].startLine).toBeGreaterThan(blocks[i - 1].endLine);
    }
    for (const block of blocks) {
      expect(block.declarationLine).toBeGreaterThanOrEqual(block.startLine);
      expect(block.declarationLine).toBeLessThanOrEqual(block.endLine);
    }
  });

  it('should pair a TypeScript enum with its merged namespace', () => {
    const source = [
      '/** Order side. */',
      "export enum Side {",
      "  Buy = 'BUY',",
      "  Sell = 'SELL',",
      '}',
      '',
      'export namespace Side {',
      '  export function flip(side: Side): Side {',
      '    return side === Side.Buy ? Side.Sell : Side.Buy;',
      '  }',
      '}',
      '',
      'export const enum Flag {',
      '  On,',
      '}',
    ].join('\n');

    const { blocks } = extractDeclarations(source, { profile: typescriptProfile });

    expect(blocks.map(b => [b.name, b.startLine, b.endLine])).toEqual([
      ['Side', 0, 10],
      ['Flag', 11, 14],
    ]);
  });
});

describe('TypeScript lookahead boundaries', () => {
  for (const boundary of ['export interface Shape {', 'export class Shape {', 'export type Shape = {']) {
    it(`should stop at "${boundary}"`, () => {
      const source = [
        'export enum Kind {',
        '  A,',
        '}',
        '',
        boundary,
        '  kind: Kind;',
        '}',
        '',
        'export namespace Kind {',
        '  export const all = [Kind.A];',
        '}',
      ].join('\n');

      const { blocks } = extractDeclarations(source, { profile: typescriptProfile });

      expect(blocks.map(b => [b.name, b.startLine, b.endLine])).toEqual([['Kind', 0, 2]]);
    });
  }
});

describe('findBalancedEnd', () => {
  it('should close on the same line for an empty body', () => {
    expect(findBalancedEnd(['pub enum E {}', 'next'], 0)).toBe(0);
  });

  it('should wait for the opening brace on a later line', () => {
    expect(findBalancedEnd(['pub enum E', '{', '    A,', '}'], 0)).toBe(3);
  });
});
