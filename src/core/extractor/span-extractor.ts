import { DEFAULT_LOOKAHEAD } from '../types.js';
import type { DeclarationBlock, ExtractionResult, LanguageProfile } from '../types.js';

export interface ExtractOptions {
  profile: LanguageProfile;
  /** Lines searched after a declaration for its behavior block. */
  lookahead?: number;
}

/**
 * Scan source text for declarations and recover each one's full span:
 * leading docs and annotations, the declaration body, and the behavior
 * blocks that follow it, each within the lookahead window of the last.
 *
 * Braces are counted per line without lexing, so a brace inside a string
 * or comment skews the count.
 */
export function extractDeclarations(source: string, options: ExtractOptions): ExtractionResult {
  const { profile } = options;
  const lookahead = options.lookahead ?? DEFAULT_LOOKAHEAD;
  const lines = source.split('\n');

  const blocks: DeclarationBlock[] = [];
  const skippedLines: number[] = [];
  let floor = 0;
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];

    if (!profile.declarationKeyword.test(line)) {
      i++;
      continue;
    }

    const name = line.match(profile.declarationPattern)?.[1];
    if (!name) {
      skippedLines.push(i);
      i++;
      continue;
    }

    const start = findLeadingStart(lines, i, floor, profile);
    const bodyEnd = findBalancedEnd(lines, i);
    const end = findBehaviorBlockEnd(lines, name, bodyEnd, lookahead, profile);

    blocks.push({
      name,
      content: lines.slice(start, end + 1).join('\n'),
      startLine: start,
      declarationLine: i,
      endLine: end,
    });

    floor = end + 1;
    i = end + 1;
  }

  return { blocks, skippedLines };
}

/**
 * Walk back from the declaration over doc, annotation and blank lines.
 * Never crosses `floor`, the first line after the previous block.
 */
export function findLeadingStart(
  lines: readonly string[],
  declarationLine: number,
  floor: number,
  profile: LanguageProfile,
): number {
  let start = declarationLine;

  while (start > floor) {
    const prev = lines[start - 1].trim();
    if (prev !== '' && !profile.isLeadingLine(prev)) break;
    start--;
  }

  return start;
}

/**
 * First line at or after `from` where the brace count drops back to zero
 * once it has gone positive. Clamps to the last line when it never does.
 */
export function findBalancedEnd(lines: readonly string[], from: number): number {
  let depth = 0;
  let opened = false;

  for (let i = from; i < lines.length; i++) {
    for (const ch of lines[i]) {
      if (ch === '{') {
        depth++;
        opened = true;
      } else if (ch === '}') {
        depth--;
      }
    }

    if (opened && depth <= 0) return i;
  }

  return lines.length - 1;
}

/**
 * Extend past every behavior block of `name` that follows, each found
 * within `lookahead` lines of the previous end.
 */
function findBehaviorBlockEnd(
  lines: readonly string[],
  name: string,
  bodyEnd: number,
  lookahead: number,
  profile: LanguageProfile,
): number {
  const behaviorLine = profile.behaviorBlockPattern(name);
  let end = bodyEnd;

  for (;;) {
    const next = findNextBehaviorLine(lines, behaviorLine, end, lookahead, profile);
    if (next === -1) return end;
    end = findBalancedEnd(lines, next);
  }
}

function findNextBehaviorLine(
  lines: readonly string[],
  behaviorLine: RegExp,
  after: number,
  lookahead: number,
  profile: LanguageProfile,
): number {
  const limit = Math.min(after + lookahead, lines.length - 1);

  for (let j = after + 1; j <= limit; j++) {
    if (behaviorLine.test(lines[j])) return j;
    // Another declaration starts first: no further behavior block
    if (profile.boundaryPattern.test(lines[j])) break;
  }

  return -1;
}
