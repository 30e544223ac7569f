import { describe, it, expect } from 'vitest';
import type { Hunk } from '../types/patch';
import { extendHunks, mergeHunks, splitFileLines } from './context-extender';
import { parseHunks } from './hunk-parser';

function parse(diff: string): Hunk[] {
  const result = parseHunks(diff, 'a.py', 'a.py', 'numbered');
  if (!result.ok) {
    throw result.error;
  }
  return result.hunks;
}

function numbered(count: number, replace: Record<number, string> = {}): string {
  return Array.from({ length: count }, (_, i) => replace[i + 1] ?? `line${i + 1}`).join('\n') + '\n';
}

describe('extendHunks', () => {
  // New file: line1..line11, then the added line, then the old line12..line19
  const newFile = [
    ...Array.from({ length: 11 }, (_, i) => `line${i + 1}`),
    'added',
    ...Array.from({ length: 8 }, (_, i) => `line${i + 12}`)
  ].join('\n') + '\n';
  const hunks = parse('@@ -10,3 +10,4 @@\n line10\n line11\n+added\n line12');

  it('widens a hunk by the requested lines on both sides', () => {
    const [extended] = extendHunks(hunks, newFile, 2, 2);

    expect(extended.oldStart).toBe(8);
    expect(extended.oldCount).toBe(7);
    expect(extended.newStart).toBe(8);
    expect(extended.newCount).toBe(8);
    expect(extended.lines[0]).toEqual({ kind: 'context', oldNumber: 8, newNumber: 8, text: 'line8' });
    expect(extended.lines[extended.lines.length - 1]).toEqual({
      kind: 'context',
      oldNumber: 14,
      newNumber: 15,
      text: 'line14'
    });
  });

  it('is a no-op without full text or with nothing to add', () => {
    expect(extendHunks(hunks, undefined, 3, 3)).toEqual(hunks);
    expect(extendHunks(hunks, newFile, 0, 0)).toEqual(hunks);
  });

  it('clamps extension at the start and end of the file', () => {
    const text = numbered(5, { 1: 'ONE', 5: 'FIVE' });

    const [atStart] = extendHunks(parse('@@ -1,2 +1,2 @@\n-line1\n+ONE\n line2'), text, 3, 0);
    expect(atStart.oldStart).toBe(1);
    expect(atStart.lines).toHaveLength(3);

    const [atEnd] = extendHunks(parse('@@ -4,2 +4,2 @@\n line4\n-line5\n+FIVE'), text, 0, 3);
    expect(atEnd.lines).toHaveLength(3);
    expect(atEnd.newCount).toBe(2);
  });

  it('shifts old numbers by the offset a pure insertion introduces', () => {
    const text = ['line1', 'line2', 'line3', 'line4', 'line5', 'a', 'b', 'line6', 'line7', 'line8'].join('\n');
    const [extended] = extendHunks(parse('@@ -5,0 +6,2 @@\n+a\n+b'), text, 1, 1);

    expect(extended.lines).toEqual([
      { kind: 'context', oldNumber: 5, newNumber: 5, text: 'line5' },
      { kind: 'added', newNumber: 6, text: 'a' },
      { kind: 'added', newNumber: 7, text: 'b' },
      { kind: 'context', oldNumber: 6, newNumber: 8, text: 'line6' }
    ]);
    expect([extended.oldStart, extended.oldCount, extended.newStart, extended.newCount]).toEqual([5, 2, 5, 4]);
  });

  it('merges hunks whose extended windows overlap, keeping shared lines once', () => {
    const text = numbered(20, { 3: 'C', 7: 'G' });
    const twoHunks = parse('@@ -3,1 +3,1 @@\n-line3\n+C\n@@ -7,1 +7,1 @@\n-line7\n+G');

    const merged = extendHunks(twoHunks, text, 2, 2);

    expect(merged).toHaveLength(1);
    expect([merged[0].oldStart, merged[0].oldCount, merged[0].newStart, merged[0].newCount]).toEqual([1, 9, 1, 9]);
    expect(merged[0].lines.map(line => line.text)).toEqual([
      'line1', 'line2', 'line3', 'C', 'line4', 'line5', 'line6', 'line7', 'G', 'line8', 'line9'
    ]);
  });

  it('never borrows the changed lines of a nearby hunk as context', () => {
    const text = numbered(20, { 10: 'B', 12: 'D' });
    const twoHunks = parse('@@ -10,1 +10,1 @@\n-line10\n+B\n@@ -12,1 +12,1 @@\n-line12\n+D');

    const merged = extendHunks(twoHunks, text, 3, 3);

    expect(merged).toHaveLength(1);
    expect(merged[0].lines.map(line => `${line.kind}:${line.text}`)).toEqual([
      'context:line7',
      'context:line8',
      'context:line9',
      'removed:line10',
      'added:B',
      'context:line11',
      'removed:line12',
      'added:D',
      'context:line13',
      'context:line14',
      'context:line15'
    ]);
    expect([merged[0].oldStart, merged[0].oldCount, merged[0].newStart, merged[0].newCount]).toEqual([7, 9, 7, 9]);
  });

  it('keeps hunks apart when their windows do not touch', () => {
    const text = numbered(20, { 3: 'C', 7: 'G' });
    const twoHunks = parse('@@ -3,1 +3,1 @@\n-line3\n+C\n@@ -7,1 +7,1 @@\n-line7\n+G');

    const extended = extendHunks(twoHunks, text, 1, 1);

    expect(extended.map(hunk => [hunk.oldStart, hunk.oldCount])).toEqual([[2, 3], [6, 3]]);
  });
});

describe('mergeHunks', () => {
  it('merges directly adjacent hunks', () => {
    const hunks = parse('@@ -1,2 +1,2 @@\n a\n-b\n+B\n@@ -3,1 +3,1 @@\n-c\n+C');
    const [merged] = mergeHunks(hunks);

    expect([merged.oldStart, merged.oldCount, merged.newStart, merged.newCount]).toEqual([1, 3, 1, 3]);
    expect(merged.lines).toHaveLength(5);
  });
});

describe('splitFileLines', () => {
  it('does not count a trailing newline as a line', () => {
    expect(splitFileLines('a\r\nb\n')).toEqual(['a', 'b']);
    expect(splitFileLines('')).toEqual([]);
  });
});
