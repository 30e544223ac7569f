import { describe, it, expect } from 'vitest';
import type { Hunk } from '../types/patch';
import { parseHunkHeader, parseHunks, ParseError, type ParseResult } from './hunk-parser';

function hunksOf(result: ParseResult): Hunk[] {
  if (!result.ok) {
    throw result.error;
  }
  return result.hunks;
}

function errorOf(result: ParseResult): ParseError {
  if (result.ok) {
    throw new Error('expected a parse error');
  }
  return result.error;
}

describe('parseHunkHeader', () => {
  it('reads starts, counts and section', () => {
    expect(parseHunkHeader('@@ -10,3 +10,4 @@ def main():')).toEqual({
      oldStart: 10,
      oldCount: 3,
      newStart: 10,
      newCount: 4,
      section: 'def main():'
    });
  });

  it('defaults omitted counts to 1', () => {
    expect(parseHunkHeader('@@ -7 +8 @@')).toEqual({ oldStart: 7, oldCount: 1, newStart: 8, newCount: 1, section: '' });
  });

  it('rejects lines that are not headers', () => {
    expect(parseHunkHeader('@@ -1,2 +1,2')).toBeNull();
    expect(parseHunkHeader('-1,2 +1,2')).toBeNull();
  });
});

describe('parseHunks', () => {
  it('skips file metadata and numbers each line', () => {
    const diff = [
      'diff --git a/a.py b/a.py',
      'index 1111111..2222222 100644',
      '--- a/a.py',
      '+++ b/a.py',
      '@@ -10,3 +10,4 @@ def main():',
      ' line10',
      ' line11',
      '+added',
      ' line12'
    ].join('\n');

    const hunks = hunksOf(parseHunks(diff, 'a.py', 'a.py', 'numbered'));

    expect(hunks).toEqual([{
      oldStart: 10,
      oldCount: 3,
      newStart: 10,
      newCount: 4,
      section: 'def main():',
      lines: [
        { kind: 'context', oldNumber: 10, newNumber: 10, text: 'line10' },
        { kind: 'context', oldNumber: 11, newNumber: 11, text: 'line11' },
        { kind: 'added', newNumber: 12, text: 'added' },
        { kind: 'context', oldNumber: 12, newNumber: 13, text: 'line12' }
      ]
    }]);
  });

  it('keeps old and new numbers strictly increasing across removals and additions', () => {
    const diff = '@@ -1,4 +1,3 @@\n a\n-b\n-c\n+C\n d\n';
    const [hunk] = hunksOf(parseHunks(diff, 'f.txt', 'f.txt', 'numbered'));

    const oldNumbers = hunk.lines.flatMap(line => (line.oldNumber === undefined ? [] : [line.oldNumber]));
    const newNumbers = hunk.lines.flatMap(line => (line.newNumber === undefined ? [] : [line.newNumber]));

    expect(oldNumbers).toEqual([1, 2, 3, 4]);
    expect(newNumbers).toEqual([1, 2, 3]);
    expect(hunk.lines.map(line => line.kind)).toEqual(['context', 'removed', 'removed', 'added', 'context']);
  });

  it('treats an empty line inside a hunk as an empty context line', () => {
    const [hunk] = hunksOf(parseHunks('@@ -1,3 +1,3 @@\n a\n\n b', 'f.txt', 'f.txt', 'plain'));

    expect(hunk.lines[1]).toEqual({ kind: 'context', oldNumber: 2, newNumber: 2, text: '' });
    expect(hunk.lines).toHaveLength(3);
  });

  it('flags lines followed by the no-newline marker', () => {
    const diff = '@@ -1 +1 @@\n-old\n\\ No newline at end of file\n+new\n\\ No newline at end of file\n';
    const [hunk] = hunksOf(parseHunks(diff, 'f.txt', 'f.txt', 'plain'));

    expect(hunk.lines).toEqual([
      { kind: 'removed', oldNumber: 1, text: 'old', noNewlineAtEof: true },
      { kind: 'added', newNumber: 1, text: 'new', noNewlineAtEof: true }
    ]);
  });

  it('starts numbering after the named line when a side is empty', () => {
    const [created] = hunksOf(parseHunks('@@ -0,0 +1,2 @@\n+x\n+y', 'new.txt', 'new.txt', 'numbered'));
    expect(created.lines.map(line => line.newNumber)).toEqual([1, 2]);

    const [removed] = hunksOf(parseHunks('@@ -3,2 +2,0 @@\n-x\n-y', 'old.txt', 'old.txt', 'numbered'));
    expect(removed.lines.map(line => line.oldNumber)).toEqual([3, 4]);
  });

  it('parses several hunks in order', () => {
    const diff = '@@ -1,2 +1,2 @@\n a\n-b\n+B\n@@ -20,1 +20,2 @@ class X\n x\n+y\n';
    const hunks = hunksOf(parseHunks(diff, 'f.txt', 'f.txt', 'numbered'));

    expect(hunks.map(hunk => [hunk.oldStart, hunk.newStart, hunk.section])).toEqual([
      [1, 1, ''],
      [20, 20, 'class X']
    ]);
  });

  it('strips carriage returns', () => {
    const [hunk] = hunksOf(parseHunks('@@ -1 +1 @@\r\n-a\r\n+b\r\n', 'f.txt', 'f.txt', 'plain'));
    expect(hunk.lines.map(line => line.text)).toEqual(['a', 'b']);
  });

  it('carries the numbering mode through', () => {
    const result = parseHunks('@@ -1 +1 @@\n-a\n+b', 'f.txt', 'f.txt', 'plain');
    expect(result.ok && result.numbering).toBe('plain');
  });

  it('returns no hunks for a diff with metadata only', () => {
    const diff = 'diff --git a/x b/y\nsimilarity index 100%\nrename from x\nrename to y';
    expect(hunksOf(parseHunks(diff, 'x', 'y', 'numbered'))).toEqual([]);
  });

  describe('errors', () => {
    it('reports a malformed header', () => {
      const error = errorOf(parseHunks('@@ -1,2 +1,2\n a\n b', 'a.py', 'a.py', 'numbered'));

      expect(error).toBeInstanceOf(ParseError);
      expect(error.kind).toBe('malformed_header');
      expect(error.lineNumber).toBe(1);
      expect(error.message).toBe("a.py:1: malformed hunk header '@@ -1,2 +1,2'");
    });

    it('reports a hunk range without @@ delimiters as a missing header', () => {
      const error = errorOf(parseHunks('-10,3 +10,4\n a\n b\n+c', 'a.py', 'a.py', 'numbered'));

      expect(error.kind).toBe('missing_header');
      expect(error.lineNumber).toBe(1);
    });

    it('reports content before any header as a missing header', () => {
      const error = errorOf(parseHunks('--- a/f\n+++ b/f\n a\n+b', 'f', 'f', 'numbered'));

      expect(error.kind).toBe('missing_header');
      expect(error.lineNumber).toBe(3);
    });

    it('reports an unrecognized marker inside a hunk', () => {
      const error = errorOf(parseHunks('@@ -1,2 +1,2 @@\n a\n*b', 'f', 'f', 'numbered'));

      expect(error.kind).toBe('unrecognized_marker');
      expect(error.lineNumber).toBe(3);
    });

    it('reports a hunk cut short', () => {
      const error = errorOf(parseHunks('@@ -1,3 +1,3 @@\n a\n b\n', 'f', 'f', 'numbered'));

      expect(error.kind).toBe('truncated_hunk');
      expect(error.lineNumber).toBe(3);
      expect(error.message).toBe('f:3: hunk ended with 1 old and 1 new line(s) missing');
    });

    it('reports a marked line after the hunk is complete', () => {
      const error = errorOf(parseHunks('@@ -1,1 +1,1 @@\n a\n+extra', 'f', 'f', 'numbered'));

      expect(error.kind).toBe('line_outside_hunk');
      expect(error.lineNumber).toBe(3);
    });

    it('reports a hunk that starts before the previous one ends', () => {
      const diff = '@@ -10,1 +10,1 @@\n-a\n+b\n@@ -5,1 +5,1 @@\n-c\n+d';
      const error = errorOf(parseHunks(diff, 'f', 'f', 'numbered'));

      expect(error.kind).toBe('hunk_out_of_order');
      expect(error.message).toBe("f:4: hunk header '@@ -5,1 +5,1 @@' starts before the end of the previous hunk");
    });

    it('accepts a hunk that starts right after the previous one', () => {
      const diff = '@@ -1,2 +1,2 @@\n a\n-b\n+B\n@@ -3,1 +3,1 @@\n-c\n+C';
      expect(hunksOf(parseHunks(diff, 'f', 'f', 'numbered'))).toHaveLength(2);
    });

    it('refuses text that holds a second file', () => {
      const diff = '@@ -1 +1 @@\n-a\n+b\ndiff --git a/g b/g';
      const error = errorOf(parseHunks(diff, 'f', 'f', 'numbered'));

      expect(error.kind).toBe('line_outside_hunk');
      expect(error.message).toBe('f:4: diff text contains more than one file');
    });
  });
});
