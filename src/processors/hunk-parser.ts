/**
 * Hunk Parser
 *
 * Turns one file's unified diff into structured hunks whose lines carry their
 * old and new line numbers.
 *
 * Git diff format structure:
 * - Optional file metadata (diff --git, index, ---, +++, mode and rename lines)
 * - Hunks with "@@ -start,count +start,count @@ section" headers
 * - Content lines (+, -, space-prefixed)
 * - "\ No newline at end of file" after the last line of either side
 */

import type { Hunk, Line, NumberingMode } from '../types/patch';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(?: (.*))?$/;

/** A hunk range written without its @@ delimiters, e.g. "-10,3 +10,4" */
const BARE_RANGE = /^-\d+(?:,\d+)? \+\d+(?:,\d+)?(?:\s.*)?$/;

const NO_NEWLINE_MARKER = '\\ No newline at end of file';

export type ParseErrorKind =
  | 'malformed_header'
  | 'missing_header'
  | 'unrecognized_marker'
  | 'truncated_hunk'
  | 'line_outside_hunk'
  | 'hunk_out_of_order';

/**
 * Returned (never thrown) when a file's diff cannot be parsed.
 * The caller drops that one file and carries on with the rest.
 */
export class ParseError extends Error {
  constructor(
    public readonly kind: ParseErrorKind,
    public readonly path: string,
    /** 1-based line within the file's diff text */
    public readonly lineNumber: number,
    message: string
  ) {
    super(`${path}:${lineNumber}: ${message}`);
    this.name = 'ParseError';
  }
}

export type ParseResult =
  | { ok: true; hunks: Hunk[]; numbering: NumberingMode }
  | { ok: false; error: ParseError };

interface OpenHunk {
  header: Omit<Hunk, 'lines'>;
  lines: Line[];
  oldNext: number;
  newNext: number;
  oldRemaining: number;
  newRemaining: number;
}

export interface HunkHeader {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  section: string;
}

/**
 * Parse a hunk header line. Omitted counts default to 1.
 */
export function parseHunkHeader(line: string): HunkHeader | null {
  const match = line.match(HUNK_HEADER);
  if (!match) {
    return null;
  }
  return {
    oldStart: parseInt(match[1], 10),
    oldCount: match[2] !== undefined ? parseInt(match[2], 10) : 1,
    newStart: parseInt(match[3], 10),
    newCount: match[4] !== undefined ? parseInt(match[4], 10) : 1,
    section: match[5] ?? ''
  };
}

/**
 * Parse one file's diff text into hunks.
 *
 * Each hunk is read until both of its declared counts are consumed; context
 * lines advance both counters, added lines the new counter and removed lines
 * the old counter.
 *
 * @param numbering - Carried through to rendering: numbered output annotates
 *   lines with new-file numbers, plain output is a clean patch
 */
export function parseHunks(
  rawDiffText: string,
  oldPath: string,
  newPath: string,
  numbering: NumberingMode
): ParseResult {
  const path = newPath || oldPath;
  const textLines = rawDiffText.split('\n');
  if (textLines.length > 0 && textLines[textLines.length - 1] === '') {
    textLines.pop();
  }

  const hunks: Hunk[] = [];
  let current: OpenHunk | null = null;
  let seenHeader = false;

  const fail = (kind: ParseErrorKind, index: number, message: string): ParseResult => ({
    ok: false,
    error: new ParseError(kind, path, index + 1, message)
  });

  for (let i = 0; i < textLines.length; i++) {
    const raw = textLines[i].endsWith('\r') ? textLines[i].slice(0, -1) : textLines[i];

    if (raw === NO_NEWLINE_MARKER) {
      const target: Line | undefined = current?.lines[current.lines.length - 1];
      if (target) {
        target.noNewlineAtEof = true;
      }
      continue;
    }

    // Inside a hunk that still expects lines: every line is content
    if (current && (current.oldRemaining > 0 || current.newRemaining > 0)) {
      const marker = raw === '' ? ' ' : raw[0];
      const text = raw.slice(1);

      if (marker === ' ') {
        if (current.oldRemaining === 0 || current.newRemaining === 0) {
          return fail('unrecognized_marker', i, 'context line exceeds the hunk header counts');
        }
        current.lines.push({ kind: 'context', oldNumber: current.oldNext++, newNumber: current.newNext++, text });
        current.oldRemaining--;
        current.newRemaining--;
      } else if (marker === '+') {
        if (current.newRemaining === 0) {
          return fail('unrecognized_marker', i, 'added line exceeds the hunk header new count');
        }
        current.lines.push({ kind: 'added', newNumber: current.newNext++, text });
        current.newRemaining--;
      } else if (marker === '-') {
        if (current.oldRemaining === 0) {
          return fail('unrecognized_marker', i, 'removed line exceeds the hunk header old count');
        }
        current.lines.push({ kind: 'removed', oldNumber: current.oldNext++, text });
        current.oldRemaining--;
      } else {
        return fail('unrecognized_marker', i, `unrecognized line marker '${marker}'`);
      }
      continue;
    }

    if (raw.startsWith('@@')) {
      const header = parseHunkHeader(raw);
      if (!header) {
        return fail('malformed_header', i, `malformed hunk header '${raw}'`);
      }
      // A zero count means the start names the line before the hunk
      const oldFirst = header.oldCount === 0 ? header.oldStart + 1 : header.oldStart;
      const newFirst = header.newCount === 0 ? header.newStart + 1 : header.newStart;
      if (current) {
        if (oldFirst < current.oldNext || newFirst < current.newNext) {
          return fail('hunk_out_of_order', i, `hunk header '${raw}' starts before the end of the previous hunk`);
        }
        hunks.push(closeHunk(current));
      }
      seenHeader = true;
      current = {
        header,
        lines: [],
        oldNext: oldFirst,
        newNext: newFirst,
        oldRemaining: header.oldCount,
        newRemaining: header.newCount
      };
      continue;
    }

    if (BARE_RANGE.test(raw)) {
      return fail('missing_header', i, `hunk range without @@ delimiters '${raw}'`);
    }

    if (!seenHeader) {
      if (isContentLine(raw)) {
        return fail('missing_header', i, 'hunk content before any hunk header');
      }
      // File metadata before the first hunk
      continue;
    }

    if (raw === '') {
      continue;
    }

    if (raw.startsWith('diff --git ')) {
      return fail('line_outside_hunk', i, 'diff text contains more than one file');
    }

    return fail('line_outside_hunk', i, `line after the end of a hunk '${raw}'`);
  }

  if (current) {
    if (current.oldRemaining > 0 || current.newRemaining > 0) {
      return fail(
        'truncated_hunk',
        textLines.length - 1,
        `hunk ended with ${current.oldRemaining} old and ${current.newRemaining} new line(s) missing`
      );
    }
    hunks.push(closeHunk(current));
  }

  return { ok: true, hunks, numbering };
}

function closeHunk(open: OpenHunk): Hunk {
  return { ...open.header, lines: open.lines };
}

function isContentLine(line: string): boolean {
  if (line.startsWith('+++ ') || line.startsWith('--- ')) {
    return false;
  }
  return line.startsWith('+') || line.startsWith('-') || line.startsWith(' ');
}
