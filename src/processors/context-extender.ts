/**
 * Context Extender
 *
 * Widens each hunk with unchanged lines taken from the full new-file text,
 * then merges hunks whose windows now touch or overlap.
 */

import type { Hunk, Line } from '../types/patch';

/**
 * Extend hunks with up to `before` preceding and `after` following lines.
 *
 * Extension is clamped to the file and silently shortens near its edges. It
 * also stops short of the neighbouring hunks, so their changed lines are never
 * borrowed as context. Without the full file text (or with nothing to add) the
 * hunks are returned as they are.
 */
export function extendHunks(
  hunks: readonly Hunk[],
  fullNewFileText: string | undefined,
  before: number,
  after: number
): Hunk[] {
  const extraBefore = Math.max(0, Math.floor(before));
  const extraAfter = Math.max(0, Math.floor(after));

  if (fullNewFileText === undefined || hunks.length === 0 || (extraBefore === 0 && extraAfter === 0)) {
    return [...hunks];
  }

  const fileLines = splitFileLines(fullNewFileText);
  const extended = hunks.map((hunk, i) => {
    const previous = hunks[i - 1];
    const next = hunks[i + 1];
    return extendHunk(hunk, fileLines, extraBefore, extraAfter, {
      first: previous ? lastNewLine(previous) + 1 : 1,
      last: next ? firstNewLine(next) - 1 : fileLines.length
    });
  });
  return mergeHunks(extended);
}

/**
 * Split file text into lines; a trailing newline does not start another line.
 */
export function splitFileLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** New-file lines a hunk may borrow as context */
interface ContextBounds {
  first: number;
  last: number;
}

function extendHunk(hunk: Hunk, fileLines: readonly string[], before: number, after: number, bounds: ContextBounds): Hunk {
  const fileLength = fileLines.length;

  // A zero count means the start names the line before the hunk
  const firstOld = hunk.oldCount === 0 ? hunk.oldStart + 1 : hunk.oldStart;
  const firstNew = hunk.newCount === 0 ? hunk.newStart + 1 : hunk.newStart;
  const leadingOffset = firstOld - firstNew;

  const leading: Line[] = [];
  const from = Math.max(1, firstNew - before, 1 - leadingOffset, bounds.first);
  for (let n = from; n < firstNew && n <= fileLength; n++) {
    leading.push({ kind: 'context', oldNumber: n + leadingOffset, newNumber: n, text: fileLines[n - 1] });
  }

  const nextOld = firstOld + hunk.oldCount;
  const nextNew = firstNew + hunk.newCount;
  const trailingOffset = nextOld - nextNew;

  const trailing: Line[] = [];
  const to = Math.min(fileLength, nextNew + after - 1, bounds.last);
  for (let n = Math.max(nextNew, 1 - trailingOffset); n <= to; n++) {
    trailing.push({ kind: 'context', oldNumber: n + trailingOffset, newNumber: n, text: fileLines[n - 1] });
  }

  if (leading.length === 0 && trailing.length === 0) {
    return hunk;
  }

  return buildHunk([...leading, ...hunk.lines, ...trailing], hunk.section, hunk.oldStart, hunk.newStart);
}

/**
 * Merge hunks that overlap or are directly adjacent, keeping shared lines once.
 * Input must be ordered by oldStart.
 */
export function mergeHunks(hunks: readonly Hunk[]): Hunk[] {
  const merged: Hunk[] = [];

  for (const hunk of hunks) {
    const previous = merged[merged.length - 1];
    if (previous && touches(previous, hunk)) {
      merged[merged.length - 1] = mergePair(previous, hunk);
    } else {
      merged.push(hunk);
    }
  }

  return merged;
}

function lastOldLine(hunk: Hunk): number {
  return hunk.oldCount === 0 ? hunk.oldStart : hunk.oldStart + hunk.oldCount - 1;
}

function lastNewLine(hunk: Hunk): number {
  return hunk.newCount === 0 ? hunk.newStart : hunk.newStart + hunk.newCount - 1;
}

function firstNewLine(hunk: Hunk): number {
  return hunk.newCount === 0 ? hunk.newStart + 1 : hunk.newStart;
}

function touches(previous: Hunk, next: Hunk): boolean {
  const nextFirstOld = next.oldCount === 0 ? next.oldStart + 1 : next.oldStart;
  return nextFirstOld <= lastOldLine(previous) + 1 || firstNewLine(next) <= lastNewLine(previous) + 1;
}

function mergePair(previous: Hunk, next: Hunk): Hunk {
  const maxOld = lastOldLine(previous);
  const maxNew = lastNewLine(previous);

  const fresh = next.lines.filter(line =>
    !((line.oldNumber !== undefined && line.oldNumber <= maxOld)
      || (line.newNumber !== undefined && line.newNumber <= maxNew))
  );

  return buildHunk([...previous.lines, ...fresh], previous.section, previous.oldStart, previous.newStart);
}

/**
 * Build a hunk whose header is derived from its lines.
 * The fallback starts are used for a side with no lines at all.
 */
export function buildHunk(lines: Line[], section: string, fallbackOldStart: number, fallbackNewStart: number): Hunk {
  const oldLines = lines.filter(line => line.oldNumber !== undefined);
  const newLines = lines.filter(line => line.newNumber !== undefined);

  return {
    oldStart: oldLines[0]?.oldNumber ?? fallbackOldStart,
    oldCount: oldLines.length,
    newStart: newLines[0]?.newNumber ?? fallbackNewStart,
    newCount: newLines.length,
    section,
    lines
  };
}
