/**
 * Diff splitting utilities
 *
 * Splits a multi-file diff into one raw section per file.
 *
 * Git diff format structure:
 * - Each file section starts with "diff --git a/path b/path"
 * - Followed by metadata lines (new/deleted file mode, rename from/to, index, ---, +++)
 * - Then hunks with "@@ -start,count +start,count @@" headers
 *
 * Plain `diff -u` output has no "diff --git" line; there a section starts at
 * a "--- " line directly followed by a "+++ " line.
 */

import type { EditType, RawFileDiff } from '../types/patch';
import { parseHunkHeader } from '../processors/hunk-parser';

const GIT_HEADER_PREFIX = 'diff --git ';
// Each side is either C-quoted ("a/caf\303\251.ts") or plain
const GIT_HEADER = /^diff --git ("(?:[^"\\]|\\.)*"|a\/.+?) ("(?:[^"\\]|\\.)*"|b\/.+)$/;
const DEV_NULL = '/dev/null';

const QUOTED_ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  t: '\t',
  n: '\n',
  v: '\v',
  f: '\f',
  r: '\r',
  '"': '"',
  '\\': '\\'
};

/**
 * Undo git's C-style quoting of paths with special or non-ASCII characters.
 * Octal escapes are UTF-8 bytes.
 */
export function unquoteGitPath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    return raw;
  }

  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  for (let i = 0; i < body.length; i++) {
    if (body[i] !== '\\') {
      bytes.push(...Buffer.from(body[i], 'utf-8'));
      continue;
    }
    const octal = body.slice(i + 1, i + 4);
    if (/^[0-7]{3}$/.test(octal)) {
      bytes.push(parseInt(octal, 8));
      i += 3;
    } else {
      const escaped = body[i + 1] ?? '';
      bytes.push(...Buffer.from(QUOTED_ESCAPES[escaped] ?? escaped, 'utf-8'));
      i += 1;
    }
  }
  return Buffer.from(bytes).toString('utf-8');
}

interface Section {
  header: string | null;
  lines: string[];
}

function stripSidePrefix(raw: string): string {
  // "+++ b/src/app.ts\t2024-01-01 ..." -> "src/app.ts"
  const path = unquoteGitPath(raw.split('\t')[0].trim());
  if (path === DEV_NULL) {
    return path;
  }
  return path.replace(/^[ab]\//, '');
}

function startsPlainSection(lines: string[], index: number): boolean {
  return lines[index].startsWith('--- ') && (lines[index + 1]?.startsWith('+++ ') ?? false);
}

function splitSections(diff: string): Section[] {
  const lines = diff.split('\n');
  const hasGitHeaders = lines.some(line => line.startsWith(GIT_HEADER_PREFIX));
  const sections: Section[] = [];
  let current: Section | null = null;
  // Lines still owed to the open hunk; a "--- " line inside a hunk is a removed line
  let oldRemaining = 0;
  let newRemaining = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (current && (oldRemaining > 0 || newRemaining > 0)) {
      const marker = line === '' ? ' ' : line[0];
      if (marker === ' ' || marker === '-' || marker === '+' || marker === '\\') {
        current.lines.push(line);
        if (marker !== '+' && marker !== '\\') oldRemaining--;
        if (marker !== '-' && marker !== '\\') newRemaining--;
        continue;
      }
      // Malformed hunk: stop counting and leave the error to the parser
      oldRemaining = 0;
      newRemaining = 0;
    }

    const gitHeader = hasGitHeaders && line.startsWith(GIT_HEADER_PREFIX);
    const plainHeader = !hasGitHeaders && startsPlainSection(lines, i);

    if (gitHeader || plainHeader) {
      current = { header: gitHeader ? line : null, lines: gitHeader ? [] : [line] };
      sections.push(current);
      continue;
    }

    if (!current) {
      continue;
    }
    current.lines.push(line);

    const header = parseHunkHeader(line);
    if (header) {
      oldRemaining = header.oldCount;
      newRemaining = header.newCount;
    }
  }

  return sections;
}

function describeSection(section: Section): RawFileDiff | null {
  let oldPath: string | null = null;
  let newPath: string | null = null;
  let editType: EditType = 'modified';

  if (section.header) {
    const match = section.header.match(GIT_HEADER);
    // Unparseable headers leave the paths to the ---/+++ lines
    if (match) {
      oldPath = stripSidePrefix(match[1]);
      newPath = stripSidePrefix(match[2]);
    }
  }

  for (const line of section.lines) {
    if (line.startsWith('@@')) {
      break;
    }
    if (line.startsWith('new file mode')) {
      editType = 'added';
    } else if (line.startsWith('deleted file mode')) {
      editType = 'deleted';
    } else if (line.startsWith('rename from ')) {
      editType = 'renamed';
      oldPath = unquoteGitPath(line.slice('rename from '.length));
    } else if (line.startsWith('rename to ')) {
      editType = 'renamed';
      newPath = unquoteGitPath(line.slice('rename to '.length));
    } else if (line.startsWith('--- ')) {
      const side = stripSidePrefix(line.slice(4));
      if (side === DEV_NULL) {
        editType = 'added';
      } else {
        oldPath = side;
      }
    } else if (line.startsWith('+++ ')) {
      const side = stripSidePrefix(line.slice(4));
      if (side === DEV_NULL) {
        editType = 'deleted';
      } else {
        newPath = side;
      }
    }
  }

  const path = editType === 'deleted' ? oldPath ?? newPath : newPath ?? oldPath;
  if (!path) {
    return null;
  }

  let end = section.lines.length;
  while (end > 0 && section.lines[end - 1] === '') {
    end--;
  }

  return {
    path,
    oldPath: oldPath ?? path,
    editType,
    diff: section.lines.slice(0, end).join('\n')
  };
}

/**
 * Split a diff into per-file raw diffs, in the order they appear.
 * Sections without a recognizable path are skipped.
 */
export function splitDiff(diff: string): RawFileDiff[] {
  if (!diff || diff.trim() === '') {
    return [];
  }

  return splitSections(diff)
    .map(describeSection)
    .filter((file): file is RawFileDiff => file !== null);
}
