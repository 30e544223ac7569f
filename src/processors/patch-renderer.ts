/**
 * Patch Renderer
 *
 * Serializes a FilePatch into the text the model sees. The compression
 * planner prices every file by the token count of this text.
 */

import type { FilePatch, Hunk, Line } from '../types/patch';

const MARKERS: Record<Line['kind'], string> = {
  context: ' ',
  added: '+',
  removed: '-'
};

export function formatHunkHeader(hunk: Hunk): string {
  const section = hunk.section ? ` ${hunk.section}` : '';
  return `@@ -${hunk.oldStart},${hunk.oldCount} +${hunk.newStart},${hunk.newCount} @@${section}`;
}

export function formatFileHeader(patch: FilePatch): string {
  switch (patch.editType) {
    case 'added':
      return `## File: '${patch.path}' (new file)`;
    case 'deleted':
      return `## File: '${patch.path}' (deleted)`;
    case 'renamed':
      return `## File: '${patch.path}' (renamed from '${patch.oldPath}')`;
    case 'modified':
      return `## File: '${patch.path}'`;
    default:
      throw new Error(`Unrecognized edit type: ${patch.editType satisfies never}`);
  }
}

/**
 * Numbered form: the new side with line numbers, then the old side.
 *
 * @@ -8,7 +8,8 @@ section
 * __new hunk__
 * 8  context
 * 9 +added
 * __old hunk__
 *  context
 * -removed
 */
function renderNumberedHunk(hunk: Hunk): string[] {
  const out = [formatHunkHeader(hunk)];
  const hasAdded = hunk.lines.some(line => line.kind === 'added');
  const hasRemoved = hunk.lines.some(line => line.kind === 'removed');

  if (hasAdded || !hasRemoved) {
    out.push('__new hunk__');
    for (const line of hunk.lines) {
      if (line.kind !== 'removed') {
        out.push(`${line.newNumber} ${MARKERS[line.kind]}${line.text}`);
      }
    }
  }

  if (hasRemoved) {
    out.push('__old hunk__');
    for (const line of hunk.lines) {
      if (line.kind !== 'added') {
        out.push(`${MARKERS[line.kind]}${line.text}`);
      }
    }
  }

  return out;
}

function renderPlainHunk(hunk: Hunk): string[] {
  const out = [formatHunkHeader(hunk)];
  for (const line of hunk.lines) {
    out.push(`${MARKERS[line.kind]}${line.text}`);
    if (line.noNewlineAtEof) {
      out.push('\\ No newline at end of file');
    }
  }
  return out;
}

export function renderFilePatch(patch: FilePatch): string {
  const out = [formatFileHeader(patch), ''];

  if (patch.isBinary) {
    out.push('(binary file)');
    return out.join('\n') + '\n';
  }

  for (const hunk of patch.hunks) {
    out.push(...(patch.numbering === 'numbered' ? renderNumberedHunk(hunk) : renderPlainHunk(hunk)));
  }

  return out.join('\n') + '\n';
}
