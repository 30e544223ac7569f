import type { FilePatch, LineKind } from '../types/patch';

export interface LocatedLine {
  path: string;
  kind: Exclude<LineKind, 'removed'>;
  newNumber: number;
  /** Only for context lines; added lines have no counterpart in the old file */
  oldNumber?: number;
  hunkIndex: number;
  text: string;
}

/**
 * Map a line number the model referenced (new-file numbering, as printed in
 * numbered patches) back to the parsed line.
 *
 * Returns undefined when the file is not part of the patches or the line is
 * outside every hunk that was sent.
 */
export function locateLine(patches: readonly FilePatch[], path: string, newLineNumber: number): LocatedLine | undefined {
  const patch = patches.find(candidate => candidate.path === path);
  if (!patch) {
    return undefined;
  }

  for (let hunkIndex = 0; hunkIndex < patch.hunks.length; hunkIndex++) {
    for (const line of patch.hunks[hunkIndex].lines) {
      if (line.kind === 'removed' || line.newNumber !== newLineNumber) {
        continue;
      }
      return {
        path,
        kind: line.kind,
        newNumber: newLineNumber,
        oldNumber: line.oldNumber,
        hunkIndex,
        text: line.text
      };
    }
  }

  return undefined;
}
