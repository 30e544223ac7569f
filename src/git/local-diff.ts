import * as fs from 'fs';
import * as path from 'path';
import type { RawFileDiff } from '../types/patch';
import { splitDiff } from '../utils/diff-split';
import { attachNewContent, openRepo, revisionReader } from './diff';

/**
 * Get diff for local development
 *
 * Staged changes win when there are any; otherwise unstaged changes are used.
 * New content comes from the index for staged changes and from the working
 * tree for unstaged ones, matching the side of the diff being shown.
 */
export async function getLocalDiff(repoRoot: string): Promise<RawFileDiff[]> {
  const git = await openRepo(repoRoot);
  const status = await git.status();

  if (status.staged.length > 0) {
    const diff = await git.diff(['--cached', '--no-color', '--no-ext-diff']);
    return attachNewContent(splitDiff(diff), revisionReader(git, ''));
  }

  if (status.files.length > 0) {
    const diff = await git.diff(['--no-color', '--no-ext-diff']);
    // Diff paths are relative to the top of the work tree, not to repoRoot
    const topLevel = (await git.revparse(['--show-toplevel'])).trim();
    return attachNewContent(
      splitDiff(diff),
      async filePath => fs.promises.readFile(path.join(topLevel, filePath), 'utf-8')
    );
  }

  return [];
}
