import simpleGit, { type SimpleGit } from 'simple-git';
import type { RawFileDiff } from '../types/patch';
import { splitDiff } from '../utils/diff-split';
import { logger } from '../utils/logger';

const DIFF_FLAGS = ['--no-color', '--no-ext-diff'];

/**
 * Opens the repository, failing loudly outside one.
 */
export async function openRepo(repoRoot: string): Promise<SimpleGit> {
  const git: SimpleGit = simpleGit(repoRoot);
  if (!(await git.checkIsRepo())) {
    throw new Error(`Not a git repository: ${repoRoot}`);
  }
  return git;
}

export type ContentReader = (path: string) => Promise<string>;

/**
 * Attach the full new-file text to every file that still exists after the change.
 * A file whose content cannot be read keeps its diff; it just gets no extra context.
 */
export async function attachNewContent(files: RawFileDiff[], read: ContentReader): Promise<RawFileDiff[]> {
  const withContent: RawFileDiff[] = [];

  for (const file of files) {
    if (file.editType === 'deleted') {
      withContent.push(file);
      continue;
    }
    try {
      withContent.push({ ...file, newContent: await read(file.path) });
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.debug(`Could not read new content of ${file.path}: ${errorMessage}`);
      withContent.push(file);
    }
  }

  return withContent;
}

/**
 * Reads a file as it is at a revision ("HEAD", a SHA, or "" for the index).
 */
export function revisionReader(git: SimpleGit, revision: string): ContentReader {
  return path => git.show([`${revision}:${path}`]);
}

/**
 * Get the diff a commit introduced, against its first parent.
 *
 * @param ref - Commit SHA or git reference (HEAD, HEAD~1, abc123)
 */
export async function getCommitDiff(repoRoot: string, ref: string = 'HEAD'): Promise<RawFileDiff[]> {
  const git = await openRepo(repoRoot);

  let sha: string;
  try {
    sha = (await git.revparse([ref])).trim();
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(`Unknown commit '${ref}': ${errorMessage}`);
  }

  let diff: string;
  try {
    diff = await git.diff([...DIFF_FLAGS, `${sha}^`, sha]);
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(
      `Failed to get diff for commit ${ref}: ${errorMessage}\n` +
      `The commit might be the root commit of the repository.`
    );
  }

  logger.debug(`Commit ${ref} resolved to ${sha}`);
  return attachNewContent(splitDiff(diff), revisionReader(git, sha));
}

/**
 * Get all changes of the current branch since it forked from base.
 * Uses the merge base (three dots) so changes made on base after branching are not included.
 */
export async function getBranchDiff(repoRoot: string, base: string): Promise<RawFileDiff[]> {
  const git = await openRepo(repoRoot);

  let diff: string;
  try {
    diff = await git.diff([...DIFF_FLAGS, `${base}...HEAD`]);
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(`Failed to diff against base '${base}': ${errorMessage}`);
  }

  return attachNewContent(splitDiff(diff), revisionReader(git, 'HEAD'));
}
