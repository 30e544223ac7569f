import type { RawFileDiff } from '../types/patch';
import { getBranchDiff, getCommitDiff } from './diff';
import { getDiffFromSource, getFileContent, getFolderContent, getMultipleFilesContent } from './file';
import { getLocalDiff } from './local-diff';
import { logger } from '../utils/logger';

export interface DiffSourceOptions {
  diff?: string;
  commit?: string;
  branch?: string;
  file?: string;
  folder?: string;
  files?: string[];
}

export type DiffSource =
  | { kind: 'diff'; source: string }
  | { kind: 'commit'; ref: string }
  | { kind: 'branch'; base: string }
  | { kind: 'file'; path: string }
  | { kind: 'folder'; path: string }
  | { kind: 'files'; paths: string[] }
  | { kind: 'local' };

/**
 * Which source the CLI options select. Throws when more than one is given.
 */
export function selectDiffSource(options: DiffSourceOptions): DiffSource {
  const selected: DiffSource[] = [];
  if (options.diff) selected.push({ kind: 'diff', source: options.diff });
  if (options.commit) selected.push({ kind: 'commit', ref: options.commit });
  if (options.branch) selected.push({ kind: 'branch', base: options.branch });
  if (options.file) selected.push({ kind: 'file', path: options.file });
  if (options.folder) selected.push({ kind: 'folder', path: options.folder });
  if (options.files && options.files.length > 0) selected.push({ kind: 'files', paths: options.files });

  if (selected.length > 1) {
    throw new Error(
      `Only one diff source can be specified at a time (got ${selected.map(source => `--${source.kind}`).join(', ')})`
    );
  }
  return selected[0] ?? { kind: 'local' };
}

/**
 * Collect the per-file diffs of a source.
 */
export async function collectDiff(repoRoot: string, source: DiffSource): Promise<RawFileDiff[]> {
  switch (source.kind) {
    case 'diff':
      logger.info(`Reading diff from ${source.source === '-' ? 'stdin' : source.source}...`);
      return getDiffFromSource(repoRoot, source.source);
    case 'commit':
      logger.info(`Collecting diff of commit ${source.ref}...`);
      return getCommitDiff(repoRoot, source.ref);
    case 'branch':
      logger.info(`Collecting branch changes since ${source.base}...`);
      return getBranchDiff(repoRoot, source.base);
    case 'file':
      logger.info(`Reading file: ${source.path}...`);
      return getFileContent(repoRoot, source.path);
    case 'folder':
      logger.info(`Reading folder: ${source.path}...`);
      return getFolderContent(repoRoot, source.path);
    case 'files':
      logger.info(`Reading ${source.paths.length} file(s)...`);
      return getMultipleFilesContent(repoRoot, source.paths);
    case 'local':
      logger.info('Collecting staged/unstaged changes...');
      return getLocalDiff(repoRoot);
    default:
      throw new Error(`Unrecognized diff source: ${source satisfies never}`);
  }
}
