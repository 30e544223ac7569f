import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import type { RawFileDiff } from '../types/patch';
import { splitFileLines } from '../processors/context-extender';
import { splitDiff } from '../utils/diff-split';
import { logger } from '../utils/logger';

/**
 * Create an artificial diff of a whole file (all lines as additions)
 */
export function artificialDiff(filePath: string, content: string): RawFileDiff {
  // Normalize path to forward slashes for cross-platform consistency (git uses forward slashes)
  const normalizedPath = filePath.replace(/\\/g, '/');
  const lines = splitFileLines(content);

  const header = [
    `diff --git a/${normalizedPath} b/${normalizedPath}`,
    'new file mode 100644',
    '--- /dev/null',
    `+++ b/${normalizedPath}`
  ];
  const hunk = lines.length > 0
    ? [`@@ -0,0 +1,${lines.length} @@`, ...lines.map(line => `+${line}`)]
    : [];

  return {
    path: normalizedPath,
    oldPath: normalizedPath,
    editType: 'added',
    diff: [...header, ...hunk].join('\n'),
    newContent: content
  };
}

function readFileAsDiff(repoRoot: string, filePath: string): RawFileDiff {
  const fullPath = path.resolve(repoRoot, filePath);

  if (!fs.existsSync(fullPath)) {
    throw new Error(`File '${filePath}' not found`);
  }

  const stats = fs.statSync(fullPath);
  if (!stats.isFile()) {
    throw new Error(`Path '${filePath}' is not a file`);
  }

  return artificialDiff(path.relative(repoRoot, fullPath), fs.readFileSync(fullPath, 'utf-8'));
}

/**
 * Read a single file as an artificial diff
 */
export async function getFileContent(repoRoot: string, filePath: string): Promise<RawFileDiff[]> {
  return [readFileAsDiff(repoRoot, filePath)];
}

/**
 * Read all files in a folder (recursively) as artificial diffs
 */
export async function getFolderContent(repoRoot: string, folderPath: string): Promise<RawFileDiff[]> {
  const fullPath = path.resolve(repoRoot, folderPath);

  if (!fs.existsSync(fullPath)) {
    throw new Error(`Folder '${folderPath}' not found`);
  }

  const stats = fs.statSync(fullPath);
  if (!stats.isDirectory()) {
    throw new Error(`Path '${folderPath}' is not a folder`);
  }

  const files = await glob('**/*', {
    cwd: fullPath,
    nodir: true,
    dot: true,
    ignore: ['**/node_modules/**', '**/.git/**', '**/dist/**', '**/build/**']
  });

  if (files.length === 0) {
    throw new Error(`No files found in folder '${folderPath}'`);
  }

  const diffs: RawFileDiff[] = [];
  for (const file of files.sort()) {
    const relativePath = path.relative(repoRoot, path.join(fullPath, file));
    try {
      diffs.push(artificialDiff(relativePath, fs.readFileSync(path.join(fullPath, file), 'utf-8')));
    } catch (error: unknown) {
      // Skip files that can't be read (permissions, etc.)
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger.warn(`Could not read file '${relativePath}': ${errorMessage}`);
    }
  }

  return diffs;
}

/**
 * Read multiple specified files as artificial diffs
 */
export async function getMultipleFilesContent(repoRoot: string, filePaths: string[]): Promise<RawFileDiff[]> {
  if (filePaths.length === 0) {
    throw new Error('No files specified');
  }
  return filePaths.map(filePath => readFileAsDiff(repoRoot, filePath));
}

/**
 * Read a ready-made diff from a file, or from stdin when source is "-".
 * No full-file content is available for such diffs.
 */
export async function getDiffFromSource(repoRoot: string, source: string): Promise<RawFileDiff[]> {
  if (source === '-') {
    return splitDiff(fs.readFileSync(0, 'utf-8'));
  }

  const fullPath = path.resolve(repoRoot, source);
  if (!fs.existsSync(fullPath)) {
    throw new Error(`Diff file '${source}' not found`);
  }
  return splitDiff(fs.readFileSync(fullPath, 'utf-8'));
}
