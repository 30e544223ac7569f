/**
 * File Filter
 *
 * Decides whether a file's diff is worth parsing at all. Runs before the
 * hunk parser, so ignored and binary files never cost any parsing work.
 */

import { Minimatch } from 'minimatch';
import type { FilterDecision } from '../types/patch';
import binaryExtensionList from './binary-extensions.json';

const BINARY_EXTENSIONS: ReadonlySet<string> = new Set(binaryExtensionList);

/**
 * Number of leading characters inspected for NUL bytes (same prefix size git uses).
 */
export const BINARY_SAMPLE_SIZE = 8000;

const GIT_BINARY_MARKER = /^(Binary files .* differ|GIT binary patch)$/m;

/**
 * Compiled ignore patterns and extension allow-list.
 * Built once when configuration loads and shared read-only afterwards.
 */
export interface FileFilter {
  readonly ignoreGlobs: readonly Minimatch[];
  readonly ignoreRegexes: readonly RegExp[];
  /** null when no allow-list is configured */
  readonly allowedExtensions: ReadonlySet<string> | null;
}

export interface FileFilterCompilation {
  filter: FileFilter;
  /** Patterns that could not be compiled and were skipped */
  warnings: string[];
}

export function compileFileFilter(options: {
  ignoreGlobs?: readonly string[];
  ignoreRegexes?: readonly string[];
  allowedExtensions?: readonly string[];
}): FileFilterCompilation {
  const warnings: string[] = [];

  const ignoreGlobs = (options.ignoreGlobs ?? [])
    .filter(pattern => pattern.trim() !== '')
    .map(pattern => new Minimatch(pattern.trim(), { dot: true, matchBase: true }));

  const ignoreRegexes: RegExp[] = [];
  for (const pattern of options.ignoreRegexes ?? []) {
    try {
      ignoreRegexes.push(new RegExp(pattern));
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      warnings.push(`Invalid ignore regex '${pattern}' skipped: ${errorMessage}`);
    }
  }

  const extensions = (options.allowedExtensions ?? [])
    .map(normalizeExtension)
    .filter(ext => ext !== '');

  return {
    filter: {
      ignoreGlobs,
      ignoreRegexes,
      allowedExtensions: extensions.length > 0 ? new Set(extensions) : null
    },
    warnings
  };
}

/**
 * Decide whether a file is admitted into the pipeline.
 *
 * Exclusion order, first match wins:
 * 1. ignore glob or regex matches the path
 * 2. an allow-list is configured and the extension is not on it
 * 3. the content sample or the extension says the file is binary
 *
 * @param sampledContent - Full new-file text when known, otherwise the file's raw diff
 */
export function decide(path: string, sampledContent: string, filter: FileFilter): FilterDecision {
  if (isIgnored(path, filter)) {
    return { included: false, reason: 'ignored' };
  }

  if (filter.allowedExtensions) {
    const ext = extensionOf(path);
    if (ext === '' || !filter.allowedExtensions.has(ext)) {
      return { included: false, reason: 'extension_not_allowed' };
    }
  }

  if (hasBinaryExtension(path) || looksBinary(sampledContent)) {
    return { included: false, reason: 'binary' };
  }

  return { included: true, reason: 'included' };
}

export interface FilterEntry {
  path: string;
  sample: string;
}

export interface FilterPartition<T extends FilterEntry> {
  included: T[];
  excluded: Array<{ entry: T; decision: FilterDecision }>;
}

/**
 * Applies decide() to every entry, preserving order.
 * Filtering an already-filtered list returns it unchanged.
 */
export function filterFiles<T extends FilterEntry>(entries: readonly T[], filter: FileFilter): FilterPartition<T> {
  const included: T[] = [];
  const excluded: Array<{ entry: T; decision: FilterDecision }> = [];

  for (const entry of entries) {
    const decision = decide(entry.path, entry.sample, filter);
    if (decision.included) {
      included.push(entry);
    } else {
      excluded.push({ entry, decision });
    }
  }

  return { included, excluded };
}

function isIgnored(path: string, filter: FileFilter): boolean {
  return filter.ignoreGlobs.some(glob => glob.match(path))
    || filter.ignoreRegexes.some(regex => regex.test(path));
}

export function hasBinaryExtension(path: string): boolean {
  const ext = extensionOf(path);
  return ext !== '' && BINARY_EXTENSIONS.has(ext);
}

export function looksBinary(sample: string): boolean {
  const prefix = sample.slice(0, BINARY_SAMPLE_SIZE);
  return prefix.includes('\0') || GIT_BINARY_MARKER.test(prefix);
}

/**
 * Lower-cased extension without the dot; '' when the basename has none.
 * Dotfiles such as ".env" have no extension.
 */
export function extensionOf(path: string): string {
  const basename = path.slice(path.lastIndexOf('/') + 1);
  const dot = basename.lastIndexOf('.');
  if (dot <= 0) {
    return '';
  }
  return basename.slice(dot + 1).toLowerCase();
}

function normalizeExtension(ext: string): string {
  return ext.trim().replace(/^\./, '').toLowerCase();
}
