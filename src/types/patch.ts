export type LineKind = 'context' | 'added' | 'removed';

export interface Line {
  kind: LineKind;
  /** Present for context and removed lines */
  oldNumber?: number;
  /** Present for context and added lines */
  newNumber?: number;
  text: string;
  /** Set when the line was followed by "\ No newline at end of file" */
  noNewlineAtEof?: true;
}

export interface Hunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  /** Text after the closing @@ (usually the enclosing function) */
  section: string;
  lines: Line[];
}

export type EditType = 'added' | 'modified' | 'deleted' | 'renamed';

/**
 * numbered: rendered with new-file line numbers so the model can reference exact lines
 * plain: rendered as a clean unified patch
 */
export type NumberingMode = 'numbered' | 'plain';

export interface FilePatch {
  path: string;
  oldPath: string;
  editType: EditType;
  hunks: Hunk[];
  isBinary: boolean;
  numbering: NumberingMode;
}

export type FilterReason = 'included' | 'ignored' | 'extension_not_allowed' | 'binary';

export interface FilterDecision {
  included: boolean;
  reason: FilterReason;
}

export type TokenizerKind = 'o200k_base' | 'cl100k_base' | 'heuristic';

export interface TokenBudget {
  limit: number;
  modelId: string;
  tokenizer: TokenizerKind;
}

export interface CompressionResult {
  patches: FilePatch[];
  wasCompressed: boolean;
  omittedFiles: number;
  omittedHunks: number;
}

/**
 * One file's slice of a diff, as handed over by a diff source.
 */
export interface RawFileDiff {
  path: string;
  oldPath: string;
  editType: EditType;
  /** Hunk text, optionally preceded by the file's diff metadata lines */
  diff: string;
  /** Full text of the file after the change, when the source could read it */
  newContent?: string;
}
