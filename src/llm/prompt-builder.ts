/**
 * Prompt Builder
 *
 * Turns planned patches into the diff text sent to the model, and wraps it
 * into the user message of the ask command.
 */

import type { CompressionResult, EditType, FilePatch, TokenBudget } from '../types/patch';
import { renderFilePatch } from '../processors/patch-renderer';
import { PATCH_SEPARATOR } from '../processors/compression-planner';
import { clipTokens, createTokenCounter, TRUNCATION_SUFFIX } from './tokens';

/** Below this many spare tokens, lists of left-out files are not worth appending */
export const MIN_LIST_TOKENS = 10;

type ListKind = 'added' | 'modified' | 'deleted';

const LIST_ORDER: readonly ListKind[] = ['added', 'modified', 'deleted'];

function listKind(editType: EditType): ListKind {
  switch (editType) {
    case 'added':
      return 'added';
    case 'deleted':
      return 'deleted';
    case 'modified':
    case 'renamed':
      return 'modified';
    default:
      throw new Error(`Unrecognized edit type: ${editType satisfies never}`);
  }
}

/**
 * Join the planned patches into one diff text.
 *
 * When the diff was compressed, files that were left out entirely are listed
 * after it, grouped by edit type, as far as the remaining budget allows.
 *
 * @param allFiles - Every file that was offered to the planner
 */
export function assembleDiff(
  result: CompressionResult,
  allFiles: ReadonlyArray<Pick<FilePatch, 'path' | 'editType'>>,
  budget: TokenBudget
): string {
  let text = result.patches.map(renderFilePatch).join(PATCH_SEPARATOR);

  if (!result.wasCompressed) {
    return text;
  }

  const included = new Set(result.patches.map(patch => patch.path));
  const leftOut: Record<ListKind, string[]> = { added: [], modified: [], deleted: [] };
  for (const file of allFiles) {
    if (!included.has(file.path)) {
      leftOut[listKind(file.editType)].push(file.path);
    }
  }

  const count = createTokenCounter(budget.tokenizer);
  const suffixTokens = count(TRUNCATION_SUFFIX);
  let remaining = budget.limit - count(text);

  for (const kind of LIST_ORDER) {
    if (leftOut[kind].length === 0) continue;
    if (remaining < MIN_LIST_TOKENS) break;

    const section = `\n### Additional ${kind} files (not included in diff):\n${leftOut[kind].join('\n')}\n`;
    // The truncation suffix has to fit as well
    const clipped = count(section) <= remaining ? section : clipTokens(section, remaining - suffixTokens, count);
    const cost = count(clipped);
    if (clipped === '' || cost > remaining) break;

    text += clipped;
    remaining -= cost;
  }

  return text;
}

export const ASK_SYSTEM_PROMPT =
  'You are a senior software engineer reviewing a code change. ' +
  'Answer the question about the change precisely. ' +
  'When you refer to code, cite it as path:line using the new-file line numbers shown in the diff.';

/**
 * User message for the ask command.
 */
export function buildAskPrompt(question: string, diff: string, files: readonly string[]): string {
  return `Question:
${question.trim()}

Code Changes:
${diff}

Changed Files:
${files.join('\n')}

How to read the diff:
- Each file section starts with "## File: 'path'"
- "@@ -start,count +start,count @@" headers give the line ranges of a hunk in the old and new file
- In numbered diffs, "__new hunk__" lists the new code with its line numbers and "__old hunk__" lists the code it replaced
- Lines starting with "+" were added, lines starting with "-" were removed
- Files listed under "Additional ... files" changed but their content was left out to fit the context window
`;
}
