/**
 * Compression Planner
 *
 * Decides which parts of the diff survive when the rendered patches exceed
 * the token budget.
 *
 * Policy: files are reduced largest first (ties broken by path) so that
 * smaller files stay whole. A reduced file loses hunks from its end, keeping
 * the earliest ones, and is omitted only when no hunk fits.
 */

import type { CompressionResult, FilePatch, TokenBudget } from '../types/patch';
import { createTokenCounter } from '../llm/tokens';
import { renderFilePatch } from './patch-renderer';

/** Text placed between two rendered patches */
export const PATCH_SEPARATOR = '\n';

type CostFn = (patch: FilePatch) => number;

interface Reduction {
  patch: FilePatch;
  cost: number;
}

function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Indices of patches by descending cost, then ascending path, then input position.
 */
function largestFirst(patches: readonly FilePatch[], costs: readonly number[]): number[] {
  return patches
    .map((_, index) => index)
    .sort((a, b) => costs[b] - costs[a] || comparePaths(patches[a].path, patches[b].path) || a - b);
}

/**
 * Drop trailing hunks until the patch costs at most `target`.
 * Returns null when not even the first hunk fits.
 */
function truncateToFit(patch: FilePatch, target: number, costOf: CostFn): Reduction | null {
  for (let keep = patch.hunks.length - 1; keep > 0; keep--) {
    const candidate: FilePatch = { ...patch, hunks: patch.hunks.slice(0, keep) };
    const cost = costOf(candidate);
    if (cost <= target) {
      return { patch: candidate, cost };
    }
  }
  return null;
}

interface Pricing {
  costOf: CostFn;
  limit: number;
}

/**
 * Rendered patches are joined by a newline. Every patch is charged one
 * separator and the limit is raised by one separator, so the first patch
 * pays none.
 */
function pricing(budget: TokenBudget): Pricing {
  const count = createTokenCounter(budget.tokenizer);
  const separator = count(PATCH_SEPARATOR);
  return {
    costOf: patch => count(renderFilePatch(patch)) + separator,
    limit: budget.limit + separator
  };
}

/**
 * Fit the patches into the budget.
 *
 * When everything fits the input comes back unchanged with wasCompressed
 * false. Surviving patches keep their input order. The result is fully
 * determined by the inputs.
 */
export function planCompression(patches: readonly FilePatch[], budget: TokenBudget): CompressionResult {
  const { costOf, limit } = pricing(budget);
  const costs = patches.map(costOf);
  const total = costs.reduce((sum, cost) => sum + cost, 0);

  if (total <= limit) {
    return { patches: [...patches], wasCompressed: false, omittedFiles: 0, omittedHunks: 0 };
  }

  const kept: Array<FilePatch | null> = [...patches];
  let running = total;
  let omittedFiles = 0;
  let omittedHunks = 0;

  for (const index of largestFirst(patches, costs)) {
    if (running <= limit) {
      break;
    }

    const patch = patches[index];
    const others = running - costs[index];
    const reduction = truncateToFit(patch, limit - others, costOf);

    if (reduction) {
      kept[index] = reduction.patch;
      omittedHunks += patch.hunks.length - reduction.patch.hunks.length;
      running = others + reduction.cost;
    } else {
      kept[index] = null;
      omittedFiles++;
      omittedHunks += patch.hunks.length;
      running = others;
    }
  }

  return {
    patches: kept.filter((patch): patch is FilePatch => patch !== null),
    wasCompressed: true,
    omittedFiles,
    omittedHunks
  };
}

/**
 * Pack the patches into at most `maxBatches` batches that each fit the budget,
 * for callers that can afford several model calls.
 *
 * Files are placed largest first into the current batch when they fit and
 * deferred to the next batch otherwise. A file larger than the whole budget
 * starts a batch of its own, truncated like in planCompression. Files still
 * pending after the last batch are counted as omitted on that batch.
 */
export function planBatches(patches: readonly FilePatch[], budget: TokenBudget, maxBatches: number): CompressionResult[] {
  const { costOf, limit } = pricing(budget);
  const costs = patches.map(costOf);
  const total = costs.reduce((sum, cost) => sum + cost, 0);

  if (total <= limit) {
    return [{ patches: [...patches], wasCompressed: false, omittedFiles: 0, omittedHunks: 0 }];
  }

  const batches: CompressionResult[] = [];
  let pending = largestFirst(patches, costs);

  while (pending.length > 0 && batches.length < Math.max(1, maxBatches)) {
    const placed = new Map<number, FilePatch>();
    const deferred: number[] = [];
    let running = 0;
    let omittedFiles = 0;
    let omittedHunks = 0;

    for (const index of pending) {
      const patch = patches[index];
      const room = limit - running;

      if (costs[index] <= room) {
        placed.set(index, patch);
        running += costs[index];
      } else if (costs[index] > limit && placed.size === 0 && running === 0) {
        const reduction = truncateToFit(patch, limit, costOf);
        if (reduction) {
          placed.set(index, reduction.patch);
          running += reduction.cost;
          omittedHunks += patch.hunks.length - reduction.patch.hunks.length;
        } else {
          omittedFiles++;
          omittedHunks += patch.hunks.length;
        }
      } else {
        deferred.push(index);
      }
    }

    batches.push({
      patches: [...placed.keys()].sort((a, b) => a - b).map(index => placed.get(index) ?? patches[index]),
      wasCompressed: true,
      omittedFiles,
      omittedHunks
    });
    pending = deferred;
  }

  if (pending.length > 0) {
    const last = batches[batches.length - 1];
    batches[batches.length - 1] = {
      ...last,
      omittedFiles: last.omittedFiles + pending.length,
      omittedHunks: last.omittedHunks + pending.reduce((sum, index) => sum + patches[index].hunks.length, 0)
    };
  }

  return batches;
}
