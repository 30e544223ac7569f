import { describe, it, expect } from 'vitest';
import type { FilePatch, Hunk, TokenBudget } from '../types/patch';
import { PATCH_SEPARATOR, planBatches, planCompression } from './compression-planner';
import { renderFilePatch } from './patch-renderer';
import { heuristicTokenCount } from '../llm/tokens';

// Plain rendering of a 4-character path: "## File: 'a.ts'\n\n" is 17 characters,
// and a hunk at a two-digit line is 20 characters plus its line text.
function hunkAt(line: number, textLength: number): Hunk {
  return {
    oldStart: line,
    oldCount: 0,
    newStart: line,
    newCount: 1,
    section: '',
    lines: [{ kind: 'added', newNumber: line, text: 'x'.repeat(textLength) }]
  };
}

function patch(path: string, textLengths: number[]): FilePatch {
  return {
    path,
    oldPath: path,
    editType: 'modified',
    hunks: textLengths.map((length, i) => hunkAt(10 * (i + 1), length)),
    isBinary: false,
    numbering: 'plain'
  };
}

function cost(file: FilePatch): number {
  return heuristicTokenCount(renderFilePatch(file));
}

function budget(limit: number): TokenBudget {
  return { limit, modelId: 'test-model', tokenizer: 'heuristic' };
}

function hunkCount(files: readonly FilePatch[]): number {
  return files.reduce((sum, file) => sum + file.hunks.length, 0);
}

// 500 tokens, one hunk
const fileA = patch('a.ts', [1963]);
// 700 tokens over five hunks; prefixes of 1, 2, 3 hunks cost 145, 285, 425
const fileB = patch('b.ts', [540, 540, 540, 540, 523]);
// 100 tokens, one hunk
const fileC = patch('c.ts', [363]);

describe('fixtures', () => {
  it('have the intended costs', () => {
    expect([cost(fileA), cost(fileB), cost(fileC)]).toEqual([500, 700, 100]);
    expect(cost({ ...fileB, hunks: fileB.hunks.slice(0, 2) })).toBe(285);
    expect(cost({ ...fileB, hunks: fileB.hunks.slice(0, 3) })).toBe(425);
  });
});

describe('planCompression', () => {
  it('returns everything unchanged when it fits', () => {
    const result = planCompression([fileA, fileC], budget(601));

    expect(result).toEqual({ patches: [fileA, fileC], wasCompressed: false, omittedFiles: 0, omittedHunks: 0 });
    expect(result.patches[0]).toBe(fileA);
  });

  it('counts the newline that joins two patches against the budget', () => {
    const joined = renderFilePatch(fileA) + PATCH_SEPARATOR + renderFilePatch(fileC);
    expect(heuristicTokenCount(joined)).toBe(601);

    const result = planCompression([fileA, fileC], budget(600));

    expect(result.patches).toEqual([fileC]);
    expect(result.omittedFiles).toBe(1);
  });

  it('keeps the smaller file whole and truncates the larger one to the remaining budget', () => {
    const result = planCompression([fileA, fileB], budget(900));

    expect(result.wasCompressed).toBe(true);
    expect(result.patches).toHaveLength(2);
    expect(result.patches[0]).toBe(fileA);
    expect(result.patches[1].path).toBe('b.ts');
    expect(result.patches[1].hunks).toEqual(fileB.hunks.slice(0, 2));
    expect(result.omittedFiles).toBe(0);
    expect(result.omittedHunks).toBe(3);
  });

  it('keeps input order for surviving patches', () => {
    const result = planCompression([fileB, fileC, fileA], budget(900));
    expect(result.patches.map(file => file.path)).toEqual(['b.ts', 'c.ts', 'a.ts']);
  });

  it('omits files that cannot fit at all', () => {
    const result = planCompression([fileA, fileB, fileC], budget(200));

    expect(result.patches).toEqual([fileC]);
    expect(result.omittedFiles).toBe(2);
    expect(result.omittedHunks).toBe(6);
  });

  it('returns an empty result when nothing fits', () => {
    const result = planCompression([fileA, fileB], budget(100));

    expect(result).toEqual({ patches: [], wasCompressed: true, omittedFiles: 2, omittedHunks: 6 });
  });

  it('breaks cost ties by path', () => {
    const first = patch('b.ts', [580, 580]);
    const second = patch('a.ts', [580, 580]);
    expect(cost(first)).toBe(305);

    const result = planCompression([first, second], budget(500));

    expect(result.patches[0]).toBe(first);
    expect(result.patches[1].path).toBe('a.ts');
    expect(result.patches[1].hunks).toHaveLength(1);
  });

  it('is deterministic', () => {
    const files = [fileA, fileB, fileC];
    expect(planCompression(files, budget(700))).toEqual(planCompression(files, budget(700)));
  });

  it('never keeps fewer files or hunks when the budget grows', () => {
    const files = [fileA, fileB, fileC];
    let previousFiles = 0;
    let previousHunks = 0;

    for (let limit = 0; limit <= 1400; limit += 20) {
      const { patches } = planCompression(files, budget(limit));
      expect(patches.length).toBeGreaterThanOrEqual(previousFiles);
      expect(hunkCount(patches)).toBeGreaterThanOrEqual(previousHunks);
      previousFiles = patches.length;
      previousHunks = hunkCount(patches);
    }

    expect(previousFiles).toBe(3);
    expect(previousHunks).toBe(7);
  });
});

describe('planBatches', () => {
  const first = patch('a.ts', [1163]);
  const second = patch('b.ts', [1163]);
  const third = patch('c.ts', [1163]);

  it('returns one uncompressed batch when everything fits', () => {
    const batches = planBatches([first, second], budget(601), 3);

    expect(batches).toEqual([{ patches: [first, second], wasCompressed: false, omittedFiles: 0, omittedHunks: 0 }]);
  });

  it('spreads files over batches that each fit the budget', () => {
    expect(cost(first)).toBe(300);
    const batches = planBatches([third, second, first], budget(700), 2);

    expect(batches.map(batch => batch.patches.map(file => file.path))).toEqual([['b.ts', 'a.ts'], ['c.ts']]);
    expect(batches.every(batch => batch.omittedFiles === 0)).toBe(true);
  });

  it('counts files left after the last batch as omitted', () => {
    const batches = planBatches([first, second, third], budget(700), 1);

    expect(batches).toHaveLength(1);
    expect(batches[0].patches.map(file => file.path)).toEqual(['a.ts', 'b.ts']);
    expect(batches[0].omittedFiles).toBe(1);
    expect(batches[0].omittedHunks).toBe(1);
  });

  it('truncates a file larger than the whole budget into a batch of its own', () => {
    const batches = planBatches([fileB, fileC], budget(400), 2);

    expect(batches).toHaveLength(1);
    expect(batches[0].patches.map(file => [file.path, file.hunks.length])).toEqual([['b.ts', 2], ['c.ts', 1]]);
    expect(batches[0].omittedHunks).toBe(3);
  });
});
