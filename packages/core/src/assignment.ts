/**
 * Optimal one-to-one assignment of warnings (rows) to events (columns)
 *
 * Replaces greedy best-first pairing: every row and column is used at most
 * once and the total score of the kept pairs is maximal.
 */

import { InvalidRangeError } from './errors.js';
import { f1, mean } from './scoring.js';
import type { AggregateResults } from './types.js';

export interface AssignmentOptions {
  /** Report pairs with a score of exactly 0 as matches (default false) */
  allowZeroScores?: boolean;
}

/**
 * Matched row/column with its score
 */
export interface AssignedPair<R, C> {
  row: R;
  col: C;
  score: number;
}

export interface AssignmentResult<R, C> extends AggregateResults {
  matches: AssignedPair<R, C>[];
  unmatchedRows: R[];
  unmatchedCols: C[];
}

/**
 * Maximum-weight perfect assignment on a square non-negative matrix
 * (Hungarian algorithm, O(n^3)).
 *
 * @returns column assigned to each row
 */
export function maxWeightAssignment(square: readonly (readonly number[])[]): number[] {
  const n = square.length;
  for (const row of square) {
    if (row.length !== n) {
      throw new InvalidRangeError(`Assignment matrix must be square, got a row of ${row.length} in a ${n}x${n} matrix`);
    }
  }
  if (n === 0) return [];

  // Maximize score == minimize (maxScore - score)
  let maxScore = 0;
  for (const row of square) {
    for (const value of row) {
      if (value > maxScore) maxScore = value;
    }
  }
  const cost = (i: number, j: number): number => maxScore - square[i - 1][j - 1];

  // 1-indexed potentials; column 0 is the virtual start
  const u = new Array<number>(n + 1).fill(0);
  const v = new Array<number>(n + 1).fill(0);
  const rowOfCol = new Array<number>(n + 1).fill(0);
  const way = new Array<number>(n + 1).fill(0);

  for (let i = 1; i <= n; i++) {
    rowOfCol[0] = i;
    let j0 = 0;
    const minv = new Array<number>(n + 1).fill(Infinity);
    const used = new Array<boolean>(n + 1).fill(false);

    do {
      used[j0] = true;
      const i0 = rowOfCol[j0];
      let delta = Infinity;
      let j1 = 0;

      for (let j = 1; j <= n; j++) {
        if (used[j]) continue;
        const reduced = cost(i0, j) - u[i0] - v[j];
        if (reduced < minv[j]) {
          minv[j] = reduced;
          way[j] = j0;
        }
        if (minv[j] < delta) {
          delta = minv[j];
          j1 = j;
        }
      }

      for (let j = 0; j <= n; j++) {
        if (used[j]) {
          u[rowOfCol[j]] += delta;
          v[j] -= delta;
        } else {
          minv[j] -= delta;
        }
      }
      j0 = j1;
    } while (rowOfCol[j0] !== 0);

    // Augment along the alternating path
    do {
      const j1 = way[j0];
      rowOfCol[j0] = rowOfCol[j1];
      j0 = j1;
    } while (j0 !== 0);
  }

  const colOfRow = new Array<number>(n).fill(-1);
  for (let j = 1; j <= n; j++) {
    colOfRow[rowOfCol[j] - 1] = j - 1;
  }
  return colOfRow;
}

function emptyResult<R, C>(rowIds: readonly R[], colIds: readonly C[]): AssignmentResult<R, C> {
  return {
    matches: [],
    unmatchedRows: [...rowIds],
    unmatchedCols: [...colIds],
    qualityScore: 0,
    precision: 0,
    recall: 0,
    f1: 0,
  };
}

/**
 * Match rows to columns maximizing total score, then compute
 * quality score, precision, recall and F1 over the kept pairs.
 *
 * Empty dimensions or an all-non-positive matrix short-circuit to an empty result.
 */
export function solveAssignment<R, C>(
  scores: readonly (readonly number[])[],
  rowIds: readonly R[],
  colIds: readonly C[],
  options: AssignmentOptions = {}
): AssignmentResult<R, C> {
  const { allowZeroScores = false } = options;
  const rowCount = rowIds.length;
  const colCount = colIds.length;

  if (scores.length !== rowCount) {
    throw new InvalidRangeError(`Score matrix has ${scores.length} rows for ${rowCount} row ids`);
  }
  for (const row of scores) {
    if (row.length !== colCount) {
      throw new InvalidRangeError(`Score matrix row has ${row.length} entries for ${colCount} column ids`);
    }
  }

  if (rowCount === 0 || colCount === 0) {
    return emptyResult(rowIds, colIds);
  }

  let maxScore = -Infinity;
  for (const row of scores) {
    for (const value of row) {
      if (value > maxScore) maxScore = value;
    }
  }
  if (!(maxScore > 0)) {
    return emptyResult(rowIds, colIds);
  }

  // Clamp to >= 0 and pad to a square with zero rows/columns
  const size = Math.max(rowCount, colCount);
  const square: number[][] = [];
  for (let i = 0; i < size; i++) {
    const padded = new Array<number>(size).fill(0);
    if (i < rowCount) {
      for (let j = 0; j < colCount; j++) {
        padded[j] = Math.max(scores[i][j], 0);
      }
    }
    square.push(padded);
  }

  const colOfRow = maxWeightAssignment(square);

  const matches: AssignedPair<R, C>[] = [];
  const matchedRows = new Set<number>();
  const matchedCols = new Set<number>();

  for (let i = 0; i < rowCount; i++) {
    const j = colOfRow[i];
    // Padding column
    if (j >= colCount) continue;
    const score = square[i][j];
    if (score === 0 && !allowZeroScores) continue;

    matches.push({ row: rowIds[i], col: colIds[j], score });
    matchedRows.add(i);
    matchedCols.add(j);
  }

  const precision = matches.length / rowCount;
  const recall = matches.length / colCount;

  return {
    matches,
    unmatchedRows: rowIds.filter((_, i) => !matchedRows.has(i)),
    unmatchedCols: colIds.filter((_, j) => !matchedCols.has(j)),
    qualityScore: mean(matches.map((m) => m.score)),
    precision,
    recall,
    f1: f1(precision, recall),
  };
}
