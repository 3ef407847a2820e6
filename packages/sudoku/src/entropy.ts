import { Grid, GRID_SIZE, TILE_SIZE } from "./grid.js";
import type { Position } from "./grid.js";

const DIGITS = [1, 2, 3, 4, 5, 6, 7, 8, 9];

/** The most constrained empty cell and the digits it can still take */
export interface EntropyResult {
  position: Position;
  candidates: number[];
}

/**
 * Digits still legal at (row, col), ascending.
 * Returns null for a filled cell; an empty array means the cell is stuck.
 */
export function candidatesAt(
  grid: Grid,
  row: number,
  col: number
): number[] | null {
  if (grid.get(row, col) !== 0) return null;

  const used = new Set<number>([
    ...grid.getRow(row),
    ...grid.getColumn(col),
    ...grid.getTile(Math.floor(row / TILE_SIZE), Math.floor(col / TILE_SIZE)),
  ]);
  return DIGITS.filter((v) => !used.has(v));
}

/**
 * Scan every empty cell in row-major order and return the one with the
 * fewest candidates. Ties keep the first cell scanned. Returns null once
 * the grid has no empty cell left.
 */
export function findLeastEntropy(grid: Grid): EntropyResult | null {
  let best: EntropyResult | null = null;

  for (let row = 0; row < GRID_SIZE; row++) {
    for (let col = 0; col < GRID_SIZE; col++) {
      const candidates = candidatesAt(grid, row, col);
      if (candidates === null) continue;
      if (best === null || candidates.length < best.candidates.length) {
        best = { position: [row, col], candidates };
        if (candidates.length === 0) return best;
      }
    }
  }
  return best;
}
