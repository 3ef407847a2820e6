import { Grid, GRID_SIZE, TILE_SIZE } from "./grid.js";

export type UnitKind = "row" | "column" | "tile";

/** A digit that appears more than once in one row, column or tile */
export interface Conflict {
  unit: UnitKind;
  /** Row or column number, or tile number counted row-major (0-8) */
  index: number;
  digit: number;
}

export interface ValidationResult {
  valid: boolean;
  conflicts: Conflict[];
}

function duplicates(cells: number[]): number[] {
  const seen = new Set<number>();
  const repeated = new Set<number>();
  for (const v of cells) {
    if (v === 0) continue;
    if (seen.has(v)) repeated.add(v);
    seen.add(v);
  }
  return [...repeated].sort((a, b) => a - b);
}

/**
 * Check that no row, column or tile holds the same non-zero digit twice.
 * Empty cells are ignored, so a partially filled grid can be valid.
 */
export function validateGrid(grid: Grid): ValidationResult {
  const conflicts: Conflict[] = [];

  for (let i = 0; i < GRID_SIZE; i++) {
    for (const digit of duplicates(grid.getRow(i))) {
      conflicts.push({ unit: "row", index: i, digit });
    }
  }
  for (let i = 0; i < GRID_SIZE; i++) {
    for (const digit of duplicates(grid.getColumn(i))) {
      conflicts.push({ unit: "column", index: i, digit });
    }
  }
  for (let i = 0; i < GRID_SIZE; i++) {
    const tile = grid.getTile(Math.floor(i / TILE_SIZE), i % TILE_SIZE);
    for (const digit of duplicates(tile)) {
      conflicts.push({ unit: "tile", index: i, digit });
    }
  }

  return { valid: conflicts.length === 0, conflicts };
}

/** Check if the grid is completely and correctly solved */
export function isSolved(grid: Grid): boolean {
  return grid.isFull() && validateGrid(grid).valid;
}
