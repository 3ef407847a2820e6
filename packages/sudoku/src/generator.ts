import { Grid, CELL_COUNT, GRID_SIZE, TILE_SIZE } from "./grid.js";
import { InvalidConfigurationError } from "./errors.js";
import { SeededRng } from "./prng.js";
import type { Seed } from "./prng.js";

export type Difficulty = "easy" | "medium" | "hard";

/** Bounds on the number of cells cleared, by difficulty */
export const DIFFICULTY_RANGES: Record<Difficulty, [number, number]> = {
  easy: [36, 46],
  medium: [46, 54],
  hard: [54, 60],
};

export interface PuzzleOptions {
  /** Seed for the complete-grid construction */
  gridSeed: Seed;
  /** Seed for picking the cells to clear */
  removalSeed: Seed;
  minHints: number;
  maxHints: number;
}

export interface Puzzle {
  puzzle: Grid;
  solution: Grid;
  hints: number;
}

function rotateLeft(row: number[], by: number): number[] {
  return [...row.slice(by), ...row.slice(0, by)];
}

/** Shuffle indexes within each group of three, keeping the groups in place */
function shuffledWithinGroups(rng: SeededRng): number[] {
  const order: number[] = [];
  for (let group = 0; group < GRID_SIZE; group += TILE_SIZE) {
    order.push(...rng.shuffle([group, group + 1, group + 2]));
  }
  return order;
}

/**
 * Build a complete valid grid from a shuffled first row.
 * Each later row is the previous one rotated left by 1 at the start of a
 * band and by 3 otherwise, which satisfies every row, column and tile.
 * Rows are then shuffled within their band, columns within their stack,
 * and the digits relabelled, none of which can break a constraint.
 */
export function generateCompleteGrid(rng: SeededRng): Grid {
  const rows: number[][] = [rng.shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9])];
  for (let r = 1; r < GRID_SIZE; r++) {
    rows.push(rotateLeft(rows[r - 1], r % TILE_SIZE === 0 ? 1 : 3));
  }

  const rowOrder = shuffledWithinGroups(rng);
  const colOrder = shuffledWithinGroups(rng);
  const labels = rng.shuffle([1, 2, 3, 4, 5, 6, 7, 8, 9]);

  return Grid.fromRows(
    rowOrder.map((r) => colOrder.map((c) => labels[rows[r][c] - 1]))
  );
}

/**
 * Clear random cells of `grid` in place and return how many filled cells
 * remain. The number cleared is drawn from [minHints, maxHints), so a full
 * grid ends with a hint count in (81 - maxHints, 81 - minHints].
 * No uniqueness check is made on the resulting puzzle.
 */
export function removeCells(
  grid: Grid,
  rng: SeededRng,
  minHints: number,
  maxHints: number
): number {
  if (!Number.isInteger(minHints) || !Number.isInteger(maxHints)) {
    throw new InvalidConfigurationError(
      `Hint bounds must be integers, got ${minHints} and ${maxHints}`
    );
  }
  if (minHints >= maxHints) {
    throw new InvalidConfigurationError(
      `minHints (${minHints}) must be less than maxHints (${maxHints})`
    );
  }
  if (minHints < 0 || maxHints > CELL_COUNT + 1) {
    throw new InvalidConfigurationError(
      `Hint bounds must lie within 0..${CELL_COUNT + 1}, got ${minHints}..${maxHints}`
    );
  }

  const toClear = rng.nextRange(minHints, maxHints);

  // Build a list of the filled cell indexes and shuffle them
  const filled: number[] = [];
  for (let i = 0; i < CELL_COUNT; i++) {
    if (grid.get(Math.floor(i / GRID_SIZE), i % GRID_SIZE) !== 0) filled.push(i);
  }
  rng.shuffle(filled);

  for (const i of filled.slice(0, toClear)) {
    grid.clear(Math.floor(i / GRID_SIZE), i % GRID_SIZE);
  }

  return CELL_COUNT - grid.emptyCount();
}

/**
 * Generate a puzzle and the complete grid it was cut from.
 * The two seeds are independent so a layout can be reproduced exactly.
 */
export function generatePuzzle(options: PuzzleOptions): Puzzle {
  const solution = generateCompleteGrid(new SeededRng(options.gridSeed));
  const puzzle = solution.clone();
  const hints = removeCells(
    puzzle,
    new SeededRng(options.removalSeed),
    options.minHints,
    options.maxHints
  );
  return { puzzle, solution, hints };
}
