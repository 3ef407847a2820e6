export { Grid, GRID_SIZE, CELL_COUNT, TILE_SIZE } from "./grid.js";
export type { Position } from "./grid.js";
export { candidatesAt, findLeastEntropy } from "./entropy.js";
export type { EntropyResult } from "./entropy.js";
export { solve, DEFAULT_MAX_STEPS } from "./solver.js";
export type {
  Move,
  SolveOptions,
  SolveResult,
  SolveStats,
  SolveStatus,
} from "./solver.js";
export {
  generateCompleteGrid,
  removeCells,
  generatePuzzle,
  DIFFICULTY_RANGES,
} from "./generator.js";
export type { Difficulty, Puzzle, PuzzleOptions } from "./generator.js";
export { SeededRng, randomSeed, parseSeed } from "./prng.js";
export type { Seed } from "./prng.js";
export { validateGrid, isSolved } from "./validator.js";
export type { Conflict, UnitKind, ValidationResult } from "./validator.js";
export { renderGrid } from "./render.js";
export {
  GridError,
  MalformedGridError,
  InvalidConfigurationError,
  InvariantViolationError,
} from "./errors.js";
export { default as log, isLogLevel } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
