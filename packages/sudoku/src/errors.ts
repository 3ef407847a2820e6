/** Base class for every error raised by the sudoku package. */
export class GridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The board representation is not exactly 81 digit characters. */
export class MalformedGridError extends GridError {}

/** A caller-supplied setting (hint bounds, seed, step cap) is out of range. */
export class InvalidConfigurationError extends GridError {}

/**
 * Internal state the solver relies on did not hold. Signals a defect in
 * this package, never a property of the puzzle being solved.
 */
export class InvariantViolationError extends GridError {}
