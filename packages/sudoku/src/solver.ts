import { Grid } from "./grid.js";
import type { Position } from "./grid.js";
import { candidatesAt, findLeastEntropy } from "./entropy.js";
import type { EntropyResult } from "./entropy.js";
import { InvalidConfigurationError, InvariantViolationError } from "./errors.js";
import { SeededRng } from "./prng.js";
import log from "./logger.js";
import type { Logger } from "./logger.js";

export const DEFAULT_MAX_STEPS = 20_000;

/**
 * An ambiguous collapse: the cell had more than one candidate and `value`
 * was chosen. `cascades` lists the single-candidate fills that followed,
 * so undoing the move undoes them too.
 */
export interface Move {
  position: Position;
  value: number;
  cascades: Position[];
}

export interface SolveStats {
  /** Selector results acted upon */
  steps: number;
  /** Cells filled because only one digit was left */
  forced: number;
  /** Ambiguous cells collapsed by lookahead */
  choices: number;
  /** Moves popped off the history */
  backtracks: number;
  /** Deepest move history reached */
  maxDepth: number;
}

export type SolveStatus = "solved" | "unsolvable" | "step-limit";

export interface SolveResult {
  status: SolveStatus;
  stats: SolveStats;
}

export interface SolveOptions {
  /** Upper bound on solver steps; the grid is left partially filled when hit */
  maxSteps?: number;
  logger?: Logger;
}

type Recovery =
  | { kind: "resume"; next: EntropyResult }
  | { kind: "solved" }
  | { kind: "exhausted" };

/** Mutable state of a single solve call. */
class CollapseRun {
  private readonly moves: Move[] = [];
  readonly stats: SolveStats = {
    steps: 0,
    forced: 0,
    choices: 0,
    backtracks: 0,
    maxDepth: 0,
  };

  constructor(
    private readonly grid: Grid,
    private readonly rng: SeededRng,
    private readonly log: Logger
  ) {}

  run(maxSteps: number): SolveStatus {
    let next = findLeastEntropy(this.grid);

    while (next !== null) {
      if (this.stats.steps >= maxSteps) return "step-limit";
      this.stats.steps++;

      const { position, candidates } = next;

      if (candidates.length === 0) {
        const recovery = this.backtrack();
        if (recovery.kind === "exhausted") return "unsolvable";
        if (recovery.kind === "solved") return "solved";
        next = recovery.next;
        continue;
      }

      if (candidates.length === 1) {
        this.fillForced(position, candidates[0]);
      } else if (this.collapse(position, candidates) === "completed") {
        return "solved";
      }

      next = findLeastEntropy(this.grid);
    }
    return "solved";
  }

  private fillForced([row, col]: Position, value: number): void {
    this.grid.set(row, col, value);
    this.stats.forced++;
    const last = this.moves[this.moves.length - 1];
    if (last) last.cascades.push([row, col]);
    this.log.trace({ row, col, value }, "Forced single candidate");
  }

  /**
   * Try each candidate one ply deep and commit the one leaving the next
   * most constrained cell with the fewest options. Stops early when a
   * candidate fills the last empty cell.
   */
  private collapse([row, col]: Position, candidates: number[]): "committed" | "completed" {
    let best: { value: number; next: EntropyResult } | null = null;

    for (const value of candidates) {
      this.grid.set(row, col, value);
      const next = findLeastEntropy(this.grid);
      if (next === null) return "completed";
      if (next.candidates.length === 0) continue;
      if (best === null || next.candidates.length < best.next.candidates.length) {
        best = { value, next };
      }
    }

    // Every empty cell had two or more options, and one placement removes
    // at most one option from each peer.
    if (best === null) {
      throw new InvariantViolationError(
        `No candidate of (${row}, ${col}) survives lookahead: ${candidates.join(",")}`
      );
    }

    this.grid.set(row, col, best.value);
    this.push({ position: [row, col], value: best.value, cascades: [] });
    this.stats.choices++;
    this.log.debug(
      { row, col, value: best.value, candidates, depth: this.moves.length },
      "Collapsed ambiguous cell"
    );
    return "committed";
  }

  /**
   * Undo the most recent ambiguous move and substitute another value for
   * it, unwinding further back while no substitute survives lookahead.
   */
  private backtrack(): Recovery {
    for (;;) {
      const last = this.moves.pop();
      if (!last) {
        this.log.debug("Move history exhausted");
        return { kind: "exhausted" };
      }
      this.stats.backtracks++;

      for (const [r, c] of last.cascades) this.grid.clear(r, c);
      const [row, col] = last.position;
      this.grid.clear(row, col);

      const remaining = candidatesAt(this.grid, row, col);
      if (remaining === null) {
        throw new InvariantViolationError(
          `Cell (${row}, ${col}) still filled after undoing its move`
        );
      }

      const survivors: { value: number; next: EntropyResult }[] = [];
      for (const value of remaining) {
        if (value === last.value) continue;
        this.grid.set(row, col, value);
        const next = findLeastEntropy(this.grid);
        if (next === null) return { kind: "solved" };
        if (next.candidates.length > 0) survivors.push({ value, next });
      }
      this.grid.clear(row, col);

      const substitute = this.rng.pick(survivors);
      if (substitute) {
        this.grid.set(row, col, substitute.value);
        this.push({ position: [row, col], value: substitute.value, cascades: [] });
        this.log.debug(
          { row, col, from: last.value, to: substitute.value, undone: last.cascades.length },
          "Substituted value after contradiction"
        );
        return { kind: "resume", next: substitute.next };
      }

      // Unreachable while moves are only pushed from states where every
      // empty cell has two or more options: one value is left, and placing
      // it removes at most one option from each peer.
      this.log.debug(
        { row, col, value: last.value, depth: this.moves.length },
        "No substitute survives, unwinding further"
      );
    }
  }

  private push(move: Move): void {
    this.moves.push(move);
    this.stats.maxDepth = Math.max(this.stats.maxDepth, this.moves.length);
  }
}

/**
 * Solve `grid` in place by repeatedly collapsing its least-entropy cell,
 * backtracking over ambiguous choices when a cell runs out of candidates.
 *
 * A result of "unsolvable" means the move history ran dry: either the
 * puzzle has no solution or this strategy could not reach one. The grid is
 * left in whatever state the solver reached.
 */
export function solve(
  grid: Grid,
  rng: SeededRng,
  options: SolveOptions = {}
): SolveResult {
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  if (!Number.isInteger(maxSteps) || maxSteps < 1) {
    throw new InvalidConfigurationError(`maxSteps must be a positive integer, got ${maxSteps}`);
  }

  const logger = options.logger ?? log;
  const runner = new CollapseRun(grid, rng, logger);
  const status = runner.run(maxSteps);

  logger.debug({ status, ...runner.stats }, "Solve finished");
  return { status, stats: runner.stats };
}
