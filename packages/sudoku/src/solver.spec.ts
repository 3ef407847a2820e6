import { strict as assert } from "assert";
import { Grid } from "./grid.js";
import { SeededRng } from "./prng.js";
import { solve } from "./solver.js";
import {
  generateCompleteGrid,
  removeCells,
  generatePuzzle,
  DIFFICULTY_RANGES,
} from "./generator.js";
import { validateGrid, isSolved } from "./validator.js";
import { InvalidConfigurationError } from "./errors.js";

const CLASSIC =
  "530070000600195000098000060800060003400803001700020006060000280000419005000080079";
const CLASSIC_SOLUTION =
  "534678912672195348198342567859761423426853791713924856961537284287419635345286179";

/** Every clue of `puzzle` is still in place in `solved` */
function keepsClues(puzzle: string, solved: Grid): boolean {
  const cells = solved.toString();
  return [...puzzle].every((ch, i) => ch === "0" || ch === cells[i]);
}

describe("solve", () => {
  it("solves the classic puzzle to its known solution", () => {
    const grid = Grid.parse(CLASSIC);
    const result = solve(grid, new SeededRng(1n));
    assert.equal(result.status, "solved");
    assert.equal(grid.toString(), CLASSIC_SOLUTION);
    assert.equal(validateGrid(grid).valid, true);
    assert.deepEqual(result.stats, {
      steps: 51,
      forced: 51,
      choices: 0,
      backtracks: 0,
      maxDepth: 0,
    });
  });

  it("reports an already solved grid as done without touching it", () => {
    const grid = Grid.parse(CLASSIC_SOLUTION);
    const result = solve(grid, new SeededRng(1n));
    assert.equal(result.status, "solved");
    assert.equal(result.stats.steps, 0);
    assert.equal(grid.toString(), CLASSIC_SOLUTION);
  });

  it("collapses ambiguous cells by one-ply lookahead", () => {
    const puzzle =
      "000810270100007430500000891040030020900004083386092007000040300003025704467301002";
    const grid = Grid.parse(puzzle);
    const result = solve(grid, new SeededRng(2n));
    assert.equal(result.status, "solved");
    assert.deepEqual(result.stats, {
      steps: 43,
      forced: 41,
      choices: 2,
      backtracks: 0,
      maxDepth: 2,
    });
    assert.equal(
      grid.toString(),
      "634819275198257436572463891741538629925674183386192547259746318813925764467381952"
    );
  });

  it("recovers from contradictions by backtracking", () => {
    const puzzle =
      "401002800920000301080000090002005060000009008008000002264987000015006080070031000";
    const grid = Grid.parse(puzzle);
    const result = solve(grid, new SeededRng(4n));
    assert.equal(result.status, "solved");
    assert.equal(isSolved(grid), true);
    assert.ok(keepsClues(puzzle, grid));
    assert.deepEqual(result.stats, {
      steps: 58,
      forced: 49,
      choices: 7,
      backtracks: 2,
      maxDepth: 7,
    });
  });

  it("finishes early when a lookahead candidate fills the last cell", () => {
    // the lone empty cell sees only 1s, so 2-9 are all legal
    const grid = Grid.parse("0" + "1".repeat(80));
    const result = solve(grid, new SeededRng(1n));
    assert.equal(result.status, "solved");
    assert.equal(grid.get(0, 0), 2);
    assert.equal(result.stats.steps, 1);
    assert.equal(result.stats.choices, 0);
  });

  it("reports a contradiction with no history as unsolvable", () => {
    const puzzle = "123456780" + "000000009" + "0".repeat(63);
    const grid = Grid.parse(puzzle);
    const result = solve(grid, new SeededRng(1n));
    assert.equal(result.status, "unsolvable");
    assert.equal(result.stats.steps, 1);
    assert.equal(result.stats.backtracks, 0);
    assert.equal(grid.toString(), puzzle);
  });

  it("stops at the step limit and leaves the grid partially filled", () => {
    const grid = Grid.parse(CLASSIC);
    const result = solve(grid, new SeededRng(1n), { maxSteps: 10 });
    assert.equal(result.status, "step-limit");
    assert.equal(result.stats.steps, 10);
    assert.equal(grid.emptyCount(), 41);
  });

  it("cycles between substitutes on an unsatisfiable triangle until capped", () => {
    // (0,0), (0,1) and (1,0) all see each other and can only take 3 or 5
    const puzzle =
      "004678912072196648198342567869761423426853791713924856961537284287419635645286179";
    const grid = Grid.parse(puzzle);
    const result = solve(grid, new SeededRng(1n), { maxSteps: 10 });
    assert.equal(result.status, "step-limit");
    assert.deepEqual(result.stats, {
      steps: 10,
      forced: 5,
      choices: 1,
      backtracks: 4,
      maxDepth: 1,
    });
    assert.equal(grid.get(0, 0), 3);
    assert.equal(grid.get(0, 1), 5);
    assert.equal(grid.get(1, 0), 0);
  });

  it("rejects a non-positive step limit", () => {
    assert.throws(
      () => solve(Grid.parse(CLASSIC), new SeededRng(1n), { maxSteps: 0 }),
      InvalidConfigurationError
    );
  });
});

describe("generateCompleteGrid", () => {
  it("produces a complete valid grid", () => {
    for (let seed = 1n; seed <= 20n; seed++) {
      const grid = generateCompleteGrid(new SeededRng(seed));
      assert.ok(isSolved(grid), `seed ${seed} produced ${grid.toString()}`);
    }
  });

  it("every row, column and tile holds each digit once", () => {
    const grid = generateCompleteGrid(new SeededRng(5n));
    const digits = [1, 2, 3, 4, 5, 6, 7, 8, 9];
    for (let i = 0; i < 9; i++) {
      assert.deepEqual([...grid.getRow(i)].sort(), digits);
      assert.deepEqual([...grid.getColumn(i)].sort(), digits);
      assert.deepEqual([...grid.getTile(Math.floor(i / 3), i % 3)].sort(), digits);
    }
  });

  it("is deterministic for a seed", () => {
    const a = generateCompleteGrid(new SeededRng(42n));
    const b = generateCompleteGrid(new SeededRng(42n));
    assert.ok(a.equals(b));
    assert.equal(
      a.toString(),
      "916872453728543961435691782257436198189725346364918275871254639542369817693187524"
    );
  });

  it("differs across seeds", () => {
    const a = generateCompleteGrid(new SeededRng(42n));
    const b = generateCompleteGrid(new SeededRng(43n));
    assert.equal(a.equals(b), false);
  });
});

describe("removeCells", () => {
  it("clears a drawn number of distinct cells", () => {
    const grid = generateCompleteGrid(new SeededRng(42n));
    const hints = removeCells(grid, new SeededRng(43n), 20, 30);
    assert.equal(hints, 53);
    assert.equal(grid.emptyCount(), 28);
    assert.equal(
      grid.toString(),
      "000870400700503960405091082207406098109720046064910270871254009500369817690187520"
    );
  });

  it("keeps the hint count within (81 - max, 81 - min]", () => {
    for (let seed = 1n; seed <= 50n; seed++) {
      const grid = generateCompleteGrid(new SeededRng(seed));
      const hints = removeCells(grid, new SeededRng(seed + 1000n), 20, 30);
      assert.ok(hints > 51 && hints <= 61, `seed ${seed} left ${hints} hints`);
      assert.equal(81 - grid.emptyCount(), hints);
    }
  });

  it("leaves surviving hints equal to the complete grid", () => {
    const solution = generateCompleteGrid(new SeededRng(8n));
    const puzzle = solution.clone();
    removeCells(puzzle, new SeededRng(9n), 40, 50);
    assert.ok(keepsClues(puzzle.toString(), solution));
  });

  it("rejects inverted or degenerate bounds", () => {
    const grid = generateCompleteGrid(new SeededRng(1n));
    assert.throws(() => removeCells(grid, new SeededRng(1n), 30, 30), InvalidConfigurationError);
    assert.throws(() => removeCells(grid, new SeededRng(1n), 30, 20), InvalidConfigurationError);
    assert.throws(() => removeCells(grid, new SeededRng(1n), -1, 20), InvalidConfigurationError);
    assert.throws(() => removeCells(grid, new SeededRng(1n), 1.5, 20), InvalidConfigurationError);
    assert.equal(grid.emptyCount(), 0);
  });
});

describe("generatePuzzle", () => {
  it("reproduces a puzzle from its two seeds", () => {
    const options = { gridSeed: 42n, removalSeed: 43n, minHints: 20, maxHints: 30 };
    const a = generatePuzzle(options);
    const b = generatePuzzle(options);
    assert.ok(a.puzzle.equals(b.puzzle));
    assert.ok(a.solution.equals(b.solution));
    assert.equal(a.hints, 53);
  });

  it("generated puzzles in [20, 30) cleared cells always solve", () => {
    for (let n = 1n; n <= 20n; n++) {
      const { puzzle, hints } = generatePuzzle({
        gridSeed: n,
        removalSeed: n + 100n,
        minHints: 20,
        maxHints: 30,
      });
      assert.ok(hints >= 52 && hints <= 61, `hints ${hints}`);
      const result = solve(puzzle, new SeededRng(n + 200n));
      assert.equal(result.status, "solved", `seed ${n}`);
      assert.ok(isSolved(puzzle));
    }
  });

  it("difficulty ranges are valid removal bounds", () => {
    for (const [min, max] of Object.values(DIFFICULTY_RANGES)) {
      assert.ok(min < max && min >= 0 && max <= 82);
    }
  });
});
