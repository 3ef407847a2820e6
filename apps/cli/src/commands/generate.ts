import { Command } from "commander";
import {
  generatePuzzle,
  renderGrid,
  parseSeed,
  randomSeed,
  solve,
  SeededRng,
  DIFFICULTY_RANGES,
  InvalidConfigurationError,
  log,
} from "@gridcollapse/sudoku";
import type { Difficulty } from "@gridcollapse/sudoku";
import { initConfig, applyCliFlags, parseInteger } from "../config/index.js";
import { formatSolveResult, errorMessage } from "./report.js";

export interface GenerateInput {
  gridSeed: bigint;
  removalSeed: bigint;
  minHints: number;
  maxHints: number;
  /** Seed for solving the puzzle afterwards, if wanted */
  solveSeed?: bigint;
  maxSteps: number;
}

export function buildGenerateReport(input: GenerateInput): string[] {
  const { puzzle, hints } = generatePuzzle(input);
  log.debug(
    { gridSeed: String(input.gridSeed), removalSeed: String(input.removalSeed), hints },
    "Puzzle generated",
  );

  const lines = [
    `Grid seed: ${input.gridSeed}`,
    `Removal seed: ${input.removalSeed}`,
    renderGrid(puzzle),
    puzzle.toString(),
    `Hints: ${hints}`,
  ];

  if (input.solveSeed !== undefined) {
    const result = solve(puzzle, new SeededRng(input.solveSeed), { maxSteps: input.maxSteps });
    lines.push("", `Solve seed: ${input.solveSeed}`, renderGrid(puzzle), puzzle.toString());
    lines.push(...formatSolveResult(result));
  }
  return lines;
}

interface GenerateFlags {
  seed?: string;
  removalSeed?: string;
  difficulty?: string;
  minHints?: string;
  maxHints?: string;
  solve?: boolean;
  solveSeed?: string;
}

/**
 * Hint bounds from explicit flags, falling back to the preset of the
 * configured difficulty. Both flags must be given together.
 */
export function resolveHintBounds(
  flags: Pick<GenerateFlags, "minHints" | "maxHints">,
  difficulty: Difficulty,
): [number, number] {
  if (flags.minHints !== undefined || flags.maxHints !== undefined) {
    if (flags.minHints === undefined || flags.maxHints === undefined) {
      throw new InvalidConfigurationError("--min-hints and --max-hints must be given together");
    }
    return [
      parseInteger("--min-hints", flags.minHints, 0),
      parseInteger("--max-hints", flags.maxHints, 0),
    ];
  }
  return DIFFICULTY_RANGES[difficulty];
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate")
    .description("Generate a puzzle from a grid seed and a removal seed")
    .option("-s, --seed <seed>", "Seed for the complete grid (decimal or 0x hex)")
    .option("-r, --removal-seed <seed>", "Seed for choosing the cleared cells")
    .option("-d, --difficulty <level>", "easy, medium or hard")
    .option("--min-hints <n>", "Fewest cells to clear")
    .option("--max-hints <n>", "Clear fewer than this many cells")
    .option("--solve", "Solve the puzzle after generating it")
    .option("--solve-seed <seed>", "Seed for the solver's backtracking choices")
    .action(async (opts: GenerateFlags) => {
      try {
        applyCliFlags({ difficulty: opts.difficulty });
        const settings = await initConfig();
        const [minHints, maxHints] = resolveHintBounds(opts, settings.difficulty);
        const lines = buildGenerateReport({
          gridSeed: opts.seed ? parseSeed(opts.seed) : randomSeed(),
          removalSeed: opts.removalSeed ? parseSeed(opts.removalSeed) : randomSeed(),
          minHints,
          maxHints,
          solveSeed: opts.solve
            ? opts.solveSeed
              ? parseSeed(opts.solveSeed)
              : randomSeed()
            : undefined,
          maxSteps: settings.maxSteps,
        });
        for (const line of lines) console.log(line);
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
