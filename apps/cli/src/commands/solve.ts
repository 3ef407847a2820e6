import { Command } from "commander";
import {
  Grid,
  SeededRng,
  solve,
  validateGrid,
  renderGrid,
  parseSeed,
  randomSeed,
} from "@gridcollapse/sudoku";
import { initConfig, applyCliFlags } from "../config/index.js";
import { formatSolveResult, formatValidation, errorMessage } from "./report.js";

export const CLASSIC_PUZZLE =
  "530070000600195000098000060800060003400803001700020006060000280000419005000080079";

export interface SolveInput {
  puzzle: string;
  seed: bigint;
  maxSteps: number;
}

export interface SolveReport {
  lines: string[];
  solved: boolean;
}

export function buildSolveReport(input: SolveInput): SolveReport {
  const grid = Grid.parse(input.puzzle);
  const lines = [`Seed: ${input.seed}`, renderGrid(grid), ""];

  const started = performance.now();
  const result = solve(grid, new SeededRng(input.seed), { maxSteps: input.maxSteps });
  const elapsed = performance.now() - started;

  lines.push(renderGrid(grid), grid.toString(), "");
  lines.push(...formatSolveResult(result));
  lines.push(...formatValidation(validateGrid(grid)));
  lines.push(`Duration: ${Math.round(elapsed)}ms`);
  return { lines, solved: result.status === "solved" };
}

interface SolveFlags {
  seed?: string;
  maxSteps?: string;
}

export function registerSolveCommand(program: Command): void {
  program
    .command("solve")
    .description("Solve a puzzle given as 81 digits, 0 for empty")
    .argument("[puzzle]", "Puzzle to solve", CLASSIC_PUZZLE)
    .option("-s, --seed <seed>", "Seed for backtracking choices")
    .option("--max-steps <n>", "Solver step cap")
    .action(async (puzzle: string, opts: SolveFlags) => {
      try {
        applyCliFlags({ maxSteps: opts.maxSteps });
        const settings = await initConfig();
        const report = buildSolveReport({
          puzzle,
          seed: opts.seed ? parseSeed(opts.seed) : randomSeed(),
          maxSteps: settings.maxSteps,
        });
        for (const line of report.lines) console.log(line);
        if (!report.solved) process.exitCode = 1;
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
