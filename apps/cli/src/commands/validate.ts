import { Command } from "commander";
import { Grid, validateGrid, renderGrid } from "@gridcollapse/sudoku";
import { initConfig } from "../config/index.js";
import { formatValidation, errorMessage } from "./report.js";

export function registerValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Check a board for repeated digits in any row, column or tile")
    .argument("<grid>", "Board as 81 digits, 0 for empty")
    .action(async (representation: string) => {
      try {
        await initConfig();
        const grid = Grid.parse(representation);
        const validation = validateGrid(grid);
        console.log(renderGrid(grid));
        for (const line of formatValidation(validation)) console.log(line);
        if (!validation.valid) process.exitCode = 1;
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
