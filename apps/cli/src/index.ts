import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerConfigCommand } from "./commands/config.js";
import { registerGenerateCommand } from "./commands/generate.js";
import { registerSolveCommand } from "./commands/solve.js";
import { registerValidateCommand } from "./commands/validate.js";
import { registerGlobalOptions } from "./commands/options.js";

program
  .name("gridcollapse")
  .description("Generate Sudoku puzzles from seeds and solve them by least-entropy collapse")
  .version("0.1.0", "-v, --version");

registerGlobalOptions(program);
registerConfigCommand(program);
registerGenerateCommand(program);
registerSolveCommand(program);
registerValidateCommand(program);

await program.parseAsync();
