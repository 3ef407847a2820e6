import { Command } from "commander";
import { applyCliFlags } from "../config/index.js";

type GlobalFlags = {
  logLevel?: string;
};

/** `--log-level` on the program, applied before any subcommand runs */
export function registerGlobalOptions(program: Command): void {
  program
    .option("-l, --log-level <level>", "bunyan level for solver and generator logs")
    .hook("preAction", () => {
      applyCliFlags(program.opts<GlobalFlags>());
    });
}
