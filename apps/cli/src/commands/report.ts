import { SolveResult, ValidationResult } from "@gridcollapse/sudoku";

const STATUS_TEXT: Record<SolveResult["status"], string> = {
  solved: "solved",
  unsolvable: "solver could not complete the board",
  "step-limit": "stopped at the step limit",
};

export function formatSolveResult(result: SolveResult): string[] {
  const { steps, forced, choices, backtracks, maxDepth } = result.stats;
  return [
    `Status: ${STATUS_TEXT[result.status]}`,
    `Steps: ${steps} (forced ${forced}, choices ${choices}, backtracks ${backtracks}, max depth ${maxDepth})`,
  ];
}

export function formatValidation(validation: ValidationResult): string[] {
  if (validation.valid) return ["The board is valid!"];
  return [
    "The board is invalid!",
    ...validation.conflicts.map(
      (c) => `  ${c.unit} ${c.index + 1}: digit ${c.digit} repeated`,
    ),
  ];
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
