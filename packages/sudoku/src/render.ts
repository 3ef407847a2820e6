import { Grid, GRID_SIZE, TILE_SIZE } from "./grid.js";

const SEGMENT = "─".repeat(TILE_SIZE * 2 + 1);

function border(left: string, joint: string, right: string): string {
  return left + Array(TILE_SIZE).fill(SEGMENT).join(joint) + right;
}

const TOP = border("┌", "┬", "┐");
const MIDDLE = border("├", "┼", "┤");
const BOTTOM = border("└", "┴", "┘");

function renderRow(cells: number[]): string {
  let line = "";
  cells.forEach((v, c) => {
    if (c % TILE_SIZE === 0) line += "│";
    line += ` ${v === 0 ? " " : v}`;
    if (c % TILE_SIZE === TILE_SIZE - 1) line += " ";
  });
  return line + "│";
}

/**
 * Draw the grid with box-drawing characters around each 3x3 tile.
 * Empty cells are left blank.
 */
export function renderGrid(grid: Grid): string {
  const lines = [TOP];
  for (let r = 0; r < GRID_SIZE; r++) {
    if (r > 0 && r % TILE_SIZE === 0) lines.push(MIDDLE);
    lines.push(renderRow(grid.getRow(r)));
  }
  lines.push(BOTTOM);
  return lines.join("\n");
}
