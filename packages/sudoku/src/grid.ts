import { MalformedGridError } from "./errors.js";

export const GRID_SIZE = 9;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;
export const TILE_SIZE = 3;

/** Row and column of a cell, both 0-8 */
export type Position = [number, number];

function assertIndex(kind: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value >= GRID_SIZE) {
    throw new RangeError(`${kind} out of range: ${value}`);
  }
}

function assertTileIndex(kind: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value >= TILE_SIZE) {
    throw new RangeError(`${kind} out of range: ${value}`);
  }
}

function isCellValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 9;
}

/**
 * A 9x9 Sudoku board stored as 81 row-major cells.
 * 0 marks an empty cell, 1-9 a filled one.
 */
export class Grid {
  private readonly cells: number[];

  private constructor(cells: number[]) {
    this.cells = cells;
  }

  /** Parse the 81-character interchange format ('0' for empty). */
  static parse(representation: string): Grid {
    if (representation.length !== CELL_COUNT) {
      throw new MalformedGridError(
        `Expected ${CELL_COUNT} characters, got ${representation.length}`
      );
    }
    const cells: number[] = [];
    for (let i = 0; i < CELL_COUNT; i++) {
      const ch = representation[i];
      if (ch < "0" || ch > "9") {
        throw new MalformedGridError(`Invalid character "${ch}" at index ${i}`);
      }
      cells.push(ch.charCodeAt(0) - 48);
    }
    return new Grid(cells);
  }

  static fromCells(cells: readonly number[]): Grid {
    if (cells.length !== CELL_COUNT) {
      throw new MalformedGridError(
        `Expected ${CELL_COUNT} cells, got ${cells.length}`
      );
    }
    const bad = cells.findIndex((v) => !isCellValue(v));
    if (bad !== -1) {
      throw new MalformedGridError(`Invalid value ${cells[bad]} at index ${bad}`);
    }
    return new Grid([...cells]);
  }

  static fromRows(rows: readonly (readonly number[])[]): Grid {
    if (rows.length !== GRID_SIZE || rows.some((r) => r.length !== GRID_SIZE)) {
      throw new MalformedGridError("Expected 9 rows of 9 cells");
    }
    return Grid.fromCells(rows.flat());
  }

  static empty(): Grid {
    return new Grid(Array<number>(CELL_COUNT).fill(0));
  }

  get(row: number, col: number): number {
    assertIndex("Row", row);
    assertIndex("Column", col);
    return this.cells[row * GRID_SIZE + col];
  }

  set(row: number, col: number, value: number): void {
    assertIndex("Row", row);
    assertIndex("Column", col);
    if (!isCellValue(value)) {
      throw new RangeError(`Cell value out of range: ${value}`);
    }
    this.cells[row * GRID_SIZE + col] = value;
  }

  clear(row: number, col: number): void {
    this.set(row, col, 0);
  }

  getRow(row: number): number[] {
    assertIndex("Row", row);
    return this.cells.slice(row * GRID_SIZE, row * GRID_SIZE + GRID_SIZE);
  }

  getColumn(col: number): number[] {
    assertIndex("Column", col);
    const column: number[] = [];
    for (let r = 0; r < GRID_SIZE; r++) column.push(this.cells[r * GRID_SIZE + col]);
    return column;
  }

  /** Cells of the 3x3 tile at (tileRow, tileCol), each 0-2, read row by row */
  getTile(tileRow: number, tileCol: number): number[] {
    assertTileIndex("Tile row", tileRow);
    assertTileIndex("Tile column", tileCol);
    const tile: number[] = [];
    const br = tileRow * TILE_SIZE;
    const bc = tileCol * TILE_SIZE;
    for (let r = br; r < br + TILE_SIZE; r++) {
      for (let c = bc; c < bc + TILE_SIZE; c++) {
        tile.push(this.cells[r * GRID_SIZE + c]);
      }
    }
    return tile;
  }

  emptyCount(): number {
    return this.cells.filter((v) => v === 0).length;
  }

  isFull(): boolean {
    return this.cells.every((v) => v !== 0);
  }

  emptyPositions(): Position[] {
    const positions: Position[] = [];
    this.cells.forEach((v, i) => {
      if (v === 0) positions.push([Math.floor(i / GRID_SIZE), i % GRID_SIZE]);
    });
    return positions;
  }

  toRows(): number[][] {
    return Array.from({ length: GRID_SIZE }, (_, r) => this.getRow(r));
  }

  clone(): Grid {
    return new Grid([...this.cells]);
  }

  equals(other: Grid): boolean {
    return this.cells.every((v, i) => v === other.cells[i]);
  }

  /** The 81-character interchange format */
  toString(): string {
    return this.cells.join("");
  }
}
