import type { Cell } from "./types";

const CELL_NAME = /^pt(?<x>\d+)pt(?<y>\d+)$/;

/**
 * Lookup table over a `width × laneCount` grid.
 */
export interface GridIndex {
  readonly width: number;
  readonly laneCount: number;
  /** Every cell, x-major: all lanes of column 0, then column 1, and so on. */
  readonly cells: ReadonlyArray<Cell>;
  contains(cell: Cell): boolean;
  /**
   * @throws {RangeError} when `(x, y)` lies outside the grid.
   */
  cellAt(x: number, y: number): Cell;
}

/** Object name of a cell in the encoding: `(3, 1)` → `"pt3pt1"`. */
export function cellName(cell: Cell): string {
  return `pt${cell.x}pt${cell.y}`;
}

/**
 * Inverse of {@link cellName}.
 *
 * @throws {SyntaxError} if `name` is not of the form `pt<x>pt<y>`.
 */
export function parseCellName(name: string): Cell {
  const match = CELL_NAME.exec(name);
  if (match?.groups === undefined) {
    throw new SyntaxError(`Not a cell name: "${name}"`);
  }
  return { x: Number(match.groups.x), y: Number(match.groups.y) };
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Builds the cell table for a grid. Cells are shared, frozen objects, so
 * `cellAt` returns the same instance every time.
 *
 * @throws {RangeError} if either dimension is not a positive integer.
 */
export function createGridIndex(width: number, laneCount: number): GridIndex {
  if (!Number.isInteger(width) || width < 1) {
    throw new RangeError(`Grid width must be a positive integer, got ${width}`);
  }
  if (!Number.isInteger(laneCount) || laneCount < 1) {
    throw new RangeError(`Lane count must be a positive integer, got ${laneCount}`);
  }

  const cells: Cell[] = [];
  for (let x = 0; x < width; x++) {
    for (let y = 0; y < laneCount; y++) {
      cells.push(Object.freeze({ x, y }));
    }
  }
  Object.freeze(cells);

  const contains = (cell: Cell): boolean =>
    Number.isInteger(cell.x) &&
    Number.isInteger(cell.y) &&
    cell.x >= 0 &&
    cell.x < width &&
    cell.y >= 0 &&
    cell.y < laneCount;

  return {
    width,
    laneCount,
    cells,
    contains,
    cellAt(x: number, y: number): Cell {
      const cell = cells[x * laneCount + y];
      if (!contains({ x, y }) || cell === undefined) {
        throw new RangeError(`Cell (${x}, ${y}) is outside the ${width}x${laneCount} grid`);
      }
      return cell;
    },
  };
}
