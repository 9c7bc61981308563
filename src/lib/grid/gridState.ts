export type BinaryCell = 0 | 1;
export type Grid = BinaryCell[][];

export interface CellRef {
  row: number;
  col: number;
}

export function createGrid(size: number): Grid {
  return Array.from({ length: size }, () => Array.from({ length: size }, (): BinaryCell => 0));
}

export const cloneGrid = (grid: Grid): Grid => grid.map((row) => row.slice());

export function isInsideGrid(grid: Grid, cell: CellRef): boolean {
  const size = grid.length;
  return cell.row >= 0 && cell.row < size && cell.col >= 0 && cell.col < size;
}

export function isGridEmpty(grid: Grid): boolean {
  return grid.every((row) => row.every((value) => value === 0));
}

export function countActiveCells(grid: Grid): number {
  let active = 0;
  for (let r = 0; r < grid.length; r += 1) {
    for (let c = 0; c < grid[r].length; c += 1) {
      active += grid[r][c];
    }
  }
  return active;
}

/**
 * Returns a grid with `cell` forced to `value`. The input grid is returned as-is
 * when the cell is out of bounds or already holds `value`, so callers can skip
 * a store update by comparing references.
 */
export function setCell(grid: Grid, cell: CellRef, value: BinaryCell): Grid {
  if (!isInsideGrid(grid, cell)) return grid;
  if (grid[cell.row][cell.col] === value) return grid;
  const next = cloneGrid(grid);
  next[cell.row][cell.col] = value;
  return next;
}

export function toggleCell(grid: Grid, cell: CellRef): Grid {
  if (!isInsideGrid(grid, cell)) return grid;
  return setCell(grid, cell, grid[cell.row][cell.col] === 1 ? 0 : 1);
}

/** Row-major flattening: cell (r, c) lands at index r * size + c. */
export function flattenGrid(grid: Grid): BinaryCell[] {
  const out: BinaryCell[] = [];
  for (let r = 0; r < grid.length; r += 1) {
    for (let c = 0; c < grid[r].length; c += 1) {
      out.push(grid[r][c]);
    }
  }
  return out;
}

export const cellIndex = (cell: CellRef, size: number): number => cell.row * size + cell.col;
