import type { CellRef } from './gridState';

export type PointerPhase = 'down' | 'move';
export type PointerButton = 'primary' | 'secondary';
export type GridActionKind = 'toggle' | 'paint' | 'erase';

export interface GridAction {
  kind: GridActionKind;
  cell: CellRef;
}

// MouseEvent.button values and MouseEvent.buttons bit flags.
const BUTTON_PRIMARY = 0;
const BUTTON_SECONDARY = 2;
const BUTTONS_PRIMARY_MASK = 1;
const BUTTONS_SECONDARY_MASK = 2;

export function pointToCell(x: number, y: number, cellSize: number, gridSize: number): CellRef | null {
  if (!Number.isFinite(x) || !Number.isFinite(y) || cellSize <= 0) return null;
  if (x < 0 || y < 0) return null;
  const col = Math.floor(x / cellSize);
  const row = Math.floor(y / cellSize);
  if (row >= gridSize || col >= gridSize) return null;
  return { row, col };
}

export function pressedButton(button: number): PointerButton | null {
  if (button === BUTTON_PRIMARY) return 'primary';
  if (button === BUTTON_SECONDARY) return 'secondary';
  return null;
}

export function heldButton(buttons: number): PointerButton | null {
  if (buttons & BUTTONS_PRIMARY_MASK) return 'primary';
  if (buttons & BUTTONS_SECONDARY_MASK) return 'secondary';
  return null;
}

export const sameCell = (a: CellRef | null, b: CellRef | null): boolean =>
  a !== null && b !== null && a.row === b.row && a.col === b.col;

/**
 * Primary press toggles, primary drag paints to 1, secondary press or drag
 * erases to 0. A move that stays on the cell last touched yields nothing, so
 * a toggled-off cell is not repainted by jitter inside the same cell.
 */
export function resolvePointerAction(
  phase: PointerPhase,
  button: PointerButton,
  cell: CellRef | null,
  lastCell: CellRef | null = null,
): GridAction | null {
  if (!cell) return null;
  if (phase === 'move' && sameCell(cell, lastCell)) return null;
  if (button === 'secondary') return { kind: 'erase', cell };
  return { kind: phase === 'down' ? 'toggle' : 'paint', cell };
}
