import { describe, expect, it } from 'vitest';
import { heldButton, pointToCell, pressedButton, resolvePointerAction } from './pointerInput';

describe('pointToCell', () => {
  it('maps coordinates by integer division against the cell size', () => {
    expect(pointToCell(0, 0, 50, 8)).toEqual({ row: 0, col: 0 });
    expect(pointToCell(49.9, 49.9, 50, 8)).toEqual({ row: 0, col: 0 });
    expect(pointToCell(50, 120, 50, 8)).toEqual({ row: 2, col: 1 });
    expect(pointToCell(399, 399, 50, 8)).toEqual({ row: 7, col: 7 });
  });

  it('ignores coordinates outside the grid', () => {
    expect(pointToCell(400, 10, 50, 8)).toBeNull();
    expect(pointToCell(10, 250, 50, 5)).toBeNull();
    expect(pointToCell(-1, 10, 50, 8)).toBeNull();
    expect(pointToCell(10, -0.5, 50, 8)).toBeNull();
    expect(pointToCell(Number.NaN, 10, 50, 8)).toBeNull();
  });
});

describe('pointer buttons', () => {
  it('reads the pressed button from MouseEvent.button', () => {
    expect(pressedButton(0)).toBe('primary');
    expect(pressedButton(2)).toBe('secondary');
    expect(pressedButton(1)).toBeNull();
  });

  it('reads the held button from MouseEvent.buttons', () => {
    expect(heldButton(1)).toBe('primary');
    expect(heldButton(2)).toBe('secondary');
    expect(heldButton(0)).toBeNull();
  });
});

describe('resolvePointerAction', () => {
  const cell = { row: 1, col: 2 };

  it('toggles on a primary press', () => {
    expect(resolvePointerAction('down', 'primary', cell)).toEqual({ kind: 'toggle', cell });
  });

  it('paints on a primary drag into a new cell', () => {
    expect(resolvePointerAction('move', 'primary', cell, { row: 1, col: 1 })).toEqual({ kind: 'paint', cell });
  });

  it('erases on a secondary press or drag', () => {
    expect(resolvePointerAction('down', 'secondary', cell)).toEqual({ kind: 'erase', cell });
    expect(resolvePointerAction('move', 'secondary', cell, null)).toEqual({ kind: 'erase', cell });
  });

  it('ignores moves that stay on the last touched cell', () => {
    expect(resolvePointerAction('move', 'primary', cell, { row: 1, col: 2 })).toBeNull();
  });

  it('ignores pointer positions outside the grid', () => {
    expect(resolvePointerAction('down', 'primary', null)).toBeNull();
    expect(resolvePointerAction('move', 'secondary', null, cell)).toBeNull();
  });
});
