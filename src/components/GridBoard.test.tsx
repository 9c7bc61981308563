import { act, fireEvent, render } from '@testing-library/react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DrawerStoreProvider } from '@/context/DrawerStoreContext';
import { createDrawerStore } from '@/store/drawerStore';
import { GridBoard } from './GridBoard';

const cellsOf = (container: HTMLElement) => Array.from(container.querySelectorAll('[role="gridcell"]'));

const PRIMARY = { button: 0, buttons: 1 };
const SECONDARY = { button: 2, buttons: 2 };

const renderBoard = (presetId: 'grid' | 'symbols' = 'grid') => {
  const store = createDrawerStore({ presetId });
  const { container, getByRole } = render(
    <DrawerStoreProvider store={store}>
      <GridBoard />
    </DrawerStoreProvider>,
  );
  return { store, container, board: getByRole('grid') };
};

const rowOf = (grid: ReadonlyArray<ReadonlyArray<number>>, row: number): string => grid[row].join('');

describe('GridBoard', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders one indexed cell per grid position', () => {
    const store = createDrawerStore({ presetId: 'symbols' });
    const { container } = render(
      <DrawerStoreProvider store={store}>
        <GridBoard />
      </DrawerStoreProvider>,
    );

    const cells = cellsOf(container);
    expect(cells).toHaveLength(25);
    expect(cells[24].getAttribute('data-index')).toBe('24');
    expect(cells[24].textContent).toBe('24');
    expect(container.querySelector('svg')?.getAttribute('width')).toBe('250');
  });

  it('repaints cells as the grid changes', () => {
    const store = createDrawerStore({ presetId: 'grid' });
    const { container } = render(
      <DrawerStoreProvider store={store}>
        <GridBoard />
      </DrawerStoreProvider>,
    );

    act(() => {
      store.getState().toggleCell({ row: 1, col: 2 });
    });

    const cell = container.querySelector('[data-index="10"]');
    expect(cell?.getAttribute('aria-selected')).toBe('true');
    expect(cell?.querySelector('rect')?.getAttribute('fill')).toBe('#000000');
    expect(container.querySelector('[data-index="11"] rect')?.getAttribute('fill')).toBe('#ffffff');

    act(() => {
      store.getState().reset();
    });

    expect(cellsOf(container).every((node) => node.getAttribute('aria-selected') === 'false')).toBe(true);
  });

  it('toggles the pressed cell on a primary click', () => {
    const { store, board } = renderBoard();

    fireEvent.pointerDown(board, { ...PRIMARY, clientX: 60, clientY: 110 });
    fireEvent.pointerUp(board, { button: 0, buttons: 0, clientX: 60, clientY: 110 });
    expect(store.getState().grid[2][1]).toBe(1);

    fireEvent.pointerDown(board, { ...PRIMARY, clientX: 60, clientY: 110 });
    fireEvent.pointerUp(board, { button: 0, buttons: 0, clientX: 60, clientY: 110 });
    expect(store.getState().grid[2][1]).toBe(0);
  });

  it('paints the cells a primary drag passes over', () => {
    const { store, board } = renderBoard();

    fireEvent.pointerDown(board, { ...PRIMARY, clientX: 10, clientY: 10 });
    fireEvent.pointerMove(board, { ...PRIMARY, clientX: 60, clientY: 10 });
    fireEvent.pointerMove(board, { ...PRIMARY, clientX: 110, clientY: 10 });
    fireEvent.pointerUp(board, { button: 0, buttons: 0, clientX: 110, clientY: 10 });

    expect(rowOf(store.getState().grid, 0)).toBe('11100000');
  });

  it('erases on a secondary press and drag', () => {
    const { store, board } = renderBoard();
    act(() => {
      store.getState().toggleCell({ row: 0, col: 0 });
      store.getState().toggleCell({ row: 0, col: 1 });
    });

    fireEvent.pointerDown(board, { ...SECONDARY, clientX: 10, clientY: 10 });
    expect(rowOf(store.getState().grid, 0)).toBe('01000000');
    fireEvent.pointerMove(board, { ...SECONDARY, clientX: 60, clientY: 10 });
    fireEvent.pointerUp(board, { button: 2, buttons: 0, clientX: 60, clientY: 10 });

    expect(rowOf(store.getState().grid, 0)).toBe('00000000');
  });

  it('does not repaint a cell just toggled off while the pointer stays inside it', () => {
    const { store, board } = renderBoard();
    act(() => {
      store.getState().toggleCell({ row: 0, col: 0 });
    });

    fireEvent.pointerDown(board, { ...PRIMARY, clientX: 10, clientY: 10 });
    fireEvent.pointerMove(board, { ...PRIMARY, clientX: 20, clientY: 30 });
    fireEvent.pointerUp(board, { button: 0, buttons: 0, clientX: 20, clientY: 30 });

    expect(store.getState().grid[0][0]).toBe(0);
  });

  it('ignores presses and moves outside the board', () => {
    const { store, board } = renderBoard();
    const before = store.getState().grid;

    fireEvent.pointerDown(board, { ...PRIMARY, clientX: 410, clientY: 10 });
    fireEvent.pointerMove(board, { ...PRIMARY, clientX: 10, clientY: 500 });
    fireEvent.pointerUp(board, { button: 0, buttons: 0, clientX: 10, clientY: 500 });

    expect(store.getState().grid).toBe(before);
  });

  it('stops dragging once no button is held', () => {
    const { store, board } = renderBoard();

    fireEvent.pointerDown(board, { ...PRIMARY, clientX: 10, clientY: 10 });
    fireEvent.pointerMove(board, { button: -1, buttons: 0, clientX: 60, clientY: 10 });
    fireEvent.pointerMove(board, { ...PRIMARY, clientX: 110, clientY: 10 });

    expect(rowOf(store.getState().grid, 0)).toBe('10000000');
  });

  it('maps pointer positions on a board shrunk by layout', () => {
    const { store, board } = renderBoard('symbols');
    vi.spyOn(board, 'getBoundingClientRect').mockReturnValue({
      x: 100,
      y: 50,
      left: 100,
      top: 50,
      width: 125,
      height: 125,
      right: 225,
      bottom: 175,
      toJSON: () => ({}),
    });

    // 125 px on screen for a 250 px board: each cell is 25 px wide.
    fireEvent.pointerDown(board, { ...PRIMARY, clientX: 100 + 30, clientY: 50 + 110 });

    expect(store.getState().grid[4][1]).toBe(1);
    expect(store.getState().grid[2][0]).toBe(0);
  });

  it('suppresses the context menu so the secondary button can erase', () => {
    const { board } = renderBoard();
    expect(fireEvent.contextMenu(board)).toBe(false);
  });
});
