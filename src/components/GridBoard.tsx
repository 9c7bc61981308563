import { useRef, type PointerEvent as ReactPointerEvent } from 'react';
import { useDrawerStore } from '@/context/DrawerStoreContext';
import { cellIndex, type CellRef } from '@/lib/grid/gridState';
import {
  heldButton,
  pointToCell,
  pressedButton,
  resolvePointerAction,
  type PointerButton,
} from '@/lib/grid/pointerInput';

interface DragState {
  button: PointerButton;
  lastCell: CellRef | null;
}

const INK_FILL = '#000000';
const PAPER_FILL = '#ffffff';

export function GridBoard() {
  const grid = useDrawerStore((state) => state.grid);
  const cellSize = useDrawerStore((state) => state.preset.cellSize);
  const applyPointerAction = useDrawerStore((state) => state.applyPointerAction);
  const dragRef = useRef<DragState | null>(null);

  const gridSize = grid.length;
  const boardPx = gridSize * cellSize;

  const cellFromEvent = (event: ReactPointerEvent<SVGSVGElement>): CellRef | null => {
    const rect = event.currentTarget.getBoundingClientRect();
    // The board may be scaled down by CSS on narrow screens.
    const scale = rect.width > 0 ? boardPx / rect.width : 1;
    const x = (event.clientX - rect.left) * scale;
    const y = (event.clientY - rect.top) * scale;
    return pointToCell(x, y, cellSize, gridSize);
  };

  const endDrag = (event: ReactPointerEvent<SVGSVGElement>) => {
    dragRef.current = null;
    if (event.currentTarget.hasPointerCapture?.(event.pointerId)) {
      event.currentTarget.releasePointerCapture(event.pointerId);
    }
  };

  return (
    <section className="drawer-panel drawer-panel-primary">
      <svg
        width={boardPx}
        height={boardPx}
        viewBox={`0 0 ${boardPx} ${boardPx}`}
        className="drawer-board"
        role="grid"
        aria-label={`${gridSize} by ${gridSize} drawing grid`}
        onContextMenu={(event) => event.preventDefault()}
        onPointerDown={(event) => {
          const button = pressedButton(event.button);
          if (!button) return;
          event.preventDefault();
          event.currentTarget.setPointerCapture?.(event.pointerId);
          const cell = cellFromEvent(event);
          const action = resolvePointerAction('down', button, cell);
          if (action) applyPointerAction(action);
          dragRef.current = { button, lastCell: cell };
        }}
        onPointerMove={(event) => {
          const drag = dragRef.current;
          if (!drag) return;
          // Button released outside the window: no pointerup reached us.
          if (heldButton(event.buttons) === null) {
            dragRef.current = null;
            return;
          }
          event.preventDefault();
          const cell = cellFromEvent(event);
          const action = resolvePointerAction('move', drag.button, cell, drag.lastCell);
          if (action) applyPointerAction(action);
          if (cell) drag.lastCell = cell;
        }}
        onPointerUp={endDrag}
        onPointerCancel={endDrag}
      >
        {grid.map((row, r) =>
          row.map((value, c) => {
            const index = cellIndex({ row: r, col: c }, gridSize);
            const x = c * cellSize;
            const y = r * cellSize;
            return (
              <g key={`cell-${index}`} role="gridcell" aria-selected={value === 1} data-index={index}>
                <rect
                  x={x}
                  y={y}
                  width={cellSize}
                  height={cellSize}
                  fill={value === 1 ? INK_FILL : PAPER_FILL}
                  stroke="#9ca3af"
                  strokeWidth={1}
                />
                <text
                  x={x + cellSize / 2}
                  y={y + cellSize / 2}
                  textAnchor="middle"
                  dominantBaseline="central"
                  fontSize={Math.round(cellSize * 0.3)}
                  fontWeight={600}
                  fill="#b3b3b3"
                  pointerEvents="none"
                >
                  {index}
                </text>
              </g>
            );
          }),
        )}
      </svg>
    </section>
  );
}
