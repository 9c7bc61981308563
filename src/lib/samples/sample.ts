import { flattenGrid, type Grid } from '@/lib/grid/gridState';

export type Sample = readonly number[];

export function buildSample(grid: Grid, label: number | null): Sample {
  const vector: number[] = flattenGrid(grid);
  if (label !== null) vector.push(label);
  return Object.freeze(vector);
}

export const expectedSampleLength = (gridSize: number, labelled: boolean): number =>
  gridSize * gridSize + (labelled ? 1 : 0);
