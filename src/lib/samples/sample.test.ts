import { describe, expect, it } from 'vitest';
import { createGrid, setCell } from '@/lib/grid/gridState';
import { buildSample, expectedSampleLength } from './sample';

describe('buildSample', () => {
  it('flattens an 8x8 grid with only (0,0) set to a 64-entry vector', () => {
    const grid = setCell(createGrid(8), { row: 0, col: 0 }, 1);
    const sample = buildSample(grid, null);
    expect(sample).toHaveLength(64);
    expect(sample[0]).toBe(1);
    expect(sample.slice(1).every((value) => value === 0)).toBe(true);
  });

  it('appends the label after the 5x5 pixels', () => {
    const grid = setCell(createGrid(5), { row: 4, col: 4 }, 1);
    const sample = buildSample(grid, 1);
    expect(sample).toHaveLength(26);
    expect(sample.slice(0, 24).every((value) => value === 0)).toBe(true);
    expect(sample[24]).toBe(1);
    expect(sample[25]).toBe(1);
  });

  it('freezes the sample', () => {
    const sample = buildSample(createGrid(5), 0);
    expect(Object.isFrozen(sample)).toBe(true);
  });
});

describe('expectedSampleLength', () => {
  it('adds one entry for labelled presets', () => {
    expect(expectedSampleLength(8, false)).toBe(64);
    expect(expectedSampleLength(5, true)).toBe(26);
  });
});
