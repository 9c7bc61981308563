import { encode } from 'fast-png';
import type { BinaryCell, Grid } from '@/lib/grid/gridState';

export type ImagePolarity = 'ink-black' | 'ink-white';

export const IMAGE_MIME_TYPE = 'image/png';

export interface GrayRaster {
  width: number;
  height: number;
  data: Uint8Array;
}

export function cellIntensity(value: BinaryCell, polarity: ImagePolarity): 0 | 255 {
  const inked = value === 1;
  if (polarity === 'ink-black') return inked ? 0 : 255;
  return inked ? 255 : 0;
}

/** Nearest-neighbour scale-up: each cell becomes a cellSize x cellSize block. */
export function rasterizeGrid(grid: Grid, cellSize: number, polarity: ImagePolarity): GrayRaster {
  const side = grid.length * cellSize;
  const data = new Uint8Array(side * side);
  for (let y = 0; y < side; y += 1) {
    const row = grid[Math.floor(y / cellSize)];
    for (let x = 0; x < side; x += 1) {
      data[y * side + x] = cellIntensity(row[Math.floor(x / cellSize)], polarity);
    }
  }
  return { width: side, height: side, data };
}

export function encodeGrayPng(raster: GrayRaster): Uint8Array {
  return encode({
    width: raster.width,
    height: raster.height,
    data: raster.data,
    channels: 1,
    depth: 8,
  });
}
