import type { ImagePolarity } from '@/lib/export/rasterExport';

export interface LabelOption {
  id: number;
  name: string;
}

export interface ExportPolicies {
  clearSamplesAfterExport: boolean;
  imagePolarity: ImagePolarity;
  rejectEmptyImage: boolean;
}

export interface DrawerPreset {
  id: string;
  title: string;
  gridSize: number;
  cellSize: number;
  labels: readonly LabelOption[];
  policies: ExportPolicies;
}

export const CELL_SIZE_PX = 50;

// The two presets disagree on every export policy; each switch can still be
// flipped at run time from the settings panel.
export const drawerPresets = {
  grid: {
    id: 'grid',
    title: 'Grid Drawer 8×8',
    gridSize: 8,
    cellSize: CELL_SIZE_PX,
    labels: [],
    policies: {
      clearSamplesAfterExport: true,
      imagePolarity: 'ink-black',
      rejectEmptyImage: false,
    },
  },
  symbols: {
    id: 'symbols',
    title: 'Symbol Collector 5×5',
    gridSize: 5,
    cellSize: CELL_SIZE_PX,
    labels: [
      { id: 0, name: 'Circle' },
      { id: 1, name: 'Cross' },
    ],
    policies: {
      clearSamplesAfterExport: false,
      imagePolarity: 'ink-white',
      rejectEmptyImage: true,
    },
  },
} as const satisfies Record<string, DrawerPreset>;

export type PresetId = keyof typeof drawerPresets;

export const presetIds: PresetId[] = ['grid', 'symbols'];

export const DEFAULT_PRESET_ID: PresetId = 'grid';

export function isPresetId(value: unknown): value is PresetId {
  return presetIds.some((id) => id === value);
}

export function resolvePresetId(raw: string | undefined): PresetId {
  const candidate = raw?.trim().toLowerCase();
  return isPresetId(candidate) ? candidate : DEFAULT_PRESET_ID;
}

export function getPreset(id: PresetId): DrawerPreset {
  return drawerPresets[id];
}

export const isLabelled = (preset: DrawerPreset): boolean => preset.labels.length > 0;

export const defaultLabel = (preset: DrawerPreset): number => preset.labels[0]?.id ?? 0;
