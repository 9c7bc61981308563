import { createStore, type StoreApi } from 'zustand/vanilla';
import {
  defaultLabel,
  getPreset,
  isLabelled,
  resolvePresetId,
  type DrawerPreset,
  type ExportPolicies,
  type PresetId,
} from '@/config/drawerPresets';
import {
  countActiveCells,
  createGrid,
  isGridEmpty,
  setCell,
  toggleCell,
  type CellRef,
  type Grid,
} from '@/lib/grid/gridState';
import type { GridAction } from '@/lib/grid/pointerInput';
import { buildSample, type Sample } from '@/lib/samples/sample';
import { formatSamplesTable, TABLE_MIME_TYPE } from '@/lib/export/tableExport';
import { encodeGrayPng, IMAGE_MIME_TYPE, rasterizeGrid } from '@/lib/export/rasterExport';
import { BrowserDownloadSink, normalizeFileName, type FileSink } from '@/lib/export/fileSink';
import { Logger } from '@/lib/logger';
import { describeError, notice, type Notice } from '@/lib/notices';

export type ExportKind = 'table' | 'image';

export interface PendingExport {
  kind: ExportKind;
  defaultFileName: string;
  extension: string;
}

export interface DrawerState {
  presetId: PresetId;
  preset: DrawerPreset;
  grid: Grid;
  label: number;
  samples: Sample[];
  policies: ExportPolicies;
  pendingExport: PendingExport | null;
  busy: boolean;
  sessionEnded: boolean;

  // Pointer-driven mutations
  applyPointerAction: (action: GridAction) => void;
  toggleCell: (cell: CellRef) => void;
  paintCell: (cell: CellRef) => void;
  eraseCell: (cell: CellRef) => void;
  setLabel: (label: number) => void;

  // Commands
  commit: () => Notice;
  reset: () => Notice;
  requestTableExport: () => Notice | null;
  requestImageExport: () => Notice | null;
  confirmExport: (fileName: string) => Promise<Notice>;
  cancelExport: () => void;

  // Session
  selectPreset: (id: PresetId) => Notice;
  setPolicy: <K extends keyof ExportPolicies>(key: K, value: ExportPolicies[K]) => void;
  endSession: () => void;
  startSession: () => void;
}

export interface DrawerStoreOptions {
  fileSink?: FileSink;
  presetId?: PresetId;
}

const exportTargets: Record<ExportKind, Omit<PendingExport, 'kind'>> = {
  table: { defaultFileName: 'samples.csv', extension: '.csv' },
  image: { defaultFileName: 'drawing.png', extension: '.png' },
};

type SessionFields = Pick<
  DrawerState,
  'presetId' | 'preset' | 'grid' | 'label' | 'samples' | 'policies' | 'pendingExport' | 'busy' | 'sessionEnded'
>;

const freshSession = (presetId: PresetId): SessionFields => {
  const preset = getPreset(presetId);
  return {
    presetId,
    preset,
    grid: createGrid(preset.gridSize),
    label: defaultLabel(preset),
    samples: [],
    policies: { ...preset.policies },
    pendingExport: null,
    busy: false,
    sessionEnded: false,
  };
};

export function createDrawerStore({
  fileSink = new BrowserDownloadSink(),
  presetId = resolvePresetId(import.meta.env.VITE_DRAWER_PRESET),
}: DrawerStoreOptions = {}): StoreApi<DrawerState> {
  return createStore<DrawerState>((set, get) => {
    // Grid mutations are ignored while a save dialog is open or the session is over.
    const isInert = (): boolean => {
      const state = get();
      return state.sessionEnded || state.pendingExport !== null || state.busy;
    };

    const updateGrid = (next: Grid): void => {
      if (next !== get().grid) set({ grid: next });
    };

    const clearCanvas = (): void => {
      const { preset } = get();
      set({ grid: createGrid(preset.gridSize), label: defaultLabel(preset) });
    };

    // Grid most recently merged into the samples by a table export. Grid mutations always
    // produce a new reference, so an unchanged drawing is never merged twice.
    let mergedGrid: Grid | null = null;

    const appendCurrentSample = (): number => {
      const { grid, label, preset, samples } = get();
      const sample = buildSample(grid, isLabelled(preset) ? label : null);
      const next = [...samples, sample];
      set({ samples: next });
      Logger.log('SAMPLE_COMMITTED', { count: next.length, length: sample.length, label: isLabelled(preset) ? label : null });
      return next.length;
    };

    const inertNotice = (): Notice =>
      get().sessionEnded
        ? notice.warning('Session ended', 'Start a new session first.')
        : notice.warning('Save in progress', 'Finish or cancel the current save first.');

    return {
      ...freshSession(presetId),

      applyPointerAction: (action) => {
        switch (action.kind) {
          case 'toggle':
            get().toggleCell(action.cell);
            return;
          case 'paint':
            get().paintCell(action.cell);
            return;
          case 'erase':
            get().eraseCell(action.cell);
            return;
        }
      },

      toggleCell: (cell) => {
        if (isInert()) return;
        const next = toggleCell(get().grid, cell);
        if (next === get().grid) return;
        set({ grid: next });
        Logger.log('CELL_TOGGLED', { row: cell.row, col: cell.col, value: next[cell.row][cell.col] });
      },

      paintCell: (cell) => {
        if (isInert()) return;
        updateGrid(setCell(get().grid, cell, 1));
      },

      eraseCell: (cell) => {
        if (isInert()) return;
        updateGrid(setCell(get().grid, cell, 0));
      },

      setLabel: (label) => {
        const { preset, sessionEnded } = get();
        if (sessionEnded || !preset.labels.some((option) => option.id === label)) return;
        set({ label });
      },

      commit: () => {
        if (isInert()) return inertNotice();
        const { grid, samples } = get();
        if (isGridEmpty(grid)) {
          return notice.warning('Empty drawing', 'The drawing is empty. Draw something before pressing Next.');
        }
        // Already stored by a table export.
        const count = grid === mergedGrid ? samples.length : appendCurrentSample();
        clearCanvas();
        return notice.info('Next', `Sample #${count} stored. Total samples: ${count}.`);
      },

      reset: () => {
        if (isInert()) return inertNotice();
        clearCanvas();
        Logger.log('GRID_RESET');
        return notice.info('Reset', 'Canvas cleared.');
      },

      requestTableExport: () => {
        if (isInert()) return inertNotice();
        const { grid } = get();
        if (!isGridEmpty(grid) && grid !== mergedGrid) {
          appendCurrentSample();
          mergedGrid = grid;
        }
        if (get().samples.length === 0) {
          return notice.warning('Nothing to save', 'No samples to save.');
        }
        set({ pendingExport: { kind: 'table', ...exportTargets.table } });
        return null;
      },

      requestImageExport: () => {
        if (isInert()) return inertNotice();
        const { grid, policies } = get();
        if (policies.rejectEmptyImage && isGridEmpty(grid)) {
          return notice.warning('Empty drawing', 'The drawing is empty.');
        }
        set({ pendingExport: { kind: 'image', ...exportTargets.image } });
        return null;
      },

      confirmExport: async (rawFileName) => {
        const pending = get().pendingExport;
        if (!pending) {
          return notice.warning('Nothing to save', 'No export is waiting for a file name.');
        }
        const fileName = normalizeFileName(rawFileName, pending.extension);
        if (!fileName) {
          return notice.warning('Missing file name', 'Enter a file name to save.');
        }

        set({ busy: true });
        try {
          if (pending.kind === 'table') {
            const { samples, policies } = get();
            await fileSink.save(fileName, formatSamplesTable(samples), TABLE_MIME_TYPE);
            Logger.log('EXPORT_TABLE_WRITTEN', { fileName, count: samples.length });
            if (policies.clearSamplesAfterExport) {
              set({ samples: [] });
              mergedGrid = null;
            }
            return notice.info('Saved', `${samples.length} samples saved to ${fileName}`);
          }

          const { grid, preset, policies } = get();
          const raster = rasterizeGrid(grid, preset.cellSize, policies.imagePolarity);
          await fileSink.save(fileName, encodeGrayPng(raster), IMAGE_MIME_TYPE);
          Logger.log('EXPORT_IMAGE_WRITTEN', {
            fileName,
            width: raster.width,
            height: raster.height,
            activeCells: countActiveCells(grid),
          });
          return notice.info('Saved', `Image saved to ${fileName}`);
        } catch (error) {
          const message = describeError(error);
          Logger.log('EXPORT_FAILED', { kind: pending.kind, fileName, error: message }, 'error');
          return notice.error('Save failed', `Could not save ${fileName}: ${message}`);
        } finally {
          set({ busy: false, pendingExport: null });
        }
      },

      cancelExport: () => {
        if (get().busy) return;
        set({ pendingExport: null });
      },

      selectPreset: (id) => {
        set(freshSession(id));
        const { preset } = get();
        Logger.log('PRESET_CHANGED', { presetId: id, gridSize: preset.gridSize });
        return notice.info('Preset changed', `${preset.title}: stored samples were discarded.`);
      },

      setPolicy: (key, value) => {
        set((state) => ({ policies: { ...state.policies, [key]: value } }));
        Logger.log('POLICY_CHANGED', { key, value });
      },

      endSession: () => {
        const { samples, presetId: current } = get();
        set({ ...freshSession(current), sessionEnded: true });
        Logger.log('SESSION_ENDED', { discardedSamples: samples.length });
      },

      startSession: () => {
        set(freshSession(get().presetId));
      },
    };
  });
}

export const drawerStore = createDrawerStore();
