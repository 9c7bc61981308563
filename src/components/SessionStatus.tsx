import { useDrawerStore } from '@/context/DrawerStoreContext';
import { isLabelled } from '@/config/drawerPresets';
import { countActiveCells } from '@/lib/grid/gridState';
import { expectedSampleLength } from '@/lib/samples/sample';

export function SessionStatus() {
  const sampleCount = useDrawerStore((state) => state.samples.length);
  const activeCells = useDrawerStore((state) => countActiveCells(state.grid));
  const vectorLength = useDrawerStore((state) => expectedSampleLength(state.preset.gridSize, isLabelled(state.preset)));

  return (
    <p className="drawer-status" aria-live="polite">
      Stored samples: <strong data-testid="sample-count">{sampleCount}</strong> | Active cells:{' '}
      <strong data-testid="active-cells">{activeCells}</strong> | Vector length: <strong>{vectorLength}</strong>
    </p>
  );
}
