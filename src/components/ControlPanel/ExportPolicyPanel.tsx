import { Settings2 } from 'lucide-react';
import { useDrawerStore } from '@/context/DrawerStoreContext';
import type { ImagePolarity } from '@/lib/export/rasterExport';
import { Dropdown, type DropdownOption } from './Dropdown';
import { Toggle } from './Toggle';

const polarityOptions: readonly DropdownOption<ImagePolarity>[] = [
  { value: 'ink-black', label: 'Black ink on white' },
  { value: 'ink-white', label: 'White ink on black' },
];

export function ExportPolicyPanel() {
  const policies = useDrawerStore((state) => state.policies);
  const setPolicy = useDrawerStore((state) => state.setPolicy);
  const locked = useDrawerStore((state) => state.sessionEnded || state.busy);

  return (
    <section className="drawer-panel" aria-label="Export settings">
      <h4 className="drawer-section-title drawer-section-title-icon">
        <Settings2 className="drawer-icon" />
        Export settings
      </h4>
      <div className="drawer-stack">
        <Toggle
          label="Clear samples after CSV export"
          checked={policies.clearSamplesAfterExport}
          disabled={locked}
          onChange={(checked) => setPolicy('clearSamplesAfterExport', checked)}
        />
        <Toggle
          label="Reject empty PNG export"
          description="When off, an empty drawing exports as a blank image."
          checked={policies.rejectEmptyImage}
          disabled={locked}
          onChange={(checked) => setPolicy('rejectEmptyImage', checked)}
        />
        <Dropdown
          label="PNG polarity"
          options={polarityOptions}
          value={policies.imagePolarity}
          disabled={locked}
          onChange={(value) => setPolicy('imagePolarity', value)}
        />
      </div>
    </section>
  );
}
