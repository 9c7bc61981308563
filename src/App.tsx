import { Grid3x3, PlayCircle } from 'lucide-react';
import { drawerPresets, presetIds, type PresetId } from '@/config/drawerPresets';
import { useDrawerStore } from '@/context/DrawerStoreContext';
import { CommandBar } from '@/components/CommandBar';
import { ExportPolicyPanel } from '@/components/ControlPanel/ExportPolicyPanel';
import { Dropdown, type DropdownOption } from '@/components/ControlPanel/Dropdown';
import { GridBoard } from '@/components/GridBoard';
import { LabelSelector } from '@/components/LabelSelector';
import { SaveFileDialog } from '@/components/SaveFileDialog';
import { SessionStatus } from '@/components/SessionStatus';
import { ThemeToggle } from '@/components/ThemeToggle';
import { Toaster, showNotice } from '@/components/ui/sonner';

const presetOptions: DropdownOption<PresetId>[] = presetIds.map((id) => ({
  value: id,
  label: drawerPresets[id].title,
}));

function SessionEndedPanel() {
  const startSession = useDrawerStore((state) => state.startSession);
  return (
    <section className="drawer-panel drawer-panel-primary drawer-session-ended">
      <h2 className="drawer-section-title">Session ended</h2>
      <p className="drawer-status">Drawings that were not exported have been discarded.</p>
      <button type="button" className="drawer-chip drawer-chip-primary" onClick={startSession}>
        <PlayCircle className="drawer-icon" />
        Start new session
      </button>
    </section>
  );
}

export default function App() {
  const presetId = useDrawerStore((state) => state.presetId);
  const title = useDrawerStore((state) => state.preset.title);
  const sessionEnded = useDrawerStore((state) => state.sessionEnded);
  const inert = useDrawerStore((state) => state.pendingExport !== null || state.busy);
  const selectPreset = useDrawerStore((state) => state.selectPreset);

  return (
    <div className="drawer-shell">
      <header className="drawer-header">
        <h1 className="drawer-title">
          <Grid3x3 className="drawer-icon-lg" />
          {title}
        </h1>
        <div className="drawer-header-controls">
          <Dropdown
            label="Preset"
            options={presetOptions}
            value={presetId}
            disabled={inert}
            onChange={(id) => showNotice(selectPreset(id))}
          />
          <ThemeToggle />
        </div>
      </header>

      {sessionEnded ? (
        <main className="drawer-main">
          <SessionEndedPanel />
        </main>
      ) : (
        <main className="drawer-main">
          <div className="drawer-stack">
            <GridBoard />
            <SessionStatus />
          </div>
          <aside className="drawer-sidebar">
            <LabelSelector />
            <CommandBar />
            <ExportPolicyPanel />
          </aside>
        </main>
      )}

      <SaveFileDialog />
      <Toaster />
    </div>
  );
}
