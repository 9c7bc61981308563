import { ArrowRight, FileSpreadsheet, ImageDown, LogOut, RotateCcw } from 'lucide-react';
import { useDrawerStore } from '@/context/DrawerStoreContext';
import { showNotice } from '@/components/ui/sonner';

export function CommandBar() {
  const commit = useDrawerStore((state) => state.commit);
  const reset = useDrawerStore((state) => state.reset);
  const requestTableExport = useDrawerStore((state) => state.requestTableExport);
  const requestImageExport = useDrawerStore((state) => state.requestImageExport);
  const endSession = useDrawerStore((state) => state.endSession);
  const inert = useDrawerStore((state) => state.pendingExport !== null || state.busy);

  const commands = [
    { id: 'next', label: 'Next', icon: ArrowRight, run: () => showNotice(commit()) },
    { id: 'save-csv', label: 'Save CSV', icon: FileSpreadsheet, run: () => showNotice(requestTableExport()) },
    { id: 'save-png', label: 'Save PNG', icon: ImageDown, run: () => showNotice(requestImageExport()) },
    { id: 'reset', label: 'Reset', icon: RotateCcw, run: () => showNotice(reset()) },
  ];

  return (
    <nav className="drawer-panel drawer-commands" aria-label="Drawing commands">
      {commands.map((command) => {
        const Icon = command.icon;
        return (
          <button
            key={command.id}
            type="button"
            className="drawer-chip"
            disabled={inert}
            onClick={command.run}
          >
            <Icon className="drawer-icon" />
            {command.label}
          </button>
        );
      })}
      <button type="button" className="drawer-chip drawer-chip-danger drawer-chip-exit" disabled={inert} onClick={endSession}>
        <LogOut className="drawer-icon" />
        Exit
      </button>
    </nav>
  );
}
