import { useEffect, useRef, useState, type FormEvent } from 'react';
import { Download, X } from 'lucide-react';
import { useDrawerStore } from '@/context/DrawerStoreContext';
import { showNotice } from '@/components/ui/sonner';

const dialogTitles = {
  table: 'Save all drawings as CSV',
  image: 'Save current drawing as PNG',
} as const;

export function SaveFileDialog() {
  const pendingExport = useDrawerStore((state) => state.pendingExport);
  const busy = useDrawerStore((state) => state.busy);
  const confirmExport = useDrawerStore((state) => state.confirmExport);
  const cancelExport = useDrawerStore((state) => state.cancelExport);
  const [fileName, setFileName] = useState('');
  const inputRef = useRef<HTMLInputElement | null>(null);

  useEffect(() => {
    if (!pendingExport) return;
    setFileName(pendingExport.defaultFileName);
    inputRef.current?.focus();
    inputRef.current?.select();
  }, [pendingExport]);

  if (!pendingExport) return null;

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    showNotice(await confirmExport(fileName));
  };

  return (
    <div className="drawer-modal-backdrop">
      <form
        role="dialog"
        aria-modal="true"
        aria-labelledby="save-dialog-title"
        className="drawer-modal"
        onSubmit={(event) => void handleSubmit(event)}
        onKeyDown={(event) => {
          if (event.key === 'Escape') cancelExport();
        }}
      >
        <h3 id="save-dialog-title" className="drawer-section-title">{dialogTitles[pendingExport.kind]}</h3>
        <label htmlFor="save-file-name" className="drawer-label">File name</label>
        <input
          id="save-file-name"
          ref={inputRef}
          type="text"
          value={fileName}
          disabled={busy}
          onChange={(event) => setFileName(event.target.value)}
          className="drawer-input"
        />
        <div className="drawer-actions">
          <button type="button" className="drawer-chip" disabled={busy} onClick={cancelExport}>
            <X className="drawer-icon" />
            Cancel
          </button>
          <button type="submit" className="drawer-chip drawer-chip-primary" disabled={busy}>
            <Download className="drawer-icon" />
            Save
          </button>
        </div>
      </form>
    </div>
  );
}
