import { useDrawerStore } from '@/context/DrawerStoreContext';

export function LabelSelector() {
  const labels = useDrawerStore((state) => state.preset.labels);
  const label = useDrawerStore((state) => state.label);
  const setLabel = useDrawerStore((state) => state.setLabel);

  if (labels.length === 0) return null;

  return (
    <fieldset className="drawer-panel" aria-label="Shape label">
      <legend className="drawer-section-title">Shape label</legend>
      {labels.map((option) => (
        <label key={option.id} className="drawer-radio">
          <input
            type="radio"
            name="shape-label"
            value={option.id}
            checked={label === option.id}
            onChange={() => setLabel(option.id)}
          />
          {option.name} ({option.id})
        </label>
      ))}
    </fieldset>
  );
}
