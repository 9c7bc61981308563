import { useState } from 'react';

interface ToggleProps {
  label: string;
  description?: string;
  checked: boolean;
  disabled?: boolean;
  onChange: (checked: boolean) => void;
}

export function Toggle({ label, description, checked, disabled = false, onChange }: ToggleProps) {
  const controlId = label.toLowerCase().replace(/\s+/g, '-');
  const [pressed, setPressed] = useState(false);

  return (
    <div className="drawer-toggle-row">
      <div className="drawer-toggle-text">
        <label htmlFor={controlId} className="drawer-label">{label}</label>
        {description && <span className="drawer-hint">{description}</span>}
      </div>
      <button
        id={controlId}
        type="button"
        role="switch"
        aria-checked={checked}
        disabled={disabled}
        onPointerDown={() => setPressed(true)}
        onPointerUp={() => setPressed(false)}
        onPointerLeave={() => setPressed(false)}
        onClick={() => onChange(!checked)}
        className={`drawer-toggle ${checked ? 'drawer-toggle-on' : 'drawer-toggle-off'} ${pressed ? 'drawer-toggle-pressed' : ''}`}
      >
        <span className="drawer-toggle-knob" />
      </button>
    </div>
  );
}
