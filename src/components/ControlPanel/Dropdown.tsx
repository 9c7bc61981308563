export interface DropdownOption<T extends string> {
  value: T;
  label: string;
}

export function Dropdown<T extends string>({
  label,
  options,
  value,
  onChange,
  disabled = false,
}: {
  label: string;
  options: readonly DropdownOption<T>[];
  value: T;
  onChange: (value: T) => void;
  disabled?: boolean;
}) {
  const controlId = label.toLowerCase().replace(/\s+/g, '-');
  return (
    <div className="drawer-field">
      <label htmlFor={controlId} className="drawer-field-label">{label}</label>
      <select
        id={controlId}
        value={value}
        disabled={disabled}
        onChange={(e) => {
          const next = options.find((opt) => opt.value === e.target.value);
          if (next) onChange(next.value);
        }}
        className="drawer-input"
      >
        {options.map((opt) => (
          <option key={opt.value} value={opt.value}>
            {opt.label}
          </option>
        ))}
      </select>
    </div>
  );
}
