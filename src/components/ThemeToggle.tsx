import { useEffect, useState } from 'react';
import { useTheme } from 'next-themes';
import { Moon, Sun } from 'lucide-react';

export function ThemeToggle() {
  const { resolvedTheme, setTheme } = useTheme();
  const [mounted, setMounted] = useState(false);

  useEffect(() => {
    setMounted(true);
  }, []);

  if (!mounted) return <span className="theme-toggle-placeholder" aria-hidden="true" />;

  const dark = resolvedTheme === 'dark';
  const Icon = dark ? Sun : Moon;
  return (
    <button
      type="button"
      className="theme-toggle-chip"
      onClick={() => setTheme(dark ? 'light' : 'dark')}
      title={dark ? 'Switch to light theme' : 'Switch to dark theme'}
    >
      <Icon className="drawer-icon-sm" />
    </button>
  );
}
