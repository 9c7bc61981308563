import { useTheme } from 'next-themes';
import { Toaster as SonnerToaster, toast, type ToasterProps } from 'sonner';
import type { Notice } from '@/lib/notices';

export function Toaster(props: ToasterProps) {
  const { resolvedTheme } = useTheme();
  return (
    <SonnerToaster
      theme={resolvedTheme === 'dark' ? 'dark' : 'light'}
      position="top-center"
      richColors
      closeButton
      {...props}
    />
  );
}

export function showNotice(notice: Notice | null): void {
  if (!notice) return;
  const options = { description: notice.message };
  switch (notice.severity) {
    case 'info':
      toast.info(notice.title, options);
      return;
    case 'warning':
      toast.warning(notice.title, options);
      return;
    case 'error':
      toast.error(notice.title, { ...options, duration: 8000 });
      return;
  }
}
