export type NoticeSeverity = 'info' | 'warning' | 'error';

export interface Notice {
  severity: NoticeSeverity;
  title: string;
  message: string;
}

export const notice = {
  info: (title: string, message: string): Notice => ({ severity: 'info', title, message }),
  warning: (title: string, message: string): Notice => ({ severity: 'warning', title, message }),
  error: (title: string, message: string): Notice => ({ severity: 'error', title, message }),
};

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
