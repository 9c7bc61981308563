export type FileContent = string | Uint8Array;

export interface FileSink {
  save(fileName: string, content: FileContent, mimeType: string): Promise<void>;
}

/**
 * Trims the user's input down to a bare file name and appends `extension`
 * when the name has none. Returns null for blank input.
 */
export function normalizeFileName(raw: string, extension: string): string | null {
  const base = raw.trim().split(/[\\/]/).pop()?.trim() ?? '';
  if (!base || base === '.' || base === '..') return null;
  return /\.[^.]+$/.test(base) ? base : `${base}${extension}`;
}

export class BrowserDownloadSink implements FileSink {
  async save(fileName: string, content: FileContent, mimeType: string): Promise<void> {
    const part = typeof content === 'string' ? content : new Uint8Array(content);
    const blob = new Blob([part], { type: mimeType });
    const url = URL.createObjectURL(blob);
    const link = document.createElement('a');
    link.href = url;
    link.download = fileName;
    document.body.appendChild(link);
    try {
      link.click();
    } finally {
      link.remove();
      URL.revokeObjectURL(url);
    }
  }
}
