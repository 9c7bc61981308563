import type { Sample } from '@/lib/samples/sample';

export const TABLE_DELIMITER = ',';
export const TABLE_MIME_TYPE = 'text/csv';

export const formatSampleRow = (sample: Sample): string =>
  sample.map((value) => String(Math.trunc(value))).join(TABLE_DELIMITER);

/** One row per sample, no header, every row newline-terminated. */
export function formatSamplesTable(samples: readonly Sample[]): string {
  return samples.map((sample) => `${formatSampleRow(sample)}\n`).join('');
}
