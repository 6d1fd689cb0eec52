import { StoredReading } from '../types/reading';

export const CSV_COLUMNS = [
  'row_id',
  'timestamp',
  'received_at',
  'device_id',
  'temperature',
  'humidity',
  'gas_raw',
  'gas_digital',
] as const;

function escapeCell(value: string | number | boolean | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Render readings as RFC 4180 CSV with a header row. Invalid measurements
 * become empty cells.
 */
export function readingsToCsv(rows: StoredReading[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(CSV_COLUMNS.map((column) => escapeCell(row[column])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}
