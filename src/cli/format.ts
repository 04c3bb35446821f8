import { ExportRow } from '../types';

/**
 * Format seconds as H:MM:SS. Negative input renders as 0:00:00.
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.trunc(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}

const CSV_HEADER = ['start', 'end', 'duration_seconds', 'note'];

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Render export rows as CSV with a header line
 */
export function toCsv(rows: ExportRow[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const row of rows) {
    lines.push(
      [
        row.start,
        row.end ?? '',
        row.durationSeconds === null ? '' : String(row.durationSeconds),
        row.note,
      ]
        .map(csvField)
        .join(',')
    );
  }
  return lines.join('\n') + '\n';
}
