/**
 * CSV writer. Reading goes through csv-parse in csvStorage.ts.
 */

export function escapeCSV(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(values: string[]): string {
  return values.map(escapeCSV).join(',');
}
