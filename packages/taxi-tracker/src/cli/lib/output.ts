/**
 * Output Formatting for CLI Commands
 *
 * Table, JSON and CSV rendering shared by the commands.
 *
 * @module cli/lib/output
 */

/**
 * Column definition for table and CSV output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
}

function cellText(row: Record<string, unknown>, col: TableColumn): string {
  return String(row[col.key] ?? '');
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    const maxDataWidth = Math.max(...data.map((row) => cellText(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => padCell(cellText(row, col), widths[i], col.align ?? 'left'))
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].map((line) => line.trimEnd()).join('\n');
}

/**
 * Pad a cell value to the column width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  return align === 'right' ? value.padStart(width) : value.padEnd(width);
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format data as CSV
 */
export function formatCsv<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');

  const dataRows = data.map((row) =>
    columns.map((col) => escapeCSV(cellText(row, col))).join(',')
  );

  return [headerRow, ...dataRows].join('\n');
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Print output to stdout
 */
export function printOutput(output: string): void {
  process.stdout.write(output.endsWith('\n') ? output : output + '\n');
}
