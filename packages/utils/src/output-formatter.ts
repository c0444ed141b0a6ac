/**
 * Output Formatter - JSON, table, CSV formats
 */

export type OutputFormat = 'json' | 'table' | 'csv';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    // Convert objects/arrays to compact JSON
    return JSON.stringify(value);
  }
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Union of keys across rows, in first-seen order
 */
function detectColumns(data: unknown[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of data) {
    if (!isRecord(row)) continue;
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

function cell(row: unknown, column: string): unknown {
  return isRecord(row) ? row[column] : undefined;
}

/**
 * Format output as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = columns ?? detectColumns(data);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const widths = detectedColumns.map((col) =>
    Math.max(col.length, ...data.map((row) => valueToString(cell(row, col)).length))
  );

  const lines: string[] = [];
  lines.push(detectedColumns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-|-'));

  for (const row of data) {
    lines.push(
      detectedColumns
        .map((col, i) => valueToString(cell(row, col)).padEnd(widths[i] ?? 0))
        .join(' | ')
    );
  }

  return lines.join('\n');
}

/**
 * Format output as CSV
 */
export function formatCSV(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return '';
  }

  const detectedColumns = columns ?? detectColumns(data);
  if (detectedColumns.length === 0) {
    return '';
  }

  const lines: string[] = [detectedColumns.join(',')];

  for (const row of data) {
    const values = detectedColumns.map((col) => {
      const str = valueToString(cell(row, col));
      // Escape CSV values
      if (str.includes(',') || str.includes('"') || str.includes('\n')) {
        return `"${str.replace(/"/g, '""')}"`;
      }
      return str;
    });
    lines.push(values.join(','));
  }

  return lines.join('\n');
}

/**
 * Format any handler result. Arrays of primitives become a single `value` column
 * for table and CSV output.
 */
export function formatOutput(data: unknown, format: OutputFormat): string {
  if (format === 'json') {
    return formatJSON(data);
  }

  const rows = Array.isArray(data) ? data : [data];
  const tabular = rows.map((row) => (isRecord(row) ? row : { value: row }));

  return format === 'csv' ? formatCSV(tabular) : formatTable(tabular);
}
