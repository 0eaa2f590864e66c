/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../command-defs/address-sets.js';

/**
 * What a command hands back for printing: `display` is rendered as a table,
 * `raw` is printed for --format json.
 */
export interface CommandOutput {
  title?: string;
  display: unknown;
  raw: unknown;
}

export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format rows as a simple table. Columns default to every key seen, in first
 * appearance order.
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const rows = data.map((row) => (isRecord(row) ? row : { value: row }));
  const detectedColumns = columns ?? [...new Set(rows.flatMap((row) => Object.keys(row)))];

  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const widths = new Map<string, number>();
  for (const col of detectedColumns) {
    widths.set(col, Math.max(col.length, ...rows.map((row) => valueToString(row[col]).length)));
  }
  const pad = (text: string, col: string) => text.padEnd(widths.get(col) ?? text.length);

  const lines: string[] = [];
  lines.push(detectedColumns.map((col) => pad(col, col)).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(widths.get(col) ?? col.length)).join('-|-'));

  for (const row of rows) {
    lines.push(detectedColumns.map((col) => pad(valueToString(row[col]), col)).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Format a single object as field/value rows
 */
export function formatKeyValue(record: Record<string, unknown>): string {
  return formatTable(
    Object.entries(record).map(([field, value]) => ({ field, value })),
    ['field', 'value']
  );
}

export function formatOutput(data: unknown, format: OutputFormat): string {
  if (format === 'json') {
    return formatJSON(data);
  }
  if (Array.isArray(data)) {
    return formatTable(data);
  }
  if (isRecord(data)) {
    return formatKeyValue(data);
  }
  return valueToString(data);
}

export function renderCommandOutput(output: CommandOutput, format: OutputFormat): string {
  if (format === 'json') {
    return formatJSON(output.raw);
  }
  const body = formatOutput(output.display, 'table');
  return output.title ? `${output.title}\n${body}` : body;
}
