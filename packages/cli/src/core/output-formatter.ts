/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../command-defs/common.js';

export type TableRow = Record<string, unknown>;

export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

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
 * Fixed-width table; columns default to the keys of the first row
 */
export function formatTable(rows: readonly TableRow[], columns?: string[]): string {
  if (rows.length === 0) {
    return 'No data to display';
  }

  const cols = columns ?? Object.keys(rows[0]);
  if (cols.length === 0) {
    return formatJSON(rows);
  }

  const widths = cols.map((col) =>
    Math.max(col.length, ...rows.map((row) => valueToString(row[col]).length))
  );

  const lines: string[] = [];
  lines.push(cols.map((col, i) => col.padEnd(widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-|-'));
  for (const row of rows) {
    lines.push(cols.map((col, i) => valueToString(row[col]).padEnd(widths[i])).join(' | '));
  }

  return lines.join('\n');
}

export interface OutputRenderers<T> {
  toRows?: (data: T) => TableRow[];
  toText?: (data: T) => string;
}

/**
 * Render a command result. Text output falls back to the table, and the
 * table to JSON, when the command has no renderer for them.
 */
export function formatOutput<T>(
  data: T,
  format: OutputFormat,
  renderers: OutputRenderers<T> = {}
): string {
  if (format === 'text' && renderers.toText) {
    return renderers.toText(data);
  }
  if (format !== 'json' && renderers.toRows) {
    return formatTable(renderers.toRows(data));
  }
  return formatJSON(data);
}
