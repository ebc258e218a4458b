/**
 * Output Formatter
 * JSON (default) or cli-table3 tables on stdout; errors as JSON or one line on stderr
 */

import Table from 'cli-table3';
import { ApiError, AuthError, MyobError } from '../lib/errors.js';

export type OutputFormat = 'json' | 'table';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Process exit codes by failure class
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  VALIDATION: 1,
  API: 2,
  AUTH: 3,
  INTERRUPTED: 130,
} as const;

/**
 * Column definition
 */
export interface ColumnDef {
  /** Dotted path into the row, e.g. "Customer.Name" */
  key: string;
  label: string;
  align?: 'left' | 'right' | 'center';
  format?: (value: unknown) => string;
}

/**
 * Value at a dotted path (supports nested objects)
 */
export function getValue(row: unknown, path: string): unknown {
  let current: unknown = row;
  for (const part of path.split('.')) {
    if (typeof current !== 'object' || current === null || !Object.hasOwn(current, part)) {
      return undefined;
    }
    current = Object.getOwnPropertyDescriptor(current, part)?.value;
  }
  return current;
}

function cell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function formatMoney(value: unknown): string {
  return typeof value === 'number' ? value.toFixed(2) : cell(value);
}

/**
 * Render rows with cli-table3
 */
export function formatTable(rows: readonly unknown[], columns: readonly ColumnDef[]): string {
  const table = new Table({
    head: columns.map((column) => column.label),
    style: { head: ['cyan'] },
    colAligns: columns.map((column) => column.align ?? 'left'),
  });

  for (const row of rows) {
    table.push(
      columns.map((column) => {
        const value = getValue(row, column.key);
        return column.format ? column.format(value) : cell(value);
      })
    );
  }
  return table.toString();
}

/**
 * Key/value table for a single record
 */
export function formatRecord(record: Record<string, unknown>): string {
  const table = new Table({ style: { head: ['cyan'] } });
  for (const [key, value] of Object.entries(record)) {
    table.push({ [key]: cell(value) });
  }
  return table.toString();
}

export function formatJSON(data: unknown, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Print a successful result. JSON wraps the payload as `{ success: true, ... }`;
 * table format uses the renderer, or falls back to JSON without one.
 */
export function printResult(
  format: OutputFormat,
  payload: Record<string, unknown>,
  renderTable?: () => string
): void {
  if (format === 'table' && renderTable) {
    console.log(renderTable());
    return;
  }
  console.log(formatJSON({ success: true, ...payload }));
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof AuthError) return EXIT_CODES.AUTH;
  if (error instanceof ApiError) return EXIT_CODES.API;
  return EXIT_CODES.VALIDATION;
}

export function errorPayload(error: unknown): { success: false; error: Record<string, unknown> } {
  if (error instanceof MyobError) {
    return { success: false, error: error.toJSON() };
  }
  return {
    success: false,
    error: {
      code: 'UNEXPECTED_ERROR',
      message: error instanceof Error ? error.message : String(error),
    },
  };
}

/**
 * Print a failure and return the exit code for it
 */
export function printError(format: OutputFormat, error: unknown): number {
  if (format === 'json') {
    console.log(formatJSON(errorPayload(error), false));
  } else {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
  return exitCodeFor(error);
}
