import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  EXIT_CODES,
  errorPayload,
  exitCodeFor,
  formatJSON,
  formatMoney,
  formatRecord,
  formatTable,
  getValue,
  isOutputFormat,
  printError,
  printResult,
  type ColumnDef,
} from '../../src/utils/output.js';
import { ApiError, AuthError, RateLimitError, ValidationError } from '../../src/lib/errors.js';

// cli-table3 may colour the header; compare plain text
const plain = (text: string): string => text.replace(/\u001b\[[0-9;]*m/g, '');

describe('Output Formatter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getValue', () => {
    it('should follow dotted paths', () => {
      expect(getValue({ Customer: { Name: 'Acme' } }, 'Customer.Name')).toBe('Acme');
    });

    it('should return undefined for missing segments', () => {
      expect(getValue({ Customer: null }, 'Customer.Name')).toBeUndefined();
      expect(getValue({}, 'a.b')).toBeUndefined();
      expect(getValue('text', 'length')).toBeUndefined();
    });
  });

  describe('formatMoney', () => {
    it('should show two decimals for numbers', () => {
      expect(formatMoney(12.5)).toBe('12.50');
      expect(formatMoney(undefined)).toBe('');
      expect(formatMoney('n/a')).toBe('n/a');
    });
  });

  describe('formatTable', () => {
    const columns: ColumnDef[] = [
      { key: 'Name', label: 'Name' },
      { key: 'Customer.Name', label: 'Customer' },
      { key: 'Total', label: 'Total', align: 'right', format: formatMoney },
    ];

    it('should render a header and one row per item', () => {
      const lines = plain(formatTable([{ Name: 'INV-1', Customer: { Name: 'Acme' }, Total: 5 }], columns)).split('\n');

      expect(lines).toHaveLength(5);
      expect(lines[1]).toMatch(/│ Name\s+│ Customer\s+│ Total\s+│/);
      expect(lines[3]).toMatch(/│ INV-1\s+│ Acme\s+│\s+5\.00 │/);
    });

    it('should render empty cells for missing values', () => {
      const lines = plain(formatTable([{ Name: 'INV-2' }], columns)).split('\n');

      expect(lines[3]).toMatch(/│ INV-2 │\s+│\s+│/);
    });
  });

  describe('formatRecord', () => {
    it('should render one row per field', () => {
      const output = plain(formatRecord({ UID: 'abc', Scopes: ['a', 'b'] }));

      expect(output).toContain('abc');
      expect(output).toContain('["a","b"]');
    });
  });

  describe('formatJSON', () => {
    it('should pretty-print by default', () => {
      expect(formatJSON({ a: 1 })).toBe('{\n  "a": 1\n}');
      expect(formatJSON({ a: 1 }, false)).toBe('{"a":1}');
    });
  });

  describe('printResult', () => {
    it('should wrap JSON output with success', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      printResult('json', { count: 1 }, () => 'table');

      expect(log).toHaveBeenCalledWith('{\n  "success": true,\n  "count": 1\n}');
    });

    it('should use the table renderer for table output', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      printResult('table', { count: 1 }, () => 'rendered');

      expect(log).toHaveBeenCalledWith('rendered');
    });
  });

  describe('errors', () => {
    it('should map error classes to exit codes', () => {
      expect(exitCodeFor(new ValidationError('x'))).toBe(EXIT_CODES.VALIDATION);
      expect(exitCodeFor(new ApiError(500, '/Contact', ''))).toBe(EXIT_CODES.API);
      expect(exitCodeFor(new RateLimitError('/Contact', ''))).toBe(EXIT_CODES.API);
      expect(exitCodeFor(new AuthError('x'))).toBe(EXIT_CODES.AUTH);
      expect(exitCodeFor(new Error('x'))).toBe(EXIT_CODES.VALIDATION);
    });

    it('should describe unexpected errors', () => {
      expect(errorPayload(new Error('boom'))).toEqual({
        success: false,
        error: { code: 'UNEXPECTED_ERROR', message: 'boom' },
      });
    });

    it('should print JSON errors on stdout', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      const code = printError('json', new ValidationError('Invalid top', 'top'));

      expect(code).toBe(1);
      expect(log).toHaveBeenCalledWith(
        '{"success":false,"error":{"code":"VALIDATION_ERROR","message":"Invalid top","param":"top"}}'
      );
    });

    it('should print one line on stderr for table output', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(printError('table', new AuthError('Not authorized'))).toBe(3);
      expect(error).toHaveBeenCalledWith('Error: Not authorized');
    });
  });

  it('should recognise output formats', () => {
    expect(isOutputFormat('table')).toBe(true);
    expect(isOutputFormat('csv')).toBe(false);
  });
});
