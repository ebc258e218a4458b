/**
 * Shared option parsers and result rows
 */

import { InvalidArgumentError } from 'commander';
import { ValidationError } from '../lib/errors.js';
import type { WriteResult } from '../services/api.js';

/**
 * commander parser for --top
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * commander parser for money amounts
 */
export function parseAmount(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
}

/**
 * Repeatable option collector
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * --active / --inactive to a filter value
 */
export function activeFilter(options: { active?: boolean; inactive?: boolean }): boolean | undefined {
  if (options.active && options.inactive) {
    throw new ValidationError('Use either --active or --inactive, not both', 'active');
  }
  if (options.active) return true;
  if (options.inactive) return false;
  return undefined;
}

/**
 * Table rows for a create result
 */
export function writeResultRecord(result: WriteResult): Record<string, unknown> {
  return {
    Status: result.status,
    UID: result.uid,
    Location: result.location,
  };
}
