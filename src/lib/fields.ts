/**
 * Response Field Whitelists
 * Keep only the fields a command shows; the specs live in field-specs.json.
 */

import fieldSpecs from './field-specs.json' with { type: 'json' };
import type { JsonObject } from '../types/api.js';

/**
 * `true` keeps the value; a nested spec recurses into an object or each
 * object of an array
 */
export interface FieldSpec {
  [field: string]: boolean | FieldSpec;
}

export type FieldSpecName = keyof typeof fieldSpecs;

export const FIELDS: Readonly<Record<FieldSpecName, FieldSpec>> = fieldSpecs;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * @example pick({ UID: 'a', URI: 'x', Customer: { UID: 'b', URI: 'y' } }, { UID: true, Customer: { UID: true } })
 *          => { UID: 'a', Customer: { UID: 'b' } }
 */
export function pick(obj: JsonObject, spec: FieldSpec): JsonObject {
  const out: JsonObject = {};
  for (const [key, rule] of Object.entries(spec)) {
    if (rule === false || !Object.hasOwn(obj, key)) {
      continue;
    }
    const value = obj[key];
    if (rule === true) {
      out[key] = value;
    } else if (Array.isArray(value)) {
      out[key] = value.filter(isJsonObject).map((item) => pick(item, rule));
    } else if (isJsonObject(value)) {
      out[key] = pick(value, rule);
    }
  }
  return out;
}

export function pickList(items: readonly JsonObject[], spec: FieldSpec): JsonObject[] {
  return items.map((item) => pick(item, spec));
}

/**
 * When IsTaxInclusive, MYOB reports Subtotal equal to TotalAmount. Rewrite it
 * as the tax-exclusive amount so every document reads the same way.
 */
export function fixSubtotal<T extends JsonObject>(item: T): T {
  if (item.IsTaxInclusive !== true) {
    return item;
  }
  const total = typeof item.TotalAmount === 'number' ? item.TotalAmount : 0;
  const tax = typeof item.TotalTax === 'number' ? item.TotalTax : 0;
  return { ...item, Subtotal: Math.round((total - tax) * 100) / 100 };
}
