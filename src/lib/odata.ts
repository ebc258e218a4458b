/**
 * OData Filter Builder
 * Builds MYOB AccountRight $filter clauses. Every user-supplied value that ends up
 * in a filter string goes through one of these functions.
 */

import { ValidationError } from './errors.js';

export type DateComparator = 'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le';

export type FilterOperator = DateComparator | 'substringof' | 'or';

/**
 * One $filter fragment together with what it encodes
 */
export interface FilterClause {
  readonly field: string;
  readonly operator: FilterOperator;
  readonly value: string | boolean;
  readonly expression: string;
}

export interface ODataQueryOptions {
  filter?: string;
  orderby?: string[];
  top?: number;
  skip?: number;
}

const FIELD_PATTERN = /^[A-Za-z][A-Za-z0-9_]*(\/[A-Za-z][A-Za-z0-9_]*)*$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const GUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;
const DATE_COMPARATORS: readonly DateComparator[] = ['eq', 'ne', 'gt', 'ge', 'lt', 'le'];

function clause(
  field: string,
  operator: FilterOperator,
  value: string | boolean,
  expression: string
): FilterClause {
  return Object.freeze({ field, operator, value, expression });
}

/**
 * Field references come from code, but are checked anyway so a typo can't
 * turn into a grammar error on the server.
 * @example assertField('Customer/UID')
 */
export function assertField(field: string): string {
  if (!FIELD_PATTERN.test(field)) {
    throw new ValidationError(`Invalid filter field reference: '${field}'`, 'field');
  }
  return field;
}

/**
 * Double every single quote. Not idempotent: apply exactly once per value.
 * @example escapeLiteral("O'Brien") => "O''Brien"
 */
export function escapeLiteral(value: string): string {
  return value.replace(/'/g, "''");
}

export function isGuid(value: string): boolean {
  return GUID_PATTERN.test(value);
}

/**
 * Strict YYYY-MM-DD that names a real calendar day
 */
export function isIsoDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

export function assertGuid(value: string, param: string): string {
  if (!isGuid(value)) {
    throw new ValidationError(`Invalid ${param}: '${value}'. Expected a UID such as 00000000-0000-0000-0000-000000000000.`, param);
  }
  return value;
}

export function assertIsoDate(value: string, param: string): string {
  if (!isIsoDate(value)) {
    throw new ValidationError(`Invalid date for ${param}: '${value}'. Expected YYYY-MM-DD.`, param);
  }
  return value;
}

/**
 * Case-insensitive substring match. Both sides are lower-cased, so
 * 'Marketing' and 'marketing' produce the same clause.
 * @example searchClause('Name', 'Marketing') => "substringof('marketing', tolower(Name)) eq true"
 */
export function searchClause(field: string, term: string): FilterClause {
  assertField(field);
  const needle = escapeLiteral(term.toLowerCase());
  return clause(field, 'substringof', term, `substringof('${needle}', tolower(${field})) eq true`);
}

/**
 * @example dateClause('Date', 'ge', '2024-01-15') => "Date ge datetime'2024-01-15'"
 */
export function dateClause(field: string, comparator: DateComparator, date: string): FilterClause {
  assertField(field);
  if (!DATE_COMPARATORS.includes(comparator)) {
    throw new ValidationError(`Invalid date comparator: '${comparator}'`, 'comparator');
  }
  assertIsoDate(date, field);
  return clause(field, comparator, date, `${field} ${comparator} datetime'${date}'`);
}

/**
 * The id is validated as a UUID, so it is embedded without escaping.
 * @example identifierEquals('Customer/UID', id) => "Customer/UID eq guid'<id>'"
 */
export function identifierEquals(field: string, id: string): FilterClause {
  assertField(field);
  assertGuid(id, field);
  return clause(field, 'eq', id, `${field} eq guid'${id}'`);
}

/**
 * @example equalsClause('Status', 'Open') => "Status eq 'Open'"
 */
export function equalsClause(field: string, value: string): FilterClause {
  assertField(field);
  return clause(field, 'eq', value, `${field} eq '${escapeLiteral(value)}'`);
}

/**
 * @example booleanClause('IsActive', true) => 'IsActive eq true'
 */
export function booleanClause(field: string, value: boolean): FilterClause {
  assertField(field);
  return clause(field, 'eq', value, `${field} eq ${value ? 'true' : 'false'}`);
}

/**
 * OR-group, usable as a single clause inside combine()
 * @example anyOf([searchClause('Name', 'a'), searchClause('Number', 'a')])
 *          => "(substringof('a', tolower(Name)) eq true) or (substringof('a', tolower(Number)) eq true)"
 */
export function anyOf(clauses: FilterClause[]): FilterClause {
  if (clauses.length === 0) {
    throw new ValidationError('anyOf() needs at least one clause');
  }
  if (clauses.length === 1) {
    return clauses[0];
  }
  const expression = clauses.map((c) => `(${c.expression})`).join(' or ');
  return clause(clauses.map((c) => c.field).join(','), 'or', '', expression);
}

/**
 * AND-join into the final $filter expression
 * @example combine([a, b]) => "(a) and (b)"
 */
export function combine(clauses: FilterClause[]): string {
  if (clauses.length === 0) return '';
  if (clauses.length === 1) return clauses[0].expression;
  return clauses.map((c) => `(${c.expression})`).join(' and ');
}

/**
 * @example orderBy('Name', 'desc') => 'Name desc'
 */
export function orderBy(field: string, direction: 'asc' | 'desc' = 'asc'): string {
  assertField(field);
  return direction === 'desc' ? `${field} desc` : field;
}

/**
 * Parse a user-supplied "Field [asc|desc]" sort expression
 */
export function parseOrderBy(input: string): string {
  const [field = '', direction, ...rest] = input.trim().split(/\s+/);
  if (rest.length === 0 && (direction === undefined || direction === 'asc' || direction === 'desc')) {
    return orderBy(field, direction);
  }
  throw new ValidationError(`Invalid orderby: '${input}'. Expected "Field" or "Field desc".`, 'orderby');
}

/**
 * Query-string parameters for one request
 */
export function buildODataQuery(options: ODataQueryOptions): Record<string, string> {
  const query: Record<string, string> = {};

  if (options.filter) {
    query['$filter'] = options.filter;
  }

  if (options.orderby && options.orderby.length > 0) {
    query['$orderby'] = options.orderby.join(',');
  }

  if (options.top !== undefined && options.top > 0) {
    query['$top'] = String(options.top);
  }

  if (options.skip !== undefined && options.skip > 0) {
    query['$skip'] = String(options.skip);
  }

  return query;
}
