/**
 * OData Filter Builder Tests
 */

import { describe, it, expect } from 'vitest';
import {
  anyOf,
  assertField,
  booleanClause,
  buildODataQuery,
  combine,
  dateClause,
  equalsClause,
  escapeLiteral,
  identifierEquals,
  isGuid,
  isIsoDate,
  orderBy,
  parseOrderBy,
  searchClause,
} from '../../src/lib/odata.js';
import { ValidationError } from '../../src/lib/errors.js';

const UID = '3f2504e0-4f89-11d3-9a0c-0305e82c3301';

describe('escapeLiteral', () => {
  it('should double single quotes', () => {
    expect(escapeLiteral("O'Brien")).toBe("O''Brien");
  });

  it('should leave strings without quotes unchanged', () => {
    expect(escapeLiteral('Smith & Co')).toBe('Smith & Co');
  });

  it('should not be idempotent', () => {
    expect(escapeLiteral(escapeLiteral("'"))).toBe("''''");
  });
});

describe('searchClause', () => {
  it('should lower-case the term and the field', () => {
    expect(searchClause('Name', 'Marketing').expression).toBe(
      "substringof('marketing', tolower(Name)) eq true"
    );
  });

  it('should produce the same clause regardless of term case', () => {
    expect(searchClause('Name', 'MARKETING').expression).toBe(searchClause('Name', 'marketing').expression);
  });

  it('should escape quotes in the term', () => {
    expect(searchClause('CompanyName', "O'Brien").expression).toBe(
      "substringof('o''brien', tolower(CompanyName)) eq true"
    );
  });

  it('should keep the original term as the clause value', () => {
    const clause = searchClause('Name', 'Acme');
    expect(clause.field).toBe('Name');
    expect(clause.operator).toBe('substringof');
    expect(clause.value).toBe('Acme');
  });
});

describe('dateClause', () => {
  it('should render a datetime literal', () => {
    expect(dateClause('Date', 'ge', '2024-01-15').expression).toBe("Date ge datetime'2024-01-15'");
  });

  it('should reject a malformed date', () => {
    expect(() => dateClause('Date', 'ge', '2024-1-5')).toThrow(ValidationError);
  });

  it('should reject a day that does not exist', () => {
    expect(() => dateClause('Date', 'le', '2023-02-29')).toThrow(ValidationError);
  });

  it('should accept a leap day', () => {
    expect(dateClause('Date', 'le', '2024-02-29').expression).toBe("Date le datetime'2024-02-29'");
  });

  it('should name the field in the error', () => {
    try {
      dateClause('Date', 'ge', 'yesterday');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ param: 'Date' });
    }
  });
});

describe('identifierEquals', () => {
  it('should embed a valid UID as a guid literal', () => {
    expect(identifierEquals('Customer/UID', UID).expression).toBe(`Customer/UID eq guid'${UID}'`);
  });

  it('should reject anything that is not a UID', () => {
    expect(() => identifierEquals('Customer/UID', "x' or 1 eq 1")).toThrow(ValidationError);
  });
});

describe('equalsClause and booleanClause', () => {
  it('should quote and escape string values', () => {
    expect(equalsClause('Status', "Open'")).toMatchObject({ expression: "Status eq 'Open'''" });
  });

  it('should render booleans bare', () => {
    expect(booleanClause('IsActive', true).expression).toBe('IsActive eq true');
    expect(booleanClause('IsActive', false).expression).toBe('IsActive eq false');
  });
});

describe('assertField', () => {
  it('should accept navigation paths', () => {
    expect(assertField('Account/UID')).toBe('Account/UID');
  });

  it('should reject field references with operators or spaces', () => {
    expect(() => assertField('Name eq 1')).toThrow(ValidationError);
    expect(() => assertField('')).toThrow(ValidationError);
    expect(() => assertField('Account//UID')).toThrow(ValidationError);
  });
});

describe('combine', () => {
  it('should return an empty string for no clauses', () => {
    expect(combine([])).toBe('');
  });

  it('should return a single clause bare', () => {
    expect(combine([booleanClause('IsActive', true)])).toBe('IsActive eq true');
  });

  it('should parenthesise and AND-join several clauses', () => {
    expect(combine([booleanClause('IsActive', true), equalsClause('Status', 'Open')])).toBe(
      "(IsActive eq true) and (Status eq 'Open')"
    );
  });

  it('should keep an OR group intact inside an AND', () => {
    const search = anyOf([searchClause('Name', 'a'), searchClause('Number', 'a')]);
    expect(combine([booleanClause('IsActive', true), search])).toBe(
      "(IsActive eq true) and ((substringof('a', tolower(Name)) eq true) or (substringof('a', tolower(Number)) eq true))"
    );
  });
});

describe('anyOf', () => {
  it('should reject an empty list', () => {
    expect(() => anyOf([])).toThrow(ValidationError);
  });

  it('should return a single clause unchanged', () => {
    const only = booleanClause('IsActive', true);
    expect(anyOf([only])).toBe(only);
  });
});

describe('orderBy and parseOrderBy', () => {
  it('should render ascending without a suffix', () => {
    expect(orderBy('Name')).toBe('Name');
    expect(orderBy('Name', 'desc')).toBe('Name desc');
  });

  it('should parse user input', () => {
    expect(parseOrderBy('Number')).toBe('Number');
    expect(parseOrderBy('  Number   desc ')).toBe('Number desc');
    expect(parseOrderBy('Number asc')).toBe('Number');
  });

  it('should reject anything else', () => {
    expect(() => parseOrderBy('Number sideways')).toThrow(ValidationError);
    expect(() => parseOrderBy('Number desc extra')).toThrow(ValidationError);
    expect(() => parseOrderBy('')).toThrow(ValidationError);
  });
});

describe('buildODataQuery', () => {
  it('should include only the options given', () => {
    expect(buildODataQuery({})).toEqual({});
    expect(buildODataQuery({ filter: 'IsActive eq true', orderby: ['Name', 'Number desc'], top: 10, skip: 20 })).toEqual({
      $filter: 'IsActive eq true',
      $orderby: 'Name,Number desc',
      $top: '10',
      $skip: '20',
    });
  });

  it('should omit zero top and skip', () => {
    expect(buildODataQuery({ top: 0, skip: 0 })).toEqual({});
  });
});

describe('isGuid and isIsoDate', () => {
  it('should recognise UIDs in either case', () => {
    expect(isGuid(UID)).toBe(true);
    expect(isGuid(UID.toUpperCase())).toBe(true);
    expect(isGuid(UID.slice(1))).toBe(false);
  });

  it('should reject impossible dates', () => {
    expect(isIsoDate('2024-13-01')).toBe(false);
    expect(isIsoDate('2024-04-31')).toBe(false);
    expect(isIsoDate('2024-04-30')).toBe(true);
  });
});
