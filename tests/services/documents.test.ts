import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('ofetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ofetch')>();
  return { ...actual, ofetch: Object.assign(vi.fn(), { raw: vi.fn() }) };
});

import { ofetch } from 'ofetch';
import { API_BASE } from '../../src/services/api.js';
import { DocumentsService, parseLineItem } from '../../src/services/documents.js';
import { ValidationError } from '../../src/lib/errors.js';
import {
  ACCOUNT_UID,
  COMPANY_FILE,
  PARTY_UID,
  TAX_CODE_UID,
  createTestExecutor,
  reply,
  sentRequest,
} from '../helpers/executor.js';

describe('parseLineItem', () => {
  it('should parse description, quantity, price and account', () => {
    expect(parseLineItem(`Consulting|2|150.50|${ACCOUNT_UID}`)).toEqual({
      Description: 'Consulting',
      Quantity: 2,
      UnitPrice: 150.5,
      Account: { UID: ACCOUNT_UID },
    });
  });

  it('should take an optional tax code', () => {
    expect(parseLineItem(` Widgets | 1 | 9.99 | ${ACCOUNT_UID} | ${TAX_CODE_UID} `)).toEqual({
      Description: 'Widgets',
      Quantity: 1,
      UnitPrice: 9.99,
      Account: { UID: ACCOUNT_UID },
      TaxCode: { UID: TAX_CODE_UID },
    });
  });

  it('should allow negative quantities for credits', () => {
    expect(parseLineItem(`Refund|-1|20|${ACCOUNT_UID}`).Quantity).toBe(-1);
  });

  it.each([
    ['too few parts', 'Consulting|2|150'],
    ['too many parts', `a|1|1|${ACCOUNT_UID}|${TAX_CODE_UID}|x`],
    ['no description', `|1|1|${ACCOUNT_UID}`],
    ['zero quantity', `a|0|1|${ACCOUNT_UID}`],
    ['non-numeric quantity', `a|two|1|${ACCOUNT_UID}`],
    ['missing price', `a|1||${ACCOUNT_UID}`],
    ['bad account', 'a|1|1|4000'],
    ['bad tax code', `a|1|1|${ACCOUNT_UID}|GST`],
  ])('should reject %s', (_case, spec) => {
    expect(() => parseLineItem(spec)).toThrow(ValidationError);
  });
});

describe('DocumentsService', () => {
  const raw = vi.mocked(ofetch.raw);

  beforeEach(() => {
    raw.mockReset();
  });

  describe('invoices', () => {
    let invoices: DocumentsService;

    beforeEach(() => {
      invoices = new DocumentsService(createTestExecutor(), 'invoice');
    });

    it('should filter by date range, status and customer', async () => {
      raw.mockResolvedValueOnce(reply(200, { Items: [] }));

      await invoices.list({ from: '2024-01-01', to: '2024-03-31', status: 'Open', partyId: PARTY_UID });

      expect(sentRequest()).toMatchObject({
        url: `${API_BASE}/${COMPANY_FILE}/Sale/Invoice`,
        query: {
          $filter:
            `(Date ge datetime'2024-01-01') and (Date le datetime'2024-03-31') and (Status eq 'Open') and (Customer/UID eq guid'${PARTY_UID}')`,
          $top: '400',
        },
      });
    });

    it('should reject an empty date range before any request', async () => {
      await expect(invoices.list({ from: '2024-04-01', to: '2024-03-31' })).rejects.toThrow(
        'Date range is empty: 2024-04-01 is after 2024-03-31'
      );
      expect(raw).not.toHaveBeenCalled();
    });

    it('should normalise tax-inclusive subtotals and trim fields', async () => {
      raw.mockResolvedValueOnce(
        reply(200, {
          Items: [
            {
              UID: 'a',
              Number: '00000123',
              IsTaxInclusive: true,
              Subtotal: 110,
              TotalTax: 10,
              TotalAmount: 110,
              RowVersion: '7',
              Customer: { UID: PARTY_UID, Name: 'Acme', DisplayID: 'CUS001' },
            },
          ],
        })
      );

      expect(await invoices.list()).toEqual([
        {
          UID: 'a',
          Number: '00000123',
          Subtotal: 100,
          TotalTax: 10,
          TotalAmount: 110,
          Customer: { UID: PARTY_UID, Name: 'Acme' },
        },
      ]);
    });

    it('should get one invoice', async () => {
      raw.mockResolvedValueOnce(reply(200, { UID: PARTY_UID, Number: '1', IsTaxInclusive: false }));

      expect(await invoices.get(PARTY_UID)).toEqual({ UID: PARTY_UID, Number: '1', IsTaxInclusive: false });
      expect(sentRequest().url).toBe(`${API_BASE}/${COMPANY_FILE}/Sale/Invoice/${PARTY_UID}`);
    });

    it('should create an item invoice', async () => {
      raw.mockResolvedValueOnce(reply(201));
      const line = parseLineItem(`Consulting|2|150|${ACCOUNT_UID}`);

      await invoices.create({
        partyId: PARTY_UID,
        date: '2024-05-01',
        dueDate: '2024-05-31',
        lines: [line],
        number: 'INV-7',
        notes: 'Thanks',
      });

      expect(sentRequest()).toMatchObject({
        method: 'POST',
        url: `${API_BASE}/${COMPANY_FILE}/Sale/Invoice/Item`,
        body: {
          Customer: { UID: PARTY_UID },
          Date: '2024-05-01',
          BalanceDueDate: '2024-05-31',
          Lines: [line],
          Number: 'INV-7',
          Comment: 'Thanks',
        },
      });
    });

    it('should validate a new invoice locally', async () => {
      const line = parseLineItem(`Consulting|2|150|${ACCOUNT_UID}`);
      const valid = { partyId: PARTY_UID, date: '2024-05-01', dueDate: '2024-05-31', lines: [line] };

      await expect(invoices.create({ ...valid, partyId: 'acme' })).rejects.toThrow(ValidationError);
      await expect(invoices.create({ ...valid, date: '01/05/2024' })).rejects.toThrow(ValidationError);
      await expect(invoices.create({ ...valid, dueDate: '2024-04-30' })).rejects.toThrow(
        'Due date 2024-04-30 is before the document date 2024-05-01'
      );
      await expect(invoices.create({ ...valid, lines: [] })).rejects.toThrow('At least one line item is required');
      expect(raw).not.toHaveBeenCalled();
    });
  });

  describe('bills', () => {
    it('should filter on the supplier and post to the bill item endpoint', async () => {
      const bills = new DocumentsService(createTestExecutor(), 'bill');
      raw.mockResolvedValueOnce(reply(200, { Items: [] })).mockResolvedValueOnce(reply(201));

      await bills.list({ partyId: PARTY_UID });
      await bills.create({
        partyId: PARTY_UID,
        date: '2024-05-01',
        dueDate: '2024-05-01',
        lines: [parseLineItem(`Paper|10|4.5|${ACCOUNT_UID}`)],
      });

      expect(sentRequest(0)).toMatchObject({
        url: `${API_BASE}/${COMPANY_FILE}/Purchase/Bill`,
        query: { $filter: `Supplier/UID eq guid'${PARTY_UID}'` },
      });
      expect(sentRequest(1)).toMatchObject({
        url: `${API_BASE}/${COMPANY_FILE}/Purchase/Bill/Item`,
        body: { Supplier: { UID: PARTY_UID } },
      });
    });
  });
});
