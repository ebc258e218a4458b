import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('ofetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ofetch')>();
  return { ...actual, ofetch: Object.assign(vi.fn(), { raw: vi.fn() }) };
});

import { ofetch } from 'ofetch';
import { API_BASE } from '../../src/services/api.js';
import { ContactsService, isContactType } from '../../src/services/contacts.js';
import { ValidationError } from '../../src/lib/errors.js';
import { COMPANY_FILE, PARTY_UID, createTestExecutor, reply, sentRequest } from '../helpers/executor.js';

describe('ContactsService', () => {
  const raw = vi.mocked(ofetch.raw);
  let contacts: ContactsService;

  beforeEach(() => {
    raw.mockReset();
    contacts = new ContactsService(createTestExecutor());
  });

  describe('list', () => {
    it('should list all contacts without a filter', async () => {
      raw.mockResolvedValueOnce(reply(200, { Items: [{ UID: PARTY_UID, CompanyName: 'Acme', URI: 'x' }] }));

      expect(await contacts.list()).toEqual([{ UID: PARTY_UID, CompanyName: 'Acme' }]);
      expect(sentRequest()).toMatchObject({
        url: `${API_BASE}/${COMPANY_FILE}/Contact`,
        query: { $top: '400' },
      });
    });

    it('should narrow by type, activity and name', async () => {
      raw.mockResolvedValueOnce(reply(200, { Items: [] }));

      await contacts.list({ type: 'customer', isActive: true, search: "O'Brien", top: 5 });

      expect(sentRequest()).toMatchObject({
        url: `${API_BASE}/${COMPANY_FILE}/Contact/Customer`,
        query: {
          $filter: "(IsActive eq true) and (substringof('o''brien', tolower(CompanyName)) eq true)",
          $top: '5',
        },
      });
    });

    it('should stop at top', async () => {
      raw.mockResolvedValueOnce(reply(200, [{ UID: 'a' }, { UID: 'b' }]));

      expect(await contacts.list({ top: 2, type: 'supplier' })).toHaveLength(2);
      expect(raw).toHaveBeenCalledTimes(1);
    });

    it('should reject a bad top before any request', async () => {
      await expect(contacts.list({ top: -1 })).rejects.toThrow(ValidationError);
      expect(raw).not.toHaveBeenCalled();
    });
  });

  describe('get', () => {
    it('should fetch one contact by UID', async () => {
      raw.mockResolvedValueOnce(
        reply(200, { UID: PARTY_UID, CompanyName: 'Acme', Addresses: [{ Location: 1, Email: 'a@example.com', URI: 'x' }] })
      );

      expect(await contacts.get(PARTY_UID)).toEqual({
        UID: PARTY_UID,
        CompanyName: 'Acme',
        Addresses: [{ Location: 1, Email: 'a@example.com' }],
      });
      expect(sentRequest().url).toBe(`${API_BASE}/${COMPANY_FILE}/Contact/${PARTY_UID}`);
    });

    it('should validate the UID', async () => {
      await expect(contacts.get('42')).rejects.toThrow(ValidationError);
    });
  });

  describe('create', () => {
    it('should post a company contact with its address', async () => {
      raw.mockResolvedValueOnce(
        reply(201, undefined, { Location: `${API_BASE}/${COMPANY_FILE}/Contact/Customer/${PARTY_UID}` })
      );

      const result = await contacts.create({
        name: '  Acme Pty Ltd ',
        type: 'customer',
        email: 'accounts@example.com',
        phone: '555-0100',
      });

      expect(result.uid).toBe(PARTY_UID);
      expect(sentRequest()).toMatchObject({
        method: 'POST',
        url: `${API_BASE}/${COMPANY_FILE}/Contact/Customer`,
        body: {
          CompanyName: 'Acme Pty Ltd',
          IsIndividual: false,
          Addresses: [{ Location: 1, Email: 'accounts@example.com', Phone1: '555-0100' }],
        },
      });
    });

    it('should omit the address when there is nothing to put in it', async () => {
      raw.mockResolvedValueOnce(reply(201));

      await contacts.create({ name: 'Acme', type: 'supplier' });

      expect(sentRequest().body).toEqual({ CompanyName: 'Acme', IsIndividual: false });
    });

    it('should require a name', async () => {
      await expect(contacts.create({ name: '  ', type: 'customer' })).rejects.toThrow('Contact name must not be empty');
      expect(raw).not.toHaveBeenCalled();
    });
  });
});

describe('isContactType', () => {
  it('should accept customer and supplier only', () => {
    expect(isContactType('customer')).toBe(true);
    expect(isContactType('supplier')).toBe(true);
    expect(isContactType('employee')).toBe(false);
  });
});
