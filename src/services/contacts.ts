/**
 * Contacts Service
 * Customers and suppliers
 */

import { ValidationError } from '../lib/errors.js';
import { FIELDS, pick, pickList } from '../lib/fields.js';
import { assertGuid, booleanClause, buildODataQuery, combine, searchClause } from '../lib/odata.js';
import type { FilterClause } from '../lib/odata.js';
import { fingerprint } from './cache.js';
import { pagedRead } from './api.js';
import type { RequestExecutor, RequestScope, WriteResult } from './api.js';
import type { Contact, JsonObject } from '../types/api.js';

export type ContactType = 'customer' | 'supplier';

export const CONTACT_PATHS: Readonly<Record<ContactType | 'all', string>> = {
  all: '/Contact',
  customer: '/Contact/Customer',
  supplier: '/Contact/Supplier',
};

export interface ContactListOptions {
  type?: ContactType;
  isActive?: boolean;
  /** Case-insensitive match on the company name */
  search?: string;
  top?: number;
}

export interface NewContact {
  name: string;
  type: ContactType;
  email?: string;
  phone?: string;
}

export function isContactType(value: string): value is ContactType {
  return value === 'customer' || value === 'supplier';
}

export class ContactsService {
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  async list(options: ContactListOptions = {}, scope: RequestScope = {}): Promise<JsonObject[]> {
    const path = CONTACT_PATHS[options.type ?? 'all'];
    const clauses: FilterClause[] = [];

    if (options.isActive !== undefined) {
      clauses.push(booleanClause('IsActive', options.isActive));
    }
    if (options.search) {
      clauses.push(searchClause('CompanyName', options.search));
    }

    const query = buildODataQuery({ filter: combine(clauses) });
    const items = await this.executor.executePaged<Contact>(path, pagedRead(path, query, scope, options.top));
    return pickList(items, FIELDS.contactList);
  }

  async get(uid: string, scope: RequestScope = {}): Promise<JsonObject> {
    const path = `/Contact/${assertGuid(uid, 'uid')}`;
    const contact = await this.executor.execute<Contact>('GET', path, {
      ...scope,
      cacheKey: fingerprint('GET', path),
    });
    return pick(contact, FIELDS.contactDetail);
  }

  async create(contact: NewContact, scope: RequestScope = {}): Promise<WriteResult> {
    const name = contact.name.trim();
    if (!name) {
      throw new ValidationError('Contact name must not be empty', 'name');
    }
    if (!isContactType(contact.type)) {
      throw new ValidationError(`Invalid contact type: '${contact.type}'. Expected customer or supplier.`, 'type');
    }

    const body: JsonObject = {
      CompanyName: name,
      IsIndividual: false,
    };

    const address: JsonObject = {};
    if (contact.email) address.Email = contact.email;
    if (contact.phone) address.Phone1 = contact.phone;
    if (Object.keys(address).length > 0) {
      body.Addresses = [{ Location: 1, ...address }];
    }

    return this.executor.executeWrite('POST', CONTACT_PATHS[contact.type], { ...scope, body });
  }
}
