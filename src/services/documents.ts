/**
 * Documents Service
 * Sale invoices and purchase bills share one shape; only the path and the
 * party (Customer / Supplier) differ.
 */

import { ValidationError } from '../lib/errors.js';
import { FIELDS, fixSubtotal, pick, pickList } from '../lib/fields.js';
import type { FieldSpec } from '../lib/fields.js';
import {
  assertGuid,
  assertIsoDate,
  buildODataQuery,
  combine,
  dateClause,
  equalsClause,
  identifierEquals,
  isGuid,
} from '../lib/odata.js';
import type { FilterClause } from '../lib/odata.js';
import { fingerprint } from './cache.js';
import { pagedRead } from './api.js';
import type { RequestExecutor, RequestScope, WriteResult } from './api.js';
import type { DocumentLine, JsonObject, LedgerDocument } from '../types/api.js';

export type DocumentKind = 'invoice' | 'bill';

interface DocumentDefinition {
  /** List and detail path */
  path: string;
  /** Item-layout create path */
  createPath: string;
  party: 'Customer' | 'Supplier';
  listFields: FieldSpec;
  detailFields: FieldSpec;
}

export const DOCUMENT_KINDS: Readonly<Record<DocumentKind, DocumentDefinition>> = {
  invoice: {
    path: '/Sale/Invoice',
    createPath: '/Sale/Invoice/Item',
    party: 'Customer',
    listFields: FIELDS.invoiceList,
    detailFields: FIELDS.invoiceDetail,
  },
  bill: {
    path: '/Purchase/Bill',
    createPath: '/Purchase/Bill/Item',
    party: 'Supplier',
    listFields: FIELDS.billList,
    detailFields: FIELDS.billDetail,
  },
};

export interface DocumentListOptions {
  from?: string;
  to?: string;
  status?: string;
  /** Customer UID for invoices, supplier UID for bills */
  partyId?: string;
  top?: number;
}

export interface NewDocument {
  partyId: string;
  date: string;
  dueDate: string;
  lines: DocumentLine[];
  number?: string;
  notes?: string;
}

/**
 * Parse a `description|quantity|unitPrice|accountUid[|taxCodeUid]` line item
 * @example parseLineItem('Consulting|2|150|<account uid>')
 */
export function parseLineItem(input: string): DocumentLine {
  const parts = input.split('|').map((part) => part.trim());
  if (parts.length < 4 || parts.length > 5) {
    throw new ValidationError(
      `Invalid line item '${input}'. Expected "description|quantity|unitPrice|accountUid[|taxCodeUid]".`,
      'line'
    );
  }

  const [description, quantityText, priceText, accountUid, taxCodeUid] = parts;
  if (!description) {
    throw new ValidationError(`Line item '${input}' has no description`, 'line');
  }

  const quantity = Number(quantityText);
  if (!quantityText || !Number.isFinite(quantity) || quantity === 0) {
    throw new ValidationError(`Invalid quantity '${quantityText}' in line item '${input}'`, 'line');
  }
  const unitPrice = Number(priceText);
  if (!priceText || !Number.isFinite(unitPrice)) {
    throw new ValidationError(`Invalid unit price '${priceText}' in line item '${input}'`, 'line');
  }
  if (!isGuid(accountUid)) {
    throw new ValidationError(`Invalid account UID '${accountUid}' in line item '${input}'`, 'line');
  }

  const line: DocumentLine = {
    Description: description,
    Quantity: quantity,
    UnitPrice: unitPrice,
    Account: { UID: accountUid },
  };
  if (taxCodeUid !== undefined && taxCodeUid !== '') {
    if (!isGuid(taxCodeUid)) {
      throw new ValidationError(`Invalid tax code UID '${taxCodeUid}' in line item '${input}'`, 'line');
    }
    line.TaxCode = { UID: taxCodeUid };
  }
  return line;
}

export class DocumentsService {
  private readonly executor: RequestExecutor;
  private readonly definition: DocumentDefinition;

  constructor(executor: RequestExecutor, kind: DocumentKind) {
    this.executor = executor;
    this.definition = DOCUMENT_KINDS[kind];
  }

  async list(options: DocumentListOptions = {}, scope: RequestScope = {}): Promise<JsonObject[]> {
    const { path, party, listFields } = this.definition;
    const clauses: FilterClause[] = [];

    if (options.from) {
      clauses.push(dateClause('Date', 'ge', options.from));
    }
    if (options.to) {
      clauses.push(dateClause('Date', 'le', options.to));
    }
    if (options.from && options.to && options.from > options.to) {
      throw new ValidationError(`Date range is empty: ${options.from} is after ${options.to}`, 'from');
    }
    if (options.status) {
      clauses.push(equalsClause('Status', options.status));
    }
    if (options.partyId) {
      clauses.push(identifierEquals(`${party}/UID`, options.partyId));
    }

    const query = buildODataQuery({ filter: combine(clauses) });
    const items = await this.executor.executePaged<LedgerDocument>(path, pagedRead(path, query, scope, options.top));
    return pickList(items.map(fixSubtotal), listFields);
  }

  async get(uid: string, scope: RequestScope = {}): Promise<JsonObject> {
    const path = `${this.definition.path}/${assertGuid(uid, 'uid')}`;
    const document = await this.executor.execute<LedgerDocument>('GET', path, {
      ...scope,
      cacheKey: fingerprint('GET', path),
    });
    return pick(fixSubtotal(document), this.definition.detailFields);
  }

  async create(document: NewDocument, scope: RequestScope = {}): Promise<WriteResult> {
    const { createPath, party } = this.definition;

    assertGuid(document.partyId, party.toLowerCase());
    assertIsoDate(document.date, 'date');
    assertIsoDate(document.dueDate, 'due');
    if (document.dueDate < document.date) {
      throw new ValidationError(`Due date ${document.dueDate} is before the document date ${document.date}`, 'due');
    }
    if (document.lines.length === 0) {
      throw new ValidationError('At least one line item is required', 'line');
    }

    const body: JsonObject = {
      [party]: { UID: document.partyId },
      Date: document.date,
      BalanceDueDate: document.dueDate,
      Lines: document.lines,
    };
    if (document.number) {
      body.Number = document.number;
    }
    if (document.notes) {
      body.Comment = document.notes;
    }

    return this.executor.executeWrite('POST', createPath, { ...scope, body });
  }
}
