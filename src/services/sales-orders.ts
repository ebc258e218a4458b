/**
 * Sales Orders Service
 * Item and Service layout orders. Edits are a read-modify-write: the current
 * order (with its RowVersion) is fetched, changed and PUT back.
 */

import { ValidationError } from '../lib/errors.js';
import { FIELDS, fixSubtotal, pick, pickList } from '../lib/fields.js';
import {
  assertGuid,
  assertIsoDate,
  buildODataQuery,
  combine,
  dateClause,
  equalsClause,
  identifierEquals,
  isGuid,
  parseOrderBy,
  searchClause,
} from '../lib/odata.js';
import type { FilterClause } from '../lib/odata.js';
import { fingerprint } from './cache.js';
import { pagedRead } from './api.js';
import type { RequestExecutor, RequestScope, WriteResult } from './api.js';
import { parseLineItem } from './documents.js';
import type { JsonObject, SalesOrder, SalesOrderLine } from '../types/api.js';

export const SALES_ORDER_PATH = '/Sale/Order';

export type OrderLayout = 'Item' | 'Service';

export const ORDER_LAYOUTS: readonly OrderLayout[] = ['Item', 'Service'];

export function isOrderLayout(value: string): value is OrderLayout {
  return ORDER_LAYOUTS.some((layout) => layout === value);
}

export interface SalesOrderListOptions {
  from?: string;
  to?: string;
  status?: string;
  customerId?: string;
  /** Case-insensitive match on the order number */
  search?: string;
  top?: number;
  /** "Field" or "Field desc" */
  orderby?: string;
}

/**
 * Header fields shared by create and edit
 */
export interface SalesOrderFields {
  number?: string;
  comment?: string;
  shipToAddress?: string;
  isTaxInclusive?: boolean;
  freight?: number;
  customerPurchaseOrderNumber?: string;
  salespersonId?: string;
}

export interface NewSalesOrder extends SalesOrderFields {
  customerId: string;
  date: string;
  layout: OrderLayout;
  lines: SalesOrderLine[];
}

export interface SalesOrderChanges extends SalesOrderFields {
  /** Must match the stored order's layout */
  layout: OrderLayout;
  customerId?: string;
  date?: string;
  /** Replaces every line when given */
  lines?: SalesOrderLine[];
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Parse an order line for the given layout:
 * Item `description|quantity|unitPrice|accountUid[|taxCodeUid]` (total = quantity × price),
 * Service `description|amount|accountUid[|taxCodeUid]`
 */
export function parseOrderLine(input: string, layout: OrderLayout): SalesOrderLine {
  if (layout === 'Item') {
    const line = parseLineItem(input);
    return {
      Type: 'Transaction',
      Description: line.Description,
      ShipQuantity: line.Quantity,
      UnitPrice: line.UnitPrice,
      Total: roundCents(line.Quantity * line.UnitPrice),
      Account: line.Account,
      ...(line.TaxCode ? { TaxCode: line.TaxCode } : {}),
    };
  }

  const parts = input.split('|').map((part) => part.trim());
  if (parts.length < 3 || parts.length > 4) {
    throw new ValidationError(
      `Invalid service line '${input}'. Expected "description|amount|accountUid[|taxCodeUid]".`,
      'line'
    );
  }
  const [description, amountText, accountUid, taxCodeUid] = parts;
  if (!description) {
    throw new ValidationError(`Line item '${input}' has no description`, 'line');
  }
  const amount = Number(amountText);
  if (!amountText || !Number.isFinite(amount)) {
    throw new ValidationError(`Invalid amount '${amountText}' in line item '${input}'`, 'line');
  }
  if (!isGuid(accountUid)) {
    throw new ValidationError(`Invalid account UID '${accountUid}' in line item '${input}'`, 'line');
  }

  const line: SalesOrderLine = {
    Type: 'Transaction',
    Description: description,
    Total: amount,
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

function applyFields(body: JsonObject, fields: SalesOrderFields): void {
  if (fields.number !== undefined) body.Number = fields.number;
  if (fields.comment !== undefined) body.Comment = fields.comment;
  if (fields.shipToAddress !== undefined) body.ShipToAddress = fields.shipToAddress;
  if (fields.isTaxInclusive !== undefined) body.IsTaxInclusive = fields.isTaxInclusive;
  if (fields.freight !== undefined) {
    if (!Number.isFinite(fields.freight) || fields.freight < 0) {
      throw new ValidationError(`Invalid freight: '${fields.freight}'`, 'freight');
    }
    body.Freight = fields.freight;
  }
  if (fields.customerPurchaseOrderNumber !== undefined) {
    body.CustomerPurchaseOrderNumber = fields.customerPurchaseOrderNumber;
  }
  if (fields.salespersonId !== undefined) {
    body.Salesperson = { UID: assertGuid(fields.salespersonId, 'salesperson') };
  }
}

export class SalesOrdersService {
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  async list(options: SalesOrderListOptions = {}, scope: RequestScope = {}): Promise<JsonObject[]> {
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
    if (options.customerId) {
      clauses.push(identifierEquals('Customer/UID', options.customerId));
    }
    if (options.search) {
      clauses.push(searchClause('Number', options.search));
    }

    const query = buildODataQuery({
      filter: combine(clauses),
      orderby: options.orderby ? [parseOrderBy(options.orderby)] : undefined,
    });
    const items = await this.executor.executePaged<SalesOrder>(
      SALES_ORDER_PATH,
      pagedRead(SALES_ORDER_PATH, query, scope, options.top)
    );
    return pickList(items.map(fixSubtotal), FIELDS.salesOrderList);
  }

  async get(uid: string, scope: RequestScope = {}): Promise<JsonObject> {
    const path = `${SALES_ORDER_PATH}/${assertGuid(uid, 'uid')}`;
    const order = await this.executor.execute<SalesOrder>('GET', path, {
      ...scope,
      cacheKey: fingerprint('GET', path),
    });
    return pick(fixSubtotal(order), FIELDS.salesOrderDetail);
  }

  async create(order: NewSalesOrder, scope: RequestScope = {}): Promise<WriteResult> {
    assertGuid(order.customerId, 'customer');
    assertIsoDate(order.date, 'date');
    if (!isOrderLayout(order.layout)) {
      throw new ValidationError(`Invalid layout: '${order.layout}'. Expected Item or Service.`, 'layout');
    }
    if (order.lines.length === 0) {
      throw new ValidationError('At least one line item is required', 'line');
    }

    const body: JsonObject = {
      Customer: { UID: order.customerId },
      Date: order.date,
      Lines: order.lines,
    };
    applyFields(body, order);

    return this.executor.executeWrite('POST', `${SALES_ORDER_PATH}/${order.layout}`, { ...scope, body });
  }

  /**
   * Update an open order. Unset fields keep their stored values.
   * @throws ValidationError when the order is not Open, the layout differs or RowVersion is missing
   */
  async edit(uid: string, changes: SalesOrderChanges, scope: RequestScope = {}): Promise<WriteResult> {
    assertGuid(uid, 'uid');
    if (!isOrderLayout(changes.layout)) {
      throw new ValidationError(`Invalid layout: '${changes.layout}'. Expected Item or Service.`, 'layout');
    }
    if (changes.customerId !== undefined) {
      assertGuid(changes.customerId, 'customer');
    }
    if (changes.date !== undefined) {
      assertIsoDate(changes.date, 'date');
    }
    if (changes.lines !== undefined && changes.lines.length === 0) {
      throw new ValidationError('At least one line item is required', 'line');
    }

    // unfiltered and uncached: the PUT needs every field and the current RowVersion
    const current = await this.executor.execute<SalesOrder>('GET', `${SALES_ORDER_PATH}/${uid}`, scope);

    if (current.Status !== 'Open') {
      throw new ValidationError(
        `Cannot edit order with status '${current.Status ?? 'unknown'}'. Only Open orders can be edited.`,
        'uid'
      );
    }
    if (current.Layout && current.Layout !== changes.layout) {
      throw new ValidationError(
        `Layout mismatch: order has layout '${current.Layout}' but '${changes.layout}' was given`,
        'layout'
      );
    }
    if (!current.RowVersion) {
      throw new ValidationError('Cannot update order: RowVersion missing from the fetched order', 'uid');
    }

    const body: JsonObject = { ...current };
    if (changes.date !== undefined) body.Date = changes.date;
    if (changes.customerId !== undefined) body.Customer = { UID: changes.customerId };
    if (changes.lines !== undefined) body.Lines = changes.lines;
    applyFields(body, changes);

    return this.executor.executeWrite('PUT', `${SALES_ORDER_PATH}/${changes.layout}/${uid}`, { ...scope, body });
  }
}
