/**
 * Ledger Service
 * Chart of accounts, tax codes and jobs
 */

import { FIELDS, pick, pickList } from '../lib/fields.js';
import {
  anyOf,
  assertGuid,
  booleanClause,
  buildODataQuery,
  combine,
  equalsClause,
  parseOrderBy,
  searchClause,
} from '../lib/odata.js';
import type { FilterClause } from '../lib/odata.js';
import { fingerprint } from './cache.js';
import { pagedRead } from './api.js';
import type { RequestExecutor, RequestScope } from './api.js';
import type { Account, JsonObject, Job, TaxCode } from '../types/api.js';

export const LEDGER_PATHS = {
  accounts: '/GeneralLedger/Account',
  taxCodes: '/GeneralLedger/TaxCode',
  jobs: '/GeneralLedger/Job',
} as const;

export interface AccountListOptions {
  /** Asset, Liability, Equity, Income, CostOfSales, Expense, ... */
  type?: string;
  isActive?: boolean;
}

export interface JobListOptions {
  isActive?: boolean;
  /** Case-insensitive match on name or number */
  search?: string;
  top?: number;
  /** "Field" or "Field desc" */
  orderby?: string;
}

export class LedgerService {
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  async listAccounts(options: AccountListOptions = {}, scope: RequestScope = {}): Promise<JsonObject[]> {
    const path = LEDGER_PATHS.accounts;
    const clauses: FilterClause[] = [];

    if (options.type) {
      clauses.push(equalsClause('Type', options.type));
    }
    if (options.isActive !== undefined) {
      clauses.push(booleanClause('IsActive', options.isActive));
    }

    const query = buildODataQuery({ filter: combine(clauses) });
    const items = await this.executor.executePaged<Account>(path, pagedRead(path, query, scope));
    return pickList(items, FIELDS.accountList);
  }

  async getAccount(uid: string, scope: RequestScope = {}): Promise<JsonObject> {
    const path = `${LEDGER_PATHS.accounts}/${assertGuid(uid, 'uid')}`;
    const account = await this.executor.execute<Account>('GET', path, {
      ...scope,
      cacheKey: fingerprint('GET', path),
    });
    return pick(account, FIELDS.accountDetail);
  }

  async listTaxCodes(scope: RequestScope = {}): Promise<JsonObject[]> {
    const path = LEDGER_PATHS.taxCodes;
    const items = await this.executor.executePaged<TaxCode>(path, pagedRead(path, {}, scope));
    return pickList(items, FIELDS.taxCodeList);
  }

  async listJobs(options: JobListOptions = {}, scope: RequestScope = {}): Promise<JsonObject[]> {
    const path = LEDGER_PATHS.jobs;
    const clauses: FilterClause[] = [];

    if (options.isActive !== undefined) {
      clauses.push(booleanClause('IsActive', options.isActive));
    }
    if (options.search) {
      clauses.push(anyOf([searchClause('Name', options.search), searchClause('Number', options.search)]));
    }

    const query = buildODataQuery({
      filter: combine(clauses),
      orderby: options.orderby ? [parseOrderBy(options.orderby)] : undefined,
    });
    const items = await this.executor.executePaged<Job>(path, pagedRead(path, query, scope, options.top));
    return pickList(items, FIELDS.jobList);
  }
}
