/**
 * Banking Service
 * Bank accounts and spend-money transactions
 */

import { ValidationError } from '../lib/errors.js';
import { FIELDS, pickList } from '../lib/fields.js';
import { buildODataQuery, combine, dateClause, identifierEquals } from '../lib/odata.js';
import { pagedRead } from './api.js';
import type { RequestExecutor, RequestScope } from './api.js';
import type { BankTransaction, JsonObject } from '../types/api.js';

export const BANKING_PATHS = {
  accounts: '/Banking/BankAccount',
  spendMoney: '/Banking/SpendMoneyTxn',
} as const;

export interface TransactionListOptions {
  from?: string;
  to?: string;
  top?: number;
}

export class BankingService {
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  async listAccounts(scope: RequestScope = {}): Promise<JsonObject[]> {
    const path = BANKING_PATHS.accounts;
    const items = await this.executor.executePaged(path, pagedRead(path, {}, scope));
    return pickList(items, FIELDS.bankAccountList);
  }

  async listTransactions(
    accountUid: string,
    options: TransactionListOptions = {},
    scope: RequestScope = {}
  ): Promise<JsonObject[]> {
    const path = BANKING_PATHS.spendMoney;
    const clauses = [identifierEquals('Account/UID', accountUid)];

    if (options.from) {
      clauses.push(dateClause('Date', 'ge', options.from));
    }
    if (options.to) {
      clauses.push(dateClause('Date', 'le', options.to));
    }
    if (options.from && options.to && options.from > options.to) {
      throw new ValidationError(`Date range is empty: ${options.from} is after ${options.to}`, 'from');
    }

    const query = buildODataQuery({ filter: combine(clauses) });
    const items = await this.executor.executePaged<BankTransaction>(path, pagedRead(path, query, scope, options.top));
    return pickList(items, FIELDS.bankTransactionList);
  }
}
