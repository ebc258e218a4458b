/**
 * Ledger Commands
 * Accounts, tax codes and jobs
 */

import { Command } from 'commander';
import { runCommand } from '../lib/api-client.js';
import { formatMoney, formatRecord, formatTable, printResult } from '../utils/output.js';
import { activeFilter, parsePositiveInt } from './options.js';

interface AccountListOptions {
  type?: string;
  active?: boolean;
  inactive?: boolean;
}

interface JobListOptions {
  search?: string;
  active?: boolean;
  inactive?: boolean;
  top?: number;
  orderby?: string;
}

export const accountsCommand = new Command('accounts').description('General ledger accounts');

accountsCommand
  .command('list')
  .description('List accounts')
  .option('--type <type>', 'Asset, Liability, Equity, Income, CostOfSales, Expense, ...')
  .option('--active', 'Only active accounts')
  .option('--inactive', 'Only inactive accounts')
  .action(async (options: AccountListOptions, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const accounts = await services().ledger.listAccounts(
        { type: options.type, isActive: activeFilter(options) },
        scope
      );
      printResult(format, { count: accounts.length, accounts }, () =>
        formatTable(accounts, [
          { key: 'DisplayID', label: 'Number' },
          { key: 'Name', label: 'Name' },
          { key: 'Type', label: 'Type' },
          { key: 'Classification', label: 'Class' },
          { key: 'CurrentBalance', label: 'Balance', align: 'right', format: formatMoney },
          { key: 'UID', label: 'UID' },
        ])
      );
    })
  );

accountsCommand
  .command('get')
  .description('Show one account')
  .argument('<uid>', 'Account UID')
  .action(async (uid: string, _options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const account = await services().ledger.getAccount(uid, scope);
      printResult(format, { account }, () => formatRecord(account));
    })
  );

export const taxCodesCommand = new Command('tax-codes').description('Tax codes');

taxCodesCommand
  .command('list')
  .description('List tax codes')
  .action(async (_options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const taxCodes = await services().ledger.listTaxCodes(scope);
      printResult(format, { count: taxCodes.length, taxCodes }, () =>
        formatTable(taxCodes, [
          { key: 'Code', label: 'Code' },
          { key: 'Description', label: 'Description' },
          { key: 'Type', label: 'Type' },
          { key: 'Rate', label: 'Rate %', align: 'right' },
          { key: 'UID', label: 'UID' },
        ])
      );
    })
  );

export const jobsCommand = new Command('jobs').description('Jobs');

jobsCommand
  .command('list')
  .description('List jobs')
  .option('--search <text>', 'Match on name or number')
  .option('--active', 'Only active jobs')
  .option('--inactive', 'Only inactive jobs')
  .option('--top <n>', 'Maximum number of jobs', parsePositiveInt)
  .option('--orderby <field>', '"Field" or "Field desc"')
  .action(async (options: JobListOptions, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const jobs = await services().ledger.listJobs(
        {
          search: options.search,
          isActive: activeFilter(options),
          top: options.top,
          orderby: options.orderby,
        },
        scope
      );
      printResult(format, { count: jobs.length, jobs }, () =>
        formatTable(jobs, [
          { key: 'Number', label: 'Number' },
          { key: 'Name', label: 'Name' },
          { key: 'IsActive', label: 'Active' },
          { key: 'UID', label: 'UID' },
        ])
      );
    })
  );
