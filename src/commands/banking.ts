/**
 * Banking Command
 */

import { Command } from 'commander';
import { runCommand } from '../lib/api-client.js';
import { formatMoney, formatTable, printResult } from '../utils/output.js';
import { parsePositiveInt } from './options.js';

interface TransactionOptions {
  from?: string;
  to?: string;
  top?: number;
}

export const bankingCommand = new Command('banking').description('Bank accounts and transactions');

bankingCommand
  .command('accounts')
  .description('List bank accounts')
  .action(async (_options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const accounts = await services().banking.listAccounts(scope);
      printResult(format, { count: accounts.length, accounts }, () =>
        formatTable(accounts, [
          { key: 'DisplayID', label: 'Number' },
          { key: 'Name', label: 'Name' },
          { key: 'BSBNumber', label: 'BSB' },
          { key: 'CurrentBalance', label: 'Balance', align: 'right', format: formatMoney },
          { key: 'UID', label: 'UID' },
        ])
      );
    })
  );

bankingCommand
  .command('transactions')
  .description('List spend money transactions for an account')
  .argument('<accountUid>', 'Bank account UID')
  .option('--from <date>', 'On or after YYYY-MM-DD')
  .option('--to <date>', 'On or before YYYY-MM-DD')
  .option('--top <n>', 'Maximum number of transactions', parsePositiveInt)
  .action(async (accountUid: string, options: TransactionOptions, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const transactions = await services().banking.listTransactions(
        accountUid,
        { from: options.from, to: options.to, top: options.top },
        scope
      );
      printResult(format, { count: transactions.length, transactions }, () =>
        formatTable(transactions, [
          { key: 'Date', label: 'Date', format: (value) => (typeof value === 'string' ? value.slice(0, 10) : '') },
          { key: 'PayeeName', label: 'Payee' },
          { key: 'Memo', label: 'Memo' },
          { key: 'Amount', label: 'Amount', align: 'right', format: formatMoney },
          { key: 'UID', label: 'UID' },
        ])
      );
    })
  );
