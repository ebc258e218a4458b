/**
 * Payments Command
 * Customer payments and sales-order deposits
 */

import { Command, Option } from 'commander';
import { runCommand } from '../lib/api-client.js';
import { PAYMENT_METHODS, parseInvoiceApplication } from '../services/payments.js';
import { formatRecord, printResult } from '../utils/output.js';
import { collect, parseAmount, writeResultRecord } from './options.js';

interface PaymentOptions {
  customer: string;
  date: string;
  amount: number;
  account: string;
  memo?: string;
  method: string;
}

interface CustomerPaymentOptions extends PaymentOptions {
  apply?: string[];
}

interface DepositOptions extends PaymentOptions {
  order: string;
}

function withPaymentOptions(command: Command): Command {
  return command
    .requiredOption('--customer <uid>', 'Customer UID')
    .requiredOption('--date <date>', 'Payment date YYYY-MM-DD')
    .requiredOption('--amount <amount>', 'Amount received', parseAmount)
    .requiredOption('--account <uid>', 'Bank account UID to deposit into')
    .option('--memo <text>', 'Memo')
    .addOption(new Option('--method <method>', 'Payment method').choices(PAYMENT_METHODS).default('BankDeposit'));
}

export const paymentsCommand = new Command('payments').description('Customer payments');

withPaymentOptions(
  paymentsCommand
    .command('create')
    .description('Record a customer payment against invoices')
    .option('--apply <invoice>', 'invoiceUid:amount applied (repeatable)', collect)
).action(async (options: CustomerPaymentOptions, cmd: Command) =>
  runCommand(cmd, async ({ format, scope, services }) => {
    const result = await services().payments.createCustomerPayment(
      {
        customerId: options.customer,
        date: options.date,
        amount: options.amount,
        bankAccountId: options.account,
        memo: options.memo,
        paymentMethod: options.method,
        invoices: (options.apply ?? []).map(parseInvoiceApplication),
      },
      scope
    );
    printResult(format, { result }, () => formatRecord(writeResultRecord(result)));
  })
);

withPaymentOptions(
  paymentsCommand
    .command('deposit')
    .description('Record a customer deposit against a sales order')
    .requiredOption('--order <uid>', 'Sales order UID')
).action(async (options: DepositOptions, cmd: Command) =>
  runCommand(cmd, async ({ format, scope, services }) => {
    const result = await services().payments.createSalesOrderDeposit(
      {
        salesOrderId: options.order,
        customerId: options.customer,
        date: options.date,
        amount: options.amount,
        bankAccountId: options.account,
        memo: options.memo,
        paymentMethod: options.method,
      },
      scope
    );
    printResult(format, { result }, () => formatRecord(writeResultRecord(result)));
  })
);
