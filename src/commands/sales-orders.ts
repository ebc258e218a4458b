/**
 * Sales Orders Command
 */

import { Command, Option } from 'commander';
import { runCommand } from '../lib/api-client.js';
import { ORDER_LAYOUTS, parseOrderLine } from '../services/sales-orders.js';
import type { OrderLayout, SalesOrderFields } from '../services/sales-orders.js';
import { formatMoney, formatRecord, formatTable, printResult } from '../utils/output.js';
import { collect, parseAmount, parsePositiveInt, writeResultRecord } from './options.js';

interface ListOptions {
  from?: string;
  to?: string;
  status?: string;
  customer?: string;
  search?: string;
  top?: number;
  orderby?: string;
}

interface HeaderOptions {
  layout: OrderLayout;
  line?: string[];
  number?: string;
  comment?: string;
  shipTo?: string;
  taxInclusive?: boolean;
  freight?: number;
  customerPo?: string;
  salesperson?: string;
}

interface CreateOptions extends HeaderOptions {
  customer: string;
  date: string;
}

interface EditOptions extends HeaderOptions {
  customer?: string;
  date?: string;
}

const LINE_HELP =
  'Item: description|quantity|unitPrice|accountUid[|taxCodeUid]; Service: description|amount|accountUid[|taxCodeUid] (repeatable)';

function headerFields(options: HeaderOptions): SalesOrderFields {
  return {
    number: options.number,
    comment: options.comment,
    shipToAddress: options.shipTo,
    isTaxInclusive: options.taxInclusive,
    freight: options.freight,
    customerPurchaseOrderNumber: options.customerPo,
    salespersonId: options.salesperson,
  };
}

function withHeaderOptions(command: Command): Command {
  return command
    .addOption(new Option('--layout <layout>', 'Order layout').choices(ORDER_LAYOUTS).default('Item'))
    .option('--line <item>', LINE_HELP, collect)
    .option('--number <number>', 'Order number')
    .option('--comment <text>', 'Comment')
    .option('--ship-to <address>', 'Ship-to address')
    .option('--tax-inclusive', 'Prices include tax')
    .option('--no-tax-inclusive', 'Prices exclude tax')
    .option('--freight <amount>', 'Freight amount', parseAmount)
    .option('--customer-po <number>', "Customer's purchase order number")
    .option('--salesperson <uid>', 'Salesperson (employee) UID');
}

export const salesOrdersCommand = new Command('sales-orders').description('Sales orders');

salesOrdersCommand
  .command('list')
  .description('List sales orders')
  .option('--from <date>', 'On or after YYYY-MM-DD')
  .option('--to <date>', 'On or before YYYY-MM-DD')
  .option('--status <status>', 'Open, ConvertedToInvoice, ...')
  .option('--customer <uid>', 'Customer UID')
  .option('--search <text>', 'Match on order number')
  .option('--top <n>', 'Maximum number of orders', parsePositiveInt)
  .option('--orderby <field>', '"Field" or "Field desc"')
  .action(async (options: ListOptions, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const orders = await services().salesOrders.list(
        {
          from: options.from,
          to: options.to,
          status: options.status,
          customerId: options.customer,
          search: options.search,
          top: options.top,
          orderby: options.orderby,
        },
        scope
      );
      printResult(format, { count: orders.length, salesOrders: orders }, () =>
        formatTable(orders, [
          { key: 'Number', label: 'Number' },
          { key: 'Date', label: 'Date', format: (value) => (typeof value === 'string' ? value.slice(0, 10) : '') },
          { key: 'Customer.Name', label: 'Customer' },
          { key: 'Status', label: 'Status' },
          { key: 'Layout', label: 'Layout' },
          { key: 'TotalAmount', label: 'Total', align: 'right', format: formatMoney },
          { key: 'UID', label: 'UID' },
        ])
      );
    })
  );

salesOrdersCommand
  .command('get')
  .description('Show one sales order')
  .argument('<uid>', 'Sales order UID')
  .action(async (uid: string, _options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const salesOrder = await services().salesOrders.get(uid, scope);
      printResult(format, { salesOrder }, () => formatRecord(salesOrder));
    })
  );

withHeaderOptions(
  salesOrdersCommand
    .command('create')
    .description('Create a sales order')
    .requiredOption('--customer <uid>', 'Customer UID')
    .requiredOption('--date <date>', 'Date YYYY-MM-DD')
).action(async (options: CreateOptions, cmd: Command) =>
  runCommand(cmd, async ({ format, scope, services }) => {
    const lines = (options.line ?? []).map((line) => parseOrderLine(line, options.layout));
    const result = await services().salesOrders.create(
      {
        customerId: options.customer,
        date: options.date,
        layout: options.layout,
        lines,
        ...headerFields(options),
      },
      scope
    );
    printResult(format, { result }, () => formatRecord(writeResultRecord(result)));
  })
);

withHeaderOptions(
  salesOrdersCommand
    .command('edit')
    .description('Update an open sales order; --line replaces every line')
    .argument('<uid>', 'Sales order UID')
    .option('--customer <uid>', 'Customer UID')
    .option('--date <date>', 'Date YYYY-MM-DD')
).action(async (uid: string, options: EditOptions, cmd: Command) =>
  runCommand(cmd, async ({ format, scope, services }) => {
    const lines = options.line?.map((line) => parseOrderLine(line, options.layout));
    const result = await services().salesOrders.edit(
      uid,
      {
        layout: options.layout,
        customerId: options.customer,
        date: options.date,
        lines,
        ...headerFields(options),
      },
      scope
    );
    printResult(format, { result }, () => formatRecord(writeResultRecord(result)));
  })
);
