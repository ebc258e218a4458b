/**
 * Invoices and Bills Commands
 * One command factory for both document kinds; only the party option differs
 */

import { Command } from 'commander';
import { runCommand } from '../lib/api-client.js';
import { ValidationError } from '../lib/errors.js';
import { parseLineItem } from '../services/documents.js';
import type { DocumentKind, DocumentsService } from '../services/documents.js';
import type { Services } from '../lib/api-client.js';
import { formatMoney, formatRecord, formatTable, printResult } from '../utils/output.js';
import { collect, parsePositiveInt, writeResultRecord } from './options.js';

interface PartyOptions {
  customer?: string;
  supplier?: string;
}

interface ListOptions extends PartyOptions {
  from?: string;
  to?: string;
  status?: string;
  top?: number;
}

interface CreateOptions extends PartyOptions {
  date: string;
  due: string;
  line?: string[];
  number?: string;
  notes?: string;
}

interface DocumentCommandDefinition {
  name: string;
  noun: string;
  plural: string;
  partyOption: keyof PartyOptions;
  service: (services: Services) => DocumentsService;
}

const DEFINITIONS: Readonly<Record<DocumentKind, DocumentCommandDefinition>> = {
  invoice: {
    name: 'invoices',
    noun: 'invoice',
    plural: 'invoices',
    partyOption: 'customer',
    service: (services) => services.invoices,
  },
  bill: {
    name: 'bills',
    noun: 'bill',
    plural: 'bills',
    partyOption: 'supplier',
    service: (services) => services.bills,
  },
};

export function createDocumentCommand(kind: DocumentKind): Command {
  const definition = DEFINITIONS[kind];
  const { noun, plural, partyOption } = definition;
  const partyLabel = partyOption === 'customer' ? 'Customer' : 'Supplier';

  const command = new Command(definition.name).description(`Item ${plural}`);

  command
    .command('list')
    .description(`List ${plural}`)
    .option('--from <date>', 'On or after YYYY-MM-DD')
    .option('--to <date>', 'On or before YYYY-MM-DD')
    .option('--status <status>', 'Open, Closed, ...')
    .option(`--${partyOption} <uid>`, `${partyLabel} UID`)
    .option('--top <n>', `Maximum number of ${plural}`, parsePositiveInt)
    .action(async (options: ListOptions, cmd: Command) =>
      runCommand(cmd, async ({ format, scope, services }) => {
        const items = await definition.service(services()).list(
          {
            from: options.from,
            to: options.to,
            status: options.status,
            partyId: options[partyOption],
            top: options.top,
          },
          scope
        );
        printResult(format, { count: items.length, [plural]: items }, () =>
          formatTable(items, [
            { key: 'Number', label: 'Number' },
            { key: 'Date', label: 'Date', format: (value) => (typeof value === 'string' ? value.slice(0, 10) : '') },
            { key: `${partyLabel}.Name`, label: partyLabel },
            { key: 'Status', label: 'Status' },
            { key: 'Subtotal', label: 'Subtotal', align: 'right', format: formatMoney },
            { key: 'TotalTax', label: 'Tax', align: 'right', format: formatMoney },
            { key: 'TotalAmount', label: 'Total', align: 'right', format: formatMoney },
            { key: 'BalanceDueAmount', label: 'Due', align: 'right', format: formatMoney },
            { key: 'UID', label: 'UID' },
          ])
        );
      })
    );

  command
    .command('get')
    .description(`Show one ${noun}`)
    .argument('<uid>', `${noun} UID`)
    .action(async (uid: string, _options: object, cmd: Command) =>
      runCommand(cmd, async ({ format, scope, services }) => {
        const document = await definition.service(services()).get(uid, scope);
        printResult(format, { [noun]: document }, () => formatRecord(document));
      })
    );

  command
    .command('create')
    .description(`Create an item ${noun}`)
    .requiredOption(`--${partyOption} <uid>`, `${partyLabel} UID`)
    .requiredOption('--date <date>', 'Date YYYY-MM-DD')
    .requiredOption('--due <date>', 'Due date YYYY-MM-DD')
    .option('--line <item>', 'description|quantity|unitPrice|accountUid[|taxCodeUid] (repeatable)', collect)
    .option('--number <number>', `${noun} number`)
    .option('--notes <text>', 'Comment')
    .action(async (options: CreateOptions, cmd: Command) =>
      runCommand(cmd, async ({ format, scope, services }) => {
        const partyId = options[partyOption];
        if (partyId === undefined) {
          throw new ValidationError(`--${partyOption} is required`, partyOption);
        }
        const lines = (options.line ?? []).map(parseLineItem);
        const result = await definition.service(services()).create(
          {
            partyId,
            date: options.date,
            dueDate: options.due,
            lines,
            number: options.number,
            notes: options.notes,
          },
          scope
        );
        printResult(format, { result }, () => formatRecord(writeResultRecord(result)));
      })
    );

  return command;
}

export const invoicesCommand = createDocumentCommand('invoice');
export const billsCommand = createDocumentCommand('bill');
