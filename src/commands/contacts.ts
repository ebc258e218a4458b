/**
 * Contacts Command
 * Customers and suppliers
 */

import { Command, Option } from 'commander';
import { runCommand } from '../lib/api-client.js';
import { ValidationError } from '../lib/errors.js';
import { isContactType } from '../services/contacts.js';
import type { ContactType } from '../services/contacts.js';
import { formatMoney, formatRecord, formatTable, printResult } from '../utils/output.js';
import { activeFilter, parsePositiveInt, writeResultRecord } from './options.js';

interface ListOptions {
  type?: ContactType;
  active?: boolean;
  inactive?: boolean;
  search?: string;
  top?: number;
}

interface CreateOptions {
  name: string;
  type: string;
  email?: string;
  phone?: string;
}

export const contactsCommand = new Command('contacts').description('Customers and suppliers');

contactsCommand
  .command('list')
  .description('List contacts')
  .addOption(new Option('--type <type>', 'Contact type').choices(['customer', 'supplier']))
  .option('--active', 'Only active contacts')
  .option('--inactive', 'Only inactive contacts')
  .option('--search <text>', 'Match on company name')
  .option('--top <n>', 'Maximum number of contacts', parsePositiveInt)
  .action(async (options: ListOptions, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const contacts = await services().contacts.list(
        { type: options.type, isActive: activeFilter(options), search: options.search, top: options.top },
        scope
      );
      printResult(format, { count: contacts.length, contacts }, () =>
        formatTable(contacts, [
          { key: 'DisplayID', label: 'ID' },
          { key: 'CompanyName', label: 'Name' },
          { key: 'Type', label: 'Type' },
          { key: 'IsActive', label: 'Active' },
          { key: 'CurrentBalance', label: 'Balance', align: 'right', format: formatMoney },
          { key: 'UID', label: 'UID' },
        ])
      );
    })
  );

contactsCommand
  .command('get')
  .description('Show one contact')
  .argument('<uid>', 'Contact UID')
  .action(async (uid: string, _options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const contact = await services().contacts.get(uid, scope);
      printResult(format, { contact }, () => formatRecord(contact));
    })
  );

contactsCommand
  .command('create')
  .description('Create a customer or supplier')
  .requiredOption('--name <name>', 'Company name')
  .requiredOption('--type <type>', 'customer or supplier')
  .option('--email <email>', 'Email address')
  .option('--phone <phone>', 'Phone number')
  .action(async (options: CreateOptions, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      if (!isContactType(options.type)) {
        throw new ValidationError(`Invalid contact type: '${options.type}'. Expected customer or supplier.`, 'type');
      }
      const result = await services().contacts.create(
        { name: options.name, type: options.type, email: options.email, phone: options.phone },
        scope
      );
      printResult(format, { result }, () => formatRecord(writeResultRecord(result)));
    })
  );
