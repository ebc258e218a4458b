import { Command, Option } from 'commander';
import { setLogLevel } from './lib/logger.js';
import { getMetricsSnapshot } from './lib/metrics.js';
import type { GlobalOptions } from './lib/api-client.js';
import { authCommand } from './commands/auth.js';
import { configCommand } from './commands/config.js';
import { companyCommand } from './commands/company.js';
import { contactsCommand } from './commands/contacts.js';
import { invoicesCommand, billsCommand } from './commands/documents.js';
import { accountsCommand, taxCodesCommand, jobsCommand } from './commands/ledger.js';
import { bankingCommand } from './commands/banking.js';
import { salesOrdersCommand } from './commands/sales-orders.js';
import { paymentsCommand } from './commands/payments.js';

export const cli = new Command();

cli
  .name('myob')
  .description('MYOB AccountRight Live API from the command line')
  .version('0.1.0');

// global options
cli
  .addOption(new Option('-f, --format <format>', 'Output format: json | table (default: config, else json)').choices(['json', 'table']))
  .option('--company-file <uid>', 'Company file UID (overrides the configured default)')
  .option('-v, --verbose', 'Debug logging on stderr')
  .option('--metrics', 'Print Prometheus metrics to stderr after the command');

cli.hook('preAction', (thisCommand) => {
  if (thisCommand.opts<GlobalOptions>().verbose) {
    setLogLevel('debug');
  }
});

cli.hook('postAction', async (thisCommand) => {
  if (thisCommand.opts<GlobalOptions>().metrics) {
    console.error(await getMetricsSnapshot());
  }
});

cli.addCommand(authCommand);
cli.addCommand(configCommand);
cli.addCommand(companyCommand);
cli.addCommand(contactsCommand);
cli.addCommand(invoicesCommand);
cli.addCommand(salesOrdersCommand);
cli.addCommand(paymentsCommand);
cli.addCommand(billsCommand);
cli.addCommand(accountsCommand);
cli.addCommand(taxCodesCommand);
cli.addCommand(jobsCommand);
cli.addCommand(bankingCommand);
