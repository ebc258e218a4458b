/**
 * Company Command
 */

import { Command } from 'commander';
import { runCommand } from '../lib/api-client.js';
import { formatTable, printResult } from '../utils/output.js';

export const companyCommand = new Command('company').description('Company files');

companyCommand
  .command('list')
  .description('List the company files you can open')
  .action(async (_options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const companyFiles = await services().company.listCompanyFiles({ signal: scope.signal });
      printResult(format, { count: companyFiles.length, companyFiles }, () =>
        formatTable(companyFiles, [
          { key: 'Id', label: 'Id' },
          { key: 'Name', label: 'Name' },
          { key: 'Country', label: 'Country' },
          { key: 'ProductVersion', label: 'Version' },
          { key: 'LibraryPath', label: 'Library' },
        ])
      );
    })
  );
