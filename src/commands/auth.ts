/**
 * Auth Command
 * OAuth login through a local callback listener, status, refresh, logout
 */

import { Command } from 'commander';
import { runCommand } from '../lib/api-client.js';
import { callbackTarget, startCallbackServer } from '../services/callback-server.js';
import { formatRecord, printResult } from '../utils/output.js';
import { parsePositiveInt } from './options.js';
import type { AuthStatus } from '../types/auth.js';

interface LoginOptions {
  browser: boolean;
  timeout?: number;
}

function statusRecord(status: AuthStatus): Record<string, unknown> {
  return {
    Authorized: status.authorized ? 'yes' : 'no',
    'Expires at': status.expiresAt,
    'Expires in (s)': status.expiresInSeconds,
    'Company file': status.businessId,
    Scopes: status.scopes.join(' '),
    'Refresh token': status.hasRefreshToken ? 'yes' : 'no',
  };
}

export const authCommand = new Command('auth').description('Sign in to MYOB and manage the stored credential');

authCommand
  .command('login')
  .description('Authorize this CLI in the browser')
  .option('--no-browser', 'Print the authorization URL without opening a browser')
  .option('--timeout <seconds>', 'Seconds to wait for the redirect', parsePositiveInt)
  .action(async (options: LoginOptions, cmd: Command) =>
    runCommand(cmd, async ({ format, scope, services }) => {
      const { tokens, config } = services();
      const target = callbackTarget(config.redirectUri);
      const server = startCallbackServer({
        tokens,
        host: target.host,
        port: target.port,
        callbackPath: target.path,
        timeoutMs: options.timeout !== undefined ? options.timeout * 1000 : undefined,
        signal: scope.signal,
      });

      try {
        const [status] = await Promise.all([
          server.result,
          server.listening.then(() => {
            const request = tokens.beginAuthorization({ openBrowser: options.browser });
            console.error(`Open this URL to authorize the CLI:\n\n  ${request.url}\n`);
          }),
        ]);
        printResult(format, { status }, () => formatRecord(statusRecord(status)));
      } finally {
        await server.close();
      }
    })
  );

authCommand
  .command('status')
  .description('Show the stored credential')
  .action(async (_options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, services }) => {
      const status = await services().tokens.status();
      printResult(format, { status }, () => formatRecord(statusRecord(status)));
    })
  );

authCommand
  .command('refresh')
  .description('Refresh the access token now')
  .action(async (_options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, services }) => {
      const { tokens } = services();
      await tokens.refreshNow();
      const status = await tokens.status();
      printResult(format, { status }, () => formatRecord(statusRecord(status)));
    })
  );

authCommand
  .command('logout')
  .description('Delete the stored credential')
  .action(async (_options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, services }) => {
      await services().tokens.logout();
      printResult(format, { message: 'Signed out' }, () => 'Signed out');
    })
  );
