/**
 * API Client Helper
 * Builds the shared token manager, executor and resource services for a CLI
 * run, and wraps command actions with uniform error output.
 */

import type { Command } from 'commander';
import { ValidationError } from './errors.js';
import { loggers } from './logger.js';
import { TokenManager } from '../services/auth.js';
import { FileTokenStore } from '../services/token-store.js';
import { ConfigService } from '../services/config.js';
import { RequestExecutor } from '../services/api.js';
import type { RequestScope } from '../services/api.js';
import { CompanyService } from '../services/company.js';
import { ContactsService } from '../services/contacts.js';
import { DocumentsService } from '../services/documents.js';
import { LedgerService } from '../services/ledger.js';
import { BankingService } from '../services/banking.js';
import { SalesOrdersService } from '../services/sales-orders.js';
import { PaymentsService } from '../services/payments.js';
import { EXIT_CODES, isOutputFormat, printError } from '../utils/output.js';
import type { OutputFormat } from '../utils/output.js';
import type { ResolvedConfig } from '../types/config.js';

export interface Services {
  config: ResolvedConfig;
  tokens: TokenManager;
  executor: RequestExecutor;
  company: CompanyService;
  contacts: ContactsService;
  invoices: DocumentsService;
  bills: DocumentsService;
  salesOrders: SalesOrdersService;
  payments: PaymentsService;
  ledger: LedgerService;
  banking: BankingService;
}

export type GlobalOptions = {
  format?: string;
  companyFile?: string;
  verbose?: boolean;
  metrics?: boolean;
};

export interface CommandContext {
  format: OutputFormat;
  scope: RequestScope;
  configService(): ConfigService;
  services(): Services;
}

let cachedConfig: ConfigService | null = null;
let cachedServices: Services | null = null;
const abortController = new AbortController();

export function getConfigService(): ConfigService {
  if (!cachedConfig) {
    cachedConfig = new ConfigService();
  }
  return cachedConfig;
}

/**
 * One token manager and one executor per process
 * @throws ValidationError when client credentials are not configured
 */
export function getServices(): Services {
  if (!cachedServices) {
    cachedServices = createServices(getConfigService().resolve());
  }
  return cachedServices;
}

export function createServices(config: ResolvedConfig): Services {
  const tokens = new TokenManager(
    {
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      redirectUri: config.redirectUri,
      scopes: config.scopes,
    },
    new FileTokenStore(config.tokenPath)
  );
  const executor = new RequestExecutor({
    clientId: config.clientId,
    credentials: tokens,
    defaultCompanyFileId: config.defaultCompanyFileId,
  });

  return {
    config,
    tokens,
    executor,
    company: new CompanyService(executor),
    contacts: new ContactsService(executor),
    invoices: new DocumentsService(executor, 'invoice'),
    bills: new DocumentsService(executor, 'bill'),
    salesOrders: new SalesOrdersService(executor),
    payments: new PaymentsService(executor),
    ledger: new LedgerService(executor),
    banking: new BankingService(executor),
  };
}

/**
 * Clear memoized services (tests)
 */
export function clearApiClientCache(): void {
  cachedConfig = null;
  cachedServices = null;
}

/**
 * Signal aborted on SIGINT; every request of the run observes it
 */
export function getAbortSignal(): AbortSignal {
  return abortController.signal;
}

export function abortRun(reason: unknown): void {
  abortController.abort(reason);
}

/**
 * Format from -f, else the configured default, else json
 */
export function resolveFormat(requested: string | undefined): OutputFormat {
  if (requested !== undefined) {
    if (!isOutputFormat(requested)) {
      throw new ValidationError(`Invalid format: '${requested}'. Expected json or table.`, 'format');
    }
    return requested;
  }
  return getConfigService().get('format') ?? 'json';
}

/**
 * Run a command action; failures are printed in the selected format and set the exit code
 */
export async function runCommand(
  cmd: Command,
  action: (context: CommandContext) => Promise<void>
): Promise<void> {
  const globals = cmd.optsWithGlobals<GlobalOptions>();
  let format: OutputFormat = globals.format !== undefined && isOutputFormat(globals.format) ? globals.format : 'json';

  try {
    format = resolveFormat(globals.format);
    await action({
      format,
      scope: { companyFileId: globals.companyFile, signal: getAbortSignal() },
      configService: getConfigService,
      services: getServices,
    });
  } catch (error) {
    loggers.cli.debug('Command failed', { command: cmd.name(), reason: error instanceof Error ? error.message : String(error) });
    if (getAbortSignal().aborted) {
      console.error('Interrupted');
      process.exitCode = EXIT_CODES.INTERRUPTED;
      return;
    }
    process.exitCode = printError(format, error);
  }
}
