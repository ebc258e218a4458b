/**
 * CLI Command Tests
 * Runs the commander program in-process against a temporary config and
 * credential file, with ofetch.raw mocked.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

vi.mock('ofetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ofetch')>();
  return { ...actual, ofetch: Object.assign(vi.fn(), { raw: vi.fn() }) };
});

import { ofetch } from 'ofetch';
import { cli } from '../../src/cli.js';
import { API_BASE } from '../../src/services/api.js';
import { clearApiClientCache } from '../../src/lib/api-client.js';
import { ACCOUNT_UID, COMPANY_FILE, PARTY_UID, reply } from '../helpers/executor.js';

describe('myob CLI', () => {
  const raw = vi.mocked(ofetch.raw);
  let dir: string;
  let configPath: string;
  let stdout: MockInstance<typeof console.log>;

  const run = async (...args: string[]): Promise<unknown> => {
    await cli.parseAsync(['node', 'myob', ...args]);
    const printed = stdout.mock.calls.at(-1)?.[0];
    return typeof printed === 'string' ? JSON.parse(printed) : undefined;
  };

  beforeEach(() => {
    raw.mockReset();
    clearApiClientCache();
    process.exitCode = undefined;

    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'myob-cli-'));
    configPath = path.join(dir, 'config.json');
    const tokenPath = path.join(dir, 'tokens.json');
    fs.writeFileSync(
      tokenPath,
      JSON.stringify({
        access_token: 'test-access',
        refresh_token: 'test-refresh',
        expires_at: '2099-01-01T00:00:00.000Z',
        business_id: COMPANY_FILE,
        scope: 'sme-contacts-customer',
      })
    );

    vi.stubEnv('MYOB_CONFIG', configPath);
    vi.stubEnv('MYOB_CLIENT_ID', 'test-client-id');
    vi.stubEnv('MYOB_CLIENT_SECRET', 'test-secret');
    vi.stubEnv('MYOB_TOKEN_PATH', tokenPath);
    vi.stubEnv('MYOB_COMPANY_FILE_ID', '');

    stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    clearApiClientCache();
    process.exitCode = undefined;
  });

  it('should list contacts as JSON using the company file from the credential', async () => {
    raw.mockResolvedValueOnce(reply(200, { Items: [{ UID: PARTY_UID, CompanyName: 'Acme', URI: 'x' }] }));

    const output = await run('contacts', 'list', '--type', 'customer', '--top', '1');

    expect(output).toEqual({ success: true, count: 1, contacts: [{ UID: PARTY_UID, CompanyName: 'Acme' }] });
    expect(raw.mock.calls[0]?.[0]).toBe(`${API_BASE}/${COMPANY_FILE}/Contact/Customer`);
    expect(raw.mock.calls[0]?.[1]?.headers).toMatchObject({ Authorization: 'Bearer test-access' });
    expect(process.exitCode).toBeUndefined();
  });

  it('should report validation errors as JSON with exit code 1', async () => {
    const output = await run(
      'invoices',
      'create',
      '--customer',
      PARTY_UID,
      '--date',
      '2024-05-01',
      '--due',
      '2024-05-31',
      '--line',
      'bad'
    );

    expect(output).toEqual({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid line item \'bad\'. Expected "description|quantity|unitPrice|accountUid[|taxCodeUid]".',
        param: 'line',
      },
    });
    expect(process.exitCode).toBe(1);
    expect(raw).not.toHaveBeenCalled();
  });

  it('should report API errors with exit code 2', async () => {
    raw.mockResolvedValueOnce(reply(404, 'Not found'));

    const output = await run('accounts', 'get', PARTY_UID);

    expect(output).toEqual({
      success: false,
      error: {
        code: 'API_ERROR',
        message: `MYOB API error 404 on /GeneralLedger/Account/${PARTY_UID}: Not found`,
        status: 404,
        path: `/GeneralLedger/Account/${PARTY_UID}`,
        excerpt: 'Not found',
      },
    });
    expect(process.exitCode).toBe(2);
  });

  it('should show the stored credential', async () => {
    const output = await run('auth', 'status');

    expect(output).toMatchObject({
      success: true,
      status: { authorized: true, businessId: COMPANY_FILE, expiresAt: '2099-01-01T00:00:00.000Z' },
    });
  });

  it('should report a missing login with exit code 3', async () => {
    fs.rmSync(path.join(dir, 'tokens.json'));
    vi.stubEnv('MYOB_COMPANY_FILE_ID', COMPANY_FILE);

    const output = await run('tax-codes', 'list');

    expect(output).toEqual({
      success: false,
      error: { code: 'AUTH_ERROR', message: 'Not authorized. Run `myob auth login` first.' },
    });
    expect(process.exitCode).toBe(3);
  });

  it('should write config values and read them back', async () => {
    await run('config', 'set', 'format', 'json');
    const output = await run('config', 'get', 'format');

    expect(output).toEqual({ success: true, key: 'format', value: 'json' });
    expect(JSON.parse(fs.readFileSync(configPath, 'utf-8'))).toEqual({ format: 'json' });
  });

  it('should mask the client secret', async () => {
    fs.writeFileSync(configPath, JSON.stringify({ clientSecret: 'test-secret', clientId: 'test-client-id' }));

    const output = await run('config', 'list');

    expect(output).toEqual({
      success: true,
      config: { clientSecret: '********', clientId: 'test-client-id' },
    });
  });

  it('should record a customer payment applied to invoices', async () => {
    const invoice = 'd4e5f607-1a2b-4c3d-8e9f-a0b1c2d3e4f5';
    raw.mockResolvedValueOnce(reply(201));

    await run(
      'payments',
      'create',
      '--customer',
      PARTY_UID,
      '--date',
      '2024-06-03',
      '--amount',
      '120.5',
      '--account',
      ACCOUNT_UID,
      '--method',
      'Cash',
      '--apply',
      `${invoice}:120.5`
    );

    expect(raw.mock.calls[0]?.[0]).toBe(`${API_BASE}/${COMPANY_FILE}/Sale/CustomerPayment`);
    expect(raw.mock.calls[0]?.[1]?.body).toEqual({
      Customer: { UID: PARTY_UID },
      Date: '2024-06-03',
      AmountReceived: 120.5,
      Account: { UID: ACCOUNT_UID },
      PaymentMethod: 'Cash',
      Invoices: [{ UID: invoice, AmountApplied: 120.5 }],
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('should refuse to edit a sales order under another layout', async () => {
    const order = 'c1a8f3d2-5b6e-4f70-8a91-b2c3d4e5f607';
    raw.mockResolvedValueOnce(reply(200, { UID: order, Status: 'Open', Layout: 'Item', RowVersion: '1' }));

    const output = await run('sales-orders', 'edit', order, '--layout', 'Service', '--comment', 'Rush');

    expect(output).toEqual({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: "Layout mismatch: order has layout 'Item' but 'Service' was given",
        param: 'layout',
      },
    });
    expect(process.exitCode).toBe(1);
    expect(raw).toHaveBeenCalledTimes(1);
  });
});
