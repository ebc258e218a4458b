import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { FileTokenStore, MemoryTokenStore, fromStored, toStored } from '../../src/services/token-store.js';
import type { Credential } from '../../src/types/auth.js';

const BUSINESS_ID = '3f2504e0-4f89-11d3-9a0c-0305e82c3301';

const credential: Credential = {
  accessToken: 'test-access',
  refreshToken: 'test-refresh',
  expiresAt: Date.parse('2030-01-01T00:00:00.000Z'),
  businessId: BUSINESS_ID,
  scopes: ['sme-contact', 'sme-sales'],
};

describe('toStored / fromStored', () => {
  it('should use the snake_case file layout', () => {
    expect(toStored(credential)).toEqual({
      access_token: 'test-access',
      refresh_token: 'test-refresh',
      expires_at: '2030-01-01T00:00:00.000Z',
      business_id: BUSINESS_ID,
      scope: 'sme-contact sme-sales',
    });
  });

  it('should omit an absent business id', () => {
    expect(toStored({ ...credential, businessId: undefined })).not.toHaveProperty('business_id');
  });

  it('should read back what it wrote', () => {
    expect(fromStored(toStored(credential))).toEqual(credential);
  });

  it('should reject malformed records', () => {
    expect(fromStored(null)).toBeNull();
    expect(fromStored([])).toBeNull();
    expect(fromStored({ access_token: 'a', refresh_token: 'b' })).toBeNull();
    expect(fromStored({ access_token: 'a', refresh_token: 'b', expires_at: 'never' })).toBeNull();
  });
});

describe('FileTokenStore', () => {
  let dir: string;
  let filePath: string;
  let store: FileTokenStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'myob-tokens-'));
    filePath = path.join(dir, 'nested', 'tokens.json');
    store = new FileTokenStore(filePath);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return null when no file exists', async () => {
    expect(await store.load()).toBeNull();
  });

  it('should save with mode 0600 and load the credential back', async () => {
    await store.save(credential);

    expect(await new FileTokenStore(filePath).load()).toEqual(credential);
    if (process.platform !== 'win32') {
      expect(fs.statSync(filePath).mode & 0o777).toBe(0o600);
    }
  });

  it('should leave no temp files behind', async () => {
    await store.save(credential);
    await store.save({ ...credential, accessToken: 'test-access-2' });

    expect(fs.readdirSync(path.dirname(filePath))).toEqual(['tokens.json']);
  });

  it('should apply concurrent saves in call order', async () => {
    await Promise.all([
      store.save({ ...credential, accessToken: 'first' }),
      store.save({ ...credential, accessToken: 'second' }),
      store.save({ ...credential, accessToken: 'third' }),
    ]);

    expect((await store.load())?.accessToken).toBe('third');
  });

  it('should ignore a corrupt file', async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{not json');

    expect(await store.load()).toBeNull();
  });

  it('should ignore a file with the wrong shape', async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ token: 'x' }));

    expect(await store.load()).toBeNull();
  });

  it('should clear the file, and tolerate clearing twice', async () => {
    await store.save(credential);
    await store.clear();
    await store.clear();

    expect(fs.existsSync(filePath)).toBe(false);
  });
});

describe('MemoryTokenStore', () => {
  it('should hold one credential', async () => {
    const store = new MemoryTokenStore();
    expect(await store.load()).toBeNull();

    await store.save(credential);
    expect(await store.load()).toEqual(credential);

    await store.clear();
    expect(await store.load()).toBeNull();
  });
});
