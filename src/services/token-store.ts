/**
 * Token Store
 * Durable storage for the single active OAuth credential
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { randomBytes } from 'node:crypto';
import { loggers } from '../lib/logger.js';
import type { Credential, StoredCredential } from '../types/auth.js';

export const DEFAULT_TOKEN_PATH = path.join(os.homedir(), '.config', 'myob-cli', 'tokens.json');

export interface TokenStore {
  load(): Promise<Credential | null>;
  /** Whole-record replace */
  save(credential: Credential): Promise<void>;
  clear(): Promise<void>;
}

export function toStored(credential: Credential): StoredCredential {
  const stored: StoredCredential = {
    access_token: credential.accessToken,
    refresh_token: credential.refreshToken,
    expires_at: new Date(credential.expiresAt).toISOString(),
    scope: credential.scopes.join(' '),
  };
  if (credential.businessId) {
    stored.business_id = credential.businessId;
  }
  return stored;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed credential file; null when the shape is wrong
 */
export function fromStored(raw: unknown): Credential | null {
  if (!isRecord(raw)) {
    return null;
  }
  const { access_token, refresh_token, expires_at, business_id, scope } = raw;
  if (typeof access_token !== 'string' || typeof refresh_token !== 'string' || typeof expires_at !== 'string') {
    return null;
  }
  const expiresAt = Date.parse(expires_at);
  if (Number.isNaN(expiresAt)) {
    return null;
  }
  return {
    accessToken: access_token,
    refreshToken: refresh_token,
    expiresAt,
    businessId: typeof business_id === 'string' && business_id ? business_id : undefined,
    scopes: typeof scope === 'string' ? scope.split(/\s+/).filter(Boolean) : [],
  };
}

/**
 * JSON file store. Writes go to a sibling temp file that is renamed over the
 * target, and are serialized so the last save() call always wins.
 */
export class FileTokenStore implements TokenStore {
  private readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string = DEFAULT_TOKEN_PATH) {
    this.filePath = filePath;
  }

  async load(): Promise<Credential | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      loggers.auth.warn('Credential file is not valid JSON, ignoring it', {
        path: this.filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const credential = fromStored(parsed);
    if (!credential) {
      loggers.auth.warn('Credential file has an unexpected shape, ignoring it', { path: this.filePath });
      return null;
    }
    loggers.auth.debug('Loaded credential', { path: this.filePath });
    return credential;
  }

  save(credential: Credential): Promise<void> {
    const payload = JSON.stringify(toStored(credential), null, 2);
    return this.enqueue(async () => {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      const tempPath = `${this.filePath}.${randomBytes(6).toString('hex')}.tmp`;
      try {
        await writeFile(tempPath, payload, { encoding: 'utf-8', mode: 0o600 });
        await rename(tempPath, this.filePath);
      } catch (error) {
        await rm(tempPath, { force: true });
        throw error;
      }
      loggers.auth.debug('Saved credential', { path: this.filePath });
    });
  }

  clear(): Promise<void> {
    return this.enqueue(() => rm(this.filePath, { force: true }));
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(task);
    // keep the chain alive after a failed write; the failure still reaches the caller through `run`
    this.writeChain = run.catch(() => undefined);
    return run;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Non-persistent store for driving a TokenManager in process, as the tests do.
 * Keeps the credential in its on-disk form, so loads go through fromStored().
 */
export class MemoryTokenStore implements TokenStore {
  private stored: StoredCredential | null;

  constructor(initial: Credential | null = null) {
    this.stored = initial ? toStored(initial) : null;
  }

  async load(): Promise<Credential | null> {
    return this.stored ? fromStored(this.stored) : null;
  }

  async save(credential: Credential): Promise<void> {
    this.stored = toStored(credential);
  }

  async clear(): Promise<void> {
    this.stored = null;
  }
}
