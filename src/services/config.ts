/**
 * Config Service
 * Config file, environment overrides and ${VAR} substitution
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ValidationError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { assertGuid } from '../lib/odata.js';
import { isOutputFormat } from '../utils/output.js';
import type { AppConfig, ConfigKey, ResolvedConfig } from '../types/config.js';

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'myob-cli');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_SCOPES = [
  'sme-company-file',
  'sme-general-ledger',
  'sme-sales',
  'sme-purchases',
  'sme-banking',
  'sme-contacts-customer',
  'sme-contacts-supplier',
];

/**
 * Values used when neither the file nor the environment sets a key
 */
export const DEFAULT_CONFIG = {
  redirectUri: 'http://localhost:33333/callback',
  tokenPath: path.join(DEFAULT_CONFIG_DIR, 'tokens.json'),
  scopes: DEFAULT_SCOPES,
  format: 'json',
} satisfies AppConfig;

/** Environment variables that win over the file */
export const ENV_OVERRIDES: Readonly<Record<string, ConfigKey>> = {
  MYOB_CLIENT_ID: 'clientId',
  MYOB_CLIENT_SECRET: 'clientSecret',
  MYOB_REDIRECT_URI: 'redirectUri',
  MYOB_COMPANY_FILE_ID: 'defaultCompanyFileId',
  MYOB_TOKEN_PATH: 'tokenPath',
};

const CONFIG_KEYS: readonly ConfigKey[] = [
  'clientId',
  'clientSecret',
  'redirectUri',
  'defaultCompanyFileId',
  'tokenPath',
  'scopes',
  'format',
];

const PLACEHOLDER = /\$\{(\w+)\}/g;

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

/**
 * Replace ${VAR} with the environment value
 * @throws ValidationError naming the key when a variable is unset
 */
export function substituteEnv(value: string, key: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(PLACEHOLDER, (_match, name: string) => {
    const replacement = env[name];
    if (replacement === undefined) {
      throw new ValidationError(`Config key '${key}' references unset environment variable \${${name}}`, key);
    }
    return replacement;
  });
}

/**
 * Turn a command-line string into the typed value of a key
 */
export function parseConfigValue<K extends ConfigKey>(key: K, raw: string): AppConfig[K];
export function parseConfigValue(key: ConfigKey, raw: string): AppConfig[ConfigKey] {
  switch (key) {
    case 'scopes':
      return raw.split(/[\s,]+/).filter(Boolean);
    case 'format':
      if (!isOutputFormat(raw)) {
        throw new ValidationError(`Invalid format: '${raw}'. Expected json or table.`, key);
      }
      return raw;
    case 'defaultCompanyFileId':
      return assertGuid(raw, key);
    default:
      return raw;
  }
}

/**
 * Keep the known keys of a parsed config file, with the right types
 */
function sanitize(raw: unknown, configPath: string): AppConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ValidationError(`Config file ${configPath} must contain a JSON object`);
  }

  const config: AppConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) {
      loggers.config.warn('Ignoring unknown config key', { key, path: configPath });
      continue;
    }
    if (key === 'scopes') {
      if (!Array.isArray(value) || !value.every((scope) => typeof scope === 'string')) {
        throw new ValidationError(`Config key 'scopes' must be an array of strings`, key);
      }
      config.scopes = value;
    } else if (key === 'format') {
      if (typeof value !== 'string' || !isOutputFormat(value)) {
        throw new ValidationError(`Config key 'format' must be json or table`, key);
      }
      config.format = value;
    } else {
      if (typeof value !== 'string') {
        throw new ValidationError(`Config key '${key}' must be a string`, key);
      }
      config[key] = value;
    }
  }
  return config;
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;
  private readonly env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
    this.configPath = configPath || env.MYOB_CONFIG || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  /**
   * Missing file = empty config
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    const content = fs.readFileSync(this.configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(
        `Config file ${this.configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    loggers.config.debug('Loaded config', { path: this.configPath });
    return sanitize(parsed, this.configPath);
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  /**
   * Raw value from the file (no defaults, no substitution)
   */
  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Defaults, then the file, then environment overrides; ${VAR} substituted
   * @throws ValidationError listing missing keys or naming a bad value
   */
  resolve(): ResolvedConfig {
    const merged: AppConfig = { ...DEFAULT_CONFIG, ...this.config };

    for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
      const value = this.env[variable];
      if (value !== undefined && value.length > 0 && key !== 'scopes' && key !== 'format') {
        merged[key] = value;
      }
    }

    const text = (key: Exclude<ConfigKey, 'scopes' | 'format'>): string | undefined => {
      const value = merged[key];
      return value === undefined ? undefined : substituteEnv(value, key, this.env);
    };

    const clientId = text('clientId');
    const clientSecret = text('clientSecret');
    const missing = [
      ...(clientId ? [] : ['clientId (MYOB_CLIENT_ID)']),
      ...(clientSecret ? [] : ['clientSecret (MYOB_CLIENT_SECRET)']),
    ];
    if (!clientId || !clientSecret) {
      throw new ValidationError(`Missing configuration: ${missing.join(', ')}. Run \`myob config set\` or set the environment variables.`);
    }

    const defaultCompanyFileId = text('defaultCompanyFileId');

    return {
      clientId,
      clientSecret,
      redirectUri: text('redirectUri') ?? DEFAULT_CONFIG.redirectUri,
      defaultCompanyFileId: defaultCompanyFileId
        ? assertGuid(defaultCompanyFileId, 'defaultCompanyFileId')
        : undefined,
      tokenPath: this.resolvePath(text('tokenPath') ?? DEFAULT_CONFIG.tokenPath),
      scopes: (merged.scopes ?? DEFAULT_SCOPES).map((scope) => substituteEnv(scope, 'scopes', this.env)),
      format: merged.format ?? DEFAULT_CONFIG.format,
    };
  }

  /**
   * `~/` is the home directory; relative paths sit beside the config file
   */
  private resolvePath(value: string): string {
    if (value === '~' || value.startsWith('~/')) {
      return path.join(os.homedir(), value.slice(1));
    }
    return path.resolve(path.dirname(this.configPath), value);
  }
}
