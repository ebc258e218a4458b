import type { OutputFormat } from '../utils/output.js';

/**
 * Config file structure. Every key is optional on disk; DEFAULT_CONFIG fills the gaps.
 */
export interface AppConfig {
  /** MYOB developer key (also sent as x-myobapi-key) */
  clientId?: string;
  /** MYOB developer secret */
  clientSecret?: string;
  /** OAuth redirect URI; its port is where the callback listener binds */
  redirectUri?: string;
  /** Company file used when a command doesn't name one */
  defaultCompanyFileId?: string;
  /** Credential file location */
  tokenPath?: string;
  /** OAuth scopes requested at login */
  scopes?: string[];
  /** Default output format */
  format?: OutputFormat;
}

export type ConfigKey = keyof AppConfig;

/**
 * Configuration after defaults, environment overrides and ${VAR} substitution
 */
export interface ResolvedConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  defaultCompanyFileId?: string;
  tokenPath: string;
  scopes: string[];
  format: OutputFormat;
}
