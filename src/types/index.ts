// Command option types
export interface BaseCommandOptions {
  cwd?: string;
  verbose?: boolean;
}

export interface SetupOptions extends BaseCommandOptions {
  repo?: string;
  branch?: string;
  yes?: boolean;
  dryRun?: boolean;
  skipInstall?: boolean;
  remoteSetup?: boolean;  // commander sets this to false for --no-remote-setup
}

export interface EnvOptions extends BaseCommandOptions {
  json?: string;
}

// User configuration (~/.lintflow/config.json)
export interface LintflowConfig {
  repoUrl?: string;
  branch?: string;
  language?: string;
}

export interface LintflowDirectories {
  config: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

export enum ErrorCodes {
  FETCH_ERROR = 'FETCH_ERROR',
  NOT_A_PROJECT = 'NOT_A_PROJECT',
  UNKNOWN_ECOSYSTEM = 'UNKNOWN_ECOSYSTEM',
  MANIFEST_PATCH_ERROR = 'MANIFEST_PATCH_ERROR',
  DOWNSTREAM_COMMAND_ERROR = 'DOWNSTREAM_COMMAND_ERROR',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  USER_CANCELLED = 'USER_CANCELLED'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
