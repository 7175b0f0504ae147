import { join } from 'path';
import type { LintflowConfig } from '../types/index.js';
import { DEFAULTS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readJsonFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, describeError } from '../utils/errors.js';
import { getLintflowDirectories } from './directory.js';

/**
 * Configuration management for the lintflow CLI
 *
 * Precedence, highest first: command-line flags, LINTFLOW_* environment
 * variables, ~/.lintflow/config.json, built-in defaults.
 */

const CONFIG_KEYS = ['repoUrl', 'branch', 'language'] as const;

export interface ConfigFlags {
  repo?: string;
  branch?: string;
  language?: string;
}

export interface ResolvedSetupConfig {
  repoUrl: string;
  branch: string;
  language?: string;
}

class ConfigManager {
  private config: LintflowConfig | null = null;
  private readonly configPath: string;

  constructor(configPath: string = join(getLintflowDirectories().config, FILE_PATTERNS.CONFIG_JSON)) {
    this.configPath = configPath;
  }

  /**
   * Load the user configuration file; a missing file is an empty config
   */
  async load(): Promise<LintflowConfig> {
    if (this.config) {
      return this.config;
    }

    if (!(await exists(this.configPath))) {
      logger.debug('Config file not found, using defaults', { configPath: this.configPath });
      this.config = {};
      return this.config;
    }

    let raw: unknown;
    try {
      logger.debug(`Loading config from: ${this.configPath}`);
      raw = await readJsonFile(this.configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration: ${describeError(error)}`, [
        `Fix or remove ${this.configPath}`
      ]);
    }

    this.config = this.validate(raw);
    return this.config;
  }

  private validate(raw: unknown): LintflowConfig {
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
      throw new ConfigError('Invalid configuration structure', [`${this.configPath} must contain a JSON object`]);
    }

    const config: LintflowConfig = {};
    for (const key of CONFIG_KEYS) {
      const value: unknown = Reflect.get(raw, key);
      if (value === undefined) continue;
      if (typeof value !== 'string' || value.trim() === '') {
        throw new ConfigError(`Invalid configuration value for '${key}'`, [
          `'${key}' in ${this.configPath} must be a non-empty string`
        ]);
      }
      config[key] = value.trim();
    }
    return config;
  }
}

function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Merge flags, environment and the config file into the settings a setup
 * run needs. `language` stays undefined when nothing names one.
 */
export async function resolveSetupConfig(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv = process.env,
  manager: ConfigManager = configManager
): Promise<ResolvedSetupConfig> {
  const fileConfig = await manager.load();

  const resolved: ResolvedSetupConfig = {
    repoUrl: flags.repo ?? fromEnv(env, ENV_VARS.REPO_URL) ?? fileConfig.repoUrl ?? DEFAULTS.REPO_URL,
    branch: flags.branch ?? fromEnv(env, ENV_VARS.BRANCH) ?? fileConfig.branch ?? DEFAULTS.BRANCH
  };

  const language = flags.language ?? fromEnv(env, ENV_VARS.LANGUAGE) ?? fileConfig.language;
  if (language) {
    resolved.language = language;
  }

  logger.debug('Resolved setup configuration', resolved);
  return resolved;
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
