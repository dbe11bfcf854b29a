/**
 * Config Loader - Configuration loading and merging
 *
 * Resolves the per-user data directory, reads config.json from it, merges
 * it over the defaults and applies environment variable overrides. A
 * missing config file is not an error.
 *
 * Precedence (highest first): environment, config.json, defaults.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { assertValidConfig, isPhaseSeconds, isPlainObject } from './config-validator.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { isNotFound } from '../utils/fs.js';
import { errorMessage } from '../utils/logger.js';

import type { GlyphdeckConfig } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Data directory name under the user's home directory */
export const DATA_DIR_NAME = '.glyphdeck';

/** Config file name */
const CONFIG_FILE = 'config.json';

/** Environment variable prefix for config overrides */
const ENV_PREFIX = 'GLYPHDECK_';

export const ENV_VARS = {
  HOME: `${ENV_PREFIX}HOME`,
  CHARACTER_SECONDS: `${ENV_PREFIX}CHARACTER_SECONDS`,
  ANSWER_SECONDS: `${ENV_PREFIX}ANSWER_SECONDS`,
  SHUFFLE: `${ENV_PREFIX}SHUFFLE`,
} as const;

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when the config file exists but cannot be read
 */
export class ConfigLoadError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(
    message: string,
    filePath: string,
    errorCause?: Error | undefined
  ) {
    super(message);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when the config file is not a JSON object
 */
export class ConfigParseError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(
    message: string,
    filePath: string,
    errorCause?: Error | undefined
  ) {
    super(message);
    this.name = 'ConfigParseError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse a boolean from an environment variable string
 */
function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {return undefined;}
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {return true;}
  if (lower === 'false' || lower === '0' || lower === 'no') {return false;}
  return undefined;
}

/**
 * Parse an integer from an environment variable string
 */
function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) {return undefined;}
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

/**
 * $GLYPHDECK_HOME, or ~/.glyphdeck
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[ENV_VARS.HOME]?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), DATA_DIR_NAME);
}

// ============================================================================
// Config Loader Class
// ============================================================================

export interface ConfigLoaderOptions {
  /** Data directory; resolved from the environment when omitted */
  dataDir?: string | undefined;
  /** Environment to read overrides from */
  env?: NodeJS.ProcessEnv | undefined;
  /** Whether to apply environment variable overrides */
  applyEnvOverrides?: boolean | undefined;
}

export interface ConfigLoadResult {
  config: GlyphdeckConfig;
  dataDir: string;
  /** Path to the config file (if found) */
  configPath?: string | undefined;
  configFileFound: boolean;
  envOverridesApplied: boolean;
}

export class ConfigLoader {
  private readonly env: NodeJS.ProcessEnv;
  private readonly dataDir: string;
  private readonly configPath: string;
  private readonly applyEnvOverrides: boolean;
  private cachedConfig: GlyphdeckConfig | null = null;

  constructor(options: ConfigLoaderOptions = {}) {
    this.env = options.env ?? process.env;
    this.dataDir = options.dataDir ?? resolveDataDir(this.env);
    this.configPath = path.join(this.dataDir, CONFIG_FILE);
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
  }

  /**
   * Load configuration from file, merge with defaults, and apply env overrides
   *
   * @throws ConfigLoadError if config.json exists but cannot be read
   * @throws ConfigParseError if config.json is not a JSON object
   * @throws ConfigValidationException if config.json holds invalid values
   */
  async load(): Promise<ConfigLoadResult> {
    let config: GlyphdeckConfig = { ...DEFAULT_CONFIG, headerLabels: [...DEFAULT_CONFIG.headerLabels] };
    let configFileFound = false;
    let envOverridesApplied = false;

    const fileConfig = await this.loadFromFile();
    if (fileConfig) {
      config = { ...config, ...fileConfig };
      configFileFound = true;
    }

    if (this.applyEnvOverrides) {
      const envConfig = this.getEnvOverrides();
      if (Object.keys(envConfig).length > 0) {
        config = { ...config, ...envConfig };
        envOverridesApplied = true;
      }
    }

    this.cachedConfig = config;

    return {
      config,
      dataDir: this.dataDir,
      configPath: configFileFound ? this.configPath : undefined,
      configFileFound,
      envOverridesApplied,
    };
  }

  /**
   * Get the cached configuration, loading if necessary
   */
  async getConfig(): Promise<GlyphdeckConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }
    const result = await this.load();
    return result.config;
  }

  getDataDir(): string {
    return this.dataDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async loadFromFile(): Promise<Partial<GlyphdeckConfig> | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new ConfigLoadError(
        `Failed to read configuration file: ${errorMessage(error)}`,
        this.configPath,
        error instanceof Error ? error : undefined
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (parseError) {
      throw new ConfigParseError(
        `Failed to parse configuration file: ${errorMessage(parseError)}`,
        this.configPath,
        parseError instanceof Error ? parseError : undefined
      );
    }

    if (!isPlainObject(parsed)) {
      throw new ConfigParseError('Configuration must be a JSON object', this.configPath);
    }

    return assertValidConfig(parsed);
  }

  /**
   * Invalid environment values are ignored
   */
  private getEnvOverrides(): Partial<GlyphdeckConfig> {
    const overrides: Partial<GlyphdeckConfig> = {};

    const characterSeconds = parseEnvInteger(this.env[ENV_VARS.CHARACTER_SECONDS]);
    if (isPhaseSeconds(characterSeconds)) {
      overrides.characterSeconds = characterSeconds;
    }

    const answerSeconds = parseEnvInteger(this.env[ENV_VARS.ANSWER_SECONDS]);
    if (isPhaseSeconds(answerSeconds)) {
      overrides.answerSeconds = answerSeconds;
    }

    const shuffle = parseEnvBoolean(this.env[ENV_VARS.SHUFFLE]);
    if (shuffle !== undefined) {
      overrides.shuffleOnStudy = shuffle;
    }

    return overrides;
  }
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Load configuration with default options
 */
export async function loadConfig(options: ConfigLoaderOptions = {}): Promise<ConfigLoadResult> {
  const loader = new ConfigLoader(options);
  return loader.load();
}
