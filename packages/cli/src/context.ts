/**
 * CLI Context - Configuration, cache and loader for one command run
 */

import {
  createConsoleLogger,
  DatasetLoader,
  FileCacheStore,
  loadConfig,
  type FetchLike,
  type GlyphdeckConfig,
  type Logger,
} from 'glyphdeck-core';

export interface CliContext {
  config: GlyphdeckConfig;
  dataDir: string;
  store: FileCacheStore;
  loader: DatasetLoader;
  logger: Logger;
}

export interface CliContextOptions {
  /** Show debug output */
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Replaces the global fetch for remote sheets */
  fetch?: FetchLike;
}

/**
 * @throws ConfigLoadError, ConfigParseError or ConfigValidationException for a bad config.json
 */
export async function createCliContext(options: CliContextOptions = {}): Promise<CliContext> {
  const logger = createConsoleLogger({ debug: options.verbose ?? false });

  const { config, dataDir, configPath, envOverridesApplied } = await loadConfig({ env: options.env });
  logger.debug(`Data directory: ${dataDir}`);
  if (configPath) {
    logger.debug(`Loaded configuration from ${configPath}`);
  }
  if (envOverridesApplied) {
    logger.debug('Applied configuration overrides from the environment');
  }

  const store = new FileCacheStore({ dataDir, logger });
  const loader = new DatasetLoader({
    store,
    headerLabels: config.headerLabels,
    sheetGid: config.sheetGid,
    logger,
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });

  return { config, dataDir, store, loader, logger };
}
