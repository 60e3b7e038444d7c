// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Type definitions (WorkspaceConfig, ResolvedConfig)
 * - loader.ts    - Reading the global and workspace files
 * - validator.ts - Shape checks and warnings
 * - merger.ts    - Layer merging with priority handling
 */

import { loadGlobalConfig, loadWorkspaceConfig } from './loader.js';
import { logger } from '../logger.js';
import { mergeConfig, type CLIOptions } from './merger.js';
import type { ResolvedConfig } from './types.js';

export type { ProviderType, WorkspaceConfig, ResolvedConfig } from './types.js';
export { PROVIDER_TYPES } from './types.js';

export {
  CONFIG_FILES,
  GLOBAL_CONFIG_DIR,
  GLOBAL_CONFIG_FILE,
  loadGlobalConfig,
  loadWorkspaceConfig,
} from './loader.js';
export type { LoadedConfig } from './loader.js';

export { parseProviderType, parseWorkspaceConfig, validateConfig } from './validator.js';

export { DEFAULT_CONFIG, FAST_MODEL, mergeConfig, missingAzureSettings } from './merger.js';
export type { AzureSetting, CLIOptions, ConfigLayers } from './merger.js';

export interface LoadConfigOptions {
  cwd?: string;
  /** Directory holding the global config.json (for testing) */
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
  cli?: CLIOptions;
}

/**
 * Load and merge every configuration layer.
 * @throws ConfigError when a config file holds a value of the wrong type
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const globalLayer = loadGlobalConfig(options.globalDir);
  const workspaceLayer = loadWorkspaceConfig(options.cwd);
  for (const loaded of [globalLayer, workspaceLayer]) {
    if (loaded.configPath) {
      logger.verbose(`Using config ${loaded.configPath}`);
    }
  }

  return mergeConfig({
    global: globalLayer.config,
    workspace: workspaceLayer.config,
    env: options.env ?? process.env,
    cli: options.cli,
  });
}
