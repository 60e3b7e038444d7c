// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Functions for loading configuration files from disk.
 * Handles the global and workspace configuration files.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { logger } from '../logger.js';
import type { WorkspaceConfig } from './types.js';
import { parseWorkspaceConfig, validateConfig } from './validator.js';

/**
 * Configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.coderun.json', '.coderun/config.json', 'coderun.config.json'];

/**
 * Global config directory path.
 */
export const GLOBAL_CONFIG_DIR = path.join(os.homedir(), '.coderun');

/**
 * Global config file path.
 */
export const GLOBAL_CONFIG_FILE = path.join(GLOBAL_CONFIG_DIR, 'config.json');

export interface LoadedConfig {
  config: WorkspaceConfig | null;
  configPath: string | null;
}

/**
 * Read one config file. Files that are not JSON are reported and ignored;
 * a JSON file with mistyped values throws ConfigError.
 */
function readConfigFile(configPath: string): WorkspaceConfig | null {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  const config = parseWorkspaceConfig(data, configPath);
  for (const warning of validateConfig(config)) {
    logger.warn(`${configPath}: ${warning}`);
  }
  return config;
}

/**
 * Load global configuration from ~/.coderun/config.json.
 * @param overrideDir - Optional directory override for testing
 */
export function loadGlobalConfig(overrideDir?: string): LoadedConfig {
  const configPath = overrideDir
    ? path.join(overrideDir, 'config.json')
    : GLOBAL_CONFIG_FILE;

  if (fs.existsSync(configPath)) {
    return { config: readConfigFile(configPath), configPath };
  }
  return { config: null, configPath: null };
}

/**
 * Find and load workspace configuration from the current directory.
 * Searches for .coderun.json, .coderun/config.json, or coderun.config.json
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): LoadedConfig {
  for (const fileName of CONFIG_FILES) {
    const configPath = path.join(cwd, fileName);
    if (fs.existsSync(configPath)) {
      return { config: readConfigFile(configPath), configPath };
    }
  }
  return { config: null, configPath: null };
}
