// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > environment > workspace config > global config > defaults
 */

import { AGENT_CONFIG } from '../constants.js';
import type { ProviderType, ResolvedConfig, WorkspaceConfig } from './types.js';

/**
 * Model used by `--fast`.
 */
export const FAST_MODEL = 'gpt-3.5-turbo';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  provider: 'openai',
  temperature: AGENT_CONFIG.DEFAULT_TEMPERATURE,
  autoRun: false,
  retryDelayMs: AGENT_CONFIG.RETRY_DELAY_MS,
};

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  provider?: ProviderType;
  /** Use Azure OpenAI Service */
  azure?: boolean;
  /** Use the local raw-text backend */
  local?: boolean;
  /** Use the cheaper remote model unless a model is given */
  fast?: boolean;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  yes?: boolean;
  contextWindow?: number;
  maxTokens?: number;
}

/**
 * Apply a config file layer to the resolved config.
 */
function applyWorkspaceConfig(config: ResolvedConfig, source: WorkspaceConfig): void {
  if (source.provider) config.provider = source.provider;
  if (source.model) config.model = source.model;
  if (source.baseUrl) config.baseUrl = source.baseUrl;
  if (source.apiVersion) config.apiVersion = source.apiVersion;
  if (source.temperature !== undefined) config.temperature = source.temperature;
  if (source.autoRun !== undefined) config.autoRun = source.autoRun;
  if (source.contextWindow !== undefined) config.contextWindow = source.contextWindow;
  if (source.maxTokens !== undefined) config.maxTokens = source.maxTokens;
  if (source.retryDelayMs !== undefined) config.retryDelayMs = source.retryDelayMs;
  if (source.systemPromptAdditions) {
    config.systemPromptAdditions = config.systemPromptAdditions
      ? `${config.systemPromptAdditions}\n\n${source.systemPromptAdditions}`
      : source.systemPromptAdditions;
  }
}

/**
 * Credentials from the environment, for the provider already chosen.
 * The base URL only applies to the OpenAI-compatible backend.
 */
function applyEnvironment(config: ResolvedConfig, env: NodeJS.ProcessEnv): void {
  if (config.provider === 'azure') {
    const apiKey = env.AZURE_API_KEY || env.OPENAI_API_KEY;
    if (apiKey) config.apiKey = apiKey;
    if (env.AZURE_API_BASE) config.baseUrl = env.AZURE_API_BASE;
    if (env.AZURE_API_VERSION) config.apiVersion = env.AZURE_API_VERSION;
    if (env.AZURE_DEPLOYMENT_NAME) config.model = env.AZURE_DEPLOYMENT_NAME;
    return;
  }
  if (env.OPENAI_API_KEY) config.apiKey = env.OPENAI_API_KEY;
  if (env.OPENAI_BASE_URL && config.provider === 'openai') config.baseUrl = env.OPENAI_BASE_URL;
}

/**
 * Provider flags go first so the environment layer sees the final choice.
 */
function applyProviderChoice(config: ResolvedConfig, cli: CLIOptions): void {
  if (cli.provider) config.provider = cli.provider;
  if (cli.azure) config.provider = 'azure';
  if (cli.local) config.provider = 'ollama';
}

function applyCliOptions(config: ResolvedConfig, cli: CLIOptions): void {
  if (cli.model) {
    config.model = cli.model;
  } else if (cli.fast && config.provider === 'openai') {
    config.model = FAST_MODEL;
  }
  if (cli.baseUrl) config.baseUrl = cli.baseUrl;
  if (cli.temperature !== undefined) config.temperature = cli.temperature;
  if (cli.yes) config.autoRun = true;
  if (cli.contextWindow !== undefined) config.contextWindow = cli.contextWindow;
  if (cli.maxTokens !== undefined) config.maxTokens = cli.maxTokens;
}

export interface ConfigLayers {
  global?: WorkspaceConfig | null;
  workspace?: WorkspaceConfig | null;
  env?: NodeJS.ProcessEnv;
  cli?: CLIOptions;
}

/**
 * Merge every layer over the defaults, lowest priority first.
 */
export function mergeConfig(layers: ConfigLayers): ResolvedConfig {
  const config: ResolvedConfig = { ...DEFAULT_CONFIG };

  if (layers.global) applyWorkspaceConfig(config, layers.global);
  if (layers.workspace) applyWorkspaceConfig(config, layers.workspace);
  if (layers.cli) applyProviderChoice(config, layers.cli);
  if (layers.env) applyEnvironment(config, layers.env);
  if (layers.cli) applyCliOptions(config, layers.cli);

  return config;
}

export type AzureSetting = 'apiKey' | 'baseUrl' | 'model' | 'apiVersion';

/**
 * Settings Azure OpenAI needs that the config does not have yet.
 */
export function missingAzureSettings(config: ResolvedConfig): AzureSetting[] {
  const missing: AzureSetting[] = [];
  if (!config.apiKey) missing.push('apiKey');
  if (!config.baseUrl) missing.push('baseUrl');
  if (!config.model) missing.push('model');
  if (!config.apiVersion) missing.push('apiVersion');
  return missing;
}
