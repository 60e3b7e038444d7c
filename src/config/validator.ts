// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Turns parsed JSON into a WorkspaceConfig. Values of the wrong type are
 * errors; values that are merely unusual become warnings.
 */

import { ConfigError } from '../errors.js';
import { PROVIDER_TYPES, type ProviderType, type WorkspaceConfig } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(data: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`"${key}" must be a string`, source);
  }
  return value;
}

function readNumber(data: Record<string, unknown>, key: string, source: string): number | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`"${key}" must be a number`, source);
  }
  return value;
}

function readBoolean(data: Record<string, unknown>, key: string, source: string): boolean | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`"${key}" must be true or false`, source);
  }
  return value;
}

export function parseProviderType(value: string, source: string): ProviderType {
  const provider = PROVIDER_TYPES.find((type) => type === value);
  if (!provider) {
    throw new ConfigError(`Unknown provider "${value}". Valid: ${PROVIDER_TYPES.join(', ')}`, source);
  }
  return provider;
}

/**
 * Check the shape of a parsed config file.
 * @throws ConfigError when a known key holds a value of the wrong type
 */
export function parseWorkspaceConfig(data: unknown, source: string): WorkspaceConfig {
  if (!isRecord(data)) {
    throw new ConfigError('Config must be a JSON object', source);
  }

  const config: WorkspaceConfig = {};
  const provider = readString(data, 'provider', source);
  if (provider !== undefined) config.provider = parseProviderType(provider, source);

  const model = readString(data, 'model', source);
  if (model !== undefined) config.model = model;
  const baseUrl = readString(data, 'baseUrl', source);
  if (baseUrl !== undefined) config.baseUrl = baseUrl;
  const apiVersion = readString(data, 'apiVersion', source);
  if (apiVersion !== undefined) config.apiVersion = apiVersion;
  const additions = readString(data, 'systemPromptAdditions', source);
  if (additions !== undefined) config.systemPromptAdditions = additions;

  const temperature = readNumber(data, 'temperature', source);
  if (temperature !== undefined) config.temperature = temperature;
  const contextWindow = readNumber(data, 'contextWindow', source);
  if (contextWindow !== undefined) config.contextWindow = contextWindow;
  const maxTokens = readNumber(data, 'maxTokens', source);
  if (maxTokens !== undefined) config.maxTokens = maxTokens;
  const retryDelayMs = readNumber(data, 'retryDelayMs', source);
  if (retryDelayMs !== undefined) config.retryDelayMs = retryDelayMs;

  const autoRun = readBoolean(data, 'autoRun', source);
  if (autoRun !== undefined) config.autoRun = autoRun;

  return config;
}

/**
 * Validate workspace configuration.
 * Returns an array of warning messages for questionable options.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const warnings: string[] = [];

  if (config.temperature !== undefined && (config.temperature < 0 || config.temperature > 2)) {
    warnings.push('temperature should be between 0 and 2');
  }

  if (config.contextWindow !== undefined && config.contextWindow <= 0) {
    warnings.push('contextWindow must be a positive number');
  }

  if (config.maxTokens !== undefined && config.maxTokens <= 0) {
    warnings.push('maxTokens must be a positive number');
  }

  if (
    config.contextWindow !== undefined &&
    config.maxTokens !== undefined &&
    config.maxTokens >= config.contextWindow
  ) {
    warnings.push('maxTokens leaves no room for the prompt in contextWindow');
  }

  if (config.retryDelayMs !== undefined && config.retryDelayMs < 0) {
    warnings.push('retryDelayMs cannot be negative');
  }

  return warnings;
}
