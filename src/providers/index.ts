// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { PROVIDER_TYPES } from '../config/types.js';
import type { ProviderConfig } from '../types.js';
import { AzureOpenAIProvider } from './azure.js';
import type { BaseProvider } from './base.js';
import { OllamaProvider } from './ollama.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';

export { BaseProvider } from './base.js';
export { AzureOpenAIProvider } from './azure.js';
export { OpenAICompatibleProvider } from './openai-compatible.js';
export { OllamaProvider } from './ollama.js';
export { MockProvider } from './mock.js';

export interface CreateProviderOptions extends ProviderConfig {
  /** One of PROVIDER_TYPES; anything else is rejected */
  type: string;
}

/**
 * Build the completion backend a resolved config selects.
 * @throws Error for a type outside PROVIDER_TYPES
 */
export function createProvider(options: CreateProviderOptions): BaseProvider {
  const { type, ...config } = options;
  switch (type) {
    case 'openai':
      return new OpenAICompatibleProvider(config);
    case 'azure':
      return new AzureOpenAIProvider(config);
    case 'ollama':
      return new OllamaProvider(config);
    default:
      throw new Error(`Unknown provider type: ${type}. Available: ${PROVIDER_TYPES.join(', ')}`);
  }
}
