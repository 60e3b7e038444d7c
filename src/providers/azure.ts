// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { AzureOpenAI } from 'openai';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import type { ProviderConfig } from '../types.js';

/**
 * Azure OpenAI Service. `model` names the deployment, `baseUrl` is the
 * resource endpoint.
 */
export class AzureOpenAIProvider extends OpenAICompatibleProvider {
  constructor(config: ProviderConfig = {}) {
    super(
      { ...config, providerName: 'Azure OpenAI' },
      new AzureOpenAI({
        apiKey: config.apiKey,
        endpoint: config.baseUrl,
        apiVersion: config.apiVersion,
        deployment: config.model,
        maxRetries: 0,
      })
    );
  }
}
