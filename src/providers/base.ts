// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import type { CompletionChunk, CompletionRequest, ProviderConfig } from '../types.js';
import { DEFAULT_CONTEXT_WINDOW, getModelContextWindow } from '../models.js';

/**
 * Abstract base class for completion backends.
 * Implement this interface to add support for new model backends.
 */
export abstract class BaseProvider {
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
  }

  /**
   * Open a streaming completion.
   *
   * Resolves once the request has been accepted; failures to connect reject
   * here so the caller can retry. The returned iterable yields chunks shaped
   * like `{ choices: [{ delta | text, finish_reason }] }`.
   */
  abstract streamCompletion(request: CompletionRequest): Promise<AsyncIterable<CompletionChunk>>;

  /**
   * Whether the backend accepts function declarations and streams
   * structured calls. Raw-text backends write fenced code instead.
   */
  abstract supportsFunctionCalling(): boolean;

  /**
   * Get the name of this provider for display purposes.
   */
  abstract getName(): string;

  /**
   * Get the current model being used.
   */
  abstract getModel(): string;

  /**
   * Context window of the model in tokens.
   */
  getContextWindow(): number {
    return this.config.contextWindow ?? getModelContextWindow(this.getModel()) ?? DEFAULT_CONTEXT_WINDOW;
  }

  /**
   * Token budget available for the outgoing prompt.
   */
  getPromptTokenBudget(): number {
    return this.getContextWindow();
  }

  /**
   * Final touch-up of a finished prose reply. Identity by default.
   */
  cleanupContent(content: string): string {
    return content;
  }
}
