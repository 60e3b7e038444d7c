// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Static model registry with context windows.
 */

export interface ModelInfo {
  /** Model identifier (e.g., "gpt-4") */
  id: string;
  /** Human-readable display name */
  name: string;
  /** Context window size in tokens */
  contextWindow: number;
}

/** Used when a model is not in the registry */
export const DEFAULT_CONTEXT_WINDOW = 8192;

/**
 * Static list of known models.
 */
export const STATIC_MODELS: ModelInfo[] = [
  // OpenAI GPT-4o models
  { id: 'gpt-4o', name: 'GPT-4o', contextWindow: 128000 },
  { id: 'gpt-4o-mini', name: 'GPT-4o Mini', contextWindow: 128000 },

  // OpenAI GPT-4 models
  { id: 'gpt-4-turbo', name: 'GPT-4 Turbo', contextWindow: 128000 },
  { id: 'gpt-4-32k', name: 'GPT-4 32K', contextWindow: 32768 },
  { id: 'gpt-4', name: 'GPT-4', contextWindow: 8192 },

  // OpenAI GPT-3.5
  { id: 'gpt-3.5-turbo-16k', name: 'GPT-3.5 Turbo 16K', contextWindow: 16385 },
  { id: 'gpt-3.5-turbo', name: 'GPT-3.5 Turbo', contextWindow: 4096 },
];

/**
 * Get context window size for a specific model.
 * Returns undefined if model is not found in registry.
 */
export function getModelContextWindow(modelId: string): number | undefined {
  // Try exact match first
  const exactMatch = STATIC_MODELS.find(m => m.id === modelId);
  if (exactMatch) {
    return exactMatch.contextWindow;
  }

  // Try prefix match for versioned models (e.g., gpt-4-0613 → gpt-4)
  // Only match if the next character after the prefix is a version separator (-)
  // This prevents "gpt-4" from matching "gpt-4o"
  for (const model of STATIC_MODELS) {
    if (modelId.startsWith(model.id) && modelId[model.id.length] === '-') {
      return model.contextWindow;
    }
  }

  return undefined;
}
