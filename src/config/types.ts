// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 */

export const PROVIDER_TYPES = ['openai', 'azure', 'ollama'] as const;

export type ProviderType = (typeof PROVIDER_TYPES)[number];

/**
 * Contents of a global or workspace config file. Every key is optional.
 */
export interface WorkspaceConfig {
  /** Completion backend: a function-calling API or a local raw-text model */
  provider?: ProviderType;
  /** Model name; the deployment name on Azure */
  model?: string;
  /** API base URL (OpenAI-compatible servers, the Azure endpoint, or the Ollama host) */
  baseUrl?: string;
  /** Azure OpenAI API version */
  apiVersion?: string;
  temperature?: number;
  /** Run code without asking */
  autoRun?: boolean;
  /** Context window in tokens; overrides the model registry */
  contextWindow?: number;
  /** Completion length limit in tokens */
  maxTokens?: number;
  /** Appended to the system prompt */
  systemPromptAdditions?: string;
  /** Pause between attempts to open a stream */
  retryDelayMs?: number;
}

/**
 * Configuration after every layer has been applied.
 */
export interface ResolvedConfig {
  provider: ProviderType;
  model?: string;
  baseUrl?: string;
  apiKey?: string;
  apiVersion?: string;
  temperature: number;
  autoRun: boolean;
  contextWindow?: number;
  maxTokens?: number;
  systemPromptAdditions?: string;
  retryDelayMs: number;
}
