// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

// Core message types

/** Roles a transcript entry can carry. */
export type Role = 'system' | 'user' | 'assistant' | 'function';

/**
 * Best-effort structured view of the `run_code` arguments.
 * Fields stay optional because they are filled in while the call streams.
 */
export type RunCodeArguments = {
  language?: string;
  code?: string;
};

/**
 * A function call as it is assembled from the stream.
 * @property {string} [name] - Name of the called function.
 * @property {string} [arguments] - Raw JSON text received so far.
 * @property {RunCodeArguments} [parsed_arguments] - Last successfully repaired view of `arguments`.
 */
export type FunctionCall = {
  name?: string;
  arguments?: string;
  parsed_arguments?: RunCodeArguments;
};

/**
 * One entry of the conversation transcript.
 *
 * While a reply streams, the last entry is the one being accumulated and
 * every field may still be missing. `name` is only set on `function` entries.
 */
export type Message = {
  role?: Role;
  content?: string;
  function_call?: FunctionCall;
  name?: string;
};

/**
 * A partial fragment of a single entry, shaped like a subset of Message.
 * `content` may be null on fragments that only carry function-call data.
 */
export type Delta = {
  role?: Role;
  content?: string | null;
  function_call?: {
    name?: string;
    arguments?: string;
  };
};

// Completion stream

/**
 * One choice of a streamed completion unit.
 * Function-calling backends fill `delta`; raw-text backends fill `text`.
 */
export interface CompletionChoice {
  delta?: Delta;
  text?: string;
  finish_reason?: string | null;
}

/** One unit received from the completion stream. */
export interface CompletionChunk {
  choices: CompletionChoice[];
}

/**
 * Declared capability schema sent to the completion service.
 */
export interface FunctionDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * Everything a provider needs to open a completion stream.
 */
export interface CompletionRequest {
  /** Trimmed transcript with the system message first */
  messages: Message[];
  /** Capabilities the model may call (ignored by raw-text backends) */
  functions: FunctionDefinition[];
  temperature: number;
  signal?: AbortSignal;
}

// Provider configuration
/**
 * Represents configuration settings for a provider, such as API keys and model details.
 * @property {string} [apiKey] - Optional API key for authentication.
 * @property {string} [baseUrl] - Optional base URL for the provider's API.
 * @property {string} [model] - The AI model to use, if applicable.
 * @property {number} [maxTokens] - Maximum number of tokens to generate.
 * @property {number} [contextWindow] - Context window of the model in tokens.
 */
export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  /** Azure OpenAI API version */
  apiVersion?: string;
  maxTokens?: number;
  contextWindow?: number;
}
