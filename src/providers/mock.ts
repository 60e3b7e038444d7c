// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Mock Provider for Testing
 *
 * A configurable mock provider that replays scripted completion streams
 * for deterministic testing without real API calls.
 */

import { BaseProvider } from './base.js';
import { RUN_CODE } from '../constants.js';
import type { CompletionChunk, CompletionRequest, FunctionDefinition, Message } from '../types.js';

/**
 * A single scripted reply.
 */
export interface MockResponse {
  /** Prose to stream */
  content?: string;
  /** Function call to stream (function-calling mode only) */
  functionCall?: { name?: string; arguments: string };
  /** Exact chunks to replay; overrides content and functionCall */
  chunks?: CompletionChunk[];
  /**
   * Finish reason of the last chunk. Defaults to 'function_call' when a
   * function call is scripted and 'stop' otherwise; null sends none.
   */
  finishReason?: string | null;
  /** Reject when the stream is requested */
  error?: Error;
}

/**
 * Configuration for MockProvider.
 */
export interface MockProviderConfig {
  /** Queue of responses to return in order */
  responses?: MockResponse[];
  /** Default response when queue is empty */
  defaultResponse?: string;
  /** Chunk size for streaming (default: 10 characters) */
  streamChunkSize?: number;
  /** Whether to report function-calling support (default: true) */
  supportsFunctionCalling?: boolean;
  /** Model name to report (default: 'mock-model') */
  model?: string;
  contextWindow?: number;
}

/**
 * Record of a single call to the provider.
 */
export interface MockCall {
  /** Messages sent to the provider */
  messages: Message[];
  functions: FunctionDefinition[];
  temperature: number;
  /** Timestamp of the call */
  timestamp: Date;
}

function split(text: string, size: number): string[] {
  const pieces: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    pieces.push(text.slice(i, i + size));
  }
  return pieces;
}

function abortError(): Error {
  const error = new Error('Request was aborted.');
  error.name = 'AbortError';
  return error;
}

/**
 * Mock provider for testing.
 * Simulates streamed completions with configurable behavior.
 */
export class MockProvider extends BaseProvider {
  private responseQueue: MockResponse[];
  private defaultResponse: string;
  private streamChunkSize: number;
  private functionCalling: boolean;
  private modelName: string;
  private callHistory: MockCall[] = [];

  constructor(config: MockProviderConfig = {}) {
    super({ contextWindow: config.contextWindow });
    this.responseQueue = [...(config.responses || [])];
    this.defaultResponse = config.defaultResponse || 'Mock response';
    this.streamChunkSize = config.streamChunkSize || 10;
    this.functionCalling = config.supportsFunctionCalling !== false;
    this.modelName = config.model || 'mock-model';
  }

  /**
   * Add responses to the queue.
   */
  addResponses(responses: MockResponse[]): void {
    this.responseQueue.push(...responses);
  }

  /**
   * Get the call history.
   */
  getCallHistory(): MockCall[] {
    return [...this.callHistory];
  }

  /**
   * Get the most recent call.
   */
  getLastCall(): MockCall | undefined {
    return this.callHistory[this.callHistory.length - 1];
  }

  getCallCount(): number {
    return this.callHistory.length;
  }

  async streamCompletion(request: CompletionRequest): Promise<AsyncIterable<CompletionChunk>> {
    this.callHistory.push({
      messages: structuredClone(request.messages),
      functions: structuredClone(request.functions),
      temperature: request.temperature,
      timestamp: new Date(),
    });

    const response = this.responseQueue.shift() ?? { content: this.defaultResponse };
    if (response.error) {
      throw response.error;
    }
    if (request.signal?.aborted) {
      throw abortError();
    }

    return this.replay(response.chunks ?? this.buildChunks(response), request.signal);
  }

  private async *replay(chunks: CompletionChunk[], signal?: AbortSignal): AsyncGenerator<CompletionChunk> {
    for (const chunk of chunks) {
      // Let the consumer run between chunks, as a network stream would
      await Promise.resolve();
      if (signal?.aborted) {
        throw abortError();
      }
      yield chunk;
    }
  }

  /**
   * Turn a scripted reply into stream chunks shaped like the real backend's.
   */
  private buildChunks(response: MockResponse): CompletionChunk[] {
    const chunks: CompletionChunk[] = [];
    const size = this.streamChunkSize;
    const finishReason = response.finishReason === undefined
      ? (response.functionCall ? 'function_call' : 'stop')
      : response.finishReason;

    if (!this.functionCalling) {
      for (const piece of split(response.content ?? '', size)) {
        chunks.push({ choices: [{ text: piece, finish_reason: null }] });
      }
      if (finishReason !== null) {
        chunks.push({ choices: [{ text: '', finish_reason: finishReason }] });
      }
      return chunks;
    }

    chunks.push({ choices: [{ delta: { role: 'assistant' }, finish_reason: null }] });
    for (const piece of split(response.content ?? '', size)) {
      chunks.push({ choices: [{ delta: { content: piece }, finish_reason: null }] });
    }
    if (response.functionCall) {
      chunks.push({
        choices: [{
          delta: { content: null, function_call: { name: response.functionCall.name ?? RUN_CODE } },
          finish_reason: null,
        }],
      });
      for (const piece of split(response.functionCall.arguments, size)) {
        chunks.push({ choices: [{ delta: { function_call: { arguments: piece } }, finish_reason: null }] });
      }
    }
    if (finishReason !== null) {
      chunks.push({ choices: [{ delta: {}, finish_reason: finishReason }] });
    }
    return chunks;
  }

  supportsFunctionCalling(): boolean {
    return this.functionCalling;
  }

  getName(): string {
    return 'Mock';
  }

  getModel(): string {
    return this.modelName;
  }
}
