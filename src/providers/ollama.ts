/**
 * Ollama provider for local raw-text models, using /api/generate directly.
 * Code comes back as fenced markdown rather than function calls.
 */

import { BaseProvider } from './base.js';
import { buildPrompt, capitalize } from './prompt-template.js';
import { LOCAL_MODEL_CONFIG } from '../constants.js';
import { logger } from '../logger.js';
import type { CompletionChunk, CompletionRequest, ProviderConfig } from '../types.js';

const DEFAULT_BASE_URL = 'http://localhost:11434';

interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  raw: boolean;
  stream: boolean;
  options: {
    temperature: number;
    num_predict: number;
    num_ctx: number;
    stop: string[];
  };
}

interface OllamaGenerateResponse {
  response?: string;
  done?: boolean;
  done_reason?: string;
}

function parseLine(line: string): OllamaGenerateResponse | undefined {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch (error) {
    logger.debug(`Skipping malformed Ollama line: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
  if (typeof data !== 'object' || data === null) {
    return undefined;
  }
  const response: unknown = Reflect.get(data, 'response');
  const done: unknown = Reflect.get(data, 'done');
  const doneReason: unknown = Reflect.get(data, 'done_reason');
  return {
    response: typeof response === 'string' ? response : undefined,
    done: done === true,
    done_reason: typeof doneReason === 'string' ? doneReason : undefined,
  };
}

export class OllamaProvider extends BaseProvider {
  private baseUrl: string;
  private model: string;

  constructor(config: ProviderConfig = {}) {
    super(config);
    this.baseUrl = (config.baseUrl || process.env.OLLAMA_HOST || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.model = config.model || LOCAL_MODEL_CONFIG.DEFAULT_MODEL;
  }

  async streamCompletion(request: CompletionRequest): Promise<AsyncIterable<CompletionChunk>> {
    const prompt = buildPrompt(request.messages, this.model);
    logger.trace(`Prompt sent to ${this.model}:\n${prompt}`);

    const body: OllamaGenerateRequest = {
      model: this.model,
      prompt,
      raw: true,
      stream: true,
      options: {
        temperature: request.temperature,
        num_predict: this.getMaxTokens(),
        num_ctx: this.getContextWindow(),
        stop: [...LOCAL_MODEL_CONFIG.STOP_SEQUENCES],
      },
    };

    const response = await fetch(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: request.signal,
    });

    if (!response.ok) {
      throw new Error(`Ollama API request failed: ${response.status} ${response.statusText}`);
    }

    if (!response.body) {
      throw new Error('Response body is undefined');
    }

    return this.readStream(response.body);
  }

  private async *readStream(body: ReadableStream<Uint8Array>): AsyncGenerator<CompletionChunk> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let first = true;
    let finished = false;

    const toChunk = (data: OllamaGenerateResponse): CompletionChunk => {
      let text = data.response ?? '';
      if (first && text) {
        text = capitalize(text);
        first = false;
      }
      return {
        choices: [{ text, finish_reason: data.done ? (data.done_reason ?? 'stop') : null }],
      };
    };

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        // Last element is a partial line (or empty)
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          if (!line.trim()) continue;
          const data = parseLine(line);
          if (data) yield toChunk(data);
        }
      }

      buffer += decoder.decode();
      if (buffer.trim()) {
        const data = parseLine(buffer);
        if (data) yield toChunk(data);
      }
      finished = true;
    } finally {
      // Consumer stopped early (e.g. a closed code fence): drop the connection
      if (!finished) {
        await reader.cancel();
      }
      reader.releaseLock();
    }
  }

  supportsFunctionCalling(): boolean {
    return false;
  }

  getName(): string {
    return 'Ollama';
  }

  getModel(): string {
    return this.model;
  }

  getContextWindow(): number {
    return this.config.contextWindow ?? LOCAL_MODEL_CONFIG.CONTEXT_WINDOW;
  }

  getMaxTokens(): number {
    return this.config.maxTokens ?? LOCAL_MODEL_CONFIG.MAX_TOKENS;
  }

  /**
   * Prompt and completion share the context window.
   */
  getPromptTokenBudget(): number {
    return this.getContextWindow() - this.getMaxTokens() - LOCAL_MODEL_CONFIG.PROMPT_SAFETY_BUFFER;
  }

  /**
   * Local models tend to pad the end of a reply with `#` characters.
   */
  cleanupContent(content: string): string {
    return content.trim().replace(/#+$/, '');
  }
}
