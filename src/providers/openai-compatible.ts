import OpenAI from 'openai';
import { BaseProvider } from './base.js';
import { RUN_CODE } from '../constants.js';
import type {
  CompletionChunk,
  CompletionRequest,
  Delta,
  FunctionDefinition,
  Message,
  ProviderConfig,
} from '../types.js';

const DEFAULT_MODEL = 'gpt-4';

/**
 * OpenAI-compatible provider that works with:
 * - OpenAI API
 * - Any other server exposing chat completions with function calling
 */
export class OpenAICompatibleProvider extends BaseProvider {
  private client: OpenAI;
  private model: string;
  private providerName: string;

  constructor(config: ProviderConfig & { providerName?: string } = {}, client?: OpenAI) {
    super(config);
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey || process.env.OPENAI_API_KEY || 'not-needed',
        baseURL: config.baseUrl,
        // Attempts are counted by the caller
        maxRetries: 0,
      });
    this.model = config.model || DEFAULT_MODEL;
    this.providerName = config.providerName || 'OpenAI';
  }

  async streamCompletion(request: CompletionRequest): Promise<AsyncIterable<CompletionChunk>> {
    const params: OpenAI.ChatCompletionCreateParamsStreaming = {
      model: this.model,
      messages: this.convertMessages(request.messages),
      temperature: request.temperature,
      stream: true,
    };
    if (request.functions.length > 0) {
      params.functions = this.convertFunctions(request.functions);
    }
    if (this.config.maxTokens) {
      params.max_tokens = this.config.maxTokens;
    }

    const stream = await this.client.chat.completions.create(params, { signal: request.signal });
    return this.mapStream(stream);
  }

  supportsFunctionCalling(): boolean {
    return true;
  }

  getName(): string {
    return this.providerName;
  }

  getModel(): string {
    return this.model;
  }

  private async *mapStream(
    stream: AsyncIterable<OpenAI.ChatCompletionChunk>
  ): AsyncGenerator<CompletionChunk> {
    for await (const chunk of stream) {
      // Azure sends content filter results in frames without choices
      if (chunk.choices.length === 0) continue;
      yield {
        choices: chunk.choices.map((choice) => ({
          delta: this.convertDelta(choice.delta),
          finish_reason: choice.finish_reason,
        })),
      };
    }
  }

  private convertDelta(delta: OpenAI.ChatCompletionChunk.Choice.Delta): Delta {
    const converted: Delta = {};
    if (delta.role === 'assistant') {
      converted.role = 'assistant';
    }
    if (delta.content !== undefined) {
      converted.content = delta.content;
    }
    if (delta.function_call) {
      converted.function_call = {};
      if (delta.function_call.name !== undefined) {
        converted.function_call.name = delta.function_call.name;
      }
      if (delta.function_call.arguments !== undefined) {
        converted.function_call.arguments = delta.function_call.arguments;
      }
    }
    return converted;
  }

  private convertFunctions(functions: FunctionDefinition[]): OpenAI.ChatCompletionCreateParams.Function[] {
    return functions.map((fn) => ({
      name: fn.name,
      description: fn.description,
      parameters: { ...fn.parameters },
    }));
  }

  /**
   * Map transcript entries to API messages. Locally parsed arguments are
   * dropped; only the raw argument text goes back to the model.
   */
  private convertMessages(messages: Message[]): OpenAI.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.ChatCompletionMessageParam => {
      const content = msg.content ?? '';
      switch (msg.role) {
        case 'system':
          return { role: 'system', content };
        case 'user':
          return { role: 'user', content };
        case 'function':
          return { role: 'function', name: msg.name ?? RUN_CODE, content };
        default: {
          const call = msg.function_call;
          if (call) {
            return {
              role: 'assistant',
              content: msg.content ?? null,
              function_call: { name: call.name ?? RUN_CODE, arguments: call.arguments ?? '' },
            };
          }
          return { role: 'assistant', content };
        }
      }
    });
  }
}
