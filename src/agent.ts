import type { BaseProvider } from './providers/base.js';
import type { ConfirmPrompt } from './cli/confirmation.js';
import { AGENT_CONFIG, FUNCTION_MESSAGES, RUN_CODE, RUN_CODE_FUNCTION } from './constants.js';
import { trimMessages } from './context.js';
import { createDetector, type CodeIntentDetector } from './detectors.js';
import { TransportError, errorMessage, isAbortError } from './errors.js';
import { ExecutionGate } from './execution-gate.js';
import { createExecutor, type ExecutionBackend, type ExecutorFactory } from './executors/index.js';
import { logger } from './logger.js';
import { withRetry } from './providers/retry.js';
import type { CompletionChunk, FunctionDefinition, Message, RunCodeArguments } from './types.js';
import type { CodeSurface, Display, DisplaySurface } from './ui/types.js';
import { countMessageTokens } from './utils/token-counter.js';
import { mergeDeltas } from './utils/merge-deltas.js';

export interface AgentOptions {
  provider: BaseProvider;
  display: Display;
  /** Asks the user before code runs, unless auto-run is on */
  confirm: ConfirmPrompt;
  systemPrompt: string;
  autoRun?: boolean;
  /** Creates the backend for a language the first time it is needed */
  executorFactory?: ExecutorFactory;
  temperature?: number;
  /** Attempts made to open a stream before the turn fails */
  maxAttempts?: number;
  /** Pause between stream attempts */
  retryDelayMs?: number;
}

export interface RespondOptions {
  /** Interrupts the current turn; the transcript is kept */
  signal?: AbortSignal;
}

type TurnOutcome = 'continue' | 'stop';

/**
 * Arguments a backend can act on: both fields present and non-empty.
 */
function usableRequest(request: RunCodeArguments | undefined): { language: string; code: string } | undefined {
  if (!request?.language || !request.code) {
    return undefined;
  }
  return { language: request.language, code: request.code };
}

/**
 * The Agent orchestrates the conversation between the user, the model and
 * the execution backends.
 *
 * Each turn streams one reply into a new transcript entry, renders it as it
 * grows, and when the reply is a code request, asks, runs, records the
 * output and goes around again until the model answers in prose.
 */
export class Agent {
  private provider: BaseProvider;
  private display: Display;
  private detector: CodeIntentDetector;
  private gate: ExecutionGate;
  private systemPrompt: string;
  private executorFactory: ExecutorFactory;
  private temperature: number;
  private maxAttempts: number;
  private retryDelayMs: number;
  private messages: Message[] = [];
  private executors = new Map<string, ExecutionBackend>();

  constructor(options: AgentOptions) {
    this.provider = options.provider;
    this.display = options.display;
    this.detector = createDetector(options.provider.supportsFunctionCalling());
    this.gate = new ExecutionGate({
      display: options.display,
      confirm: options.confirm,
      autoRun: options.autoRun,
    });
    this.systemPrompt = options.systemPrompt;
    this.executorFactory = options.executorFactory ?? ((language) => createExecutor(language));
    this.temperature = options.temperature ?? AGENT_CONFIG.DEFAULT_TEMPERATURE;
    this.maxAttempts = options.maxAttempts ?? AGENT_CONFIG.TRANSPORT_MAX_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? AGENT_CONFIG.RETRY_DELAY_MS;
  }

  /**
   * Add a user message and respond to it.
   */
  async chat(message: string, options: RespondOptions = {}): Promise<void> {
    this.messages.push({ role: 'user', content: message });
    await this.respond(options);
  }

  /**
   * Respond to the transcript as it stands, running code as the model asks,
   * until the model stops, the user declines, or the signal fires.
   *
   * @throws TransportError when the stream cannot be opened
   * @throws BackendInitError when the model asks for a language with no backend
   */
  async respond(options: RespondOptions = {}): Promise<void> {
    try {
      let outcome: TurnOutcome = 'continue';
      while (outcome === 'continue') {
        outcome = await this.runTurn(options.signal);
      }
    } catch (error) {
      if (!isAbortError(error)) {
        throw error;
      }
      logger.debug('Turn interrupted');
      // An interrupt before the first fragment leaves an empty entry behind
      const last = this.messages[this.messages.length - 1];
      if (last && Object.keys(last).length === 0) {
        this.messages.pop();
      }
    }
  }

  /**
   * Run one request/stream/act cycle.
   */
  private async runTurn(signal?: AbortSignal): Promise<TurnOutcome> {
    const budget = this.provider.getPromptTokenBudget();
    const outgoing = trimMessages(this.messages, { maxTokens: budget, systemMessage: this.systemPrompt });
    const functions = this.getFunctions();

    logger.contextState(outgoing.length, countMessageTokens(outgoing), budget);
    logger.apiRequest(this.provider.getModel(), outgoing.length, functions.length > 0);
    logger.apiRequestFull(this.provider.getModel(), outgoing, functions);

    let surface: DisplaySurface | undefined;

    this.display.beginWaiting();
    try {
      const stream = await this.openStream(outgoing, functions, signal);

      const entry: Message = {};
      this.messages.push(entry);

      let codeSurface: CodeSurface | undefined;
      let inCode = false;
      let finishReason: string | null | undefined;

      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        if (!choice) continue;

        mergeDeltas(entry, this.detector.toDelta(choice));
        entry.role ??= 'assistant';

        const isCode = this.detector.isCodeIntent(entry);
        let implicitFinish = false;

        if (isCode) {
          if (!inCode) {
            surface?.end();
            const previous = this.messages[this.messages.length - 2];
            if (previous?.role === 'user' || previous?.role === 'function') {
              this.display.separator();
            }
            codeSurface = undefined;
          }
          inCode = true;
          codeSurface ??= this.display.openCode();
          surface = codeSurface;
          this.detector.updateArguments(entry);
        } else {
          if (inCode && this.detector.implicitFinish) {
            // A closed fence is the raw-text equivalent of a finished call
            this.detector.updateArguments(entry);
            implicitFinish = true;
          }
          inCode = false;
          surface ??= this.display.openMessage();
        }

        surface.update(entry);

        if (implicitFinish) {
          finishReason = 'function_call';
          break;
        }
        if (choice.finish_reason) {
          finishReason = choice.finish_reason;
          break;
        }
      }

      if (finishReason === 'function_call') {
        codeSurface ??= this.display.openCode();
        surface = codeSurface;
        return await this.handleCodeRequest(entry, codeSurface, signal);
      }

      // A stream that ends without a finish signal counts as a normal stop
      if (entry.content !== undefined) {
        entry.content = this.provider.cleanupContent(entry.content);
        surface?.update(entry);
      }
      logger.debug(`Reply finished (${finishReason ?? 'no finish reason'})`);
      return 'stop';
    } finally {
      this.display.endWaiting();
      surface?.end();
    }
  }

  /**
   * Gate, validate and run a finished code request.
   */
  private async handleCodeRequest(entry: Message, surface: CodeSurface, signal?: AbortSignal): Promise<TurnOutcome> {
    const decision = await this.gate.review(surface, entry.function_call?.parsed_arguments ?? {}, signal);

    if (!decision.approved) {
      this.appendFunctionResult(FUNCTION_MESSAGES.DECLINED);
      return 'stop';
    }

    const live = decision.surface;
    try {
      const request = usableRequest(decision.request);
      if (!request) {
        logger.debug(`Unusable ${this.detector.mode} request: ${JSON.stringify(entry.function_call ?? {})}`);
        this.appendFunctionResult(this.detector.correctionMessage);
        return 'continue';
      }

      const backend = this.getExecutor(request.language);
      logger.codeExecution(request.language, request.code);

      const startTime = Date.now();
      let output: string;
      try {
        output = await backend.run(request.code, {
          onOutput: (partial) => live.setOutput(partial),
          signal,
        });
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        // The model gets to see what went wrong and try again
        output = errorMessage(error);
      }
      logger.codeOutput(request.language, output, (Date.now() - startTime) / 1000);

      live.setOutput(output);
      this.appendFunctionResult(output === '' ? FUNCTION_MESSAGES.NO_OUTPUT : output);
      return 'continue';
    } finally {
      live.end();
    }
  }

  private appendFunctionResult(content: string): void {
    this.messages.push({ role: 'function', name: RUN_CODE, content });
  }

  /**
   * Open the completion stream, retrying with a fixed delay.
   */
  private async openStream(
    messages: Message[],
    functions: FunctionDefinition[],
    signal?: AbortSignal
  ): Promise<AsyncIterable<CompletionChunk>> {
    try {
      return await withRetry(
        () => this.provider.streamCompletion({ messages, functions, temperature: this.temperature, signal }),
        {
          maxRetries: this.maxAttempts - 1,
          initialDelayMs: this.retryDelayMs,
          signal,
          onRetry: (attempt, error, delayMs) => {
            logger.apiRetry(attempt, this.maxAttempts, delayMs, error.message);
          },
        }
      );
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new TransportError(
        `Failed to reach ${this.provider.getName()} after ${this.maxAttempts} attempts: ${errorMessage(error)}`,
        this.maxAttempts,
        error
      );
    }
  }

  private getFunctions(): FunctionDefinition[] {
    return this.detector.mode === 'function-call' ? [RUN_CODE_FUNCTION] : [];
  }

  /**
   * Backends are created on first use and kept for the rest of the session.
   */
  private getExecutor(language: string): ExecutionBackend {
    let backend = this.executors.get(language);
    if (!backend) {
      backend = this.executorFactory(language);
      this.executors.set(language, backend);
    }
    return backend;
  }

  /**
   * Clear the transcript and dispose every execution backend.
   */
  reset(): void {
    this.messages = [];
    for (const backend of this.executors.values()) {
      backend.dispose();
    }
    this.executors.clear();
  }

  /**
   * Remove the most recent user message and everything after it.
   * Returns the removed entries (empty when there is no user message).
   */
  undo(): Message[] {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      if (this.messages[i].role === 'user') {
        return this.messages.splice(i);
      }
    }
    return [];
  }

  /**
   * Replace the transcript.
   */
  load(messages: Message[]): void {
    this.messages = [...messages];
  }

  /**
   * Get the conversation history.
   */
  getHistory(): Message[] {
    return [...this.messages];
  }

  setAutoRun(enabled: boolean): void {
    this.gate.setAutoRun(enabled);
  }

  isAutoRun(): boolean {
    return this.gate.isAutoRun();
  }
}
