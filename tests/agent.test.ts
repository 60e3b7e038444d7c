// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Agent, type AgentOptions } from '../src/agent.js';
import { FUNCTION_MESSAGES, RUN_CODE_FUNCTION } from '../src/constants.js';
import { BackendInitError, TransportError } from '../src/errors.js';
import type { MockProvider } from '../src/providers/mock.js';
import { createMockProvider, mockCodeCall, mockTextResponse } from './helpers/mock-provider.js';
import { RecordingDisplay } from './helpers/recording-display.js';
import { FakeBackend } from './helpers/fake-backend.js';

const SYSTEM_PROMPT = 'test system';

function createAgent(provider: MockProvider, overrides: Partial<AgentOptions> = {}) {
  const display = new RecordingDisplay();
  const backends: FakeBackend[] = [];
  const executorFactory = vi.fn((language: string) => {
    const backend = new FakeBackend(language, '1\n');
    backends.push(backend);
    return backend;
  });
  const confirm = vi.fn(async (_question: string, _signal?: AbortSignal) => true);
  const agent = new Agent({
    provider,
    display,
    confirm,
    systemPrompt: SYSTEM_PROMPT,
    executorFactory,
    retryDelayMs: 0,
    ...overrides,
  });
  return { agent, display, backends, executorFactory, confirm };
}

describe('Agent', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('prose replies', () => {
    it('streams a reply into a single assistant entry', async () => {
      const provider = createMockProvider([mockTextResponse('Hello there, how can I help?')]);
      const { agent, display } = createAgent(provider);

      await agent.chat('Hi');

      expect(agent.getHistory()).toEqual([
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello there, how can I help?' },
      ]);
      expect(display.events).toEqual(['beginWaiting', 'openMessage', 'endWaiting']);
      expect(display.messageSurfaces[0].endCount).toBeGreaterThan(0);
    });

    it('sends the system prompt first', async () => {
      const provider = createMockProvider([mockTextResponse('Hi')]);
      const { agent } = createAgent(provider);

      await agent.chat('Hello');

      expect(provider.getLastCall()?.messages).toEqual([
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: 'Hello' },
      ]);
      expect(provider.getLastCall()?.temperature).toBe(0.001);
    });

    it('declares run_code to function-calling backends', async () => {
      const provider = createMockProvider([mockTextResponse('Hi')]);
      const { agent } = createAgent(provider);

      await agent.chat('Hello');

      expect(provider.getLastCall()?.functions).toEqual([RUN_CODE_FUNCTION]);
    });

    it('treats a stream without a finish reason as a stop', async () => {
      const provider = createMockProvider([{ content: 'Partial answer', finishReason: null }]);
      const { agent } = createAgent(provider);

      await agent.chat('Hi');

      expect(agent.getHistory()[1]).toEqual({ role: 'assistant', content: 'Partial answer' });
      expect(provider.getCallCount()).toBe(1);
    });
  });

  describe('function calls', () => {
    it('asks, runs the code, records the output and continues', async () => {
      const provider = createMockProvider([
        mockCodeCall('python', 'print(1)'),
        mockTextResponse('It printed 1.'),
      ]);
      const { agent, display, backends, confirm } = createAgent(provider);

      await agent.chat('Print one');

      expect(agent.getHistory()).toEqual([
        { role: 'user', content: 'Print one' },
        {
          role: 'assistant',
          function_call: {
            name: 'run_code',
            arguments: '{"language":"python","code":"print(1)"}',
            parsed_arguments: { language: 'python', code: 'print(1)' },
          },
        },
        { role: 'function', name: 'run_code', content: '1\n' },
        { role: 'assistant', content: 'It printed 1.' },
      ]);
      expect(confirm).toHaveBeenCalledTimes(1);
      expect(backends[0].runs).toEqual(['print(1)']);
      expect(display.events).toEqual([
        'beginWaiting',
        'openMessage',
        'separator',
        'openCode',
        'showCode:python',
        'openCode',
        'endWaiting',
        'beginWaiting',
        'openMessage',
        'endWaiting',
      ]);
    });

    it('shows output on the surface opened after approval', async () => {
      const provider = createMockProvider([mockCodeCall('python', 'print(1)'), mockTextResponse('Done')]);
      const { agent, display } = createAgent(provider);

      await agent.chat('Go');

      const [preview, live] = display.codeSurfaces;
      expect(preview.endCount).toBeGreaterThan(0);
      expect(preview.outputs).toEqual([]);
      expect(live.outputs).toEqual(['1\n', '1\n']);
      expect(live.endCount).toBe(1);
    });

    it('updates the preview with arguments as they stream', async () => {
      const provider = createMockProvider([mockCodeCall('shell', 'ls -la'), mockTextResponse('Done')]);
      const { agent, display } = createAgent(provider);

      await agent.chat('List files');

      const preview = display.codeSurfaces[0];
      expect(preview.updates.length).toBeGreaterThan(2);
      expect(preview.language).toBe('shell');
      expect(preview.code).toBe('ls -la');
    });

    it('sends the output back on the next request', async () => {
      const provider = createMockProvider([mockCodeCall('python', 'print(1)'), mockTextResponse('Done')]);
      const { agent } = createAgent(provider);

      await agent.chat('Go');

      const messages = provider.getLastCall()?.messages ?? [];
      expect(messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'function']);
      expect(messages[3]).toEqual({ role: 'function', name: 'run_code', content: '1\n' });
    });

    it('stops when the user declines', async () => {
      const provider = createMockProvider([mockCodeCall('python', 'print(1)'), mockTextResponse('unused')]);
      const { agent, executorFactory } = createAgent(provider, {
        confirm: vi.fn(async (_question: string) => false),
      });

      await agent.chat('Go');

      expect(agent.getHistory()[2]).toEqual({
        role: 'function',
        name: 'run_code',
        content: FUNCTION_MESSAGES.DECLINED,
      });
      expect(agent.getHistory()).toHaveLength(3);
      expect(provider.getCallCount()).toBe(1);
      expect(executorFactory).not.toHaveBeenCalled();
    });

    it('runs without asking when auto-run is on', async () => {
      const provider = createMockProvider([mockCodeCall('python', 'print(1)'), mockTextResponse('Done')]);
      const { agent, display, confirm } = createAgent(provider, { autoRun: true });

      await agent.chat('Go');

      expect(confirm).not.toHaveBeenCalled();
      expect(display.codeSurfaces).toHaveLength(1);
      expect(display.codeSurfaces[0].outputs).toEqual(['1\n', '1\n']);
      expect(display.events).not.toContain('showCode:python');
    });

    it('records No output for silent code', async () => {
      const provider = createMockProvider([mockCodeCall('python', 'x = 1'), mockTextResponse('Done')]);
      const { agent } = createAgent(provider, {
        autoRun: true,
        executorFactory: (language) => new FakeBackend(language, ''),
      });

      await agent.chat('Go');

      expect(agent.getHistory()[2].content).toBe(FUNCTION_MESSAGES.NO_OUTPUT);
    });

    it('records whitespace-only output as it is', async () => {
      const provider = createMockProvider([mockCodeCall('python', 'print()'), mockTextResponse('Done')]);
      const { agent } = createAgent(provider, {
        autoRun: true,
        executorFactory: (language) => new FakeBackend(language, '\n'),
      });

      await agent.chat('Go');

      expect(agent.getHistory()[2]).toEqual({ role: 'function', name: 'run_code', content: '\n' });
    });

    it('records a failing backend as output', async () => {
      const provider = createMockProvider([mockCodeCall('python', 'x'), mockTextResponse('Sorry')]);
      const { agent } = createAgent(provider, {
        autoRun: true,
        executorFactory: (language) =>
          new FakeBackend(language, () => {
            throw new Error('interpreter crashed');
          }),
      });

      await agent.chat('Go');

      expect(agent.getHistory()[2].content).toBe('interpreter crashed');
      expect(agent.getHistory()[3]).toEqual({ role: 'assistant', content: 'Sorry' });
    });

    it('asks for a correction when the arguments never parse', async () => {
      const provider = createMockProvider([
        { functionCall: { arguments: 'not json' } },
        mockTextResponse('Let me try again.'),
      ]);
      const { agent, executorFactory } = createAgent(provider, { autoRun: true });

      await agent.chat('Go');

      expect(agent.getHistory()[2]).toEqual({
        role: 'function',
        name: 'run_code',
        content: FUNCTION_MESSAGES.UNPARSEABLE_CALL,
      });
      expect(agent.getHistory()[3]).toEqual({ role: 'assistant', content: 'Let me try again.' });
      expect(executorFactory).not.toHaveBeenCalled();
    });

    it('asks for a correction when the language is missing', async () => {
      const provider = createMockProvider([
        { functionCall: { arguments: '{"code": "print(1)"}' } },
        mockTextResponse('Fixed.'),
      ]);
      const { agent, executorFactory } = createAgent(provider, { autoRun: true });

      await agent.chat('Go');

      expect(agent.getHistory()[2].content).toBe(FUNCTION_MESSAGES.UNPARSEABLE_CALL);
      expect(executorFactory).not.toHaveBeenCalled();
    });

    it('does not run a call that finished with stop', async () => {
      const provider = createMockProvider([{ ...mockCodeCall('python', 'print(1)'), finishReason: 'stop' }]);
      const { agent, executorFactory, confirm } = createAgent(provider);

      await agent.chat('Go');

      expect(agent.getHistory()).toHaveLength(2);
      expect(confirm).not.toHaveBeenCalled();
      expect(executorFactory).not.toHaveBeenCalled();
    });

    it('reuses one backend per language', async () => {
      const provider = createMockProvider([
        mockCodeCall('python', 'x = 1'),
        mockCodeCall('python', 'print(x)'),
        mockTextResponse('Done'),
      ]);
      const { agent, backends, executorFactory } = createAgent(provider, { autoRun: true });

      await agent.chat('Go');

      expect(executorFactory).toHaveBeenCalledTimes(1);
      expect(backends[0].runs).toEqual(['x = 1', 'print(x)']);
    });

    it('fails the turn for a language without a backend', async () => {
      const provider = createMockProvider([mockCodeCall('cobol', 'DISPLAY 1')]);
      const { agent } = createAgent(provider, { autoRun: true, executorFactory: undefined });

      await expect(agent.chat('Go')).rejects.toBeInstanceOf(BackendInitError);
      expect(agent.getHistory()).toHaveLength(2);
    });
  });

  describe('fenced code from raw-text backends', () => {
    it('runs a block as soon as it closes', async () => {
      const provider = createMockProvider(
        [
          { content: 'Sure.\n```python\nprint(2)\n```\nextra' },
          mockTextResponse('The answer is 2.'),
        ],
        { supportsFunctionCalling: false }
      );
      const { agent, display, backends } = createAgent(provider, { autoRun: true });

      await agent.chat('What is 1 + 1?');

      expect(backends[0].runs).toEqual(['print(2)']);
      expect(agent.getHistory()).toEqual([
        { role: 'user', content: 'What is 1 + 1?' },
        {
          role: 'assistant',
          content: 'Sure.\n```python\nprint(2)\n```\ne',
          function_call: { parsed_arguments: { language: 'python', code: 'print(2)' } },
        },
        { role: 'function', name: 'run_code', content: '1\n' },
        { role: 'assistant', content: 'The answer is 2.' },
      ]);
      expect(display.events).toEqual([
        'beginWaiting',
        'separator',
        'openCode',
        'endWaiting',
        'beginWaiting',
        'openMessage',
        'endWaiting',
      ]);
    });

    it('declares no functions', async () => {
      const provider = createMockProvider([mockTextResponse('Hi')], { supportsFunctionCalling: false });
      const { agent } = createAgent(provider);

      await agent.chat('Hello');

      expect(provider.getLastCall()?.functions).toEqual([]);
    });

    it('asks for a correction when a block has no code', async () => {
      const provider = createMockProvider(
        [{ content: '```python\n```' }, mockTextResponse('Oops.')],
        { supportsFunctionCalling: false }
      );
      const { agent, executorFactory } = createAgent(provider, { autoRun: true });

      await agent.chat('Go');

      expect(agent.getHistory()[2].content).toBe(FUNCTION_MESSAGES.UNPARSEABLE_BLOCK);
      expect(executorFactory).not.toHaveBeenCalled();
    });
  });

  describe('transport', () => {
    it('retries a failed request', async () => {
      const provider = createMockProvider([{ error: new Error('connection reset') }, mockTextResponse('Hi')]);
      const { agent } = createAgent(provider);

      await agent.chat('Hello');

      expect(provider.getCallCount()).toBe(2);
      expect(agent.getHistory()[1]).toEqual({ role: 'assistant', content: 'Hi' });
    });

    it('fails the turn after every attempt fails', async () => {
      const provider = createMockProvider([
        { error: new Error('boom') },
        { error: new Error('boom') },
        { error: new Error('boom') },
      ]);
      const { agent } = createAgent(provider);

      const error = await agent.chat('Hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof TransportError && error.attempts).toBe(3);
      expect(error instanceof Error && error.message).toBe('Failed to reach Mock after 3 attempts: boom');
      expect(provider.getCallCount()).toBe(3);
      expect(agent.getHistory()).toEqual([{ role: 'user', content: 'Hello' }]);
    });

    it('honours maxAttempts', async () => {
      const provider = createMockProvider([{ error: new Error('down') }, mockTextResponse('unused')]);
      const { agent } = createAgent(provider, { maxAttempts: 1 });

      await expect(agent.chat('Hello')).rejects.toBeInstanceOf(TransportError);
      expect(provider.getCallCount()).toBe(1);
    });
  });

  describe('interrupts', () => {
    it('ends quietly when aborted before the request', async () => {
      const provider = createMockProvider([mockTextResponse('unused')]);
      const { agent } = createAgent(provider);
      const controller = new AbortController();
      controller.abort();

      await agent.chat('Hello', { signal: controller.signal });

      expect(agent.getHistory()).toEqual([{ role: 'user', content: 'Hello' }]);
      expect(provider.getCallCount()).toBe(1);
    });

    it('drops the empty entry when aborted before the first fragment', async () => {
      const provider = createMockProvider([mockTextResponse('unused')]);
      const { agent, display } = createAgent(provider);
      const controller = new AbortController();

      const turn = agent.chat('Hello', { signal: controller.signal });
      controller.abort();
      await turn;

      expect(agent.getHistory()).toEqual([{ role: 'user', content: 'Hello' }]);
      expect(display.events).toEqual(['beginWaiting', 'endWaiting']);
    });

    it('does not run code approved after the turn was interrupted', async () => {
      const provider = createMockProvider([mockCodeCall('python', 'print(1)'), mockTextResponse('unused')]);
      const controller = new AbortController();
      const confirm = vi.fn(async (_question: string, signal?: AbortSignal) => {
        controller.abort();
        return signal !== undefined;
      });
      const { agent, executorFactory } = createAgent(provider, { confirm });

      await agent.chat('Print one', { signal: controller.signal });

      expect(confirm).toHaveBeenCalledWith(expect.any(String), controller.signal);
      expect(executorFactory).not.toHaveBeenCalled();
      expect(agent.getHistory().map((entry) => entry.role)).toEqual(['user', 'assistant']);
      expect(provider.getCallCount()).toBe(1);
    });

    it('stops the turn when the backend is interrupted', async () => {
      const provider = createMockProvider([mockCodeCall('python', 'input()'), mockTextResponse('unused')]);
      const controller = new AbortController();
      const { agent } = createAgent(provider, {
        autoRun: true,
        executorFactory: (language) =>
          new FakeBackend(language, (_code, options) => {
            controller.abort();
            options?.signal?.throwIfAborted();
            return 'unreachable';
          }),
      });

      await agent.chat('Wait', { signal: controller.signal });

      expect(agent.getHistory().map((entry) => entry.role)).toEqual(['user', 'assistant']);
      expect(provider.getCallCount()).toBe(1);
    });

    it('keeps what streamed before the abort', async () => {
      const provider = createMockProvider([mockTextResponse('A long answer that gets cut off')]);
      const controller = new AbortController();
      const display = new RecordingDisplay();
      vi.spyOn(display, 'openMessage').mockImplementation(() => {
        controller.abort();
        return RecordingDisplay.prototype.openMessage.call(display);
      });
      const { agent } = createAgent(provider, { display });

      await agent.chat('Hello', { signal: controller.signal });

      expect(agent.getHistory()).toEqual([
        { role: 'user', content: 'Hello' },
        { role: 'assistant' },
      ]);
      expect(display.surfaces[0].endCount).toBe(1);
      expect(display.events).toContain('endWaiting');
    });
  });

  describe('separator', () => {
    it('is skipped when code follows an assistant entry', async () => {
      const provider = createMockProvider([mockCodeCall('python', '1'), mockTextResponse('Done')]);
      const { agent, display } = createAgent(provider, { autoRun: true });
      agent.load([
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello' },
      ]);

      await agent.respond();

      expect(display.events.slice(0, 3)).toEqual(['beginWaiting', 'openMessage', 'openCode']);
    });
  });

  describe('session management', () => {
    it('reset clears history and disposes backends', async () => {
      const provider = createMockProvider([mockCodeCall('python', '1'), mockTextResponse('Done')]);
      const { agent, backends } = createAgent(provider, { autoRun: true });
      await agent.chat('Go');

      agent.reset();

      expect(agent.getHistory()).toEqual([]);
      expect(backends[0].disposeCount).toBe(1);
    });

    it('reset makes the next run create a new backend', async () => {
      const provider = createMockProvider([
        mockCodeCall('python', '1'),
        mockTextResponse('Done'),
        mockCodeCall('python', '2'),
        mockTextResponse('Done'),
      ]);
      const { agent, executorFactory } = createAgent(provider, { autoRun: true });

      await agent.chat('First');
      agent.reset();
      await agent.chat('Second');

      expect(executorFactory).toHaveBeenCalledTimes(2);
    });

    it('undo removes the last user message and everything after it', () => {
      const provider = createMockProvider([]);
      const { agent } = createAgent(provider);
      agent.load([
        { role: 'user', content: 'one' },
        { role: 'assistant', content: 'reply one' },
        { role: 'user', content: 'two' },
        { role: 'assistant', content: 'reply two' },
      ]);

      const removed = agent.undo();

      expect(removed).toEqual([
        { role: 'user', content: 'two' },
        { role: 'assistant', content: 'reply two' },
      ]);
      expect(agent.getHistory()).toEqual([
        { role: 'user', content: 'one' },
        { role: 'assistant', content: 'reply one' },
      ]);
    });

    it('undo does nothing without a user message', () => {
      const { agent } = createAgent(createMockProvider([]));
      expect(agent.undo()).toEqual([]);
    });

    it('getHistory returns a copy', () => {
      const { agent } = createAgent(createMockProvider([]));
      agent.getHistory().push({ role: 'user', content: 'x' });
      expect(agent.getHistory()).toEqual([]);
    });

    it('switches auto-run', () => {
      const { agent } = createAgent(createMockProvider([]));
      expect(agent.isAutoRun()).toBe(false);
      agent.setAutoRun(true);
      expect(agent.isAutoRun()).toBe(true);
    });
  });
});
