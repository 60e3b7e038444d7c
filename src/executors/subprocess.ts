// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { spawn } from 'child_process';
import { EXECUTION_CONFIG } from '../constants.js';
import { logger } from '../logger.js';
import { truncateOutput, type ExecutionBackend, type RunOptions } from './base.js';

/**
 * How to start an interpreter that reads a whole program from stdin.
 */
export interface InterpreterCommand {
  command: string;
  args: string[];
}

/** Languages whose interpreter cannot be kept running between blocks */
export const SCRIPT_RUNNERS: Record<string, InterpreterCommand> = {
  applescript: { command: 'osascript', args: ['-'] },
};

export interface SubprocessBackendOptions {
  cwd?: string;
  timeoutMs?: number;
  maxOutputLength?: number;
}

/**
 * Runs each block by piping it into a fresh interpreter process.
 */
export class SubprocessBackend implements ExecutionBackend {
  private readonly cwd: string;
  private readonly timeoutMs: number;
  private readonly maxOutputLength: number;

  constructor(
    readonly language: string,
    private readonly interpreter: InterpreterCommand,
    options: SubprocessBackendOptions = {}
  ) {
    this.cwd = options.cwd ?? process.cwd();
    this.timeoutMs = options.timeoutMs ?? EXECUTION_CONFIG.TIMEOUT_MS;
    this.maxOutputLength = options.maxOutputLength ?? EXECUTION_CONFIG.MAX_OUTPUT_LENGTH;
  }

  async run(code: string, options: RunOptions = {}): Promise<string> {
    options.signal?.throwIfAborted();
    const { command, args } = this.interpreter;

    return new Promise<string>((resolve) => {
      let output = '';
      let settled = false;
      let timedOut = false;

      const child = spawn(command, args, { cwd: this.cwd, env: process.env, stdio: 'pipe' });

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, this.timeoutMs);

      const onAbort = () => {
        child.kill('SIGTERM');
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (result: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        resolve(truncateOutput(result, this.maxOutputLength));
      };

      const append = (data: Buffer | string) => {
        output += data.toString();
        options.onOutput?.(output);
      };

      child.stdout?.on('data', append);
      child.stderr?.on('data', append);

      child.stdin?.on('error', (error: Error) => {
        // The interpreter may exit before reading all of stdin
        logger.debug(`stdin of ${command} closed early: ${error.message}`);
      });

      child.on('error', (error: Error) => {
        finish(`Failed to start ${command}: ${error.message}`);
      });

      child.on('close', (exitCode: number | null) => {
        let result = output;
        if (timedOut) {
          result += `\n[Timed out after ${this.timeoutMs / 1000} seconds]`;
        } else if (exitCode !== null && exitCode !== 0) {
          result += `\n[Exit code ${exitCode}]`;
        }
        finish(result);
      });

      child.stdin?.end(code);
    });
  }

  dispose(): void {
    // Every run has its own process; nothing is held between runs
  }
}
