// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Execution backends run one language's code and report its output as text.
 */

export interface RunOptions {
  /** Called with the output collected so far, as it grows */
  onOutput?: (output: string) => void;
  /** Kills a running program */
  signal?: AbortSignal;
}

export interface ExecutionBackend {
  readonly language: string;

  /**
   * Run `code` and resolve with its combined output. Failures of the
   * program itself (errors, non-zero exits, timeouts) are part of the output;
   * the promise only rejects when the backend itself is broken.
   */
  run(code: string, options?: RunOptions): Promise<string>;

  /** Release anything held between runs. */
  dispose(): void;
}

/** Creates the backend for a language, or throws BackendInitError. */
export type ExecutorFactory = (language: string) => ExecutionBackend;

/**
 * Keep the end of very long output, where errors usually are.
 */
export function truncateOutput(output: string, maxLength: number): string {
  if (output.length <= maxLength) {
    return output;
  }
  return `[${output.length - maxLength} characters truncated]\n` + output.slice(-maxLength);
}
