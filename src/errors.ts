// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Error types that end a turn or a command.
 *
 * Conditions the model can recover from (unparseable calls, failed
 * executions, declined confirmations) are not errors; they are appended to
 * the transcript instead.
 */

/**
 * Base class for coderun errors.
 */
export class CoderunError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CoderunError';
  }
}

/**
 * The completion stream could not be opened after every attempt.
 */
export class TransportError extends CoderunError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

/**
 * No execution backend can be created for the requested language.
 */
export class BackendInitError extends CoderunError {
  constructor(public readonly language: string, reason?: string) {
    super(`Cannot run ${language} code${reason ? `: ${reason}` : ''}`);
    this.name = 'BackendInitError';
  }
}

/**
 * A configuration file or option holds an invalid value.
 */
export class ConfigError extends CoderunError {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${message} (in ${source})` : message);
    this.name = 'ConfigError';
  }
}

/**
 * A saved transcript does not contain Message entries.
 */
export class TranscriptFormatError extends CoderunError {
  constructor(message: string, public readonly path: string) {
    super(`${message}: ${path}`);
    this.name = 'TranscriptFormatError';
  }
}

/**
 * Check whether an error was caused by an AbortSignal firing.
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === 'AbortError' || error.name === 'APIUserAbortError';
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
