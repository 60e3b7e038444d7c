// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for debug output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';
import type { FunctionDefinition, Message } from './types.js';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - code runs and their output with timing */
  VERBOSE = 1,
  /** Debug - API details, context info */
  DEBUG = 2,
  /** Trace - outgoing request payloads */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Sanitize a string for safe terminal output.
 */
export function sanitize(str: string): string {
  // Replace control characters and escape sequences that could mess up the terminal
  return str
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
    .replace(/\r?\n/g, '\\n') // Show newlines as \n
    .replace(/\t/g, '\\t'); // Show tabs as \t
}

function preview(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + '...' : text;
}

/**
 * Centralized logger with level-aware output.
 */
export class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  /**
   * Set the current log level.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get the current log level.
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.level >= LogLevel.VERBOSE) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.level >= LogLevel.TRACE) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log an outgoing completion request at DEBUG level.
   */
  apiRequest(model: string, messageCount: number, hasFunctions: boolean): void {
    if (this.level >= LogLevel.DEBUG) {
      const functionsStr = hasFunctions ? ', with functions' : '';
      console.log(chalk.dim(`[API] Sending to ${model} (${messageCount} messages${functionsStr})...`));
    }
  }

  /**
   * Log the full outgoing message list at TRACE level.
   */
  apiRequestFull(model: string, messages: Message[], functions?: FunctionDefinition[]): void {
    if (this.level >= LogLevel.TRACE) {
      console.log(chalk.gray('\n' + '='.repeat(60)));
      console.log(chalk.gray('[API Request]'));
      console.log(chalk.gray('='.repeat(60)));
      console.log(chalk.gray(`  model: ${model}`));

      console.log(chalk.gray(`  messages: [`));
      for (const msg of messages.slice(-5)) { // Show last 5 messages
        const content = msg.content !== undefined
          ? preview(msg.content, 100)
          : msg.function_call ? `[call ${msg.function_call.name ?? '?'}]` : '';
        console.log(chalk.gray(`    { role: "${msg.role ?? '?'}", content: "${sanitize(content)}" }`));
      }
      if (messages.length > 5) {
        console.log(chalk.gray(`    ... and ${messages.length - 5} more messages`));
      }
      console.log(chalk.gray(`  ]`));

      if (functions && functions.length > 0) {
        console.log(chalk.gray(`  functions: [${functions.map(f => f.name).join(', ')}]`));
      }
      console.log(chalk.gray('='.repeat(60) + '\n'));
    }
  }

  /**
   * Log a failed stream attempt that will be retried.
   */
  apiRetry(attempt: number, maxAttempts: number, delayMs: number, reason: string): void {
    if (this.level >= LogLevel.VERBOSE) {
      console.log(chalk.yellow(
        `[API] Attempt ${attempt}/${maxAttempts} failed (${sanitize(reason)}), retrying in ${delayMs}ms`
      ));
    }
  }

  /**
   * Log code about to run at VERBOSE level.
   */
  codeExecution(language: string, code: string): void {
    if (this.level >= LogLevel.VERBOSE) {
      console.log(chalk.yellow(`\n📎 run_code (${language})`));
      console.log(chalk.dim(`   code: ${sanitize(preview(code, 80))}`));
    }
  }

  /**
   * Log execution output at VERBOSE level.
   */
  codeOutput(language: string, output: string, duration: number): void {
    if (this.level >= LogLevel.VERBOSE) {
      const lines = output.split('\n').length;
      console.log(chalk.green(`✓ ${language}`) + chalk.dim(` (${lines} lines, ${duration.toFixed(2)}s)`));
      if (this.level >= LogLevel.DEBUG) {
        console.log(chalk.dim(`   ${sanitize(preview(output, 200))}`));
      }
    }
  }

  /**
   * Log context state at DEBUG level.
   */
  contextState(messageCount: number, tokenEstimate: number, budget: number): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.dim(
        `[Context] ${tokenEstimate.toLocaleString()}/${budget.toLocaleString()} tokens, ${messageCount} messages`
      ));
    }
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
