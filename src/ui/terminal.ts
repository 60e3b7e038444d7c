// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Plain terminal rendering for streamed replies.
 *
 * Streams are written incrementally: each surface remembers how much of its
 * entry it has already printed and only writes what is new.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { spinner as defaultSpinner, type SpinnerManager } from '../spinner.js';
import type { Message } from '../types.js';
import type { CodeSurface, Display, DisplaySurface } from './types.js';

export type WriteFn = (text: string) => void;

export interface TerminalDisplayOptions {
  write?: WriteFn;
  spinner?: SpinnerManager;
  /** Force colors on or off; defaults to chalk's own detection */
  color?: boolean;
  /** Model name shown while waiting */
  model?: string;
}

/**
 * Print only the part of `next` not already printed.
 * Returns the new printed text, or the old one when `next` rewrote history.
 */
function writeSuffix(write: WriteFn, printed: string, next: string, style: (text: string) => string): string {
  if (!next.startsWith(printed)) {
    return printed;
  }
  const suffix = next.slice(printed.length);
  if (suffix) {
    write(style(suffix));
  }
  return next;
}

class MessageSurface implements DisplaySurface {
  private printed = '';
  private ended = false;

  constructor(private readonly write: WriteFn) {}

  update(message: Message): void {
    if (this.ended) return;
    this.printed = writeSuffix(this.write, this.printed, message.content ?? '', text => text);
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    if (this.printed && !this.printed.endsWith('\n')) {
      this.write('\n');
    }
  }
}

class TerminalCodeSurface implements CodeSurface {
  private language: string | undefined;
  private code: string | undefined;
  private printed = '';
  private headerShown = false;
  private outputShown = false;
  private printedOutput = '';
  private ended = false;

  constructor(
    private readonly write: WriteFn,
    private readonly c: ChalkInstance
  ) {}

  update(message: Message): void {
    if (this.ended) return;
    const args = message.function_call?.parsed_arguments;
    if (!args) return;

    if (args.language !== undefined) {
      this.language = args.language;
    }
    if (args.code !== undefined) {
      this.code = args.code;
    }

    if (!this.headerShown && this.language !== undefined) {
      this.headerShown = true;
      this.write(this.c.bold.magenta(`\n[${this.language}]\n`));
    }
    if (this.code !== undefined) {
      this.printed = writeSuffix(this.write, this.printed, this.code, text => this.c.cyan(text));
    }
  }

  /**
   * Show program output. Called repeatedly with the output so far while the
   * program runs, then once with the final text.
   */
  setOutput(output: string): void {
    if (this.ended) return;
    if (!this.outputShown) {
      this.outputShown = true;
      if (this.printed && !this.printed.endsWith('\n')) {
        this.write('\n');
      }
    }
    this.printedOutput = writeSuffix(this.write, this.printedOutput, output, text => this.c.dim(text));
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.write('\n');
  }
}

/**
 * Display backed by a writable terminal.
 */
export class TerminalDisplay implements Display {
  private readonly write: WriteFn;
  private readonly spinner: SpinnerManager;
  private readonly c: ChalkInstance;
  private readonly model: string | undefined;

  constructor(options: TerminalDisplayOptions = {}) {
    this.write = options.write ?? (text => { process.stdout.write(text); });
    this.spinner = options.spinner ?? defaultSpinner;
    this.c = options.color === undefined ? chalk : new Chalk({ level: options.color ? 1 : 0 });
    this.model = options.model;
  }

  beginWaiting(): void {
    this.spinner.thinking(this.model);
  }

  endWaiting(): void {
    this.spinner.stop();
  }

  openMessage(): DisplaySurface {
    this.spinner.stop();
    return new MessageSurface(this.write);
  }

  openCode(): CodeSurface {
    this.spinner.stop();
    return new TerminalCodeSurface(this.write, this.c);
  }

  separator(): void {
    this.spinner.stop();
    this.write('\n');
  }

  showCode(language: string, code: string): void {
    this.write(this.c.bold.magenta(`\n[${language}]\n`));
    this.write(this.c.cyan(`${code}\n`));
  }
}
