// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { spawn, type ChildProcess } from 'child_process';
import { EXECUTION_CONFIG } from '../constants.js';
import { logger } from '../logger.js';
import { truncateOutput, type ExecutionBackend, type RunOptions } from './base.js';
import type { SubprocessBackendOptions } from './subprocess.js';

/** Line that closes a block of code written to an interpreter */
export const END_OF_BLOCK = '__CODERUN_END_OF_BLOCK__';

/** Printed with the block's status once the interpreter has run it */
export const DONE_MARKER = '__CODERUN_DONE__';

const DONE_LINE = new RegExp(`${DONE_MARKER}(-?\\d+)\\r?\\n`);

/**
 * How to start a long-lived interpreter and hand it blocks of code.
 */
export interface ReplCommand {
  command: string;
  args: string[];
  /** Written once, right after the interpreter starts */
  setup?: string;
  /** Sent when the turn is cancelled; SIGTERM when unset */
  interruptSignal?: NodeJS.Signals;
  /** Text written to stdin to run one block and print the done marker */
  frame(code: string): string;
}

const blockFrame = (code: string): string => `${code}\n${END_OF_BLOCK}\n`;

const PYTHON_DRIVER = [
  'import sys, traceback',
  'sys.stderr = sys.stdout',
  "scope = {'__name__': '__main__'}",
  'lines = []',
  'for line in sys.stdin:',
  `    if line.rstrip('\\r\\n') != '${END_OF_BLOCK}':`,
  '        lines.append(line)',
  '        continue',
  '    status = 0',
  '    try:',
  "        exec(compile(''.join(lines), '<code>', 'exec'), scope)",
  '    except SystemExit as error:',
  '        status = error.code if isinstance(error.code, int) else 0 if error.code is None else 1',
  '    except BaseException:',
  '        traceback.print_exc()',
  '        status = 1',
  '    lines = []',
  `    print('${DONE_MARKER}' + str(status), flush=True)`,
].join('\n');

const NODE_DRIVER = [
  '(() => {',
  "  const vm = require('vm');",
  "  const readline = require('readline');",
  '  globalThis.require = require;',
  '  console.error = console.log;',
  '  console.warn = console.log;',
  '  const lines = [];',
  '  let queue = Promise.resolve();',
  "  readline.createInterface({ input: process.stdin }).on('line', (line) => {",
  `    if (line !== '${END_OF_BLOCK}') {`,
  '      lines.push(line);',
  '      return;',
  '    }',
  "    const code = lines.splice(0).join('\\n');",
  '    queue = queue.then(async () => {',
  '      let status = 0;',
  '      try {',
  "        await vm.runInThisContext(code, { filename: 'code' });",
  '      } catch (error) {',
  '        console.log(error instanceof Error && error.stack ? error.stack : String(error));',
  '        status = 1;',
  '      }',
  `      process.stdout.write('${DONE_MARKER}' + status + '\\n');`,
  '    });',
  '  });',
  '})();',
].join('\n');

const R_DRIVER = [
  'sink(stdout(), type = "message")',
  '.con <- file("stdin")',
  'open(.con)',
  '.lines <- character(0)',
  'while (length(.line <- readLines(.con, n = 1)) > 0) {',
  `  if (.line != "${END_OF_BLOCK}") {`,
  '    .lines <- c(.lines, .line)',
  '    next',
  '  }',
  '  .status <- 0',
  '  tryCatch({',
  '    for (.expr in parse(text = .lines)) {',
  '      .shown <- withVisible(eval(.expr, envir = globalenv()))',
  '      if (.shown$visible) print(.shown$value)',
  '    }',
  '  }, error = function(e) {',
  '    message("Error: ", conditionMessage(e))',
  '    .status <<- 1',
  '  })',
  '  .lines <- character(0)',
  `  cat("${DONE_MARKER}", .status, "\\n", sep = "")`,
  '}',
].join('\n');

export const REPLS: Record<string, ReplCommand> = {
  python: {
    command: 'python3',
    args: ['-u', '-c', PYTHON_DRIVER],
    interruptSignal: 'SIGINT',
    frame: blockFrame,
  },
  javascript: { command: 'node', args: ['-e', NODE_DRIVER], frame: blockFrame },
  R: { command: 'Rscript', args: ['-e', R_DRIVER], frame: blockFrame },
  shell: {
    command: 'bash',
    args: [],
    setup: 'exec 2>&1\n',
    frame: (code) =>
      `eval "$(cat <<'${END_OF_BLOCK}'\n${code}\n${END_OF_BLOCK}\n)"\necho "${DONE_MARKER}$?"\n`,
  },
};

/**
 * Output collected so far, without the done marker or a line that may be
 * the start of one.
 */
export function visibleOutput(output: string): string {
  const done = output.indexOf(DONE_MARKER);
  if (done !== -1) {
    return output.slice(0, done);
  }
  const lineStart = output.lastIndexOf('\n') + 1;
  const tail = output.slice(lineStart);
  return tail && DONE_MARKER.startsWith(tail) ? output.slice(0, lineStart) : output;
}

interface PendingRun {
  output: string;
  shown: string;
  timedOut: boolean;
  onOutput?: (output: string) => void;
  finish(result: string): void;
}

/**
 * Runs blocks in one interpreter process that lives as long as the backend,
 * so variables, imports and the working directory carry over between runs.
 */
export class ReplBackend implements ExecutionBackend {
  private child: ChildProcess | undefined;
  private pending: PendingRun | undefined;
  private readonly cwd: string;
  private readonly timeoutMs: number;
  private readonly maxOutputLength: number;

  constructor(
    readonly language: string,
    private readonly repl: ReplCommand,
    options: SubprocessBackendOptions = {}
  ) {
    this.cwd = options.cwd ?? process.cwd();
    this.timeoutMs = options.timeoutMs ?? EXECUTION_CONFIG.TIMEOUT_MS;
    this.maxOutputLength = options.maxOutputLength ?? EXECUTION_CONFIG.MAX_OUTPUT_LENGTH;
  }

  /** Whether an interpreter process is currently running */
  isStarted(): boolean {
    return this.child !== undefined;
  }

  async run(code: string, options: RunOptions = {}): Promise<string> {
    options.signal?.throwIfAborted();
    if (this.pending) {
      throw new Error(`A ${this.language} block is already running`);
    }
    const child = this.child ?? this.start();
    const { signal, onOutput } = options;

    return new Promise<string>((resolve) => {
      const onAbort = () => {
        child.kill(this.repl.interruptSignal ?? 'SIGTERM');
      };
      const timer = setTimeout(() => {
        pending.timedOut = true;
        child.kill('SIGTERM');
      }, this.timeoutMs);

      const pending: PendingRun = {
        output: '',
        shown: '',
        timedOut: false,
        onOutput,
        finish: (result) => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
          this.pending = undefined;
          resolve(truncateOutput(result, this.maxOutputLength));
        },
      };
      this.pending = pending;
      signal?.addEventListener('abort', onAbort, { once: true });
      child.stdin?.write(this.repl.frame(code));
    });
  }

  dispose(): void {
    const child = this.child;
    if (!child) return;
    this.child = undefined;
    child.stdin?.end();
    child.kill('SIGTERM');
    logger.debug(`Stopped ${this.repl.command} for ${this.language}`);
  }

  private start(): ChildProcess {
    const { command, args, setup } = this.repl;
    const child = spawn(command, args, { cwd: this.cwd, env: process.env, stdio: 'pipe' });
    this.child = child;
    logger.debug(`Started ${command} for ${this.language}`);

    const onData = (data: Buffer | string) => {
      if (this.child === child) {
        this.receive(data.toString());
      }
    };
    child.stdout?.on('data', onData);
    child.stderr?.on('data', onData);

    child.stdin?.on('error', (error: Error) => {
      logger.debug(`stdin of ${command} closed: ${error.message}`);
    });

    child.on('error', (error: Error) => {
      this.forget(child);
      this.pending?.finish(`Failed to start ${command}: ${error.message}`);
    });

    child.on('close', (exitCode: number | null) => {
      this.forget(child);
      this.closed(exitCode);
    });

    if (setup) {
      child.stdin?.write(setup);
    }
    return child;
  }

  private receive(text: string): void {
    const pending = this.pending;
    if (!pending) {
      logger.debug(`Output from ${this.language} outside a run: ${text}`);
      return;
    }

    pending.output += text;
    const done = DONE_LINE.exec(pending.output);
    if (done) {
      const result = pending.output.slice(0, done.index);
      const status = Number(done[1]);
      pending.finish(status === 0 ? result : `${result}\n[Exit code ${status}]`);
      return;
    }

    const shown = visibleOutput(pending.output);
    if (shown !== pending.shown) {
      pending.shown = shown;
      pending.onOutput?.(shown);
    }
  }

  /** The interpreter exited; the block it was running ends with it. */
  private closed(exitCode: number | null): void {
    const pending = this.pending;
    if (!pending) return;

    let result = visibleOutput(pending.output);
    if (pending.timedOut) {
      result += `\n[Timed out after ${this.timeoutMs / 1000} seconds]`;
    } else if (exitCode !== null && exitCode !== 0) {
      result += `\n[Exit code ${exitCode}]`;
    }
    pending.finish(result);
  }

  private forget(child: ChildProcess): void {
    if (this.child === child) {
      this.child = undefined;
    }
  }
}
