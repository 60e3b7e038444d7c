// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { BackendInitError } from '../errors.js';
import type { ExecutionBackend } from './base.js';
import { HtmlBackend } from './html.js';
import { REPLS, ReplBackend } from './repl.js';
import { SCRIPT_RUNNERS, SubprocessBackend, type SubprocessBackendOptions } from './subprocess.js';

export { truncateOutput, type ExecutionBackend, type ExecutorFactory, type RunOptions } from './base.js';
export { HtmlBackend } from './html.js';
export { DONE_MARKER, END_OF_BLOCK, REPLS, ReplBackend, visibleOutput } from './repl.js';
export { SCRIPT_RUNNERS, SubprocessBackend } from './subprocess.js';

/**
 * Create the execution backend for `language`.
 * @throws BackendInitError when no backend handles the language
 */
export function createExecutor(language: string, options: SubprocessBackendOptions = {}): ExecutionBackend {
  if (language === 'html') {
    return new HtmlBackend();
  }
  if (Object.hasOwn(REPLS, language)) {
    return new ReplBackend(language, REPLS[language], options);
  }
  if (Object.hasOwn(SCRIPT_RUNNERS, language)) {
    return new SubprocessBackend(language, SCRIPT_RUNNERS[language], options);
  }
  throw new BackendInitError(language, 'unsupported language');
}
