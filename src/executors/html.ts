// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ExecutionBackend } from './base.js';

/**
 * "Runs" an HTML document by saving it where a browser can open it.
 */
export class HtmlBackend implements ExecutionBackend {
  readonly language = 'html';

  constructor(private readonly directory: string = tmpdir()) {}

  async run(code: string): Promise<string> {
    const path = join(this.directory, `coderun-${Date.now()}.html`);
    await writeFile(path, code, 'utf-8');
    return `Saved HTML to ${path}`;
  }

  dispose(): void {}
}
