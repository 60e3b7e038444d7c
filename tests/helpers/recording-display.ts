// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * In-memory Display that records what the orchestrator asks it to do.
 */

import type { Message } from '../../src/types.js';
import type { CodeSurface, Display } from '../../src/ui/types.js';

export class RecordingSurface implements CodeSurface {
  language: string | undefined;
  code: string | undefined;
  /** Copies of every entry passed to update() */
  readonly updates: Message[] = [];
  readonly outputs: string[] = [];
  endCount = 0;

  constructor(readonly kind: 'message' | 'code') {}

  update(message: Message): void {
    this.updates.push(structuredClone(message));
    const args = message.function_call?.parsed_arguments;
    if (args?.language !== undefined) this.language = args.language;
    if (args?.code !== undefined) this.code = args.code;
  }

  setOutput(output: string): void {
    this.outputs.push(output);
  }

  end(): void {
    this.endCount++;
  }

  get lastUpdate(): Message | undefined {
    return this.updates[this.updates.length - 1];
  }
}

export class RecordingDisplay implements Display {
  /** Calls in order, e.g. 'beginWaiting', 'openCode', 'showCode:python' */
  readonly events: string[] = [];
  readonly surfaces: RecordingSurface[] = [];
  readonly shownCode: Array<{ language: string; code: string }> = [];

  beginWaiting(): void {
    this.events.push('beginWaiting');
  }

  endWaiting(): void {
    this.events.push('endWaiting');
  }

  openMessage(): RecordingSurface {
    this.events.push('openMessage');
    const surface = new RecordingSurface('message');
    this.surfaces.push(surface);
    return surface;
  }

  openCode(): RecordingSurface {
    this.events.push('openCode');
    const surface = new RecordingSurface('code');
    this.surfaces.push(surface);
    return surface;
  }

  separator(): void {
    this.events.push('separator');
  }

  showCode(language: string, code: string): void {
    this.events.push(`showCode:${language}`);
    this.shownCode.push({ language, code });
  }

  get codeSurfaces(): RecordingSurface[] {
    return this.surfaces.filter((surface) => surface.kind === 'code');
  }

  get messageSurfaces(): RecordingSurface[] {
    return this.surfaces.filter((surface) => surface.kind === 'message');
  }
}
