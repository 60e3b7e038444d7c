// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Streaming delta accumulation.
 *
 * Completion streams send the same logical field (`content`,
 * `function_call.arguments`) as a series of fragments. Folding each fragment
 * into the entry being built reconstructs the full field without re-parsing.
 */

import type { Delta, Message } from '../types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a delta into `original` in place and return it.
 *
 * - Nested objects recurse; an absent key receives a copy of the whole sub-object.
 * - Strings concatenate onto an existing value, numbers add.
 * - Null and undefined delta values are skipped. No key is ever removed.
 */
export function mergeInto<T extends Record<string, unknown>>(
  original: T,
  delta: Record<string, unknown>
): T {
  const target: Record<string, unknown> = original;

  for (const [key, value] of Object.entries(delta)) {
    if (value === null || value === undefined) continue;

    const existing = target[key];

    if (isPlainObject(value)) {
      if (isPlainObject(existing)) {
        mergeInto(existing, value);
      } else {
        target[key] = structuredClone(value);
      }
    } else if (existing === undefined || existing === null) {
      target[key] = value;
    } else if (typeof existing === 'number' && typeof value === 'number') {
      target[key] = existing + value;
    } else {
      target[key] = `${String(existing)}${String(value)}`;
    }
  }

  return original;
}

/**
 * Merge one stream fragment into the transcript entry being accumulated.
 * The entry is mutated; pass the live entry, not a copy you want kept.
 */
export function mergeDeltas(original: Message, delta: Delta): Message {
  return mergeInto(original, delta);
}
