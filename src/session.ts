// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import * as fs from 'fs';
import * as path from 'path';
import { CoderunError, TranscriptFormatError } from './errors.js';
import type { FunctionCall, Message, Role, RunCodeArguments } from './types.js';

export const DEFAULT_TRANSCRIPT = 'messages.json';

const ROLES: readonly Role[] = ['system', 'user', 'assistant', 'function'];

/**
 * Resolve the file a transcript is saved to or loaded from.
 * Names without a `.json` extension get one.
 */
export function resolveTranscriptPath(name?: string): string {
  const file = name?.trim() || DEFAULT_TRANSCRIPT;
  return path.resolve(file.endsWith('.json') ? file : `${file}.json`);
}

/**
 * Save the transcript as a JSON array. Returns the absolute path written.
 */
export function saveTranscript(name: string | undefined, messages: Message[]): string {
  const filePath = resolveTranscriptPath(name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(messages, null, 2));
  return filePath;
}

/**
 * Load a transcript written by saveTranscript.
 * @throws TranscriptFormatError if the file is not a JSON array of entries
 */
export function loadTranscript(name?: string): Message[] {
  const filePath = resolveTranscriptPath(name);
  if (!fs.existsSync(filePath)) {
    throw new CoderunError(`Transcript not found: ${filePath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch {
    throw new TranscriptFormatError('Transcript is not valid JSON', filePath);
  }

  if (!Array.isArray(data)) {
    throw new TranscriptFormatError('Transcript must be a JSON array', filePath);
  }

  return data.map((value: unknown, index) => {
    const message = parseMessage(value);
    if (!message) {
      throw new TranscriptFormatError(`Entry ${index} is not a message`, filePath);
    }
    return message;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function parseRunCodeArguments(value: unknown): RunCodeArguments | undefined {
  if (!isRecord(value) || !optionalString(value.language) || !optionalString(value.code)) {
    return undefined;
  }
  const args: RunCodeArguments = {};
  if (value.language !== undefined) args.language = value.language;
  if (value.code !== undefined) args.code = value.code;
  return args;
}

function parseFunctionCall(value: unknown): FunctionCall | undefined {
  if (!isRecord(value) || !optionalString(value.name) || !optionalString(value.arguments)) {
    return undefined;
  }
  const call: FunctionCall = {};
  if (value.name !== undefined) call.name = value.name;
  if (value.arguments !== undefined) call.arguments = value.arguments;
  if (value.parsed_arguments !== undefined) {
    const parsed = parseRunCodeArguments(value.parsed_arguments);
    if (!parsed) return undefined;
    call.parsed_arguments = parsed;
  }
  return call;
}

/**
 * Validate one saved entry, keeping only known fields.
 */
export function parseMessage(value: unknown): Message | undefined {
  if (!isRecord(value) || !optionalString(value.content) || !optionalString(value.name)) {
    return undefined;
  }

  const message: Message = {};
  if (value.role !== undefined) {
    const role = ROLES.find(r => r === value.role);
    if (!role) return undefined;
    message.role = role;
  }
  if (value.content !== undefined) message.content = value.content;
  if (value.name !== undefined) message.name = value.name;
  if (value.function_call !== undefined) {
    const call = parseFunctionCall(value.function_call);
    if (!call) return undefined;
    message.function_call = call;
  }
  return message;
}
