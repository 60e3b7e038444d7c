// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Centralized constants for coderun.
 */

import type { FunctionDefinition } from './types.js';

/** Name of the single capability the model can call. */
export const RUN_CODE = 'run_code';

/**
 * Languages the model may ask to run.
 */
export const SUPPORTED_LANGUAGES = ['python', 'R', 'shell', 'applescript', 'javascript', 'html'] as const;

/**
 * Function schema declared to function-calling backends.
 */
export const RUN_CODE_FUNCTION: FunctionDefinition = {
  name: RUN_CODE,
  description: "Executes code on the user's machine and returns the output",
  parameters: {
    type: 'object',
    properties: {
      language: {
        type: 'string',
        description: 'The programming language',
        enum: [...SUPPORTED_LANGUAGES],
      },
      code: { type: 'string', description: 'The code to execute' },
    },
    required: ['language', 'code'],
  },
};

/** Markdown code fence marker. */
export const CODE_FENCE = '```';

/**
 * Messages appended to the transcript as `function` entries.
 */
export const FUNCTION_MESSAGES = {
  /** Execution produced nothing; an empty string reads as "still streaming" */
  NO_OUTPUT: 'No output',
  DECLINED: 'User decided not to run this code.',
  UNPARSEABLE_CALL:
    'Your function call could not be parsed. Please use ONLY the `run_code` function, ' +
    'which takes two parameters: `code` and `language`. Your response should be formatted as a JSON.',
  UNPARSEABLE_BLOCK:
    'Your code block could not be run. Open it with three backticks followed by the language ' +
    '(for example ```python), put only code inside, and close it with three backticks.',
} as const;

/**
 * Orchestrator loop configuration.
 */
export const AGENT_CONFIG = {
  /** Attempts made to open a completion stream before the turn fails */
  TRANSPORT_MAX_ATTEMPTS: 3,
  /** Fixed pause between stream attempts */
  RETRY_DELAY_MS: 3000,
  /** Default sampling temperature */
  DEFAULT_TEMPERATURE: 0.001,
} as const;

/**
 * Local (raw-text) model defaults.
 */
export const LOCAL_MODEL_CONFIG = {
  DEFAULT_MODEL: 'codellama',
  CONTEXT_WINDOW: 2000,
  MAX_TOKENS: 750,
  /** Slack left between prompt and completion budgets */
  PROMPT_SAFETY_BUFFER: 25,
  STOP_SEQUENCES: ['</s>'],
} as const;

/**
 * Execution backend limits.
 */
export const EXECUTION_CONFIG = {
  /** 10 minute timeout */
  TIMEOUT_MS: 600000,
  /** Truncate output if too long */
  MAX_OUTPUT_LENGTH: 50000,
} as const;
