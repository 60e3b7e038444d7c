// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * System Prompt Generation
 *
 * Builds the system prompt for the assistant from the base instructions and
 * details about the user's machine.
 */

import * as os from 'os';

export const BASE_SYSTEM_PROMPT = `You are coderun, a world-class programmer that can complete any goal by executing code.
First, write a plan. Always recap the plan between each code block; you have short-term memory loss and need to recap it to retain it.
When you send a message containing code to run_code, it will be executed on the user's machine. The user has given you full permission to execute any code necessary to complete the task.
Only use the function you have been provided with, run_code.
If you want to send data between programming languages, save it to a txt or json file.
You can install new packages with pip for python, and install.packages() for R. Try to install all necessary packages in one command at the beginning.
When a user refers to a filename, they are likely referring to an existing file in the directory you're currently in (run_code executes on the user's machine).
In general, choose packages that have the most universal chance to be already installed and to work across multiple applications.
Write messages to the user in Markdown.
In general, try to make plans with as few steps as possible. Don't try to do everything in one code block: run some code, print information, then continue in tiny, informed steps.
You are capable of any task.`;

const LOCAL_INSTRUCTIONS = [
  "Only do what the user asks you to do, then ask what they'd like to do next.",
  "To run code, write a fenced code block (i.e ```python, R or ```shell) in markdown. When you close it with ```, it will be run. You'll then be given its output.",
];

export interface UserInfo {
  name: string;
  cwd: string;
  os: string;
}

export function getUserInfo(): UserInfo {
  return {
    name: os.userInfo().username,
    cwd: process.cwd(),
    os: os.type(),
  };
}

export function formatUserInfo(info: UserInfo): string {
  return `[User Info]\nName: ${info.name}\nCWD: ${info.cwd}\nOS: ${info.os}`;
}

export interface SystemPromptOptions {
  /** Raw-text models get a short prompt that explains code fences */
  local?: boolean;
  /** Extra instructions from configuration */
  additions?: string;
  userInfo?: UserInfo;
}

/**
 * Generate the system prompt for the assistant.
 */
export function generateSystemPrompt(options: SystemPromptOptions = {}): string {
  let prompt = BASE_SYSTEM_PROMPT;

  if (options.local) {
    // Small models follow a short prompt better, and there is no run_code to mention
    prompt = [...prompt.split('\n').slice(0, 2), ...LOCAL_INSTRUCTIONS].join('\n');
  }

  if (options.additions) {
    prompt += `\n\n${options.additions}`;
  }

  return `${prompt}\n\n${formatUserInfo(options.userInfo ?? getUserInfo())}`;
}
