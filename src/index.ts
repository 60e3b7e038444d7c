#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { createInterface, type Interface } from 'readline';
import { InvalidArgumentError, program } from 'commander';
import chalk from 'chalk';
import { Agent } from './agent.js';
import { createReadlineConfirm } from './cli/confirmation.js';
import { generateSystemPrompt } from './cli/system-prompt.js';
import { isCommand, runCommand, type CommandContext } from './commands/index.js';
import { registerSessionCommands } from './commands/session-commands.js';
import { loadConfig, missingAzureSettings, type AzureSetting, type ResolvedConfig } from './config/index.js';
import { ConfigError, errorMessage } from './errors.js';
import { logger, parseLogLevel } from './logger.js';
import { createProvider } from './providers/index.js';
import { spinner } from './spinner.js';
import { TerminalDisplay } from './ui/terminal.js';
import { VERSION } from './version.js';

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

// CLI setup
program
  .name('coderun')
  .description('Chat with a language model that writes and runs code on your machine')
  .version(VERSION, '-v, --version', 'Output the current version')
  .argument('[message]', 'Answer one message and exit')
  .option('-y, --yes', 'Run code without asking first')
  .option('-f, --fast', 'Use gpt-3.5-turbo instead of gpt-4')
  .option('-l, --local', 'Use a local model through Ollama')
  .option('--use-azure', 'Use Azure OpenAI Service')
  .option('-m, --model <name>', 'Model to use')
  .option('--api-base <url>', 'Base URL for the API (OpenAI-compatible servers or the Ollama host)')
  .option('-t, --temperature <value>', 'Sampling temperature', parseNumber)
  .option('--context-window <tokens>', 'Context window size in tokens', parseInteger)
  .option('--max-tokens <tokens>', 'Maximum tokens per reply', parseInteger)
  .option('--verbose', 'Show code execution details')
  .option('-d, --debug', 'Show API and context details')
  .option('--trace', 'Show full request payloads')
  .parse();

interface ProgramOptions {
  yes?: boolean;
  fast?: boolean;
  local?: boolean;
  useAzure?: boolean;
  model?: string;
  apiBase?: string;
  temperature?: number;
  contextWindow?: number;
  maxTokens?: number;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

const options = program.opts<ProgramOptions>();
const oneShotMessage: string | undefined = program.args[0];

function ask(rl: Interface, question: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(question, resolve);
  });
}

const AZURE_QUESTIONS: Record<AzureSetting, string> = {
  apiKey: 'Azure OpenAI API key: ',
  baseUrl: 'Azure OpenAI API base: ',
  model: 'Azure OpenAI deployment name: ',
  apiVersion: 'Azure OpenAI API version: ',
};

/**
 * Ask for whatever Azure settings are missing.
 * @throws ConfigError when settings are missing and nobody can be asked
 */
async function ensureAzureSettings(rl: Interface, config: ResolvedConfig): Promise<ResolvedConfig> {
  const missing = missingAzureSettings(config);
  if (missing.length === 0) {
    return config;
  }
  if (!process.stdin.isTTY) {
    throw new ConfigError(
      'Azure OpenAI needs AZURE_API_KEY, AZURE_API_BASE, AZURE_API_VERSION and AZURE_DEPLOYMENT_NAME',
      'environment'
    );
  }

  console.log(chalk.bold('\nAzure OpenAI Service settings not found.\n'));
  const completed: ResolvedConfig = { ...config };
  for (const setting of missing) {
    completed[setting] = (await ask(rl, AZURE_QUESTIONS[setting])).trim();
  }
  console.log(chalk.dim('Tip: set AZURE_API_KEY, AZURE_API_BASE, AZURE_API_VERSION and AZURE_DEPLOYMENT_NAME to skip this step.'));
  return completed;
}

/**
 * Ask for an OpenAI key when none is configured. An empty answer switches to
 * the local backend.
 */
async function ensureCredentials(rl: Interface, config: ResolvedConfig): Promise<ResolvedConfig> {
  if (config.provider === 'azure') {
    return ensureAzureSettings(rl, config);
  }
  if (config.provider !== 'openai' || config.apiKey || config.baseUrl || !process.stdin.isTTY) {
    return config;
  }

  console.log(chalk.bold('\nOpenAI API key not found.'));
  console.log(chalk.dim('Press enter to use a local model through Ollama instead.\n'));
  const answer = (await ask(rl, 'OpenAI API key: ')).trim();
  if (!answer) {
    console.log(chalk.dim('Switching to the local backend.'));
    return { ...config, provider: 'ollama', model: undefined };
  }
  console.log(chalk.dim('Tip: set OPENAI_API_KEY to skip this step.'));
  return { ...config, apiKey: answer };
}

async function main(): Promise<void> {
  logger.setLevel(parseLogLevel(options));

  let config = loadConfig({
    cli: {
      local: options.local,
      azure: options.useAzure,
      fast: options.fast,
      model: options.model,
      baseUrl: options.apiBase,
      temperature: options.temperature,
      yes: options.yes,
      contextWindow: options.contextWindow,
      maxTokens: options.maxTokens,
    },
  });

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY ?? false,
    prompt: chalk.bold.cyan('\n> '),
  });

  config = await ensureCredentials(rl, config);

  const provider = createProvider({
    type: config.provider,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    model: config.model,
    apiVersion: config.apiVersion,
    contextWindow: config.contextWindow,
    maxTokens: config.maxTokens,
  });

  const agent = new Agent({
    provider,
    display: new TerminalDisplay({ model: provider.getModel() }),
    confirm: createReadlineConfirm(rl),
    systemPrompt: generateSystemPrompt({
      local: !provider.supportsFunctionCalling(),
      additions: config.systemPromptAdditions,
    }),
    autoRun: config.autoRun,
    temperature: config.temperature,
    retryDelayMs: config.retryDelayMs,
  });

  registerSessionCommands();
  const commandContext: CommandContext = { agent };

  // Set while a turn is running; Ctrl-C aborts the turn instead of exiting
  let turn: AbortController | null = null;

  const respond = async (message: string): Promise<void> => {
    const controller = new AbortController();
    turn = controller;
    try {
      await agent.chat(message, { signal: controller.signal });
      if (controller.signal.aborted) {
        console.log(chalk.dim('\n(interrupted)'));
      }
    } catch (error) {
      spinner.stop();
      logger.error(errorMessage(error), error instanceof Error ? error : undefined);
    } finally {
      turn = null;
    }
  };

  rl.on('SIGINT', () => {
    if (turn) {
      turn.abort();
    } else {
      rl.close();
    }
  });

  if (oneShotMessage) {
    await respond(oneShotMessage);
    agent.reset();
    rl.close();
    return;
  }

  rl.on('close', () => {
    agent.reset();
    console.log(chalk.dim('\nGoodbye!'));
    process.exit(0);
  });

  const handleInput = async (line: string): Promise<void> => {
    const trimmed = line.trim();
    if (!trimmed) {
      rl.prompt();
      return;
    }
    if (turn) {
      console.log(chalk.dim('Still working; press Ctrl-C to interrupt.'));
      return;
    }

    if (isCommand(trimmed)) {
      const output = await runCommand(trimmed, commandContext);
      if (output) {
        console.log(output);
      }
    } else {
      console.log();
      await respond(trimmed);
    }
    rl.prompt();
  };

  rl.on('line', (line) => {
    handleInput(line).catch((error: unknown) => {
      logger.error(errorMessage(error), error instanceof Error ? error : undefined);
      rl.prompt();
    });
  });

  console.log(chalk.bold(`coderun ${VERSION}`) + chalk.dim(` (${provider.getName()}: ${provider.getModel()})`));
  console.log(chalk.dim('Type /help for commands, Ctrl-D to exit.'));
  rl.prompt();
}

main().catch((error: unknown) => {
  console.error(chalk.red(errorMessage(error)));
  process.exit(1);
});
