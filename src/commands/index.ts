import type { Agent } from '../agent.js';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';

export interface Command {
  name: string;
  aliases?: string[];
  description: string;
  usage: string;
  /** Returns text to show the user, or null when there is nothing to say */
  execute: (args: string, context: CommandContext) => Promise<string | null>;
}

export interface CommandContext {
  agent: Agent;
}

function shouldShowHelp(args: string): boolean {
  const trimmed = args.trim().toLowerCase();
  return trimmed === 'help' || trimmed === '--help' || trimmed === '-h' || trimmed === '?';
}

// Command registry
const commands: Map<string, Command> = new Map();

export function registerCommand(command: Command): void {
  // Every command answers a `help` argument with its usage
  const wrapped: Command = {
    ...command,
    execute: async (args: string, context: CommandContext): Promise<string | null> => {
      if (shouldShowHelp(args)) {
        return `Usage: ${command.usage}\n\n${command.description}`;
      }
      return command.execute(args, context);
    },
  };

  commands.set(command.name, wrapped);
  if (command.aliases) {
    for (const alias of command.aliases) {
      commands.set(alias, wrapped);
    }
  }
}

export function getCommand(name: string): Command | undefined {
  return commands.get(name);
}

export function getAllCommands(): Command[] {
  // Return unique commands (filter out aliases)
  const seen = new Set<string>();
  const result: Command[] = [];
  for (const cmd of commands.values()) {
    if (!seen.has(cmd.name)) {
      seen.add(cmd.name);
      result.push(cmd);
    }
  }
  return result;
}

/**
 * Commands start with `/` or `%`. A doubled prefix is sent to the model as is.
 */
export function isCommand(input: string): boolean {
  const prefix = input.charAt(0);
  if (prefix !== '/' && prefix !== '%') return false;
  return input.charAt(1) !== prefix;
}

export function parseCommand(input: string): { name: string; args: string } | null {
  if (!isCommand(input)) return null;

  const trimmed = input.slice(1).trim();
  const spaceIndex = trimmed.indexOf(' ');

  if (spaceIndex === -1) {
    return { name: trimmed.toLowerCase(), args: '' };
  }

  return {
    name: trimmed.slice(0, spaceIndex).toLowerCase(),
    args: trimmed.slice(spaceIndex + 1).trim(),
  };
}

export function formatHelp(): string {
  const lines = getAllCommands().map((cmd) => {
    const aliases = cmd.aliases?.length ? ` (${cmd.aliases.map((a) => `/${a}`).join(', ')})` : '';
    return `  ${cmd.usage.padEnd(22)}${cmd.description}${aliases}`;
  });
  return ['Commands:', ...lines].join('\n');
}

/**
 * Run a command line. Unknown commands get the help text; failures are
 * reported as text so the session carries on.
 */
export async function runCommand(input: string, context: CommandContext): Promise<string | null> {
  const parsed = parseCommand(input);
  if (!parsed) return null;

  const command = getCommand(parsed.name);
  if (!command) {
    return `Unknown command: /${parsed.name}\n\n${formatHelp()}`;
  }

  try {
    return await command.execute(parsed.args, context);
  } catch (error) {
    logger.debug(`Command /${command.name} failed: ${error instanceof Error ? error.stack : String(error)}`);
    return `Error: ${errorMessage(error)}`;
  }
}
