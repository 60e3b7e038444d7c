import { registerCommand, formatHelp, type Command, type CommandContext } from './index.js';
import { LogLevel, logger } from '../logger.js';
import { loadTranscript, resolveTranscriptPath, saveTranscript } from '../session.js';

/**
 * Read an on/off argument. Empty means toggle; anything unrecognised is undefined.
 */
export function parseSwitch(args: string, current: boolean): boolean | undefined {
  const value = args.trim().toLowerCase();
  if (!value) return !current;
  if (['on', 'true', 'yes', '1'].includes(value)) return true;
  if (['off', 'false', 'no', '0'].includes(value)) return false;
  return undefined;
}

export const helpCommand: Command = {
  name: 'help',
  aliases: ['h', '?'],
  description: 'Show available commands',
  usage: '/help',
  execute: async (): Promise<string | null> => formatHelp(),
};

export const resetCommand: Command = {
  name: 'reset',
  aliases: ['clear'],
  description: 'Start a new conversation',
  usage: '/reset',
  execute: async (_args: string, context: CommandContext): Promise<string | null> => {
    context.agent.reset();
    return 'Conversation reset.';
  },
};

export const undoCommand: Command = {
  name: 'undo',
  description: 'Remove the last message and the replies to it',
  usage: '/undo',
  execute: async (_args: string, context: CommandContext): Promise<string | null> => {
    const removed = context.agent.undo();
    if (removed.length === 0) {
      return 'Nothing to undo.';
    }
    return `Removed ${removed.length} message${removed.length === 1 ? '' : 's'}.`;
  },
};

export const saveCommand: Command = {
  name: 'save',
  description: 'Save the conversation to a JSON file',
  usage: '/save [path]',
  execute: async (args: string, context: CommandContext): Promise<string | null> => {
    const messages = context.agent.getHistory();
    const filePath = saveTranscript(args || undefined, messages);
    return `Saved ${messages.length} messages to ${filePath}`;
  },
};

export const loadCommand: Command = {
  name: 'load',
  description: 'Replace the conversation with one saved by /save',
  usage: '/load [path]',
  execute: async (args: string, context: CommandContext): Promise<string | null> => {
    const messages = loadTranscript(args || undefined);
    context.agent.load(messages);
    return `Loaded ${messages.length} messages from ${resolveTranscriptPath(args || undefined)}`;
  },
};

export const debugCommand: Command = {
  name: 'debug',
  description: 'Toggle debug logging',
  usage: '/debug [true|false]',
  execute: async (args: string): Promise<string | null> => {
    const enabled = parseSwitch(args, logger.isLevelEnabled(LogLevel.DEBUG));
    if (enabled === undefined) {
      return 'Usage: /debug [true|false]';
    }
    logger.setLevel(enabled ? LogLevel.DEBUG : LogLevel.NORMAL);
    return `Debug mode ${enabled ? 'on' : 'off'}.`;
  },
};

export const yesCommand: Command = {
  name: 'yes',
  aliases: ['auto'],
  description: 'Run code without asking first',
  usage: '/yes [on|off]',
  execute: async (args: string, context: CommandContext): Promise<string | null> => {
    const enabled = parseSwitch(args, context.agent.isAutoRun());
    if (enabled === undefined) {
      return 'Usage: /yes [on|off]';
    }
    context.agent.setAutoRun(enabled);
    return `Auto-run ${enabled ? 'on' : 'off'}.`;
  },
};

export function registerSessionCommands(): void {
  registerCommand(helpCommand);
  registerCommand(resetCommand);
  registerCommand(undoCommand);
  registerCommand(saveCommand);
  registerCommand(loadCommand);
  registerCommand(debugCommand);
  registerCommand(yesCommand);
}
