/**
 * Slash commands available in the REPL.
 */

import type { AgentSession } from '../agent.js';
import type { EventDisplay } from '../modes/event-display.js';

/**
 * Output abstraction for command handlers.
 */
export interface CommandOutput {
  log(message: string): void;
  error(message: string): void;
}

export interface CommandContext {
  session: AgentSession;
  display: EventDisplay;
  output: CommandOutput;
}

/**
 * - 'quit': leave the REPL
 * - 'handled': command ran
 * - 'unknown': not a command we know
 */
export type CommandResult = 'quit' | 'handled' | 'unknown';

export interface CommandDefinition {
  name: string;
  aliases?: string[];
  description: string;
}

export const COMMANDS: readonly CommandDefinition[] = [
  { name: '/help', aliases: ['/h', '/?'], description: 'Show this help' },
  { name: '/clear', description: 'Start a new conversation' },
  { name: '/logs', description: 'Toggle detailed tool output' },
  { name: '/exit', aliases: ['/quit', '/q'], description: 'Leave tidecode' },
];

export function getHelpText(): string {
  const rows = COMMANDS.map(cmd => {
    const names = [cmd.name, ...(cmd.aliases ?? [])].join(', ');
    return `  ${names.padEnd(20)}${cmd.description}`;
  });
  return ['Commands:', ...rows, '', 'Anything else is sent to the model. Ctrl+C cancels a running request.'].join(
    '\n'
  );
}

export function isCommand(input: string): boolean {
  return input.startsWith('/');
}

export function handleCommand(input: string, ctx: CommandContext): CommandResult {
  const [cmd = ''] = input.trim().split(/\s+/);
  const { output } = ctx;

  switch (cmd.toLowerCase()) {
    case '/quit':
    case '/exit':
    case '/q':
      return 'quit';

    case '/help':
    case '/h':
    case '/?':
      output.log(getHelpText());
      return 'handled';

    case '/clear':
      ctx.session.reset();
      output.log('Conversation cleared.');
      return 'handled';

    case '/logs': {
      const verbose = ctx.display.toggleVerbose();
      output.log(`Detailed tool output ${verbose ? 'on' : 'off'}.`);
      return 'handled';
    }

    default:
      output.error(`Unknown command: ${cmd}. Type /help for the list.`);
      return 'unknown';
  }
}

export function createConsoleOutput(): CommandOutput {
  return {
    log: message => {
      process.stdout.write(`${message}\n`);
    },
    error: message => {
      process.stderr.write(`${message}\n`);
    },
  };
}
