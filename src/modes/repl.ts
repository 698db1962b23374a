/**
 * REPL Mode
 *
 * readline-based interface for the coding agent. One conversation per
 * REPL; slash commands go to the command handler, everything else to
 * the model. Ctrl+C cancels the running request, or exits when idle.
 */

import * as readline from 'node:readline/promises';
import { stdin, stdout } from 'node:process';

import { createAgentSession } from '../agent.js';
import type { Settings } from '../config/settings.js';
import type { LLMProviderWithTools } from '../providers/types.js';
import type { LoopOutcome } from '../core/types.js';
import { handleCommand, isCommand, createConsoleOutput } from '../commands/handler.js';
import { EventDisplay, c } from './event-display.js';
import { formatError, formatErrorForLog } from '../errors/index.js';
import { logger } from '../integrations/utilities/logger.js';

export interface REPLOptions {
  settings: Settings;
  /** Provider override (tests) */
  provider?: LLMProviderWithTools;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Print the result of one run. Final answers go to stdout as-is.
 */
export function renderOutcome(outcome: LoopOutcome, write: (text: string) => void): void {
  if (outcome.status === 'final_answer') {
    write(`\n${outcome.content}\n`);
  }
}

/**
 * Start the REPL. Resolves when the user quits or input ends.
 */
export async function startREPL(options: REPLOptions): Promise<void> {
  const { settings } = options;
  const output = options.output ?? stdout;
  const rl = readline.createInterface({ input: options.input ?? stdin, output });
  const write = (text: string): void => {
    output.write(text);
  };

  let running: AbortController | null = null;
  const session = createAgentSession({
    settings,
    provider: options.provider,
    // Ctrl+C aborts the run, which also abandons a pending approval question.
    prompt: question => rl.question(question, running ? { signal: running.signal } : {}),
  });
  const display = new EventDisplay(line => write(`${line}\n`));
  const unsubscribe = session.subscribe(display.handle);
  const commandOutput = createConsoleOutput();

  rl.on('SIGINT', () => {
    if (running) {
      running.abort();
      return;
    }
    rl.close();
  });
  let isClosed = false;
  const closed = new Promise<null>(resolve =>
    rl.once('close', () => {
      isClosed = true;
      resolve(null);
    })
  );

  write(`${c('tidecode', 'bold')} ${c(`${session.provider.name} / ${session.provider.defaultModel}`, 'dim')}\n`);
  write(c(`Workspace: ${session.workspaceRoot}\n`, 'dim'));
  write(c(`Permission mode: ${settings.permission}\n`, 'dim'));
  write(c('Type your request, or /help for commands.\n\n', 'dim'));

  try {
    while (true) {
      if (isClosed) break;
      const input = await Promise.race([closed, rl.question(c('> ', 'green'))]);
      if (input === null) break;

      const trimmed = input.trim();
      if (!trimmed) continue;

      if (isCommand(trimmed)) {
        if (handleCommand(trimmed, { session, display, output: commandOutput }) === 'quit') {
          break;
        }
        continue;
      }

      running = new AbortController();
      try {
        const outcome = await session.send(trimmed, { signal: running.signal });
        renderOutcome(outcome, write);
      } catch (error) {
        logger.debug('Run failed', { error: formatErrorForLog(error) });
        write(c(`\nError: ${formatError(error)}\n`, 'red'));
      } finally {
        running = null;
      }
      write('\n');
    }
  } finally {
    unsubscribe();
    rl.close();
  }
}
