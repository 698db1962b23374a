#!/usr/bin/env node
/**
 * tidecode - a coding agent for the terminal.
 *
 * Talks to any OpenAI-compatible endpoint (LM Studio, Ollama, OpenAI,
 * Mistral) and works on one workspace directory through sandboxed
 * file, search and shell tools.
 *
 * Run: npx tsx src/main.ts
 */

// Load environment
import { config as loadDotenv } from 'dotenv';
loadDotenv();

import { parseArgs, getHelpText, VERSION, type CLIArgs } from './cli.js';
import { loadConfig } from './config/config-manager.js';
import { resolveSettings, type Settings } from './config/settings.js';
import { runConfigure } from './commands/configure.js';
import { createAgentSession } from './agent.js';
import { startREPL, renderOutcome } from './modes/repl.js';
import { EventDisplay } from './modes/event-display.js';
import type { PermissionMode } from './tools/types.js';
import {
  ConsoleSink,
  FileSink,
  configureLogger,
  logger,
  type LogSink,
} from './integrations/utilities/logger.js';
import { formatError, formatErrorForLog } from './errors/index.js';

/**
 * Without a terminal nobody can answer an approval prompt, so
 * interactive mode falls back to strict.
 */
function effectivePermission(mode: PermissionMode): PermissionMode {
  if (mode === 'interactive' && !process.stdin.isTTY) {
    logger.warn('stdin is not a terminal; risky commands will be refused');
    return 'strict';
  }
  return mode;
}

function setupLogging(settings: Settings): void {
  const sinks: LogSink[] = [new ConsoleSink()];
  if (settings.logFile) {
    sinks.push(new FileSink(settings.logFile));
  }
  configureLogger({ level: settings.logLevel, sinks });
}

function loadSettings(args: CLIArgs): Settings {
  const workspace = args.workspace ?? process.cwd();
  const { config, warnings, sources } = loadConfig({ cwd: workspace });

  const settings = resolveSettings(config, {
    workspace: args.workspace,
    provider: args.provider,
    model: args.model,
    baseUrl: args.baseUrl,
    permission: args.permission,
    maxIterations: args.maxIterations,
    debug: args.debug,
  });
  setupLogging(settings);

  for (const warning of warnings) {
    logger.warn(warning);
  }
  logger.debug('Configuration loaded', {
    sources: sources.filter(source => source.loaded).map(source => source.path),
    provider: settings.provider.name,
    model: settings.provider.model,
    baseUrl: settings.provider.baseUrl,
  });
  return settings;
}

async function runTask(task: string, settings: Settings): Promise<number> {
  const session = createAgentSession({
    settings: { ...settings, permission: effectivePermission(settings.permission) },
  });
  const display = new EventDisplay(line => {
    process.stderr.write(`${line}\n`);
  });
  session.subscribe(display.handle);

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const outcome = await session.send(task, { signal: controller.signal });
    renderOutcome(outcome, text => {
      process.stdout.write(text);
    });
    return outcome.status === 'final_answer' ? 0 : 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

async function main(): Promise<void> {
  const args = parseArgs();

  if (args.version) {
    process.stdout.write(`tidecode v${VERSION}\n`);
    return;
  }

  if (args.help) {
    process.stdout.write(getHelpText());
    return;
  }

  if (args.configure) {
    await runConfigure();
    return;
  }

  const settings = loadSettings(args);

  if (args.task) {
    process.exitCode = await runTask(args.task, settings);
    return;
  }

  await startREPL({ settings });
}

main().catch((error: unknown) => {
  logger.debug('Fatal error', { error: formatErrorForLog(error) });
  process.stderr.write(`tidecode: ${formatError(error)}\n`);
  process.exit(1);
});
