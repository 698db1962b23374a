/**
 * Event Display
 *
 * Turns agent loop events into terminal lines. Compact mode shows one
 * line per tool call; verbose mode (toggled with /logs) adds arguments,
 * timings and result previews.
 */

import type { AgentLoopEvent } from '../core/types.js';
import { isToolFailure, type ToolResult } from '../tools/types.js';

// ANSI color codes for terminal output
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
};

export type Color = keyof typeof colors;

export function c(text: string, color: Color, enabled = true): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

export interface EventDisplayOptions {
  verbose?: boolean;
  /** ANSI colors (default true) */
  color?: boolean;
}

const PREVIEW_LENGTH = 200;
const SUMMARY_LENGTH = 80;

/** Argument shown in the compact line, per tool */
const PRIMARY_ARG: Record<string, string> = {
  bash: 'command',
  grep: 'pattern',
  find: 'pattern',
};

function truncate(text: string, max: number): string {
  const oneLine = text.replace(/\s*\n\s*/g, ' ');
  return oneLine.length > max ? `${oneLine.slice(0, max)}...` : oneLine;
}

/**
 * Short description of a call: the tool's main argument, or the first
 * string argument when the tool is not listed.
 */
export function summarizeArgs(tool: string, args: Record<string, unknown>): string {
  const key = PRIMARY_ARG[tool] ?? 'path';
  const primary = args[key];
  if (typeof primary === 'string') {
    return truncate(primary, SUMMARY_LENGTH);
  }
  const firstString = Object.values(args).find((value): value is string => typeof value === 'string');
  return firstString !== undefined ? truncate(firstString, SUMMARY_LENGTH) : '';
}

function describeResult(result: ToolResult): string {
  if (isToolFailure(result)) {
    return `error (${result.kind}): ${truncate(result.error, PREVIEW_LENGTH)}`;
  }
  if (typeof result.exit_code === 'number') {
    return `exit ${result.exit_code}`;
  }
  if (typeof result.count === 'number') {
    return `${result.count} result(s)`;
  }
  if (typeof result.replacements === 'number') {
    return `${result.replacements} replacement(s)`;
  }
  return 'ok';
}

/**
 * Render one event as terminal lines. Returns an empty list for events
 * that the current mode does not show.
 */
export function formatEvent(event: AgentLoopEvent, options: EventDisplayOptions = {}): string[] {
  const verbose = options.verbose ?? false;
  const color = options.color ?? true;

  switch (event.type) {
    case 'iteration.start':
      return verbose ? [c(`[iteration ${event.iteration}]`, 'dim', color)] : [];

    case 'tool.started': {
      const summary = summarizeArgs(event.tool, event.args);
      const lines = [c(`> ${event.tool}${summary ? ` ${summary}` : ''}`, 'cyan', color)];
      if (verbose) {
        lines.push(c(`  args: ${JSON.stringify(event.args)}`, 'dim', color));
      }
      return lines;
    }

    case 'tool.finished': {
      if (event.success && !verbose) return [];
      const text = `  ${describeResult(event.result)}${verbose ? ` (${event.durationMs}ms)` : ''}`;
      return [c(text, event.success ? 'green' : 'red', color)];
    }

    case 'approval.requested':
      return [c(`! ${event.tool} needs approval: ${event.reason}`, 'yellow', color)];

    case 'approval.resolved':
      return event.granted
        ? [c('  approved', 'green', color)]
        : [c(`  rejected${event.reason ? `: ${event.reason}` : ''}`, 'red', color)];

    case 'stalled':
      return [
        c(
          event.reason === 'cancelled' ? 'Cancelled.' : 'The model returned an empty response.',
          'yellow',
          color
        ),
      ];

    case 'iteration_limit':
      return [c(`Stopped after ${event.limit} iterations without a final answer.`, 'yellow', color)];

    case 'final_answer':
      // Printed by the caller, which owns stdout formatting of answers.
      return [];
  }
}

/**
 * Display whose verbosity can be switched while a session runs.
 */
export class EventDisplay {
  verbose: boolean;
  private color: boolean;
  private write: (line: string) => void;

  constructor(write: (line: string) => void, options: EventDisplayOptions = {}) {
    this.write = write;
    this.verbose = options.verbose ?? false;
    this.color = options.color ?? true;
  }

  /** Flip verbose mode; returns the new value */
  toggleVerbose(): boolean {
    this.verbose = !this.verbose;
    return this.verbose;
  }

  readonly handle = (event: AgentLoopEvent): void => {
    for (const line of formatEvent(event, { verbose: this.verbose, color: this.color })) {
      this.write(line);
    }
  };
}
