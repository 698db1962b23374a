/**
 * Bash Tool
 *
 * Runs shell commands in the workspace root with no stdin, separate
 * stdout/stderr capture and a hard timeout. Risk assessment is exposed
 * through `assessRisk`; the agent loop asks for approval before a
 * flagged command ever reaches `execute`.
 */

import { z } from 'zod';
import { spawn } from 'node:child_process';
import { defineTool } from './registry.js';
import type { ToolDefinition, ToolPayload } from './types.js';
import { coerceNumber } from './coercion.js';
import type { CommandRiskClassifier } from './command-risk.js';
import type { PathSandbox } from '../integrations/path-sandbox.js';
import { CommandTimeoutError, ErrorCategory, ToolError } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';

const log = createComponentLogger('BashTool');

export const DEFAULT_TIMEOUT_SEC = 120;
export const MAX_TIMEOUT_SEC = 600;
export const MAX_OUTPUT_BYTES = 100 * 1024;
export const OUTPUT_TRUNCATION_MARKER = '\n... [output truncated]';

/** Grace period between SIGTERM and SIGKILL */
const KILL_GRACE_MS = 1000;

export interface RunCommandOptions {
  cwd: string;
  timeoutSec: number;
}

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
  truncated: boolean;
}

/**
 * Bounded capture of one output stream.
 */
class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  push(chunk: Buffer): void {
    const room = MAX_OUTPUT_BYTES - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    if (kept.length < chunk.length) this.truncated = true;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString('utf-8');
    return this.truncated ? text + OUTPUT_TRUNCATION_MARKER : text;
  }
}

/**
 * Clamp a requested timeout into (0, MAX_TIMEOUT_SEC].
 */
export function normalizeTimeoutSec(timeout: number | undefined, fallback = DEFAULT_TIMEOUT_SEC): number {
  if (timeout === undefined || !Number.isFinite(timeout) || timeout <= 0) {
    return Math.min(fallback, MAX_TIMEOUT_SEC);
  }
  return Math.min(timeout, MAX_TIMEOUT_SEC);
}

/**
 * Run a command through bash. Resolves with the exit code, rejects with
 * CommandTimeoutError when the deadline passes.
 *
 * The child gets its own process group so a timeout kills everything it
 * started, not just the shell.
 */
export function runCommand(command: string, options: RunCommandOptions): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const proc = spawn('bash', ['-c', command], {
      cwd: options.cwd,
      env: { ...process.env, TERM: 'dumb' }, // Disable colors/formatting
      stdio: ['ignore', 'pipe', 'pipe'], // No stdin, capture stdout/stderr
      detached: true,
    });

    const stdout = new OutputBuffer();
    const stderr = new OutputBuffer();
    let settled = false;
    let escalation: NodeJS.Timeout | undefined;

    const killGroup = (signal: NodeJS.Signals): void => {
      if (proc.pid === undefined) return;
      try {
        process.kill(-proc.pid, signal);
      } catch (err) {
        // ESRCH: the group is already gone.
        log.debug('Process group kill failed', {
          pid: proc.pid,
          signal,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    };

    const timer = setTimeout(() => {
      settled = true;
      killGroup('SIGTERM');
      escalation = setTimeout(() => killGroup('SIGKILL'), KILL_GRACE_MS);
      escalation.unref();
      log.warn('Command timed out', { command, timeoutSec: options.timeoutSec });
      reject(
        new CommandTimeoutError(options.timeoutSec, {
          stdout: stdout.toString(),
          stderr: stderr.toString(),
        })
      );
    }, options.timeoutSec * 1000);

    proc.stdout?.on('data', (data: Buffer) => stdout.push(data));
    proc.stderr?.on('data', (data: Buffer) => stderr.push(data));

    proc.on('close', code => {
      clearTimeout(timer);
      if (escalation) clearTimeout(escalation);
      if (settled) return;
      settled = true;
      resolve({
        exitCode: code ?? -1,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        truncated: stdout.truncated || stderr.truncated,
      });
    });

    proc.on('error', error => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(
        new ToolError(
          `Failed to execute command: ${error.message}`,
          ErrorCategory.PERMANENT,
          false,
          'bash',
          { command },
          error
        )
      );
    });
  });
}

const bashSchema = z.object({
  command: z.string().min(1).describe('Shell command, run with bash in the workspace root'),
  timeout: coerceNumber()
    .optional()
    .describe(`Timeout in seconds (default ${DEFAULT_TIMEOUT_SEC}, max ${MAX_TIMEOUT_SEC})`),
});

export interface BashToolOptions {
  sandbox: PathSandbox;
  classifier: CommandRiskClassifier;
  defaultTimeoutSec?: number;
}

export function createBashTool(options: BashToolOptions): ToolDefinition {
  const { sandbox, classifier } = options;
  const defaultTimeout = normalizeTimeoutSec(options.defaultTimeoutSec);

  return defineTool(
    'bash',
    'Run a shell command in the workspace root. No interactive input is available.',
    bashSchema,
    async (input): Promise<ToolPayload> => {
      const timeoutSec = normalizeTimeoutSec(input.timeout, defaultTimeout);
      const result = await runCommand(input.command, { cwd: sandbox.root, timeoutSec });
      return {
        command: input.command,
        exit_code: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        truncated: result.truncated,
      };
    },
    {
      assessRisk: input => classifier.classify(input.command),
    }
  );
}
