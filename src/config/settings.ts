/**
 * Effective settings for one session: config files, environment and
 * CLI flags folded into the values the rest of the program consumes.
 */

import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError } from '../errors/index.js';
import type { OpenAICompatibleConfig } from '../providers/types.js';
import type { PermissionMode } from '../tools/types.js';
import { DEFAULT_TIMEOUT_SEC } from '../tools/bash.js';
import { DEFAULT_MAX_ITERATIONS } from '../core/agent-loop.js';
import { isLogLevel, type LogLevel } from '../integrations/utilities/logger.js';
import type { ValidatedUserConfig } from './schema.js';
import { resolveProvider } from './providers.js';

export interface CliOverrides {
  workspace?: string;
  provider?: string;
  model?: string;
  baseUrl?: string;
  permission?: PermissionMode;
  maxIterations?: number;
  debug?: boolean;
}

export interface Settings {
  /** Absolute workspace root */
  workspaceRoot: string;
  provider: OpenAICompatibleConfig;
  maxIterations: number;
  permission: PermissionMode;
  bashTimeoutSec: number;
  logLevel: LogLevel;
  logFile?: string;
}

export const DEFAULT_PERMISSION: PermissionMode = 'interactive';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Absolute path of the workspace, which must be an existing directory.
 */
export function resolveWorkspace(workspace: string | undefined, cwd: string = process.cwd()): string {
  const root = resolve(cwd, workspace ?? '.');
  let isDirectory = false;
  try {
    isDirectory = statSync(root).isDirectory();
  } catch (err) {
    throw new ConfigError(
      `Workspace ${root} is not accessible: ${err instanceof Error ? err.message : String(err)}`,
      { workspace: root }
    );
  }
  if (!isDirectory) {
    throw new ConfigError(`Workspace ${root} is not a directory`, { workspace: root });
  }
  return root;
}

export function resolveSettings(
  config: ValidatedUserConfig,
  overrides: CliOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const envLevel = env.TIDECODE_LOG_LEVEL?.trim().toLowerCase();
  let logLevel: LogLevel = config.logging?.level ?? DEFAULT_LOG_LEVEL;
  if (envLevel && isLogLevel(envLevel)) {
    logLevel = envLevel;
  }
  if (overrides.debug) {
    logLevel = 'debug';
  }

  return {
    workspaceRoot: resolveWorkspace(overrides.workspace),
    provider: resolveProvider(
      config,
      { provider: overrides.provider, model: overrides.model, baseUrl: overrides.baseUrl },
      env
    ),
    maxIterations: overrides.maxIterations ?? config.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    permission: overrides.permission ?? config.permission ?? DEFAULT_PERMISSION,
    bashTimeoutSec: config.bash?.defaultTimeoutSec ?? DEFAULT_TIMEOUT_SEC,
    logLevel,
    ...(config.logging?.file !== undefined && { logFile: config.logging.file }),
  };
}
