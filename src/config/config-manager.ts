/**
 * Unified Configuration Loader
 *
 * Single entry point for loading, merging, and validating configuration
 * from user-level (~/.config/tidecode/config.json) and project-level
 * (.tidecode/config.json) sources.
 */

import { existsSync, readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { getConfigPath, getProjectConfigPath } from '../paths.js';
import { UserConfigSchema, type ValidatedUserConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Workspace for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: ValidatedUserConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project'; loaded: boolean }>;
  /** Non-fatal problems; the files they concern were ignored */
  warnings: string[];
}

// =============================================================================
// DEEP MERGE
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two config objects. Nested objects merge key by key at any
 * depth, so a project can override one field of a provider profile;
 * everything else replaces.
 */
export function deepMergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? deepMergeConfigs(baseValue, value) : value;
  }

  return result;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load and validate one config file. Returns null (with a warning) when
 * the file is missing, unparseable or invalid.
 */
function loadConfigFile(filePath: string, warnings: string[]): ValidatedUserConfig | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON (${err instanceof Error ? err.message : String(err)})`);
    return null;
  }

  const result = UserConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    warnings.push(`${filePath}: invalid config, ignored (${issues.join('; ')})`);
    return null;
  }

  return result.data;
}

/**
 * Load configuration from user-level and project-level sources.
 *
 * Priority: user ← project (project overrides user). Each file is
 * validated on its own; an invalid file is reported and skipped.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  const userConfigPath = getConfigPath();
  const userConfig = loadConfigFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userConfig !== null });

  let projectConfig: ValidatedUserConfig | null = null;
  if (!skipProject) {
    const projectConfigPath = getProjectConfigPath(cwd);
    projectConfig = loadConfigFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectConfig !== null });
  }

  const merged = deepMergeConfigs(userConfig ?? {}, projectConfig ?? {});

  // Both inputs validated, so the merge does too; parsing again restores the type.
  const result = UserConfigSchema.safeParse(merged);
  if (!result.success) {
    warnings.push(`merged config failed validation: ${result.error.message}`);
    return { config: {}, sources, warnings };
  }
  return { config: result.data, sources, warnings };
}

/**
 * Validate and write the user config file, creating its directory.
 *
 * @returns the path written
 */
export async function saveUserConfig(config: ValidatedUserConfig): Promise<string> {
  const validated = UserConfigSchema.parse(config);
  const filePath = getConfigPath();
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(validated, null, 2) + '\n', 'utf-8');
  return filePath;
}
