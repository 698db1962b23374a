/**
 * XDG Base Directory compliant paths for tidecode.
 *
 * - Config: ~/.config/tidecode/ (or $XDG_CONFIG_HOME/tidecode/)
 *   User-specific configuration files
 *
 * - Project: .tidecode/
 *   Project-specific files inside the workspace
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export const APP_NAME = 'tidecode';

/**
 * Get the configuration directory path.
 * Uses $XDG_CONFIG_HOME if set, otherwise defaults to ~/.config/tidecode/
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_NAME) : join(homedir(), '.config', APP_NAME);
}

/**
 * Get the project-specific directory path.
 * This is always .tidecode/ within the specified working directory.
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_NAME}`);
}

/**
 * Path to the user configuration file.
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Path to the project configuration file.
 */
export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return join(getProjectDir(cwd), 'config.json');
}
