/**
 * Listing and search tools: ls, grep, find.
 *
 * Directory walks prune noise directories by name at any depth and
 * never descend through symlinked directories. Symlinked files are
 * followed only when they resolve inside the workspace.
 */

import { z } from 'zod';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Dirent } from 'node:fs';
import { minimatch } from 'minimatch';
import { defineTool } from './registry.js';
import type { ToolDefinition, ToolPayload } from './types.js';
import { coerceBoolean } from './coercion.js';
import type { PathSandbox } from '../integrations/path-sandbox.js';
import { FileOperationError, InvalidPatternError, errorCode } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';

const log = createComponentLogger('SearchTools');

/** Directory names skipped by every recursive walk */
export const DEFAULT_EXCLUDE_DIRS: readonly string[] = [
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  'bower_components',
  '__pycache__',
  '.venv',
  'venv',
  '.tox',
  '.mypy_cache',
  '.pytest_cache',
  'dist',
  'build',
  'target',
  '.next',
  '.cache',
  'coverage',
];

/** Extensions grep never opens */
export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png', '.jpg', '.jpeg', '.gif', '.bmp', '.ico', '.webp',
  '.pdf', '.zip', '.gz', '.tgz', '.bz2', '.xz', '.7z', '.tar', '.jar',
  '.exe', '.dll', '.so', '.dylib', '.o', '.a', '.class', '.pyc', '.wasm',
  '.mp3', '.mp4', '.mov', '.woff', '.woff2', '.ttf', '.sqlite', '.db',
]);

export const MAX_GREP_MATCHES = 100;
export const MAX_MATCH_LINE_LENGTH = 500;

// =============================================================================
// WALK
// =============================================================================

interface WalkOptions {
  excludeDirs: ReadonlySet<string>;
}

/**
 * Yield every regular file under `dir` (absolute paths), depth first,
 * entries in name order. A subdirectory that cannot be read is skipped;
 * only a failure on the starting directory propagates.
 */
async function* walkFiles(
  sandbox: PathSandbox,
  dir: string,
  options: WalkOptions,
  nested = false
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (!nested) throw err;
    log.debug('Skipping unreadable directory', { dir: sandbox.relative(dir), code: errorCode(err) });
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (options.excludeDirs.has(entry.name)) continue;
      yield* walkFiles(sandbox, full, options, true);
    } else if (entry.isFile()) {
      yield full;
    } else if (entry.isSymbolicLink() && (await isSandboxedFile(sandbox, full))) {
      yield full;
    }
  }
}

async function isSandboxedFile(sandbox: PathSandbox, link: string): Promise<boolean> {
  if (!sandbox.contains(link)) return false;
  try {
    return (await fs.stat(link)).isFile();
  } catch (err) {
    // Dangling link: nothing to list.
    if (errorCode(err) === 'ENOENT') return false;
    throw err;
  }
}

async function requireDirectory(absolute: string, display: string, operation: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(absolute)).isDirectory();
  } catch (err) {
    throw FileOperationError.fromSystemError(err, display, operation);
  }
  if (!isDirectory) {
    throw FileOperationError.notADirectory(display, operation);
  }
}

function isBinaryBuffer(buf: Buffer): boolean {
  return buf.subarray(0, 8192).includes(0);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// =============================================================================
// TOOLS
// =============================================================================

const lsSchema = z.object({
  path: z.string().default('.').describe('Directory, relative to the workspace root'),
  recursive: coerceBoolean().default(false).describe('List files in all subdirectories'),
  pattern: z.string().default('*').describe('Glob matched against file names (recursive mode)'),
  exclude_dirs: z
    .array(z.string())
    .optional()
    .describe('Directory names to skip in recursive mode; replaces the defaults'),
});

const grepSchema = z.object({
  pattern: z.string().describe('JavaScript regular expression'),
  path: z.string().default('.').describe('File or directory to search'),
  case_sensitive: coerceBoolean().default(false).describe('Match case exactly'),
});

const findSchema = z.object({
  pattern: z
    .string()
    .describe('Glob; matched against the file name, or the relative path when it contains "/"'),
  path: z.string().default('.').describe('Directory to search'),
});

export function createSearchTools(sandbox: PathSandbox): ToolDefinition[] {
  const ls = defineTool(
    'ls',
    'List a directory. With recursive=true, list matching files in all subdirectories, skipping dependency and build directories.',
    lsSchema,
    async (input): Promise<ToolPayload> => {
      const absolute = sandbox.resolve(input.path);
      const display = sandbox.relative(absolute);
      await requireDirectory(absolute, display, 'ls');

      if (!input.recursive) {
        let entries: Dirent[];
        try {
          entries = await fs.readdir(absolute, { withFileTypes: true });
        } catch (err) {
          throw FileOperationError.fromSystemError(err, display, 'ls');
        }
        const names = entries
          .map(entry => (entry.isDirectory() ? `${entry.name}/` : entry.name))
          .sort(compareStrings);
        return { path: display, entries: names, count: names.length };
      }

      const excludeDirs = new Set(input.exclude_dirs ?? DEFAULT_EXCLUDE_DIRS);
      const files: string[] = [];
      try {
        for await (const file of walkFiles(sandbox, absolute, { excludeDirs })) {
          if (minimatch(path.basename(file), input.pattern, { dot: true })) {
            files.push(sandbox.relative(file));
          }
        }
      } catch (err) {
        throw FileOperationError.fromSystemError(err, display, 'ls');
      }
      files.sort(compareStrings);
      return { path: display, files, count: files.length };
    }
  );

  const grep = defineTool(
    'grep',
    `Search file contents with a regular expression. Returns at most ${MAX_GREP_MATCHES} matches with 1-based line numbers.`,
    grepSchema,
    async (input): Promise<ToolPayload> => {
      const regex = InvalidPatternError.compile(input.pattern, input.case_sensitive ? '' : 'i');
      const absolute = sandbox.resolve(input.path);
      const display = sandbox.relative(absolute);

      let isFile: boolean;
      try {
        isFile = (await fs.stat(absolute)).isFile();
      } catch (err) {
        throw FileOperationError.fromSystemError(err, display, 'grep');
      }

      const matches: Array<{ file: string; line: number; text: string }> = [];
      let truncated = false;

      const scan = async (file: string, skipBinary: boolean): Promise<void> => {
        const buf = await fs.readFile(file);
        if (skipBinary && isBinaryBuffer(buf)) return;
        const lines = buf.toString('utf-8').split('\n');
        for (let idx = 0; idx < lines.length; idx++) {
          const line = lines[idx].replace(/\r$/, '');
          if (!regex.test(line)) continue;
          if (matches.length >= MAX_GREP_MATCHES) {
            truncated = true;
            return;
          }
          matches.push({
            file: sandbox.relative(file),
            line: idx + 1,
            text: line.trim().slice(0, MAX_MATCH_LINE_LENGTH),
          });
        }
      };

      try {
        if (isFile) {
          await scan(absolute, false);
        } else {
          const excludeDirs = new Set(DEFAULT_EXCLUDE_DIRS);
          for await (const file of walkFiles(sandbox, absolute, { excludeDirs })) {
            if (BINARY_EXTENSIONS.has(path.extname(file).toLowerCase())) continue;
            await scan(file, true);
            if (truncated) break;
          }
        }
      } catch (err) {
        throw FileOperationError.fromSystemError(err, display, 'grep');
      }

      return { matches, count: matches.length, truncated };
    }
  );

  const find = defineTool(
    'find',
    'Find files by glob pattern under a directory, skipping dependency and build directories.',
    findSchema,
    async (input): Promise<ToolPayload> => {
      const absolute = sandbox.resolve(input.path);
      const display = sandbox.relative(absolute);
      await requireDirectory(absolute, display, 'find');

      const matchPath = input.pattern.includes('/');
      const excludeDirs = new Set(DEFAULT_EXCLUDE_DIRS);
      const matches: string[] = [];
      try {
        for await (const file of walkFiles(sandbox, absolute, { excludeDirs })) {
          const subject = matchPath
            ? path.relative(absolute, file).split(path.sep).join('/')
            : path.basename(file);
          if (minimatch(subject, input.pattern, { dot: true })) {
            matches.push(sandbox.relative(file));
          }
        }
      } catch (err) {
        throw FileOperationError.fromSystemError(err, display, 'find');
      }
      matches.sort(compareStrings);
      return { path: display, matches, count: matches.length };
    }
  );

  return [ls, grep, find];
}
