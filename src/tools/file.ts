/**
 * File Tools
 *
 * read, write, edit, append and replace. Every path goes through the
 * workspace sandbox before the filesystem is touched.
 */

import { z } from 'zod';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Stats } from 'node:fs';
import { createPatch } from 'diff';
import { defineTool } from './registry.js';
import type { ToolDefinition, ToolPayload } from './types.js';
import { coerceNumber, coerceString } from './coercion.js';
import type { PathSandbox } from '../integrations/path-sandbox.js';
import {
  AmbiguousEditError,
  ErrorCategory,
  FileOperationError,
  InvalidPatternError,
  errorCode,
} from '../errors/index.js';

/** Whole-file reads above this size are refused */
export const READ_MAX_BYTES = 20 * 1024;
export const DEFAULT_READ_LIMIT = 2000;
export const MAX_LINE_LENGTH = 2000;
export const LINE_TRUNCATION_MARKER = '... [truncated]';

// =============================================================================
// HELPERS
// =============================================================================

async function readExistingFile(
  absolute: string,
  display: string,
  operation: string
): Promise<string> {
  let stat: Stats;
  try {
    stat = await fs.stat(absolute);
  } catch (err) {
    throw FileOperationError.fromSystemError(err, display, operation);
  }
  if (!stat.isFile()) {
    throw FileOperationError.notAFile(display, operation);
  }
  try {
    return await fs.readFile(absolute, 'utf-8');
  } catch (err) {
    throw FileOperationError.fromSystemError(err, display, operation);
  }
}

/**
 * Overwrite in place: the inode, its mode and any hard links survive.
 */
async function rewriteFile(absolute: string, display: string, content: string, operation: string): Promise<void> {
  try {
    await fs.writeFile(absolute, content, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOSPC') {
      throw new FileOperationError(
        `Disk full - cannot write file: ${display}`,
        ErrorCategory.PERMANENT,
        false,
        display,
        operation
      );
    }
    throw FileOperationError.fromSystemError(err, display, operation);
  }
}

/**
 * Split text into lines that keep their terminators, so joining a slice
 * reproduces the original bytes.
 */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function truncateLine(line: string): string {
  const ending = line.endsWith('\r\n') ? '\r\n' : line.endsWith('\n') ? '\n' : '';
  const body = line.slice(0, line.length - ending.length);
  if (body.length <= MAX_LINE_LENGTH) return line;
  return body.slice(0, MAX_LINE_LENGTH) + LINE_TRUNCATION_MARKER + ending;
}

/** Non-overlapping literal occurrences */
export function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Expand a `String.prototype.replace`-style template for one match.
 */
export function expandReplacement(template: string, match: RegExpMatchArray, input: string): string {
  const start = match.index ?? 0;
  return template.replace(/\$(\$|&|`|'|<([^>]*)>|\d{1,2})/g, (token, spec: string, name?: string) => {
    if (spec === '$') return '$';
    if (spec === '&') return match[0];
    if (spec === '`') return input.slice(0, start);
    if (spec === "'") return input.slice(start + match[0].length);
    if (name !== undefined) {
      return match.groups ? (match.groups[name] ?? '') : token;
    }
    // Prefer a two-digit group when it exists, like the built-in replace.
    if (spec.length === 2 && Number(spec) < match.length && Number(spec) > 0) {
      return match[Number(spec)] ?? '';
    }
    const single = Number(spec[0]);
    if (single > 0 && single < match.length) {
      return (match[single] ?? '') + spec.slice(1);
    }
    return token;
  });
}

function diffPreview(display: string, before: string, after: string): string {
  return createPatch(display, before, after, '', '', { context: 3 });
}

// =============================================================================
// TOOLS
// =============================================================================

const readSchema = z.object({
  path: z.string().describe('File path, relative to the workspace root'),
  offset: coerceNumber().int().min(0).default(0).describe('0-based line to start from'),
  limit: coerceNumber()
    .int()
    .min(1)
    .default(DEFAULT_READ_LIMIT)
    .describe('Maximum number of lines to return'),
});

const writeSchema = z.object({
  path: z.string().describe('File path, relative to the workspace root'),
  content: coerceString().describe('Full file content'),
});

const editSchema = z.object({
  path: z.string().describe('File path, relative to the workspace root'),
  old_string: z.string().min(1).describe('Exact text to find; must occur exactly once'),
  new_string: z.string().describe('Replacement text'),
});

const appendSchema = z.object({
  path: z.string().describe('File path, relative to the workspace root'),
  content: coerceString().describe('Text to add at the end of the file'),
});

const replaceSchema = z.object({
  path: z.string().describe('File path, relative to the workspace root'),
  pattern: z.string().describe('JavaScript regular expression'),
  replacement: z.string().describe('Replacement; $1, $<name> and $& are expanded'),
  count: coerceNumber()
    .int()
    .min(0)
    .default(0)
    .describe('Maximum replacements, leftmost first; 0 replaces every match'),
});

export function createFileTools(sandbox: PathSandbox): ToolDefinition[] {
  const read = defineTool(
    'read',
    `Read a text file (at most ${READ_MAX_BYTES} bytes). Returns the requested line window.`,
    readSchema,
    async (input): Promise<ToolPayload> => {
      const absolute = sandbox.resolve(input.path);
      const display = sandbox.relative(absolute);

      let text: string;
      try {
        const stat = await fs.stat(absolute);
        if (!stat.isFile()) {
          throw FileOperationError.notAFile(display, 'read');
        }
        if (stat.size > READ_MAX_BYTES) {
          throw FileOperationError.tooLarge(display, stat.size, READ_MAX_BYTES);
        }
        text = await fs.readFile(absolute, 'utf-8');
      } catch (err) {
        throw FileOperationError.fromSystemError(err, display, 'read');
      }
      const lines = splitLinesKeepEnds(text);
      const window = lines.slice(input.offset, input.offset + input.limit).map(truncateLine);

      return {
        path: display,
        content: window.join(''),
        total_lines: lines.length,
        lines_returned: window.length,
        offset: input.offset,
      };
    }
  );

  const write = defineTool(
    'write',
    'Create or overwrite a file, creating parent directories as needed.',
    writeSchema,
    async (input): Promise<ToolPayload> => {
      const absolute = sandbox.resolve(input.path);
      const display = sandbox.relative(absolute);

      try {
        await fs.mkdir(path.dirname(absolute), { recursive: true });
      } catch (err) {
        throw FileOperationError.fromSystemError(err, display, 'write');
      }
      await rewriteFile(absolute, display, input.content, 'write');

      return { path: display, bytes_written: Buffer.byteLength(input.content, 'utf-8') };
    }
  );

  const edit = defineTool(
    'edit',
    'Replace one exact occurrence of old_string with new_string. Fails if the text is missing or appears more than once.',
    editSchema,
    async (input): Promise<ToolPayload> => {
      const absolute = sandbox.resolve(input.path);
      const display = sandbox.relative(absolute);
      const before = await readExistingFile(absolute, display, 'edit');

      const occurrences = countOccurrences(before, input.old_string);
      if (occurrences === 0) {
        throw new FileOperationError(
          `Text not found in ${display}. old_string must match the file exactly, including whitespace.`,
          ErrorCategory.PERMANENT,
          true,
          display,
          'edit'
        );
      }
      if (occurrences > 1) {
        throw new AmbiguousEditError(display, occurrences);
      }

      const index = before.indexOf(input.old_string);
      const after =
        before.slice(0, index) + input.new_string + before.slice(index + input.old_string.length);
      await rewriteFile(absolute, display, after, 'edit');

      return { path: display, replacements: 1, diff: diffPreview(display, before, after) };
    }
  );

  const append = defineTool(
    'append',
    'Append text to the end of a file, creating it if missing.',
    appendSchema,
    async (input): Promise<ToolPayload> => {
      const absolute = sandbox.resolve(input.path);
      const display = sandbox.relative(absolute);

      try {
        await fs.mkdir(path.dirname(absolute), { recursive: true });
        await fs.appendFile(absolute, input.content, 'utf-8');
      } catch (err) {
        throw FileOperationError.fromSystemError(err, display, 'append');
      }

      return { path: display, bytes_appended: Buffer.byteLength(input.content, 'utf-8') };
    }
  );

  const replace = defineTool(
    'replace',
    'Regex search-and-replace across a whole file. count=0 replaces every match.',
    replaceSchema,
    async (input): Promise<ToolPayload> => {
      const regex = InvalidPatternError.compile(input.pattern, 'g');
      const absolute = sandbox.resolve(input.path);
      const display = sandbox.relative(absolute);
      const before = await readExistingFile(absolute, display, 'replace');

      let after = '';
      let cursor = 0;
      let replacements = 0;
      for (const match of before.matchAll(regex)) {
        if (input.count > 0 && replacements >= input.count) break;
        const start = match.index ?? 0;
        after += before.slice(cursor, start) + expandReplacement(input.replacement, match, before);
        cursor = start + match[0].length;
        replacements++;
      }

      if (replacements === 0) {
        return { path: display, replacements: 0 };
      }

      after += before.slice(cursor);
      await rewriteFile(absolute, display, after, 'replace');
      return { path: display, replacements, diff: diffPreview(display, before, after) };
    }
  );

  return [read, write, edit, append, replace];
}
