/**
 * CLI argument parsing tests.
 */

import { describe, it, expect } from 'vitest';
import { VERSION, getHelpText, parseArgs } from '../src/cli.js';
import { ConfigError } from '../src/errors/index.js';

describe('parseArgs', () => {
  it('defaults to the REPL with nothing set', () => {
    expect(parseArgs([])).toEqual({ help: false, version: false, debug: false, configure: false });
  });

  it('parses every option', () => {
    expect(
      parseArgs([
        '-w',
        'proj',
        '--provider',
        'ollama',
        '-m',
        'qwen3:4b',
        '--base-url',
        'http://localhost:11434/v1',
        '--permission',
        'strict',
        '--max-iterations',
        '12',
        '--debug',
      ])
    ).toEqual({
      help: false,
      version: false,
      debug: true,
      configure: false,
      workspace: 'proj',
      provider: 'ollama',
      model: 'qwen3:4b',
      baseUrl: 'http://localhost:11434/v1',
      permission: 'strict',
      maxIterations: 12,
    });
  });

  it('treats the rest of the line as the task', () => {
    expect(parseArgs(['--yolo', 'fix', 'the', '--failing', 'test'])).toMatchObject({
      permission: 'yolo',
      task: 'fix the --failing test',
    });
  });

  it('takes the task after --', () => {
    expect(parseArgs(['--', '-rf', 'explain']).task).toBe('-rf explain');
    expect(parseArgs(['--', '  ']).task).toBeUndefined();
  });

  it('recognises the configure command', () => {
    expect(parseArgs(['configure'])).toMatchObject({ configure: true });
    expect(parseArgs(['configure']).task).toBeUndefined();
  });

  it('parses help and version flags', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--version']).version).toBe(true);
  });

  describe('errors', () => {
    it('requires option values', () => {
      expect(() => parseArgs(['--model'])).toThrow('Option --model requires a value');
      expect(() => parseArgs(['-w', '--debug'])).toThrow('Option -w requires a value');
    });

    it('rejects unknown permission modes', () => {
      expect(() => parseArgs(['--permission', 'lax'])).toThrow(
        "Invalid permission mode 'lax'. Expected one of: strict, interactive, yolo"
      );
    });

    it.each(['0', '2.5', 'ten'])('rejects --max-iterations %s', raw => {
      expect(() => parseArgs(['--max-iterations', raw])).toThrow(
        `--max-iterations must be a positive integer, got '${raw}'`
      );
    });

    it('rejects unknown options with ConfigError', () => {
      expect(() => parseArgs(['--turbo'])).toThrow(ConfigError);
      expect(() => parseArgs(['--turbo'])).toThrow('Unknown option --turbo. Run tidecode --help for usage.');
    });
  });
});

describe('getHelpText', () => {
  it('names the version and the options', () => {
    const help = getHelpText();
    expect(help.startsWith(`tidecode ${VERSION} - `)).toBe(true);
    expect(help).toContain('--permission MODE');
    expect(help).toContain('tidecode configure');
  });
});
