/**
 * Event display formatting tests.
 */

import { describe, it, expect } from 'vitest';
import { EventDisplay, c, formatEvent, summarizeArgs } from '../../src/modes/event-display.js';

const plain = { color: false };

describe('formatEvent', () => {
  it('shows iterations only in verbose mode', () => {
    expect(formatEvent({ type: 'iteration.start', iteration: 2 }, plain)).toEqual([]);
    expect(formatEvent({ type: 'iteration.start', iteration: 2 }, { ...plain, verbose: true })).toEqual([
      '[iteration 2]',
    ]);
  });

  it('shows tool calls with their main argument', () => {
    const event = { type: 'tool.started' as const, callId: 'c1', tool: 'bash', args: { command: 'npm test' } };
    expect(formatEvent(event, plain)).toEqual(['> bash npm test']);
    expect(formatEvent(event, { ...plain, verbose: true })).toEqual([
      '> bash npm test',
      '  args: {"command":"npm test"}',
    ]);
  });

  it('hides successful results unless verbose', () => {
    const event = {
      type: 'tool.finished' as const,
      callId: 'c1',
      tool: 'grep',
      result: { count: 3, matches: [] },
      success: true,
      durationMs: 12,
    };
    expect(formatEvent(event, plain)).toEqual([]);
    expect(formatEvent(event, { ...plain, verbose: true })).toEqual(['  3 result(s) (12ms)']);
  });

  it('always shows failures', () => {
    const event = {
      type: 'tool.finished' as const,
      callId: 'c1',
      tool: 'read',
      result: { error: 'File not found: a.txt', kind: 'not_found' as const },
      success: false,
      durationMs: 1,
    };
    expect(formatEvent(event, plain)).toEqual(['  error (not_found): File not found: a.txt']);
  });

  it('describes exit codes and replacements', () => {
    const finished = (result: Record<string, unknown>) =>
      formatEvent(
        { type: 'tool.finished', callId: 'c', tool: 't', result, success: true, durationMs: 5 },
        { ...plain, verbose: true }
      );
    expect(finished({ exit_code: 1, stdout: '' })).toEqual(['  exit 1 (5ms)']);
    expect(finished({ replacements: 2 })).toEqual(['  2 replacement(s) (5ms)']);
    expect(finished({ path: 'a.txt' })).toEqual(['  ok (5ms)']);
  });

  it('shows approvals', () => {
    expect(
      formatEvent(
        { type: 'approval.requested', callId: 'c', tool: 'bash', command: 'sudo ls', reason: 'Privilege escalation' },
        plain
      )
    ).toEqual(['! bash needs approval: Privilege escalation']);
    expect(formatEvent({ type: 'approval.resolved', callId: 'c', tool: 'bash', granted: true }, plain)).toEqual([
      '  approved',
    ]);
    expect(
      formatEvent(
        { type: 'approval.resolved', callId: 'c', tool: 'bash', granted: false, reason: 'Denied by user' },
        plain
      )
    ).toEqual(['  rejected: Denied by user']);
  });

  it('explains how a run stopped', () => {
    expect(formatEvent({ type: 'stalled', reason: 'cancelled' }, plain)).toEqual(['Cancelled.']);
    expect(formatEvent({ type: 'stalled', reason: 'empty_response' }, plain)).toEqual([
      'The model returned an empty response.',
    ]);
    expect(formatEvent({ type: 'iteration_limit', limit: 5 }, plain)).toEqual([
      'Stopped after 5 iterations without a final answer.',
    ]);
    expect(formatEvent({ type: 'final_answer', content: 'done' }, plain)).toEqual([]);
  });

  it('colors output by default', () => {
    expect(formatEvent({ type: 'stalled', reason: 'cancelled' })).toEqual([c('Cancelled.', 'yellow')]);
    expect(c('x', 'red')).toBe('\x1b[31mx\x1b[0m');
  });
});

describe('summarizeArgs', () => {
  it('falls back to the first string argument', () => {
    expect(summarizeArgs('edit', { path: 'src/a.ts', old: 'x' })).toBe('src/a.ts');
    expect(summarizeArgs('custom', { limit: 3, query: 'needle' })).toBe('needle');
    expect(summarizeArgs('custom', { limit: 3 })).toBe('');
  });

  it('collapses and truncates long values', () => {
    expect(summarizeArgs('bash', { command: 'echo a\n  echo b' })).toBe('echo a echo b');
    expect(summarizeArgs('bash', { command: 'x'.repeat(100) })).toBe(`${'x'.repeat(80)}...`);
  });
});

describe('EventDisplay', () => {
  it('writes lines and toggles verbosity', () => {
    const lines: string[] = [];
    const display = new EventDisplay(line => lines.push(line), { color: false });

    display.handle({ type: 'iteration.start', iteration: 1 });
    expect(lines).toEqual([]);

    expect(display.toggleVerbose()).toBe(true);
    display.handle({ type: 'iteration.start', iteration: 1 });
    expect(lines).toEqual(['[iteration 1]']);

    expect(display.toggleVerbose()).toBe(false);
  });
});
