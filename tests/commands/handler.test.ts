/**
 * REPL slash command tests.
 */

import { describe, it, expect, vi } from 'vitest';
import { realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { getHelpText, handleCommand, isCommand, type CommandContext } from '../../src/commands/handler.js';
import { createAgentSession } from '../../src/agent.js';
import { EventDisplay } from '../../src/modes/event-display.js';
import { MockProvider } from '../../src/providers/adapters/mock.js';
import { testSettings } from '../helpers.js';

function createContext(): CommandContext & { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    session: createAgentSession({
      settings: testSettings(realpathSync(tmpdir())),
      provider: new MockProvider(),
    }),
    display: new EventDisplay(() => {}, { color: false }),
    output: {
      log: message => logs.push(message),
      error: message => errors.push(message),
    },
    logs,
    errors,
  };
}

describe('isCommand', () => {
  it('recognises slash commands', () => {
    expect(isCommand('/help')).toBe(true);
    expect(isCommand('help me')).toBe(false);
  });
});

describe('handleCommand', () => {
  it.each(['/quit', '/exit', '/q', '/EXIT'])('%s quits', cmd => {
    expect(handleCommand(cmd, createContext())).toBe('quit');
  });

  it.each(['/help', '/h', '/?'])('%s prints the command list', cmd => {
    const ctx = createContext();
    expect(handleCommand(cmd, ctx)).toBe('handled');
    expect(ctx.logs).toEqual([getHelpText()]);
  });

  it('/clear resets the session', () => {
    const ctx = createContext();
    const reset = vi.spyOn(ctx.session, 'reset');
    expect(handleCommand('/clear', ctx)).toBe('handled');
    expect(reset).toHaveBeenCalledTimes(1);
    expect(ctx.logs).toEqual(['Conversation cleared.']);
  });

  it('/logs toggles detailed output', () => {
    const ctx = createContext();
    handleCommand('/logs', ctx);
    handleCommand('/logs', ctx);
    expect(ctx.logs).toEqual(['Detailed tool output on.', 'Detailed tool output off.']);
    expect(ctx.display.verbose).toBe(false);
  });

  it('reports unknown commands', () => {
    const ctx = createContext();
    expect(handleCommand('/undo now', ctx)).toBe('unknown');
    expect(ctx.errors).toEqual(['Unknown command: /undo. Type /help for the list.']);
  });
});

describe('getHelpText', () => {
  it('lists commands with aliases', () => {
    expect(getHelpText()).toContain('/exit, /quit, /q');
  });
});
