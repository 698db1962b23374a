/**
 * Mock provider tests.
 */

import { describe, it, expect } from 'vitest';
import { MockProvider, mockToolCall } from '../../src/providers/adapters/mock.js';
import { CancellationError, ProviderError } from '../../src/errors/index.js';

const messages = [{ role: 'user' as const, content: 'hi' }];

describe('MockProvider', () => {
  it('replays the script in order and records requests', async () => {
    const call = mockToolCall('ls', { path: '.' }, 'call_1');
    const provider = new MockProvider([{ toolCalls: [call] }, { content: 'done' }]);

    expect(await provider.chatWithTools(messages)).toEqual({ content: null, toolCalls: [call] });
    expect(await provider.chatWithTools(messages)).toEqual({ content: 'done', toolCalls: [] });
    expect(provider.getCallCount()).toBe(2);
  });

  it('fails once the script runs out', async () => {
    const provider = new MockProvider([{ content: 'one' }]);
    await provider.chatWithTools(messages);
    await expect(provider.chatWithTools(messages)).rejects.toMatchObject({
      code: 'INVALID_RESPONSE',
      message: 'Invalid response from mock: script exhausted after 1 responses',
    });
  });

  it('can repeat the last step', async () => {
    const provider = new MockProvider([{ content: 'again' }], { repeatLast: true });
    await provider.chatWithTools(messages);
    expect((await provider.chatWithTools(messages)).content).toBe('again');
  });

  it('throws scripted errors and computes scripted functions', async () => {
    const provider = new MockProvider([
      new ProviderError('offline', 'mock', 'NETWORK_ERROR'),
      msgs => ({ content: `saw ${msgs.length}`, toolCalls: [] }),
    ]);
    await expect(provider.chatWithTools(messages)).rejects.toBeInstanceOf(ProviderError);
    expect((await provider.chatWithTools(messages)).content).toBe('saw 1');
  });

  it('honours an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      new MockProvider([{ content: 'x' }]).chatWithTools(messages, { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancellationError);
  });

  it('encodes tool call arguments as JSON', () => {
    expect(mockToolCall('read', { path: 'a' }, 'id').function.arguments).toBe('{"path":"a"}');
    expect(mockToolCall('read', '{bad').function.arguments).toBe('{bad');
  });
});
