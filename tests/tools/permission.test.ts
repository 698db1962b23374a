/**
 * Approval channel tests.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  InteractiveApprovalChannel,
  StrictApprovalChannel,
  YoloApprovalChannel,
  createApprovalChannel,
  type PromptFn,
} from '../../src/tools/permission.js';
import type { ApprovalRequest } from '../../src/tools/types.js';

const request: ApprovalRequest = {
  callId: 'call_1',
  tool: 'bash',
  command: 'sudo make install',
  reason: 'Privilege escalation',
};

function answering(...answers: string[]) {
  return vi.fn<PromptFn>(async () => answers.shift() ?? '');
}

describe('StrictApprovalChannel', () => {
  it('denies everything', async () => {
    expect(await new StrictApprovalChannel().check(request)).toEqual({
      granted: false,
      reason: 'Blocked in strict mode: Privilege escalation',
    });
  });
});

describe('YoloApprovalChannel', () => {
  it('approves everything', async () => {
    expect(await new YoloApprovalChannel().check(request)).toEqual({ granted: true });
  });
});

describe('InteractiveApprovalChannel', () => {
  it('shows the reason and the command', async () => {
    const prompt = answering('y');
    await new InteractiveApprovalChannel(prompt).check(request);
    expect(prompt).toHaveBeenCalledTimes(1);
    expect(prompt.mock.calls[0][0]).toContain('Privilege escalation');
    expect(prompt.mock.calls[0][0]).toContain('$ sudo make install');
  });

  it.each(['y', 'yes', ' Y '])('approves %j', async answer => {
    expect(await new InteractiveApprovalChannel(answering(answer)).check(request)).toEqual({ granted: true });
  });

  it.each(['n', 'no', '', 'maybe'])('denies %j', async answer => {
    expect(await new InteractiveApprovalChannel(answering(answer)).check(request)).toEqual({
      granted: false,
      reason: 'Denied by user',
    });
  });

  it('remembers "always" for the same reason', async () => {
    const prompt = answering('a');
    const channel = new InteractiveApprovalChannel(prompt);

    expect(await channel.check(request)).toEqual({ granted: true });
    expect(await channel.check({ ...request, command: 'sudo ls' })).toEqual({
      granted: true,
      remembered: true,
    });
    expect(prompt).toHaveBeenCalledTimes(1);
  });

  it('remembers "never" for the same reason', async () => {
    const prompt = answering('v');
    const channel = new InteractiveApprovalChannel(prompt);

    expect(await channel.check(request)).toEqual({ granted: false, reason: 'Denied by user' });
    expect(await channel.check(request)).toEqual({
      granted: false,
      remembered: true,
      reason: 'Denied earlier for this session',
    });
    expect(prompt).toHaveBeenCalledTimes(1);
  });

  it('asks again for a different reason', async () => {
    const prompt = answering('a', 'n');
    const channel = new InteractiveApprovalChannel(prompt);

    await channel.check(request);
    const other = await channel.check({ ...request, reason: 'Fork bomb', command: ':(){ :|:& };:' });
    expect(other).toEqual({ granted: false, reason: 'Denied by user' });
    expect(prompt).toHaveBeenCalledTimes(2);
  });
});

describe('createApprovalChannel', () => {
  it('maps permission modes to channels', () => {
    expect(createApprovalChannel('strict')).toBeInstanceOf(StrictApprovalChannel);
    expect(createApprovalChannel('yolo')).toBeInstanceOf(YoloApprovalChannel);
    expect(createApprovalChannel('interactive', answering())).toBeInstanceOf(InteractiveApprovalChannel);
  });
});
