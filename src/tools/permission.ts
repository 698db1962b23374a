/**
 * Approval channels.
 *
 * Decide whether a command the risk classifier flagged may run.
 */

import * as readline from 'node:readline';
import type {
  ApprovalChannel,
  ApprovalRequest,
  ApprovalResponse,
  PermissionMode,
} from './types.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';

const log = createComponentLogger('Approval');

/** Asks one question and resolves with the raw answer */
export type PromptFn = (question: string) => Promise<string>;

// =============================================================================
// CHANNEL IMPLEMENTATIONS
// =============================================================================

/**
 * Strict channel - denies every risky command.
 */
export class StrictApprovalChannel implements ApprovalChannel {
  async check(request: ApprovalRequest): Promise<ApprovalResponse> {
    log.info('Risky command denied in strict mode', { tool: request.tool, reason: request.reason });
    return { granted: false, reason: `Blocked in strict mode: ${request.reason}` };
  }
}

/**
 * YOLO channel - approves everything (testing only).
 */
export class YoloApprovalChannel implements ApprovalChannel {
  async check(request: ApprovalRequest): Promise<ApprovalResponse> {
    log.warn('Risky command auto-approved', { command: request.command, reason: request.reason });
    return { granted: true };
  }
}

/**
 * Interactive channel - asks the user. "always" and "never" answers are
 * remembered per classifier reason for the rest of the session.
 */
export class InteractiveApprovalChannel implements ApprovalChannel {
  private rememberedDecisions: Map<string, boolean> = new Map();
  private prompt: PromptFn;

  constructor(prompt: PromptFn = askOnStdin) {
    this.prompt = prompt;
  }

  async check(request: ApprovalRequest): Promise<ApprovalResponse> {
    const remembered = this.rememberedDecisions.get(request.reason);
    if (remembered !== undefined) {
      return {
        granted: remembered,
        remembered: true,
        ...(!remembered && { reason: 'Denied earlier for this session' }),
      };
    }

    const answer = await this.prompt(
      `\n⚠️  ${request.reason}\n   $ ${request.command}\nAllow? [y]es / [n]o / [a]lways / ne[v]er: `
    );

    let granted = false;
    let remember = false;
    switch (answer.trim().toLowerCase()) {
      case 'y':
      case 'yes':
        granted = true;
        break;
      case 'a':
      case 'always':
        granted = true;
        remember = true;
        break;
      case 'v':
      case 'never':
        remember = true;
        break;
      default:
        granted = false;
    }

    if (remember) {
      this.rememberedDecisions.set(request.reason, granted);
    }
    log.info('Approval decision', { tool: request.tool, granted, remember });

    return granted ? { granted } : { granted, reason: 'Denied by user' };
  }
}

function askOnStdin(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise(resolve => {
    rl.question(question, answer => {
      rl.close();
      resolve(answer);
    });
  });
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Create an approval channel for the given mode.
 */
export function createApprovalChannel(mode: PermissionMode, prompt?: PromptFn): ApprovalChannel {
  switch (mode) {
    case 'strict':
      return new StrictApprovalChannel();
    case 'yolo':
      log.warn('YOLO mode enabled - risky commands will be auto-approved');
      return new YoloApprovalChannel();
    case 'interactive':
      return new InteractiveApprovalChannel(prompt);
  }
}
