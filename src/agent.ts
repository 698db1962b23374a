/**
 * Agent Session
 *
 * Wires one workspace together: tool registry, provider, approval
 * channel and agent loop, plus the conversation they operate on. The
 * conversation lives here and persists across runs until `reset()`.
 */

import { AgentLoop, type RunOptions } from './core/agent-loop.js';
import { createSystemMessage } from './core/system-prompt.js';
import type { AgentLoopEventListener, LoopOutcome } from './core/types.js';
import { OpenAICompatibleProvider } from './providers/adapters/openai.js';
import type { LLMProviderWithTools, Message } from './providers/types.js';
import { createStandardRegistry } from './tools/standard.js';
import type { ToolRegistry } from './tools/registry.js';
import { createApprovalChannel, type PromptFn } from './tools/permission.js';
import type { ApprovalChannel } from './tools/types.js';
import type { Settings } from './config/settings.js';
import { createComponentLogger } from './integrations/utilities/logger.js';

const log = createComponentLogger('AgentSession');

export interface AgentSessionOptions {
  settings: Settings;
  /** Replaces the provider built from settings */
  provider?: LLMProviderWithTools;
  /** Replaces the approval channel built from the permission mode */
  approval?: ApprovalChannel;
  /** Question function used by the interactive approval channel */
  prompt?: PromptFn;
}

export class AgentSession {
  readonly workspaceRoot: string;
  readonly provider: LLMProviderWithTools;
  readonly registry: ToolRegistry;
  readonly loop: AgentLoop;

  private conversation: Message[];
  private readonly systemMessage: Message;

  constructor(options: AgentSessionOptions) {
    const { settings } = options;
    const { registry, sandbox } = createStandardRegistry({
      workspaceRoot: settings.workspaceRoot,
      bashTimeoutSec: settings.bashTimeoutSec,
    });

    this.workspaceRoot = sandbox.root;
    this.registry = registry;
    this.provider = options.provider ?? new OpenAICompatibleProvider(settings.provider);
    this.loop = new AgentLoop({
      provider: this.provider,
      registry,
      approval: options.approval ?? createApprovalChannel(settings.permission, options.prompt),
      maxIterations: settings.maxIterations,
    });

    this.systemMessage = createSystemMessage({
      workspaceRoot: sandbox.root,
      tools: registry.getSpecs(),
      bashTimeoutSec: settings.bashTimeoutSec,
    });
    this.conversation = [this.systemMessage];

    log.debug('Session created', {
      workspace: sandbox.root,
      provider: this.provider.name,
      model: this.provider.defaultModel,
      tools: registry.list(),
    });
  }

  /** The conversation so far, system message first */
  get messages(): readonly Message[] {
    return this.conversation;
  }

  subscribe(listener: AgentLoopEventListener): () => void {
    return this.loop.subscribe(listener);
  }

  /**
   * Add a user message and run the loop on the conversation.
   */
  async send(input: string, options: RunOptions = {}): Promise<LoopOutcome> {
    this.conversation.push({ role: 'user', content: input });
    const outcome = await this.loop.run(this.conversation, options);
    log.debug('Run finished', { status: outcome.status, iterations: outcome.iterations });
    return outcome;
  }

  /**
   * Drop everything but the system message.
   */
  reset(): void {
    this.conversation = [this.systemMessage];
  }
}

export function createAgentSession(options: AgentSessionOptions): AgentSession {
  return new AgentSession(options);
}
