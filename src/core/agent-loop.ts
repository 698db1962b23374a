/**
 * Agent Loop
 *
 * The ReAct cycle: send the conversation and tool specs to the provider,
 * run every requested tool call in order, append the results, repeat
 * until the model answers in plain text.
 *
 * States: AwaitingProvider → (ToolCallsPending | FinalAnswer | Stalled).
 * A run also ends when the iteration limit is hit or the caller's
 * signal aborts the provider request. Provider failures propagate.
 */

import type {
  ChatResponseWithTools,
  LLMProviderWithTools,
  Message,
  ToolCall,
  ToolMessage,
} from '../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ApprovalChannel, ApprovalRequest, ApprovalResponse, ToolResult } from '../tools/types.js';
import { failure, isToolFailure } from '../tools/types.js';
import type { AgentLoopEvent, AgentLoopEventListener, LoopOutcome } from './types.js';
import { AgentError, ErrorCategory, formatErrorForLog, isCancellation } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';

const log = createComponentLogger('AgentLoop');

export const DEFAULT_MAX_ITERATIONS = 50;

export interface AgentLoopConfig {
  provider: LLMProviderWithTools;
  registry: ToolRegistry;
  /** Decides risky calls; without one they are denied */
  approval?: ApprovalChannel;
  /** Provider requests allowed per run */
  maxIterations?: number;
  /** Model override passed to the provider */
  model?: string;
}

export interface RunOptions {
  /** Aborts the in-flight provider request */
  signal?: AbortSignal;
}

export class AgentLoop {
  readonly maxIterations: number;

  private provider: LLMProviderWithTools;
  private registry: ToolRegistry;
  private approval?: ApprovalChannel;
  private model?: string;
  private listeners: AgentLoopEventListener[] = [];

  constructor(config: AgentLoopConfig) {
    this.provider = config.provider;
    this.registry = config.registry;
    this.approval = config.approval;
    this.model = config.model;
    this.maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new AgentError(
        `maxIterations must be a positive integer, got ${this.maxIterations}`,
        ErrorCategory.VALIDATION,
        false
      );
    }
  }

  /** Subscribe to loop events */
  subscribe(listener: AgentLoopEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  /**
   * Run until the model gives a final answer, stalls, or the iteration
   * limit is reached. Appends to `conversation` in place.
   */
  async run(conversation: Message[], options: RunOptions = {}): Promise<LoopOutcome> {
    if (conversation[0]?.role !== 'system') {
      throw new AgentError(
        'Conversation must start with a system message',
        ErrorCategory.VALIDATION,
        false
      );
    }

    const tools = this.registry.getSpecs();
    let iterations = 0;

    while (true) {
      if (options.signal?.aborted) {
        return this.stall('cancelled', iterations);
      }
      if (iterations >= this.maxIterations) {
        log.warn('Iteration limit reached', { limit: this.maxIterations });
        this.emit({ type: 'iteration_limit', limit: this.maxIterations });
        return { status: 'iteration_limit_exceeded', limit: this.maxIterations, iterations };
      }

      iterations++;
      this.emit({ type: 'iteration.start', iteration: iterations });

      let response: ChatResponseWithTools;
      try {
        response = await this.provider.chatWithTools(conversation, {
          tools,
          signal: options.signal,
          ...(this.model !== undefined && { model: this.model }),
        });
      } catch (error) {
        if (isCancellation(error)) {
          return this.stall('cancelled', iterations);
        }
        log.error('Provider request failed', { error: formatErrorForLog(error) });
        throw error;
      }

      if (response.toolCalls.length > 0) {
        conversation.push({
          role: 'assistant',
          content: response.content || null,
          tool_calls: response.toolCalls,
        });
        for (const call of response.toolCalls) {
          conversation.push(await this.executeToolCall(call));
        }
        continue;
      }

      const content = response.content ?? '';
      if (content.trim().length > 0) {
        conversation.push({ role: 'assistant', content });
        this.emit({ type: 'final_answer', content });
        return { status: 'final_answer', content, iterations };
      }

      return this.stall('empty_response', iterations);
    }
  }

  // ===========================================================================
  // TOOL CALLS
  // ===========================================================================

  private async executeToolCall(call: ToolCall): Promise<ToolMessage> {
    const name = call.function.name;
    const parsed = parseArguments(call.function.arguments);

    const started = Date.now();
    let result: ToolResult;
    if (!parsed.ok) {
      this.emit({ type: 'tool.started', callId: call.id, tool: name, args: {} });
      result = failure(`Invalid arguments: ${parsed.error}`, 'invalid_arguments');
    } else {
      this.emit({ type: 'tool.started', callId: call.id, tool: name, args: parsed.args });
      result = await this.runApproved(call.id, name, parsed.args);
    }

    const durationMs = Date.now() - started;
    const success = !isToolFailure(result);
    if (!success) {
      log.debug('Tool call failed', { tool: name, result });
    }
    this.emit({ type: 'tool.finished', callId: call.id, tool: name, result, success, durationMs });

    return {
      role: 'tool',
      tool_call_id: call.id,
      name,
      content: JSON.stringify(result),
    };
  }

  /**
   * Dispatch a call, asking the approval channel first when the tool
   * flags it as risky.
   */
  private async runApproved(callId: string, name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const verdict = this.registry.assessRisk(name, args);
    if (!verdict?.requiresApproval) {
      return this.registry.dispatch(name, args);
    }

    const command = typeof args.command === 'string' ? args.command : JSON.stringify(args);
    this.emit({ type: 'approval.requested', callId, tool: name, command, reason: verdict.reason });

    const decision = await this.requestApproval({ callId, tool: name, command, reason: verdict.reason });
    this.emit({
      type: 'approval.resolved',
      callId,
      tool: name,
      granted: decision.granted,
      ...(decision.reason !== undefined && { reason: decision.reason }),
    });

    if (!decision.granted) {
      log.info('Risky call rejected', { tool: name, reason: verdict.reason });
      return failure(`Command rejected: ${decision.reason ?? verdict.reason}`, 'rejected', {
        command,
        risk: verdict.reason,
      });
    }
    return this.registry.dispatch(name, args);
  }

  private async requestApproval(request: ApprovalRequest): Promise<ApprovalResponse> {
    if (!this.approval) {
      return { granted: false, reason: `no approval channel configured (${request.reason})` };
    }
    try {
      return await this.approval.check(request);
    } catch (error) {
      if (isCancellation(error)) {
        log.info('Approval cancelled', { tool: request.tool });
        return { granted: false, reason: 'Cancelled by user' };
      }
      log.error('Approval channel failed', { tool: request.tool, error: formatErrorForLog(error) });
      return { granted: false, reason: `approval failed (${request.reason})` };
    }
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private stall(reason: 'empty_response' | 'cancelled', iterations: number): LoopOutcome {
    log.info('Loop stalled', { reason, iterations });
    this.emit({ type: 'stalled', reason });
    return { status: 'stalled', reason, iterations };
  }

  private emit(event: AgentLoopEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        log.error('Event listener failed', { event: event.type, error: formatErrorForLog(error) });
      }
    }
  }
}

// =============================================================================
// ARGUMENT PARSING
// =============================================================================

type ParsedArguments = { ok: true; args: Record<string, unknown> } | { ok: false; error: string };

/**
 * Decode a tool call's JSON arguments. Empty means no arguments; anything
 * that is not a JSON object is rejected.
 */
export function parseArguments(raw: string): ParsedArguments {
  if (raw.trim() === '') {
    return { ok: true, args: {} };
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `arguments are not valid JSON (${detail})` };
  }

  if (!isPlainObject(value)) {
    return { ok: false, error: 'arguments must be a JSON object' };
  }
  return { ok: true, args: value };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
