/**
 * Mock Provider
 *
 * A scripted LLM provider for tests. Each request consumes the next step
 * of the script; a step is a canned response, an error to throw, or a
 * function computing the response from the request.
 */

import type {
  ChatOptionsWithTools,
  ChatResponseWithTools,
  LLMProviderWithTools,
  Message,
  ToolCall,
} from '../types.js';
import { CancellationError, ProviderError } from '../../errors/index.js';

// =============================================================================
// SCRIPT TYPES
// =============================================================================

export interface MockResponse {
  content?: string | null;
  toolCalls?: ToolCall[];
}

export type MockStep =
  | MockResponse
  | Error
  | ((
      messages: readonly Message[],
      options: ChatOptionsWithTools
    ) => ChatResponseWithTools | Promise<ChatResponseWithTools>);

/** One recorded request */
export interface MockRequest {
  messages: Message[];
  options: ChatOptionsWithTools;
}

export interface MockProviderOptions {
  /** Replay the last step forever instead of failing when the script runs out */
  repeatLast?: boolean;
}

// =============================================================================
// MOCK PROVIDER
// =============================================================================

export class MockProvider implements LLMProviderWithTools {
  readonly name = 'mock';
  readonly defaultModel = 'mock-model';

  /** Every request received, in order */
  readonly requests: MockRequest[] = [];

  private script: MockStep[];
  private index = 0;
  private repeatLast: boolean;

  constructor(script: MockStep[] = [], options: MockProviderOptions = {}) {
    this.script = [...script];
    this.repeatLast = options.repeatLast ?? false;
  }

  async chatWithTools(
    messages: readonly Message[],
    options: ChatOptionsWithTools = {}
  ): Promise<ChatResponseWithTools> {
    this.requests.push({ messages: [...messages], options });

    if (options.signal?.aborted) {
      throw new CancellationError('Request cancelled by user');
    }

    const step = this.nextStep();
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(messages, options);
    }
    return {
      content: step.content ?? null,
      toolCalls: step.toolCalls ?? [],
    };
  }

  /**
   * Append steps to the script.
   */
  enqueue(...steps: MockStep[]): void {
    this.script.push(...steps);
  }

  getCallCount(): number {
    return this.requests.length;
  }

  reset(): void {
    this.script = [];
    this.index = 0;
    this.requests.length = 0;
  }

  private nextStep(): MockStep {
    if (this.index < this.script.length) {
      return this.script[this.index++];
    }
    const last = this.script[this.script.length - 1];
    if (this.repeatLast && last !== undefined) {
      return last;
    }
    return ProviderError.invalidResponse(this.name, `script exhausted after ${this.index} responses`);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

let mockCallCounter = 0;

/**
 * Build a tool call the way a provider would return it.
 */
export function mockToolCall(name: string, args: Record<string, unknown> | string = {}, id?: string): ToolCall {
  mockCallCounter++;
  return {
    id: id ?? `call_mock_${mockCallCounter}`,
    type: 'function',
    function: {
      name,
      arguments: typeof args === 'string' ? args : JSON.stringify(args),
    },
  };
}
