/**
 * Provider Types
 *
 * Conversation messages and the completion-provider contract the agent
 * loop consumes. Message shapes follow the OpenAI chat format, which
 * every supported backend speaks.
 */

import type { ToolSpec } from '../tools/types.js';

// =============================================================================
// MESSAGE TYPES
// =============================================================================

/**
 * A tool call returned by the LLM.
 */
export interface ToolCall {
  /** Unique ID for this tool call (used to match results) */
  id: string;
  type: 'function';
  function: {
    /** Which tool the LLM wants to call */
    name: string;
    /** Arguments as a JSON-encoded object */
    arguments: string;
  };
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  /** Tool calls, in the order they must be answered */
  tool_calls?: ToolCall[];
}

export interface ToolMessage {
  role: 'tool';
  /** JSON-encoded ToolResult */
  content: string;
  /** Matches the ToolCall id this message answers */
  tool_call_id: string;
  /** Tool name (some backends require it) */
  name?: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

// =============================================================================
// PROVIDER INTERFACE
// =============================================================================

export interface ChatOptionsWithTools {
  /** Tool definitions the model may call */
  tools?: ToolSpec[];
  /** Model override (uses provider default if not specified) */
  model?: string;
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Temperature for randomness (0-1) */
  temperature?: number;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * One assistant turn.
 */
export interface ChatResponseWithTools {
  /** The assistant's text, if any */
  content: string | null;
  /** Tool calls requested by the LLM, in request order (empty when none) */
  toolCalls: ToolCall[];
  /** Why the response stopped, as reported by the backend */
  stopReason?: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * Anything that can produce one assistant turn from a conversation.
 */
export interface LLMProviderWithTools {
  /** Provider name for logging/debugging */
  readonly name: string;

  /** Model used when a request does not override it */
  readonly defaultModel: string;

  chatWithTools(
    messages: readonly Message[],
    options?: ChatOptionsWithTools
  ): Promise<ChatResponseWithTools>;
}

// =============================================================================
// PROVIDER CONFIGURATION
// =============================================================================

/**
 * Connection settings for an OpenAI-compatible endpoint.
 */
export interface OpenAICompatibleConfig {
  /** Profile name, used in logs and errors */
  name: string;
  /** Base URL including the API version segment, e.g. http://localhost:1234/v1 */
  baseUrl: string;
  model: string;
  /** Sent as a bearer token when set */
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
}
