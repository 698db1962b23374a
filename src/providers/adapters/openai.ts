/**
 * OpenAI-Compatible Provider Adapter
 *
 * Speaks the `/chat/completions` dialect shared by OpenAI, Mistral,
 * LM Studio and Ollama. Tool definitions and tool calls are already in
 * that wire format, so conversion is mostly structural.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type {
  ChatOptionsWithTools,
  ChatResponseWithTools,
  LLMProviderWithTools,
  Message,
  OpenAICompatibleConfig,
  ToolCall,
} from '../types.js';
import type { ToolSpec } from '../../tools/types.js';
import { ProviderError, isCancellation, CancellationError } from '../../errors/index.js';
import { resilientFetch, type NetworkConfig } from '../resilient-fetch.js';
import { createComponentLogger } from '../../integrations/utilities/logger.js';

const log = createComponentLogger('OpenAICompatible');

// =============================================================================
// WIRE TYPES
// =============================================================================

/** OpenAI tool definition format */
interface OpenAITool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

const toolCallSchema = z.object({
  id: z.string().nullish(),
  type: z.string().nullish(),
  function: z.object({
    name: z.string(),
    // Some local servers send arguments as an object rather than a string.
    arguments: z
      .union([z.string(), z.record(z.unknown())])
      .nullish()
      .transform(args => (typeof args === 'string' ? args : args ? JSON.stringify(args) : '')),
  }),
});

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z.array(toolCallSchema).nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .nullish(),
});

type ChatCompletion = z.infer<typeof chatCompletionSchema>;

// =============================================================================
// PROVIDER
// =============================================================================

export class OpenAICompatibleProvider implements LLMProviderWithTools {
  readonly name: string;
  readonly defaultModel: string;

  private apiKey?: string;
  private baseUrl: string;
  private temperature?: number;
  private maxTokens?: number;
  private networkConfig: NetworkConfig;

  constructor(config: OpenAICompatibleConfig, networkConfig: NetworkConfig = {}) {
    this.name = config.name;
    this.defaultModel = config.model;
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
    this.networkConfig = networkConfig;
  }

  get endpoint(): string {
    return `${this.baseUrl}/chat/completions`;
  }

  async chatWithTools(
    messages: readonly Message[],
    options: ChatOptionsWithTools = {}
  ): Promise<ChatResponseWithTools> {
    const model = options.model ?? this.defaultModel;
    const temperature = options.temperature ?? this.temperature;
    const maxTokens = options.maxTokens ?? this.maxTokens;

    const body: Record<string, unknown> = {
      model,
      messages,
      ...(temperature !== undefined && { temperature }),
      ...(maxTokens !== undefined && { max_tokens: maxTokens }),
    };

    const tools = options.tools?.map(convertToolDefinition);
    if (tools && tools.length > 0) {
      body.tools = tools;
      body.tool_choice = 'auto';
    }

    log.debug('Provider request', {
      provider: this.name,
      model,
      messages: messages.length,
      tools: tools?.length ?? 0,
    });

    try {
      const { response } = await resilientFetch({
        url: this.endpoint,
        init: {
          method: 'POST',
          headers: this.buildHeaders(),
          body: JSON.stringify(body),
        },
        providerName: this.name,
        networkConfig: this.networkConfig,
        signal: options.signal,
        onRetry: (attempt, delay, error) => {
          log.warn('Retrying provider request', {
            provider: this.name,
            attempt,
            delayMs: Math.round(delay),
            error: error.message,
          });
        },
      });

      if (!response.ok) {
        const text = await response.text();
        throw this.handleError(response.status, text);
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (err) {
        throw ProviderError.invalidResponse(
          this.name,
          `body is not JSON (${err instanceof Error ? err.message : String(err)})`
        );
      }
      return this.parseResponse(data);
    } catch (error) {
      if (error instanceof ProviderError || error instanceof CancellationError) throw error;
      if (isCancellation(error)) {
        throw new CancellationError('Request cancelled by user');
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(
        `${this.name} request failed: ${cause.message}`,
        this.name,
        'NETWORK_ERROR',
        { cause }
      );
    }
  }

  // ===========================================================================
  // RESPONSE PARSING
  // ===========================================================================

  private parseResponse(data: unknown): ChatResponseWithTools {
    const parsed = chatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw ProviderError.invalidResponse(this.name, `${where}${issue?.message ?? 'unexpected shape'}`);
    }

    const completion: ChatCompletion = parsed.data;
    const choice = completion.choices[0];
    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map(tc => ({
      // Tool messages must reference an id, so fill in one when the server omits it.
      id: tc.id || `call_${randomUUID()}`,
      type: 'function' as const,
      function: {
        name: tc.function.name,
        arguments: tc.function.arguments,
      },
    }));

    return {
      content: choice.message.content ?? null,
      toolCalls,
      ...(choice.finish_reason != null && { stopReason: choice.finish_reason }),
      ...(completion.usage && {
        usage: {
          inputTokens: completion.usage.prompt_tokens,
          outputTokens: completion.usage.completion_tokens,
        },
      }),
    };
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  /**
   * Map a non-retryable HTTP failure to a ProviderError.
   */
  private handleError(status: number, body: string): ProviderError {
    let code: ProviderError['code'] = 'UNKNOWN';

    if (status === 401 || status === 403) code = 'AUTHENTICATION_FAILED';
    else if (status === 429) code = 'RATE_LIMITED';
    else if (status === 400) {
      if (body.includes('context_length') || body.includes('maximum context length')) {
        code = 'CONTEXT_LENGTH_EXCEEDED';
      } else {
        code = 'INVALID_REQUEST';
      }
    } else if (status === 404) code = 'INVALID_REQUEST';
    else if (status >= 500) code = 'SERVER_ERROR';

    return new ProviderError(`${this.name} API error (${status}): ${body}`, this.name, code, {
      statusCode: status,
    });
  }
}

function convertToolDefinition(tool: ToolSpec): OpenAITool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { ...tool.parameters },
    },
  };
}
