/**
 * Tool Registry
 *
 * Name → handler lookup table. Arguments are validated against each
 * tool's Zod schema at dispatch time, and every failure (unknown tool,
 * bad arguments, sandbox violation, I/O error) comes back as a
 * structured ToolResult. `dispatch` never throws.
 */

import { z } from 'zod';
import type {
  JSONSchema,
  JSONSchemaProperty,
  ParameterSchema,
  RiskVerdict,
  ToolDefinition,
  ToolPayload,
  ToolResult,
  ToolSpec,
} from './types.js';
import { failure } from './types.js';
import { ValidationError, formatErrorForLog, toToolFailure } from '../errors/index.js';
import { createComponentLogger } from '../integrations/utilities/logger.js';

const log = createComponentLogger('ToolRegistry');

// =============================================================================
// ZOD TO JSON SCHEMA CONVERTER
// =============================================================================

/**
 * Convert a Zod schema to JSON Schema for LLM tool descriptions.
 * Handles the types tool parameters use; descriptions set on wrappers
 * (`.optional().describe()`) are kept.
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): JSONSchemaProperty {
  const description = schema.description;
  const withDescription = (result: JSONSchemaProperty): JSONSchemaProperty =>
    description && !result.description ? { ...result, description } : result;

  if (schema instanceof z.ZodObject) {
    const properties: Record<string, JSONSchemaProperty> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) {
        required.push(key);
      }
    }

    return withDescription({
      type: 'object',
      properties,
      ...(required.length > 0 && { required }),
    });
  }

  if (schema instanceof z.ZodString) {
    return withDescription({ type: 'string' });
  }

  if (schema instanceof z.ZodNumber) {
    return withDescription({ type: schema.isInt ? 'integer' : 'number' });
  }

  if (schema instanceof z.ZodBoolean) {
    return withDescription({ type: 'boolean' });
  }

  if (schema instanceof z.ZodArray) {
    return withDescription({ type: 'array', items: zodToJsonSchema(schema.element) });
  }

  if (schema instanceof z.ZodEnum) {
    return withDescription({ type: 'string', enum: [...schema.options] });
  }

  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return withDescription(zodToJsonSchema(schema.unwrap()));
  }

  if (schema instanceof z.ZodDefault) {
    return withDescription({
      ...zodToJsonSchema(schema.removeDefault()),
      default: schema._def.defaultValue(),
    });
  }

  // z.preprocess() wrappers from coercion.ts
  if (schema instanceof z.ZodEffects) {
    return withDescription(zodToJsonSchema(schema.innerType()));
  }

  return withDescription({ type: 'string' });
}

function toParametersSchema(schema: ParameterSchema): JSONSchema {
  const converted = zodToJsonSchema(schema);
  return {
    type: 'object',
    properties: converted.properties ?? {},
    ...(converted.required && { required: converted.required }),
  };
}

// =============================================================================
// TOOL REGISTRY
// =============================================================================

/**
 * A registered tool with its schema erased; validation happens inside.
 */
interface RegisteredTool {
  spec: ToolSpec;
  run(args: unknown): Promise<ToolPayload>;
  assess(args: unknown): RiskVerdict | undefined;
}

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  /**
   * Register a tool.
   */
  register<T extends ParameterSchema>(tool: ToolDefinition<T>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    if (!(tool.parameters instanceof z.ZodObject)) {
      throw new Error(`Tool "${tool.name}" parameters must be an object schema`);
    }

    const { assessRisk } = tool;
    this.tools.set(tool.name, {
      spec: {
        name: tool.name,
        description: tool.description,
        parameters: toParametersSchema(tool.parameters),
      },
      run: async args => {
        const parsed = tool.parameters.safeParse(args);
        if (!parsed.success) {
          throw ValidationError.fromZodError(parsed.error);
        }
        return tool.execute(parsed.data);
      },
      assess: args => {
        if (!assessRisk) return undefined;
        const parsed = tool.parameters.safeParse(args);
        return parsed.success ? assessRisk(parsed.data) : undefined;
      },
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * List all registered tool names, in registration order.
   */
  list(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Tool specs for the provider (JSON Schema parameters).
   */
  getSpecs(): ToolSpec[] {
    return Array.from(this.tools.values()).map(tool => tool.spec);
  }

  /**
   * Risk verdict for a call, when the tool assesses risk and the
   * arguments validate. Undefined means no approval step is needed.
   */
  assessRisk(name: string, args: unknown): RiskVerdict | undefined {
    return this.tools.get(name)?.assess(args);
  }

  /**
   * Execute a tool by name. Always resolves.
   */
  async dispatch(name: string, args: unknown): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      log.warn('Unknown tool requested', { tool: name });
      return failure(`Unknown tool '${name}'`, 'unknown_tool');
    }

    const started = Date.now();
    try {
      const payload = await tool.run(args);
      log.debug('Tool completed', { tool: name, durationMs: Date.now() - started });
      return payload;
    } catch (error) {
      log.debug('Tool failed', { tool: name, error: formatErrorForLog(error) });
      return toToolFailure(error);
    }
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

export interface DefineToolOptions<T extends ParameterSchema> {
  /** Dynamic risk assessment of a validated call */
  assessRisk?: (input: z.infer<T>) => RiskVerdict;
}

/**
 * Create a tool definition with type inference.
 */
export function defineTool<T extends ParameterSchema>(
  name: string,
  description: string,
  parameters: T,
  execute: (input: z.infer<T>) => Promise<ToolPayload>,
  options: DefineToolOptions<T> = {}
): ToolDefinition<T> {
  return {
    name,
    description,
    parameters,
    execute,
    assessRisk: options.assessRisk,
  };
}
