/**
 * Tool System Types
 *
 * Type definitions for tool definitions, results and the approval channel.
 */

import type { z } from 'zod';
import type { ToolErrorKind, ToolFailure } from '../errors/index.js';
import type { RiskVerdict } from './command-risk.js';

export type { ToolErrorKind, ToolFailure } from '../errors/index.js';
export type { RiskVerdict } from './command-risk.js';

// =============================================================================
// TOOL DEFINITION TYPES
// =============================================================================

/**
 * Schema for a tool's parameters. Uses Zod for runtime validation.
 */
export type ParameterSchema = z.ZodTypeAny;

/**
 * Success payload of a tool. Never carries an `error` key, so a result
 * is a failure exactly when `error` is present.
 */
export type ToolPayload = { [key: string]: unknown; error?: never };

/**
 * Result of tool execution as sent back to the model.
 */
export type ToolResult = ToolPayload | ToolFailure;

/**
 * Tool definition that includes schema and metadata.
 */
export interface ToolDefinition<TInput extends ParameterSchema = ParameterSchema> {
  /** Unique identifier */
  name: string;

  /** Human-readable description (shown to LLM) */
  description: string;

  /** Input parameter schema */
  parameters: TInput;

  /**
   * Optional risk assessment of a validated call. A verdict that requires
   * approval makes the loop consult the approval channel before dispatch.
   */
  assessRisk?: (input: z.infer<TInput>) => RiskVerdict;

  /** Execute the tool; failures are thrown as typed errors */
  execute: (input: z.infer<TInput>) => Promise<ToolPayload>;
}

// =============================================================================
// JSON SCHEMA GENERATION
// =============================================================================

export interface JSONSchemaProperty {
  type: string;
  description?: string;
  enum?: string[];
  default?: unknown;
  items?: JSONSchemaProperty;
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
}

/**
 * JSON Schema representation for LLM tool descriptions.
 */
export interface JSONSchema {
  type: 'object';
  properties: Record<string, JSONSchemaProperty>;
  required?: string[];
}

/**
 * Static description of one tool, sent with every provider request.
 */
export interface ToolSpec {
  name: string;
  description: string;
  parameters: JSONSchema;
}

// =============================================================================
// APPROVAL TYPES
// =============================================================================

/**
 * Permission modes.
 */
export const PERMISSION_MODES = [
  'strict', // Deny every risky command
  'interactive', // Ask the user
  'yolo', // Approve everything (testing only)
] as const;

export type PermissionMode = (typeof PERMISSION_MODES)[number];

/**
 * A risky tool call waiting for a decision.
 */
export interface ApprovalRequest {
  callId: string;
  tool: string;
  /** What will run, as shown to the user */
  command: string;
  /** Classifier reason */
  reason: string;
}

export interface ApprovalResponse {
  granted: boolean;
  reason?: string;
  /** Decision was taken from an earlier always/never answer */
  remembered?: boolean;
}

/**
 * External channel that decides risky calls.
 */
export interface ApprovalChannel {
  check(request: ApprovalRequest): Promise<ApprovalResponse>;
}

export function isToolFailure(result: ToolResult): result is ToolFailure {
  return typeof result.error === 'string';
}

export function failure(error: string, kind: ToolErrorKind, extra: Record<string, unknown> = {}): ToolFailure {
  return { ...extra, error, kind };
}
