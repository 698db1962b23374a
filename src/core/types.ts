/**
 * Agent loop types: run outcomes and the events emitted while running.
 */

import type { ToolResult } from '../tools/types.js';

// =============================================================================
// OUTCOMES
// =============================================================================

export type StallReason = 'empty_response' | 'cancelled';

/**
 * How one run of the loop ended.
 */
export type LoopOutcome =
  | { status: 'final_answer'; content: string; iterations: number }
  | { status: 'stalled'; reason: StallReason; iterations: number }
  | { status: 'iteration_limit_exceeded'; limit: number; iterations: number };

export type LoopStatus = LoopOutcome['status'];

// =============================================================================
// EVENTS
// =============================================================================

export type AgentLoopEvent =
  | { type: 'iteration.start'; iteration: number }
  | { type: 'tool.started'; callId: string; tool: string; args: Record<string, unknown> }
  | {
      type: 'tool.finished';
      callId: string;
      tool: string;
      result: ToolResult;
      success: boolean;
      durationMs: number;
    }
  | { type: 'approval.requested'; callId: string; tool: string; command: string; reason: string }
  | { type: 'approval.resolved'; callId: string; tool: string; granted: boolean; reason?: string }
  | { type: 'final_answer'; content: string }
  | { type: 'stalled'; reason: StallReason }
  | { type: 'iteration_limit'; limit: number };

export type AgentLoopEventType = AgentLoopEvent['type'];

export type AgentLoopEventListener = (event: AgentLoopEvent) => void;
