// src/debug/types.ts
import type { TaskState } from '../types/index.js';

export interface TraceEvent {
  type: string;
  timestamp: string;
}

export interface TaskSubmittedEvent extends TraceEvent {
  type: 'task_submitted';
  taskId: string;
  taskType: string;
  dependencies: string[];
  parallelGroup: string | null;
}

export interface TaskTransitionEvent extends TraceEvent {
  type: 'task_transition';
  taskId: string;
  from: TaskState;
  to: TaskState;
  actor: string;
}

export interface BlockerEvent extends TraceEvent {
  type: 'blocker_added' | 'blocker_cleared';
  taskId: string;
  text: string;
  openBlockers: number;
}

export interface GateEvent extends TraceEvent {
  type: 'gate_set';
  taskId: string;
  gate: string;
  value: boolean;
}

export interface PlanBuiltEvent extends TraceEvent {
  type: 'plan_built';
  batches: string[][];
}

export interface EscalationEvent extends TraceEvent {
  type: 'escalation';
  taskId: string;
  iterationCount: number;
  maxIterations: number;
}

export interface DispatchEvent extends TraceEvent {
  type: 'dispatch';
  taskIds: string[];
  outcomes: Record<string, 'applied' | 'failed' | 'rejected'>;
  durationMs: number;
}

export interface McpToolCallEvent extends TraceEvent {
  type: 'mcp_tool_call';
  tool: string;
  input: Record<string, unknown>;
  result: Record<string, unknown>;
  durationMs: number;
}

export interface ErrorEvent extends TraceEvent {
  type: 'error';
  error: string;
  taskId?: string;
  context?: Record<string, unknown>;
}

export type DebugEvent =
  | TaskSubmittedEvent
  | TaskTransitionEvent
  | BlockerEvent
  | GateEvent
  | PlanBuiltEvent
  | EscalationEvent
  | DispatchEvent
  | McpToolCallEvent
  | ErrorEvent;

export interface TraceFile {
  sessionId: string;
  command: string;
  startedAt: string;
  completedAt: string | null;
  events: DebugEvent[];
}

export interface DebugTracer {
  init(sessionId: string, command: string): Promise<void>;
  finalize(): Promise<void>;
  logTaskSubmitted(
    taskId: string,
    taskType: string,
    dependencies: string[],
    parallelGroup: string | null
  ): void;
  logTransition(taskId: string, from: TaskState, to: TaskState, actor: string): void;
  logBlocker(
    type: BlockerEvent['type'],
    taskId: string,
    text: string,
    openBlockers: number
  ): void;
  logGate(taskId: string, gate: string, value: boolean): void;
  logPlan(batches: string[][]): void;
  logEscalation(taskId: string, iterationCount: number, maxIterations: number): void;
  logDispatch(
    taskIds: string[],
    outcomes: DispatchEvent['outcomes'],
    durationMs: number
  ): void;
  logMcpToolCall(
    tool: string,
    input: Record<string, unknown>,
    result: Record<string, unknown>,
    durationMs: number
  ): void;
  logError(error: string, taskId?: string, context?: Record<string, unknown>): void;
}
