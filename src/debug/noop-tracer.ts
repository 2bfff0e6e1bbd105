import type { TaskState } from '../types/index.js';
import type { BlockerEvent, DebugTracer, DispatchEvent } from './types.js';

class NoopTracer implements DebugTracer {
  async init(_sessionId: string, _command: string): Promise<void> {}
  async finalize(): Promise<void> {}
  logTaskSubmitted(
    _taskId: string,
    _taskType: string,
    _dependencies: string[],
    _parallelGroup: string | null
  ): void {}
  logTransition(_taskId: string, _from: TaskState, _to: TaskState, _actor: string): void {}
  logBlocker(
    _type: BlockerEvent['type'],
    _taskId: string,
    _text: string,
    _openBlockers: number
  ): void {}
  logGate(_taskId: string, _gate: string, _value: boolean): void {}
  logPlan(_batches: string[][]): void {}
  logEscalation(_taskId: string, _iterationCount: number, _maxIterations: number): void {}
  logDispatch(
    _taskIds: string[],
    _outcomes: DispatchEvent['outcomes'],
    _durationMs: number
  ): void {}
  logMcpToolCall(
    _tool: string,
    _input: Record<string, unknown>,
    _result: Record<string, unknown>,
    _durationMs: number
  ): void {}
  logError(_error: string, _taskId?: string, _context?: Record<string, unknown>): void {}
}

export function createNoopTracer(): DebugTracer {
  return new NoopTracer();
}
