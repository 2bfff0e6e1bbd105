import { mkdirSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { TaskState } from '../types/index.js';
import type { BlockerEvent, DebugEvent, DebugTracer, DispatchEvent, TraceFile } from './types.js';

class FileTracer implements DebugTracer {
  private stateDir: string;
  private debugDir = '';
  private trace: TraceFile | null = null;
  private writePromise: Promise<void> = Promise.resolve();
  private writeError: Error | null = null;

  constructor(stateDir: string) {
    this.stateDir = stateDir;
  }

  async init(sessionId: string, command: string): Promise<void> {
    this.debugDir = join(this.stateDir, 'debug', sessionId);
    mkdirSync(this.debugDir, { recursive: true });

    this.trace = {
      sessionId,
      command,
      startedAt: new Date().toISOString(),
      completedAt: null,
      events: [],
    };

    await this.saveTrace();
  }

  async finalize(): Promise<void> {
    if (this.trace) {
      this.trace.completedAt = new Date().toISOString();
      await this.saveTrace();
    }
  }

  logTaskSubmitted(
    taskId: string,
    taskType: string,
    dependencies: string[],
    parallelGroup: string | null
  ): void {
    this.addEvent({
      type: 'task_submitted',
      timestamp: new Date().toISOString(),
      taskId,
      taskType,
      dependencies,
      parallelGroup,
    });
  }

  logTransition(taskId: string, from: TaskState, to: TaskState, actor: string): void {
    this.addEvent({
      type: 'task_transition',
      timestamp: new Date().toISOString(),
      taskId,
      from,
      to,
      actor,
    });
  }

  logBlocker(type: BlockerEvent['type'], taskId: string, text: string, openBlockers: number): void {
    this.addEvent({ type, timestamp: new Date().toISOString(), taskId, text, openBlockers });
  }

  logGate(taskId: string, gate: string, value: boolean): void {
    this.addEvent({ type: 'gate_set', timestamp: new Date().toISOString(), taskId, gate, value });
  }

  logPlan(batches: string[][]): void {
    this.addEvent({ type: 'plan_built', timestamp: new Date().toISOString(), batches });
  }

  logEscalation(taskId: string, iterationCount: number, maxIterations: number): void {
    this.addEvent({
      type: 'escalation',
      timestamp: new Date().toISOString(),
      taskId,
      iterationCount,
      maxIterations,
    });
  }

  logDispatch(taskIds: string[], outcomes: DispatchEvent['outcomes'], durationMs: number): void {
    this.addEvent({
      type: 'dispatch',
      timestamp: new Date().toISOString(),
      taskIds,
      outcomes,
      durationMs,
    });
  }

  logMcpToolCall(
    tool: string,
    input: Record<string, unknown>,
    result: Record<string, unknown>,
    durationMs: number
  ): void {
    this.addEvent({
      type: 'mcp_tool_call',
      timestamp: new Date().toISOString(),
      tool,
      input,
      result,
      durationMs,
    });
  }

  logError(error: string, taskId?: string, context?: Record<string, unknown>): void {
    this.addEvent({
      type: 'error',
      timestamp: new Date().toISOString(),
      error,
      taskId,
      context,
    });
  }

  private addEvent(event: DebugEvent): void {
    if (this.trace) {
      this.trace.events.push(event);
      // Save after each event for crash recovery; writes are serialized and the first
      // failure is reported by finalize()
      this.writePromise = this.writePromise
        .then(() => this.doSaveTrace())
        .catch((error: unknown) => {
          this.writeError ??= error instanceof Error ? error : new Error(String(error));
        });
    }
  }

  private async saveTrace(): Promise<void> {
    await this.writePromise;
    if (this.writeError) {
      throw this.writeError;
    }
    await this.doSaveTrace();
  }

  private async doSaveTrace(): Promise<void> {
    if (this.trace) {
      await writeFile(join(this.debugDir, 'trace.json'), JSON.stringify(this.trace, null, 2));
    }
  }
}

export function createFileTracer(stateDir: string): DebugTracer {
  return new FileTracer(stateDir);
}
