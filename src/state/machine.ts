import { allowedNextStates } from '../config/loader.js';
import type { TrackerConfig } from '../config/schema.js';
import {
  GateNotSatisfiedError,
  InvalidTransitionError,
  NoSuchBlockerError,
} from '../graph/errors.js';
import type { TaskGraph } from '../graph/task-graph.js';
import {
  type Task,
  type TaskState,
  type TransitionOptions,
  type TransitionRecord,
  isTaskState,
} from '../types/index.js';

export const SYSTEM_ACTOR = 'system';

export interface StateMachineOptions {
  now?: () => string;
}

/**
 * Enforces the per-task lifecycle over the tasks held by a TaskGraph:
 * the configured transition table, blockers, quality gates and the iteration limit.
 * Every state change is appended to the task's history.
 */
export class TaskStateMachine {
  private graph: TaskGraph;
  private config: TrackerConfig;
  private now: () => string;

  constructor(graph: TaskGraph, config: TrackerConfig, options: StateMachineOptions = {}) {
    this.graph = graph;
    this.config = config;
    this.now = options.now ?? (() => new Date().toISOString());
  }

  /**
   * States `transition` would accept for the task right now, before the gate check.
   */
  nextStates(taskId: string): TaskState[] {
    const task = this.graph.get(taskId);
    if (task.state === 'complete' || task.state === 'blocked') {
      return [];
    }
    return allowedNextStates(this.config, task.type, task.state).filter(
      (state) => state !== 'blocked'
    );
  }

  transition(taskId: string, target: string, options: TransitionOptions = {}): TransitionRecord {
    const task = this.graph.get(taskId);
    const from = task.state;

    if (!isTaskState(target)) {
      throw new InvalidTransitionError(taskId, from, target, 'not a declared state');
    }
    if (from === 'complete') {
      throw new InvalidTransitionError(taskId, from, target, 'task is already complete');
    }
    if (from === 'blocked') {
      throw new InvalidTransitionError(
        taskId,
        from,
        target,
        `task has ${task.blockers.length} open blocker(s); clear them with a resume state`
      );
    }
    if (target === 'blocked') {
      throw new InvalidTransitionError(taskId, from, target, 'add a blocker instead');
    }
    if (!allowedNextStates(this.config, task.type, from).includes(target)) {
      throw new InvalidTransitionError(
        taskId,
        from,
        target,
        `not allowed for ${task.type} tasks`
      );
    }
    if (target === 'complete') {
      const unmet = task.requiredGates.filter((gate) => task.qualityGates[gate] !== true);
      if (unmet.length > 0) {
        throw new GateNotSatisfiedError(taskId, unmet);
      }
    }

    Object.assign(task.context, options.context);

    let note = options.note ?? '';
    if (options.assignee && options.assignee !== task.assignee) {
      const handoff = `handoff ${task.assignee} -> ${options.assignee}`;
      note = note ? `${handoff}: ${note}` : handoff;
      task.assignee = options.assignee;
    }

    return this.record(task, target, options.actor ?? SYSTEM_ACTOR, note);
  }

  /**
   * Append a blocker. The first open blocker moves the task to `blocked` and remembers
   * the state it left.
   */
  addBlocker(taskId: string, text: string, actor: string = SYSTEM_ACTOR): TransitionRecord | null {
    const task = this.graph.get(taskId);
    if (task.state === 'complete') {
      throw new InvalidTransitionError(taskId, task.state, 'blocked', 'task is already complete');
    }

    task.blockers.push(text);
    task.updatedAt = this.now();
    if (task.state === 'blocked') {
      return null;
    }
    task.stateBeforeBlock = task.state;
    return this.record(task, 'blocked', actor, text);
  }

  /**
   * Remove the blocker at `index`. When it was the last one the task resumes into
   * `resumeState`, which the caller must name; it is validated even if other blockers
   * remain so a bad call never half-applies.
   */
  clearBlocker(
    taskId: string,
    index: number,
    resumeState: string,
    actor: string = SYSTEM_ACTOR
  ): TransitionRecord | null {
    const task = this.graph.get(taskId);
    if (!Number.isInteger(index) || index < 0 || index >= task.blockers.length) {
      throw new NoSuchBlockerError(taskId, index);
    }
    if (!isTaskState(resumeState)) {
      throw new InvalidTransitionError(taskId, task.state, resumeState, 'not a declared state');
    }
    if (resumeState === 'blocked' || resumeState === 'complete') {
      throw new InvalidTransitionError(
        taskId,
        task.state,
        resumeState,
        'cannot resume into this state'
      );
    }

    const [removed] = task.blockers.splice(index, 1);
    task.updatedAt = this.now();
    if (task.blockers.length > 0 || task.state !== 'blocked') {
      return null;
    }
    task.stateBeforeBlock = null;
    return this.record(task, resumeState, actor, `cleared blocker: ${removed}`);
  }

  mergeContext(taskId: string, context: Record<string, string>): void {
    const task = this.graph.get(taskId);
    Object.assign(task.context, context);
    task.updatedAt = this.now();
  }

  setGate(taskId: string, gate: string, value: boolean): void {
    const task = this.graph.get(taskId);
    task.qualityGates[gate] = value;
    task.updatedAt = this.now();
  }

  unmetGates(taskId: string): string[] {
    const task = this.graph.get(taskId);
    return task.requiredGates.filter((gate) => task.qualityGates[gate] !== true);
  }

  history(taskId: string): TransitionRecord[] {
    return this.graph.get(taskId).history.map((entry) => ({ ...entry }));
  }

  /**
   * Every entry into `iteration` counts as rework, whether by transition or by resuming
   * from a block. Escalation is sticky.
   */
  private record(task: Task, to: TaskState, actor: string, note: string): TransitionRecord {
    if (to === 'iteration') {
      task.iterationCount++;
      if (task.iterationCount > task.maxIterations) {
        task.escalationRequired = true;
      }
    }

    const entry: TransitionRecord = {
      from: task.state,
      to,
      actor,
      note,
      timestamp: this.now(),
    };
    task.state = to;
    task.updatedAt = entry.timestamp;
    task.history.push(entry);
    return entry;
  }
}
