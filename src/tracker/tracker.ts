import { formatIssues, getDefaultConfig, requiredGatesFor } from '../config/loader.js';
import type { TrackerConfig } from '../config/schema.js';
import { createNoopTracer } from '../debug/noop-tracer.js';
import type { DebugTracer } from '../debug/types.js';
import { InvalidRecordError } from '../graph/errors.js';
import { TaskGraph } from '../graph/task-graph.js';
import { SYSTEM_ACTOR, TaskStateMachine } from '../state/machine.js';
import { TrackerRecordSchema } from '../state/schema.js';
import type {
  DependencyHandoff,
  PlanBatch,
  ReadyGroup,
  Task,
  TaskInput,
  TaskPriority,
  TaskSnapshot,
  TaskState,
  TaskTreeNode,
  TeamStatus,
  TrackerRecord,
  TransitionOptions,
  TransitionRecord,
} from '../types/index.js';
import { calculateProgress, computeTeamStatus } from './status.js';

export interface TaskTrackerOptions {
  tracer?: DebugTracer;
  now?: () => string;
}

export interface TaskAmendment {
  title?: string;
  description?: string;
  priority?: TaskPriority;
}

export function formatTaskId(seq: number): string {
  return `task_${String(seq).padStart(3, '0')}`;
}

/**
 * Entry point for callers: owns the graph and the state machine over it, assigns ids,
 * and converts the whole task set to and from a plain record for storage.
 */
export class TaskTracker {
  readonly config: TrackerConfig;
  private graph: TaskGraph;
  private machine: TaskStateMachine;
  private tracer: DebugTracer;
  private now: () => string;
  private nextSeq = 1;

  constructor(config: TrackerConfig = getDefaultConfig(), options: TaskTrackerOptions = {}) {
    this.config = config;
    this.tracer = options.tracer ?? createNoopTracer();
    this.now = options.now ?? (() => new Date().toISOString());
    this.graph = new TaskGraph({
      pendingStates: config.pendingStates,
      satisfiedStates: config.satisfiedStates,
    });
    this.machine = new TaskStateMachine(this.graph, config, { now: this.now });
  }

  /**
   * Rebuild a tracker from a stored record. The record is validated before use and the
   * graph re-checks every dependency and the absence of cycles.
   */
  static fromRecord(
    record: unknown,
    config: TrackerConfig = getDefaultConfig(),
    options: TaskTrackerOptions = {}
  ): TaskTracker {
    const result = TrackerRecordSchema.safeParse(record);
    if (!result.success) {
      throw new InvalidRecordError(formatIssues(result.error));
    }

    const tracker = new TaskTracker(config, options);
    tracker.load(result.data);
    return tracker;
  }

  /**
   * Replace the whole task set with a stored record, keeping config, tracer and clock.
   * Used to pick up writes made by other processes sharing the store.
   */
  restore(record: unknown): void {
    const result = TrackerRecordSchema.safeParse(record);
    if (!result.success) {
      throw new InvalidRecordError(formatIssues(result.error));
    }
    this.load(result.data);
  }

  private load(record: TrackerRecord): void {
    this.graph = TaskGraph.fromTasks(record.tasks, {
      pendingStates: this.config.pendingStates,
      satisfiedStates: this.config.satisfiedStates,
    });
    this.machine = new TaskStateMachine(this.graph, this.config, { now: this.now });
    this.nextSeq = record.nextSeq;
  }

  toRecord(): TrackerRecord {
    return {
      version: 1,
      nextSeq: this.nextSeq,
      tasks: structuredClone(this.graph.all()),
    };
  }

  get size(): number {
    return this.graph.size;
  }

  has(taskId: string): boolean {
    return this.graph.has(taskId);
  }

  submit(input: TaskInput, dependencies: string[] = []): string {
    let seq = this.nextSeq;
    let id = input.id;
    if (id === undefined) {
      id = formatTaskId(seq);
      while (this.graph.has(id)) {
        id = formatTaskId(++seq);
      }
      seq++;
    }

    const requiredGates = input.requiredGates ?? requiredGatesFor(this.config, input.type);
    const timestamp = this.now();
    const task: Task = {
      id,
      title: input.title,
      description: input.description ?? '',
      type: input.type,
      priority: input.priority ?? 'medium',
      state: 'new',
      dependencies: [],
      parallelGroup: input.parallelGroup ?? null,
      parentId: input.parentId ?? null,
      subtasks: [],
      assignee: input.type,
      blockers: [],
      stateBeforeBlock: null,
      qualityGates: Object.fromEntries(requiredGates.map((gate) => [gate, false])),
      requiredGates: [...requiredGates],
      deliverables: [],
      context: { ...input.context },
      iterationCount: 0,
      maxIterations: input.maxIterations ?? this.config.maxIterations,
      escalationRequired: false,
      history: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    this.graph.addTask(task, dependencies);
    this.nextSeq = seq;
    this.tracer.logTaskSubmitted(id, task.type, task.dependencies, task.parallelGroup);
    return id;
  }

  subtask(parentId: string, input: TaskInput, dependencies: string[] = []): string {
    return this.submit({ ...input, parentId }, dependencies);
  }

  addDependency(taskId: string, dependsOnId: string): boolean {
    return this.graph.addDependency(taskId, dependsOnId);
  }

  /**
   * Execution rounds as lists of task ids. Tasks in the same round are independent.
   */
  plan(): string[][] {
    return this.executionPlan().map((batch) => batch.taskIds);
  }

  executionPlan(): PlanBatch[] {
    const batches = this.graph.buildExecutionPlan();
    this.tracer.logPlan(batches.map((batch) => batch.taskIds));
    return batches;
  }

  transition(taskId: string, target: string, options: TransitionOptions = {}): TransitionRecord {
    const wasEscalated = this.graph.get(taskId).escalationRequired;
    const entry = this.machine.transition(taskId, target, options);
    this.logTransition(taskId, entry, wasEscalated);
    return entry;
  }

  private logTransition(taskId: string, entry: TransitionRecord, wasEscalated: boolean): void {
    this.tracer.logTransition(taskId, entry.from, entry.to, entry.actor);
    const task = this.graph.get(taskId);
    if (task.escalationRequired && !wasEscalated) {
      this.tracer.logEscalation(taskId, task.iterationCount, task.maxIterations);
    }
  }

  addBlocker(taskId: string, text: string, actor: string = SYSTEM_ACTOR): void {
    const entry = this.machine.addBlocker(taskId, text, actor);
    const open = this.graph.get(taskId).blockers.length;
    this.tracer.logBlocker('blocker_added', taskId, text, open);
    if (entry) {
      this.tracer.logTransition(taskId, entry.from, entry.to, entry.actor);
    }
  }

  clearBlocker(
    taskId: string,
    index: number,
    resumeState: string,
    actor: string = SYSTEM_ACTOR
  ): void {
    const task = this.graph.get(taskId);
    const text = task.blockers[index] ?? '';
    const wasEscalated = task.escalationRequired;
    const entry = this.machine.clearBlocker(taskId, index, resumeState, actor);
    this.tracer.logBlocker('blocker_cleared', taskId, text, task.blockers.length);
    if (entry) {
      this.logTransition(taskId, entry, wasEscalated);
    }
  }

  mergeContext(taskId: string, context: Record<string, string>): void {
    this.machine.mergeContext(taskId, context);
  }

  /**
   * Deliverables, context and the last note of each dependency, in dependency order.
   */
  handoffContext(taskId: string): DependencyHandoff[] {
    return this.graph.get(taskId).dependencies.map((depId) => {
      const dep = this.graph.get(depId);
      const lastNote = dep.history.filter((entry) => entry.note !== '').at(-1);
      return {
        taskId: dep.id,
        title: dep.title,
        type: dep.type,
        state: dep.state,
        deliverables: [...dep.deliverables],
        context: { ...dep.context },
        note: lastNote?.note ?? '',
      };
    });
  }

  setGate(taskId: string, gate: string, value: boolean): void {
    this.machine.setGate(taskId, gate, value);
    this.tracer.logGate(taskId, gate, value);
  }

  unmetGates(taskId: string): string[] {
    return this.machine.unmetGates(taskId);
  }

  nextStates(taskId: string): TaskState[] {
    return this.machine.nextStates(taskId);
  }

  status(taskId: string): TaskSnapshot {
    const task = this.graph.get(taskId);
    return {
      ...structuredClone(task),
      progress: calculateProgress(task),
      ready: this.graph.isReady(taskId),
    };
  }

  list(): TaskSnapshot[] {
    return this.graph.all().map((task) => this.status(task.id));
  }

  history(taskId: string): TransitionRecord[] {
    return this.machine.history(taskId);
  }

  ready(): string[] {
    return this.graph.readyTasks();
  }

  parallelGroups(): ReadyGroup[] {
    return this.graph.parallelGroups();
  }

  tree(taskId: string): TaskTreeNode {
    return this.graph.taskTree(taskId);
  }

  subgraph(taskId: string): string[] {
    return this.graph.subgraph(taskId);
  }

  canParallelize(taskIds: string[]): boolean {
    return this.graph.canParallelize(taskIds);
  }

  teamStatus(): TeamStatus {
    return computeTeamStatus(this.graph, this.config.pendingStates);
  }

  remove(taskId: string): void {
    this.graph.removeTask(taskId);
  }

  amend(taskId: string, fields: TaskAmendment): void {
    const task = this.graph.get(taskId);
    if (fields.title !== undefined) task.title = fields.title;
    if (fields.description !== undefined) task.description = fields.description;
    if (fields.priority !== undefined) task.priority = fields.priority;
    task.updatedAt = this.now();
  }

  addDeliverable(taskId: string, deliverable: string): void {
    const task = this.graph.get(taskId);
    task.deliverables.push(deliverable);
    task.updatedAt = this.now();
  }
}
