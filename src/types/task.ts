export const TASK_TYPES = [
  'architect',
  'coder',
  'reviewer',
  'qa',
  'debug',
  'docs',
  'devops',
  'security',
] as const;

export type TaskType = (typeof TASK_TYPES)[number];

// Ascending order matters: plan batches sort by the index of the priority
export const TASK_PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;

export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export const TASK_STATES = [
  'new',
  'analyzing',
  'planning',
  'implementing',
  'debugging',
  'reviewing',
  'testing',
  'documenting',
  'devops',
  'security_audit',
  'iteration',
  'blocked',
  'complete',
] as const;

export type TaskState = (typeof TASK_STATES)[number];

export interface TransitionRecord {
  from: TaskState;
  to: TaskState;
  actor: string;
  note: string;
  timestamp: string; // ISO-8601
}

export interface Task {
  id: string;
  title: string;
  description: string;
  type: TaskType;
  priority: TaskPriority;
  state: TaskState;
  dependencies: string[]; // Task IDs this depends on
  parallelGroup: string | null;
  parentId: string | null;
  subtasks: string[];
  assignee: string;
  blockers: string[];
  stateBeforeBlock: TaskState | null;
  qualityGates: Record<string, boolean>;
  requiredGates: string[];
  deliverables: string[];
  context: Record<string, string>; // Handoff facts for the tasks that depend on this one
  iterationCount: number;
  maxIterations: number;
  escalationRequired: boolean;
  history: TransitionRecord[];
  createdAt: string;
  updatedAt: string;
}

/**
 * Caller-supplied fields for a new task. Everything not listed here is owned by the tracker.
 */
export interface TaskInput {
  id?: string;
  title: string;
  description?: string;
  type: TaskType;
  priority?: TaskPriority;
  parallelGroup?: string | null;
  parentId?: string | null;
  requiredGates?: string[];
  maxIterations?: number;
  context?: Record<string, string>;
}

export interface TaskSnapshot extends Task {
  progress: number;
  ready: boolean;
}

/**
 * What a dependency passes on to a task that builds on it.
 */
export interface DependencyHandoff {
  taskId: string;
  title: string;
  type: TaskType;
  state: TaskState;
  deliverables: string[];
  context: Record<string, string>;
  note: string; // Last non-empty history note
}

export interface TaskTreeNode {
  id: string;
  title: string;
  state: TaskState;
  assignee: string;
  subtasks: TaskTreeNode[];
}

export interface PlanBatch {
  index: number;
  taskIds: string[];
  groups: Record<string, string[]>; // parallel-group label -> members in this batch
}

export interface ReadyGroup {
  label: string | null; // null for an ungrouped task
  taskIds: string[];
}

export function isTaskState(value: string): value is TaskState {
  return (TASK_STATES as readonly string[]).includes(value);
}

export function isTaskType(value: string): value is TaskType {
  return (TASK_TYPES as readonly string[]).includes(value);
}

export function isTaskPriority(value: string): value is TaskPriority {
  return (TASK_PRIORITIES as readonly string[]).includes(value);
}
