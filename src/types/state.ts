import type { Task, TaskPriority, TaskState, TaskType } from './task.js';

/**
 * Plain, JSON-compatible form of a whole tracker. Task order is insertion order.
 */
export interface TrackerRecord {
  version: 1;
  nextSeq: number; // Sequence used for the next generated task_NNN id
  tasks: Task[];
}

export interface TeamStatus {
  totalTasks: number;
  byState: Partial<Record<TaskState, number>>;
  byType: Partial<Record<TaskType, number>>;
  byPriority: Partial<Record<TaskPriority, number>>;
  byAssignee: Record<string, number>;
  activeBlockers: number;
  completedTasks: number;
  inProgress: number;
  readyToStart: number;
  parallelGroups: number;
  escalations: string[];
  completionRate: number; // 0..1
}

export interface TransitionOptions {
  actor?: string;
  note?: string;
  assignee?: string; // Hand the task to another role
  context?: Record<string, string>; // Merged into the task's context
}
