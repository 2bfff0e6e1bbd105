import type { TaskGraph } from '../graph/task-graph.js';
import type { Task, TaskState, TeamStatus } from '../types/index.js';

const STATE_WEIGHTS: Record<TaskState, number> = {
  new: 0,
  analyzing: 10,
  planning: 20,
  debugging: 40,
  implementing: 50,
  blocked: 50,
  reviewing: 70,
  iteration: 75,
  documenting: 80,
  devops: 80,
  security_audit: 80,
  testing: 85,
  complete: 100,
};

const GATE_BONUS = 10;

/**
 * Rough completion percentage for a task: a weight per state plus a bonus for the share
 * of quality gates already passed. A task that has not started gets no bonus.
 */
export function calculateProgress(task: Task): number {
  const base = STATE_WEIGHTS[task.state];
  const gates = Object.values(task.qualityGates);
  if (base === 0 || gates.length === 0) {
    return base;
  }
  const passed = gates.filter(Boolean).length;
  return Math.min(100, base + (passed / gates.length) * GATE_BONUS);
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Read-only summary of the whole graph.
 */
export function computeTeamStatus(graph: TaskGraph, pendingStates: TaskState[]): TeamStatus {
  const status: TeamStatus = {
    totalTasks: graph.size,
    byState: {},
    byType: {},
    byPriority: {},
    byAssignee: {},
    activeBlockers: 0,
    completedTasks: 0,
    inProgress: 0,
    readyToStart: graph.readyTasks().length,
    parallelGroups: graph.parallelGroups().filter((group) => group.label !== null).length,
    escalations: [],
    completionRate: 0,
  };

  for (const task of graph.all()) {
    increment(status.byState, task.state);
    increment(status.byType, task.type);
    increment(status.byPriority, task.priority);
    status.byAssignee[task.assignee] = (status.byAssignee[task.assignee] ?? 0) + 1;
    status.activeBlockers += task.blockers.length;

    if (task.escalationRequired) {
      status.escalations.push(task.id);
    }
    if (task.state === 'complete') {
      status.completedTasks++;
    } else if (task.state !== 'blocked' && !pendingStates.includes(task.state)) {
      status.inProgress++;
    }
  }

  status.completionRate = status.totalTasks === 0 ? 0 : status.completedTasks / status.totalTasks;
  return status;
}
