import {
  type PlanBatch,
  type ReadyGroup,
  TASK_PRIORITIES,
  type Task,
  type TaskState,
  type TaskTreeNode,
} from '../types/index.js';
import {
  CycleError,
  DependentTasksError,
  DuplicateIdError,
  NoSuchTaskError,
  UnknownDependencyError,
} from './errors.js';

export interface GraphPolicy {
  pendingStates: TaskState[]; // States a ready task may be in
  satisfiedStates: TaskState[]; // States that satisfy a dependency; always includes 'complete'
}

export const DEFAULT_GRAPH_POLICY: GraphPolicy = {
  pendingStates: ['new'],
  satisfiedStates: ['complete'],
};

type Color = 'white' | 'gray' | 'black';

function priorityRank(task: Task): number {
  return TASK_PRIORITIES.indexOf(task.priority);
}

/**
 * Tasks and their dependency edges. Edges point from a task to the tasks it depends on;
 * the reverse index (`dependents`) is kept in step for scheduling.
 *
 * Every mutating method validates fully before it changes anything, so a rejected call
 * leaves the graph as it was.
 */
export class TaskGraph {
  private tasks: Map<string, Task> = new Map();
  private dependents: Map<string, Set<string>> = new Map();
  private insertionOrder: Map<string, number> = new Map();
  private nextOrder = 0;
  private policy: GraphPolicy;

  constructor(policy: GraphPolicy = DEFAULT_GRAPH_POLICY) {
    this.policy = policy;
  }

  /**
   * Rebuild a graph from persisted tasks. Dependencies may point forward in the list, so
   * nodes go in first and edges are validated afterwards.
   */
  static fromTasks(tasks: Task[], policy: GraphPolicy = DEFAULT_GRAPH_POLICY): TaskGraph {
    const graph = new TaskGraph(policy);
    for (const task of tasks) {
      if (graph.tasks.has(task.id)) {
        throw new DuplicateIdError(task.id);
      }
      graph.insert(task);
    }

    for (const task of tasks) {
      const missing = task.dependencies.filter((dep) => !graph.tasks.has(dep));
      if (missing.length > 0) {
        throw new UnknownDependencyError(task.id, missing);
      }
      if (task.parentId !== null && !graph.tasks.has(task.parentId)) {
        throw new NoSuchTaskError(task.parentId);
      }
    }

    const cycle = graph.detectCycle();
    if (cycle) {
      throw new CycleError(cycle);
    }
    return graph;
  }

  get size(): number {
    return this.tasks.size;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  find(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  get(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NoSuchTaskError(id);
    }
    return task;
  }

  all(): Task[] {
    return Array.from(this.tasks.values());
  }

  addTask(task: Task, dependencies: string[] = []): void {
    if (this.tasks.has(task.id)) {
      throw new DuplicateIdError(task.id);
    }

    const deps = Array.from(new Set([...task.dependencies, ...dependencies]));
    if (deps.includes(task.id)) {
      throw new CycleError([task.id, task.id]);
    }
    const missing = deps.filter((dep) => !this.tasks.has(dep));
    if (missing.length > 0) {
      throw new UnknownDependencyError(task.id, missing);
    }
    const parent = task.parentId === null ? null : this.get(task.parentId);

    // A new node has no dependents yet, so edges out of it cannot close a cycle
    task.dependencies = deps;
    this.insert(task);
    if (parent && !parent.subtasks.includes(task.id)) {
      parent.subtasks.push(task.id);
    }
  }

  /**
   * Add the edge `taskId -> dependsOnId`.
   * @returns false when the edge already existed
   */
  addDependency(taskId: string, dependsOnId: string): boolean {
    const task = this.get(taskId);
    if (!this.tasks.has(dependsOnId)) {
      throw new UnknownDependencyError(taskId, [dependsOnId]);
    }
    if (task.dependencies.includes(dependsOnId)) {
      return false;
    }
    if (taskId === dependsOnId) {
      throw new CycleError([taskId, taskId]);
    }

    const back = this.findPath(dependsOnId, taskId);
    if (back) {
      throw new CycleError([taskId, ...back]);
    }

    task.dependencies.push(dependsOnId);
    task.updatedAt = new Date().toISOString();
    this.indexDependent(dependsOnId, taskId);
    return true;
  }

  /**
   * Remove a task nobody references. Tasks that depend on it, or are its subtasks, make
   * the removal fail.
   */
  removeTask(id: string): Task {
    const task = this.get(id);
    const blockers = [
      ...this.dependentsOf(id),
      ...this.all()
        .filter((t) => t.parentId === id)
        .map((t) => t.id),
    ];
    if (blockers.length > 0) {
      throw new DependentTasksError(id, Array.from(new Set(blockers)));
    }

    if (task.parentId !== null) {
      const parent = this.tasks.get(task.parentId);
      if (parent) {
        parent.subtasks = parent.subtasks.filter((sub) => sub !== id);
      }
    }
    for (const dep of task.dependencies) {
      this.dependents.get(dep)?.delete(id);
    }
    this.dependents.delete(id);
    this.insertionOrder.delete(id);
    this.tasks.delete(id);
    return task;
  }

  dependentsOf(id: string): string[] {
    return this.sortByInsertion(Array.from(this.dependents.get(id) ?? []));
  }

  isSatisfied(id: string): boolean {
    const task = this.tasks.get(id);
    return task !== undefined && this.policy.satisfiedStates.includes(task.state);
  }

  isReady(id: string): boolean {
    const task = this.get(id);
    return (
      this.policy.pendingStates.includes(task.state) &&
      task.blockers.length === 0 &&
      task.dependencies.every((dep) => this.isSatisfied(dep))
    );
  }

  readyTasks(): string[] {
    return this.all()
      .filter((task) => this.isReady(task.id))
      .map((task) => task.id);
  }

  /**
   * Ready tasks bucketed by parallel-group label, in order of first appearance.
   * Each ungrouped task is its own entry with a null label.
   */
  parallelGroups(): ReadyGroup[] {
    const groups: ReadyGroup[] = [];
    const byLabel = new Map<string, ReadyGroup>();

    for (const id of this.readyTasks()) {
      const label = this.get(id).parallelGroup;
      if (label === null) {
        groups.push({ label: null, taskIds: [id] });
        continue;
      }
      const existing = byLabel.get(label);
      if (existing) {
        existing.taskIds.push(id);
      } else {
        const group = { label, taskIds: [id] };
        byLabel.set(label, group);
        groups.push(group);
      }
    }
    return groups;
  }

  /**
   * Layered topological sort (Kahn) over every task not in a satisfied state. A dependency
   * counts only while it is unsatisfied. Within a batch tasks are ordered by priority,
   * highest first, then by insertion.
   */
  buildExecutionPlan(): PlanBatch[] {
    const nodes = this.all().filter((task) => !this.isSatisfied(task.id));
    const inDegree = new Map<string, number>();
    for (const task of nodes) {
      inDegree.set(task.id, task.dependencies.filter((dep) => !this.isSatisfied(dep)).length);
    }

    const batches: PlanBatch[] = [];
    let current = nodes.filter((task) => inDegree.get(task.id) === 0);
    let scheduled = 0;

    while (current.length > 0) {
      const ordered = [...current].sort(
        (a, b) =>
          priorityRank(b) - priorityRank(a) || this.orderOf(a.id) - this.orderOf(b.id)
      );

      const groups: Record<string, string[]> = {};
      for (const task of ordered) {
        if (task.parallelGroup !== null) {
          (groups[task.parallelGroup] ??= []).push(task.id);
        }
      }
      batches.push({ index: batches.length, taskIds: ordered.map((t) => t.id), groups });
      scheduled += ordered.length;

      const next: Task[] = [];
      for (const task of ordered) {
        for (const dependentId of this.dependents.get(task.id) ?? []) {
          const remaining = inDegree.get(dependentId);
          if (remaining === undefined) continue;
          inDegree.set(dependentId, remaining - 1);
          if (remaining - 1 === 0) {
            next.push(this.get(dependentId));
          }
        }
      }
      current = next;
    }

    if (scheduled < nodes.length) {
      throw new CycleError(this.detectCycle() ?? nodes.map((t) => t.id));
    }
    return batches;
  }

  /**
   * The root followed by every task that transitively depends on it.
   */
  subgraph(rootId: string): string[] {
    this.get(rootId);
    const seen = new Set<string>();
    const queue = [rootId];
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      queue.push(...(this.dependents.get(id) ?? []));
    }
    seen.delete(rootId);
    return [rootId, ...this.sortByInsertion(Array.from(seen))];
  }

  taskTree(rootId: string): TaskTreeNode {
    const task = this.get(rootId);
    return {
      id: task.id,
      title: task.title,
      state: task.state,
      assignee: task.assignee,
      subtasks: task.subtasks.filter((id) => this.tasks.has(id)).map((id) => this.taskTree(id)),
    };
  }

  /**
   * True when every id exists and no two of them are connected by a dependency path.
   */
  canParallelize(ids: string[]): boolean {
    if (!ids.every((id) => this.tasks.has(id))) {
      return false;
    }
    for (const a of ids) {
      for (const b of ids) {
        if (a !== b && this.findPath(a, b)) {
          return false;
        }
      }
    }
    return true;
  }

  /**
   * Dependency path `from -> ... -> to`, following edges from a task to what it depends on.
   */
  findPath(from: string, to: string): string[] | null {
    const visited = new Set<string>();
    const walk = (id: string): string[] | null => {
      if (id === to) return [id];
      if (visited.has(id)) return null;
      visited.add(id);
      for (const dep of this.tasks.get(id)?.dependencies ?? []) {
        const rest = walk(dep);
        if (rest) return [id, ...rest];
      }
      return null;
    };
    return walk(from);
  }

  /**
   * Three-color DFS. Returns the ids on the first cycle found (first id repeated at the
   * end), or null for an acyclic graph.
   */
  detectCycle(): string[] | null {
    const color = new Map<string, Color>();
    const stack: string[] = [];

    const visit = (id: string): string[] | null => {
      color.set(id, 'gray');
      stack.push(id);
      for (const dep of this.tasks.get(id)?.dependencies ?? []) {
        const depColor = color.get(dep) ?? 'white';
        if (depColor === 'gray') {
          return [...stack.slice(stack.indexOf(dep)), dep];
        }
        if (depColor === 'white') {
          const cycle = visit(dep);
          if (cycle) return cycle;
        }
      }
      stack.pop();
      color.set(id, 'black');
      return null;
    };

    for (const id of this.tasks.keys()) {
      if ((color.get(id) ?? 'white') === 'white') {
        const cycle = visit(id);
        if (cycle) return cycle;
      }
    }
    return null;
  }

  private insert(task: Task): void {
    this.tasks.set(task.id, task);
    this.insertionOrder.set(task.id, this.nextOrder++);
    for (const dep of task.dependencies) {
      this.indexDependent(dep, task.id);
    }
  }

  private indexDependent(dependencyId: string, dependentId: string): void {
    const set = this.dependents.get(dependencyId) ?? new Set<string>();
    set.add(dependentId);
    this.dependents.set(dependencyId, set);
  }

  private orderOf(id: string): number {
    return this.insertionOrder.get(id) ?? Number.MAX_SAFE_INTEGER;
  }

  private sortByInsertion(ids: string[]): string[] {
    return [...ids].sort((a, b) => this.orderOf(a) - this.orderOf(b));
  }
}
