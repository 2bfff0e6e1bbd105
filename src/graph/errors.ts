import type { TaskState } from '../types/index.js';

export type TrackerErrorCode =
  | 'DUPLICATE_ID'
  | 'UNKNOWN_DEPENDENCY'
  | 'CYCLE'
  | 'INVALID_TRANSITION'
  | 'GATE_NOT_SATISFIED'
  | 'NO_SUCH_BLOCKER'
  | 'NO_SUCH_TASK'
  | 'DEPENDENT_TASKS'
  | 'CONFIG'
  | 'INVALID_RECORD';

/**
 * Base class for caller errors raised by the tracker. None of these are retried.
 */
export abstract class TrackerError extends Error {
  abstract readonly code: TrackerErrorCode;
}

export class DuplicateIdError extends TrackerError {
  readonly code = 'DUPLICATE_ID';

  constructor(public readonly taskId: string) {
    super(`Task ${taskId} already exists`);
    this.name = 'DuplicateIdError';
  }
}

export class UnknownDependencyError extends TrackerError {
  readonly code = 'UNKNOWN_DEPENDENCY';

  constructor(
    public readonly taskId: string,
    public readonly dependencyIds: string[]
  ) {
    super(`Task ${taskId} depends on unknown task(s): ${dependencyIds.join(', ')}`);
    this.name = 'UnknownDependencyError';
  }
}

export class CycleError extends TrackerError {
  readonly code = 'CYCLE';

  /**
   * @param path - Task ids forming the cycle, first id repeated at the end
   */
  constructor(public readonly path: string[]) {
    super(`Dependency cycle: ${path.join(' -> ')}`);
    this.name = 'CycleError';
  }
}

export class InvalidTransitionError extends TrackerError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    public readonly taskId: string,
    public readonly from: TaskState,
    public readonly to: string,
    public readonly reason: string
  ) {
    super(`Task ${taskId} cannot move from ${from} to ${to}: ${reason}`);
    this.name = 'InvalidTransitionError';
  }
}

export class GateNotSatisfiedError extends TrackerError {
  readonly code = 'GATE_NOT_SATISFIED';

  constructor(
    public readonly taskId: string,
    public readonly unmetGates: string[]
  ) {
    super(`Task ${taskId} has unmet quality gates: ${unmetGates.join(', ')}`);
    this.name = 'GateNotSatisfiedError';
  }
}

export class NoSuchBlockerError extends TrackerError {
  readonly code = 'NO_SUCH_BLOCKER';

  constructor(
    public readonly taskId: string,
    public readonly index: number
  ) {
    super(`Task ${taskId} has no blocker at index ${index}`);
    this.name = 'NoSuchBlockerError';
  }
}

export class NoSuchTaskError extends TrackerError {
  readonly code = 'NO_SUCH_TASK';

  constructor(public readonly taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'NoSuchTaskError';
  }
}

export class DependentTasksError extends TrackerError {
  readonly code = 'DEPENDENT_TASKS';

  constructor(
    public readonly taskId: string,
    public readonly dependents: string[]
  ) {
    super(`Task ${taskId} is still referenced by: ${dependents.join(', ')}`);
    this.name = 'DependentTasksError';
  }
}

export class ConfigError extends TrackerError {
  readonly code = 'CONFIG';

  constructor(
    public readonly path: string,
    public readonly issues: string[]
  ) {
    super(`Invalid config ${path}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export class InvalidRecordError extends TrackerError {
  readonly code = 'INVALID_RECORD';

  constructor(public readonly issues: string[]) {
    super(`Invalid tracker record: ${issues.join('; ')}`);
    this.name = 'InvalidRecordError';
  }
}

export function isTrackerError(error: unknown): error is TrackerError {
  return error instanceof TrackerError;
}
