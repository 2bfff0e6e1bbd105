import type { TaskStore } from '../db/index.js';
import { createNoopTracer } from '../debug/noop-tracer.js';
import type { DebugTracer } from '../debug/types.js';
import { isTrackerError } from '../graph/errors.js';
import { SYSTEM_ACTOR } from '../state/machine.js';
import type { TaskTracker } from '../tracker/tracker.js';
import type { TaskSnapshot, TaskState } from '../types/index.js';

/**
 * What a worker reports back for one task. Every field is optional; an empty result
 * leaves the task where the dispatcher put it.
 */
export interface WorkerResult {
  artifact?: string;
  newBlockers?: string[];
  gateUpdates?: Record<string, boolean>;
  nextState?: string;
  note?: string;
  context?: Record<string, string>; // Handoff facts for dependent tasks
}

export interface Worker {
  execute(task: TaskSnapshot): Promise<WorkerResult>;
}

export type DispatchOutcome =
  | { taskId: string; status: 'applied'; state: TaskState }
  | { taskId: string; status: 'failed'; error: string }
  | { taskId: string; status: 'rejected'; error: string };

export interface DispatchReport {
  outcomes: DispatchOutcome[];
  durationMs: number;
}

export interface DispatchOptions {
  actor?: string;
  maxConcurrency?: number;
  tracer?: DebugTracer;
  /**
   * Shared store. When set, every change the dispatcher makes is applied to a freshly
   * loaded tracker inside one store transaction and saved before it commits.
   */
  store?: TaskStore;
}

export interface RunOptions extends DispatchOptions {
  maxRounds?: number;
  onRound?: (report: DispatchReport, round: number) => void;
}

export interface RunSummary {
  rounds: DispatchReport[];
  idle: boolean; // false when maxRounds stopped the run with work still ready
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run `fn` over every item with at most `limit` calls in flight. Results keep item order.
 */
async function settleLimited<T, R>(
  items: T[],
  limit: number,
  fn: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = [];
  let next = 0;

  const lane = async () => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await fn(items[index]) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, lane));
  return results;
}

function refresh(tracker: TaskTracker, store: TaskStore): void {
  const record = store.load();
  if (record) {
    tracker.restore(record);
  }
}

function synced<T>(tracker: TaskTracker, store: TaskStore | undefined, fn: () => T): T {
  if (!store) {
    return fn();
  }
  return store.transaction(() => {
    refresh(tracker, store);
    const result = fn();
    store.save(tracker.toRecord());
    return result;
  });
}

/**
 * Record a refusal on the task as a blocker so the next round does not pick it up again.
 * A complete task cannot take blockers; its outcome alone carries the error.
 */
function blockWith(tracker: TaskTracker, taskId: string, text: string, actor: string): void {
  if (tracker.status(taskId).state !== 'complete') {
    tracker.addBlocker(taskId, text, actor);
  }
}

/**
 * Move a ready task into the first state its type allows. A refusal blocks the task and
 * comes back as a `rejected` outcome; null means the task is in flight.
 */
function startTask(tracker: TaskTracker, taskId: string, actor: string): DispatchOutcome | null {
  const [start] = tracker.nextStates(taskId);
  if (start === undefined) {
    const error = `no state to start ${taskId} from ${tracker.status(taskId).state}`;
    blockWith(tracker, taskId, error, actor);
    return { taskId, status: 'rejected', error };
  }
  try {
    tracker.transition(taskId, start, { actor, note: 'dispatched' });
    return null;
  } catch (error) {
    if (!isTrackerError(error)) {
      throw error;
    }
    blockWith(tracker, taskId, `Dispatch rejected: ${error.message}`, actor);
    return { taskId, status: 'rejected', error: error.message };
  }
}

function applyResult(
  tracker: TaskTracker,
  taskId: string,
  result: WorkerResult,
  actor: string
): DispatchOutcome {
  try {
    for (const [gate, value] of Object.entries(result.gateUpdates ?? {})) {
      tracker.setGate(taskId, gate, value);
    }
    if (result.artifact) {
      tracker.addDeliverable(taskId, result.artifact);
    }
    if (result.context) {
      tracker.mergeContext(taskId, result.context);
    }

    const blockers = result.newBlockers ?? [];
    for (const text of blockers) {
      tracker.addBlocker(taskId, text, actor);
    }
    if (result.nextState && blockers.length === 0) {
      tracker.transition(taskId, result.nextState, { actor, note: result.note });
    }
    return { taskId, status: 'applied', state: tracker.status(taskId).state };
  } catch (error) {
    if (!isTrackerError(error)) {
      throw error;
    }
    blockWith(tracker, taskId, `Result rejected: ${error.message}`, actor);
    return { taskId, status: 'rejected', error: error.message };
  }
}

/**
 * Hand the ready tasks of one batch to the worker. Tasks are moved out of their pending
 * state before any worker runs, so they cannot be dispatched twice; results are applied
 * one at a time, in batch order, after every worker has settled.
 */
export async function dispatchBatch(
  tracker: TaskTracker,
  worker: Worker,
  taskIds: string[],
  options: DispatchOptions = {}
): Promise<DispatchReport> {
  const actor = options.actor ?? SYSTEM_ACTOR;
  const tracer = options.tracer ?? createNoopTracer();
  const startTime = Date.now();

  const outcomes: DispatchOutcome[] = [];
  const inFlight: string[] = [];
  synced(tracker, options.store, () => {
    for (const taskId of taskIds) {
      if (!tracker.has(taskId) || !tracker.status(taskId).ready) {
        continue;
      }
      const outcome = startTask(tracker, taskId, actor);
      if (outcome) {
        outcomes.push(outcome);
      } else {
        inFlight.push(taskId);
      }
    }
  });

  const settled = await settleLimited(
    inFlight.map((taskId) => tracker.status(taskId)),
    options.maxConcurrency ?? inFlight.length,
    (snapshot) => worker.execute(snapshot)
  );

  synced(tracker, options.store, () => {
    settled.forEach((result, index) => {
      const taskId = inFlight[index];
      if (!tracker.has(taskId)) {
        outcomes.push({ taskId, status: 'rejected', error: `Task ${taskId} was removed` });
        return;
      }
      if (result.status === 'rejected') {
        const error = errorMessage(result.reason);
        blockWith(tracker, taskId, `Worker failed: ${error}`, actor);
        tracer.logError(error, taskId, { phase: 'dispatch' });
        outcomes.push({ taskId, status: 'failed', error });
        return;
      }
      outcomes.push(applyResult(tracker, taskId, result.value, actor));
    });
  });

  const durationMs = Date.now() - startTime;
  tracer.logDispatch(
    outcomes.map((outcome) => outcome.taskId),
    Object.fromEntries(outcomes.map((outcome) => [outcome.taskId, outcome.status])),
    durationMs
  );
  return { outcomes, durationMs };
}

/**
 * Dispatch the ready part of the first plan batch, re-plan, and repeat until nothing is
 * ready or `maxRounds` rounds have run.
 */
export async function runUntilIdle(
  tracker: TaskTracker,
  worker: Worker,
  options: RunOptions = {}
): Promise<RunSummary> {
  const maxRounds = options.maxRounds ?? tracker.config.dispatch.maxRounds;
  const maxConcurrency = options.maxConcurrency ?? tracker.config.dispatch.maxConcurrency;
  const rounds: DispatchReport[] = [];

  while (rounds.length < maxRounds) {
    if (options.store) {
      refresh(tracker, options.store);
    }
    const [firstBatch = []] = tracker.plan();
    const batch = firstBatch.filter((taskId) => tracker.status(taskId).ready);
    if (batch.length === 0) {
      return { rounds, idle: true };
    }

    const report = await dispatchBatch(tracker, worker, batch, { ...options, maxConcurrency });
    rounds.push(report);
    options.onRound?.(report, rounds.length);
  }

  if (options.store) {
    refresh(tracker, options.store);
  }
  return { rounds, idle: tracker.ready().length === 0 };
}
