import { randomUUID } from 'node:crypto';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { loadConfig } from '../config/loader.js';
import type { TrackerConfig } from '../config/schema.js';
import { SqliteTaskStore } from '../db/index.js';
import { createTracer } from '../debug/index.js';
import type { DebugTracer } from '../debug/types.js';
import { TaskTracker } from '../tracker/tracker.js';

export const DEFAULT_STATE_DIR = '.tl';
export const DB_FILENAME = 'tracker.db';
export const CONFIG_FILENAME = 'config.yaml';

export interface OpenSessionOptions {
  stateDir: string;
  configPath?: string;
  debug?: boolean;
  command: string;
}

/**
 * A tracker loaded from the state directory, with the store it saves back to and the
 * tracer recording this invocation.
 */
export interface TrackerSession {
  tracker: TaskTracker;
  store: SqliteTaskStore;
  config: TrackerConfig;
  tracer: DebugTracer;
  stateDir: string;
}

/**
 * An explicit `--config` path must exist; otherwise `<stateDir>/config.yaml` is used when
 * present and the built-in defaults when not.
 */
export function resolveConfig(stateDir: string, configPath?: string): TrackerConfig {
  if (configPath) {
    return loadConfig(configPath);
  }
  return loadConfig(join(stateDir, CONFIG_FILENAME), false);
}

export async function openSession(options: OpenSessionOptions): Promise<TrackerSession> {
  const config = resolveConfig(options.stateDir, options.configPath);
  const tracer = createTracer(options.debug ?? false, options.stateDir);
  await tracer.init(randomUUID(), options.command);

  const store = new SqliteTaskStore(join(options.stateDir, DB_FILENAME));
  try {
    const record = store.load();
    const tracker = record
      ? TaskTracker.fromRecord(record, config, { tracer })
      : new TaskTracker(config, { tracer });
    return { tracker, store, config, tracer, stateDir: options.stateDir };
  } catch (error) {
    store.close();
    throw error;
  }
}

export function saveSession(session: TrackerSession): void {
  session.store.save(session.tracker.toRecord());
}

/**
 * Apply `fn` to the latest stored task set and save it, with no other writer able to commit
 * in between. Writes made since the session opened are picked up first.
 */
export function updateSession<T>(
  session: TrackerSession,
  fn: (session: TrackerSession) => T
): T {
  return session.store.transaction(() => {
    const record = session.store.load();
    if (record) {
      session.tracker.restore(record);
    }
    const result = fn(session);
    saveSession(session);
    return result;
  });
}

export async function closeSession(session: TrackerSession): Promise<void> {
  session.store.close();
  await session.tracer.finalize();
}

export function hasState(stateDir: string): boolean {
  return existsSync(join(stateDir, DB_FILENAME));
}
