import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { formatIssues } from '../config/loader.js';
import { InvalidRecordError } from '../graph/errors.js';
import { TrackerRecordSchema } from '../state/schema.js';
import type { Task, TrackerRecord } from '../types/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const NEXT_SEQ_KEY = 'next_seq';

const TaskRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  type: z.string(),
  priority: z.string(),
  state: z.string(),
  parallel_group: z.string().nullable(),
  parent_id: z.string().nullable(),
  assignee: z.string(),
  state_before_block: z.string().nullable(),
  iteration_count: z.number(),
  max_iterations: z.number(),
  escalation_required: z.number(),
  dependencies: z.string(),
  subtasks: z.string(),
  blockers: z.string(),
  quality_gates: z.string(),
  required_gates: z.string(),
  deliverables: z.string(),
  context: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

const HistoryRowSchema = z.object({
  task_id: z.string(),
  from_state: z.string(),
  to_state: z.string(),
  actor: z.string(),
  note: z.string(),
  timestamp: z.string(),
});

const MetaRowSchema = z.object({ value: z.string() });

type TaskRow = z.infer<typeof TaskRowSchema>;
type HistoryRow = z.infer<typeof HistoryRowSchema>;

export function createDatabase(dbPath: string): Database.Database {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  // Run schema
  const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
  db.exec(schema);

  return db;
}

function rowToTask(row: TaskRow, history: HistoryRow[]): Record<string, unknown> {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    type: row.type,
    priority: row.priority,
    state: row.state,
    dependencies: JSON.parse(row.dependencies),
    parallelGroup: row.parallel_group,
    parentId: row.parent_id,
    subtasks: JSON.parse(row.subtasks),
    assignee: row.assignee,
    blockers: JSON.parse(row.blockers),
    stateBeforeBlock: row.state_before_block,
    qualityGates: JSON.parse(row.quality_gates),
    requiredGates: JSON.parse(row.required_gates),
    deliverables: JSON.parse(row.deliverables),
    context: JSON.parse(row.context),
    iterationCount: row.iteration_count,
    maxIterations: row.max_iterations,
    escalationRequired: row.escalation_required !== 0,
    history: history.map((entry) => ({
      from: entry.from_state,
      to: entry.to_state,
      actor: entry.actor,
      note: entry.note,
      timestamp: entry.timestamp,
    })),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface TaskStore {
  load(): TrackerRecord | null;
  save(record: TrackerRecord): void;
  /** Run `fn` so that no other writer can commit between its load and its save. */
  transaction<T>(fn: () => T): T;
}

/**
 * SQLite persistence for a whole tracker. `save` replaces the stored task set inside one
 * transaction; `load` returns null for a database that has never been saved to.
 * `transaction` takes the write lock up front, so a load-modify-save inside it sees every
 * write another connection committed before it and loses none.
 */
export class SqliteTaskStore implements TaskStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = createDatabase(dbPath);
  }

  load(): TrackerRecord | null {
    const meta = this.db
      .prepare('SELECT value FROM tracker_meta WHERE key = ?')
      .get(NEXT_SEQ_KEY);
    if (meta === undefined) {
      return null;
    }

    const rows = z
      .array(TaskRowSchema)
      .parse(this.db.prepare('SELECT * FROM tasks ORDER BY position').all());
    const historyRows = z
      .array(HistoryRowSchema)
      .parse(this.db.prepare('SELECT * FROM task_history ORDER BY task_id, seq').all());

    const historyByTask = new Map<string, HistoryRow[]>();
    for (const entry of historyRows) {
      const list = historyByTask.get(entry.task_id) ?? [];
      list.push(entry);
      historyByTask.set(entry.task_id, list);
    }

    const result = TrackerRecordSchema.safeParse({
      version: 1,
      nextSeq: Number(MetaRowSchema.parse(meta).value),
      tasks: rows.map((row) => rowToTask(row, historyByTask.get(row.id) ?? [])),
    });
    if (!result.success) {
      throw new InvalidRecordError(formatIssues(result.error));
    }
    return result.data;
  }

  save(record: TrackerRecord): void {
    const insertTask = this.db.prepare(`
      INSERT INTO tasks (
        id, position, title, description, type, priority, state, parallel_group, parent_id,
        assignee, state_before_block, iteration_count, max_iterations, escalation_required,
        dependencies, subtasks, blockers, quality_gates, required_gates, deliverables,
        context, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertHistory = this.db.prepare(`
      INSERT INTO task_history (task_id, seq, from_state, to_state, actor, note, timestamp)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const write = this.db.transaction((tasks: Task[], nextSeq: number) => {
      this.db.prepare('DELETE FROM task_history').run();
      this.db.prepare('DELETE FROM tasks').run();

      tasks.forEach((task, position) => {
        insertTask.run(
          task.id,
          position,
          task.title,
          task.description,
          task.type,
          task.priority,
          task.state,
          task.parallelGroup,
          task.parentId,
          task.assignee,
          task.stateBeforeBlock,
          task.iterationCount,
          task.maxIterations,
          task.escalationRequired ? 1 : 0,
          JSON.stringify(task.dependencies),
          JSON.stringify(task.subtasks),
          JSON.stringify(task.blockers),
          JSON.stringify(task.qualityGates),
          JSON.stringify(task.requiredGates),
          JSON.stringify(task.deliverables),
          JSON.stringify(task.context),
          task.createdAt,
          task.updatedAt
        );
        task.history.forEach((entry, seq) => {
          insertHistory.run(
            task.id,
            seq,
            entry.from,
            entry.to,
            entry.actor,
            entry.note,
            entry.timestamp
          );
        });
      });

      this.db
        .prepare(`
        INSERT INTO tracker_meta (key, value) VALUES (?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value
      `)
        .run(NEXT_SEQ_KEY, String(nextSeq));
    });

    write(record.tasks, record.nextSeq);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  close(): void {
    this.db.close();
  }
}
