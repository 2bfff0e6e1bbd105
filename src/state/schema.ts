import { z } from 'zod';
import { TASK_PRIORITIES, TASK_STATES, TASK_TYPES } from '../types/index.js';

const TaskStateSchema = z.enum(TASK_STATES);

export const TransitionRecordSchema = z.object({
  from: TaskStateSchema,
  to: TaskStateSchema,
  actor: z.string(),
  note: z.string(),
  timestamp: z.string(),
});

const TaskFieldsSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  type: z.enum(TASK_TYPES),
  priority: z.enum(TASK_PRIORITIES),
  state: TaskStateSchema,
  dependencies: z.array(z.string()),
  parallelGroup: z.string().nullable(),
  parentId: z.string().nullable(),
  subtasks: z.array(z.string()),
  assignee: z.string(),
  blockers: z.array(z.string()),
  stateBeforeBlock: TaskStateSchema.nullable(),
  qualityGates: z.record(z.string(), z.boolean()),
  requiredGates: z.array(z.string()),
  deliverables: z.array(z.string()),
  context: z.record(z.string(), z.string()).default({}),
  iterationCount: z.number().int().nonnegative(),
  maxIterations: z.number().int().nonnegative(),
  escalationRequired: z.boolean(),
  history: z.array(TransitionRecordSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const TaskSchema = TaskFieldsSchema.refine(
  (task) => task.blockers.length === 0 || task.state === 'blocked',
  { message: 'a task with blockers must be blocked', path: ['state'] }
);

export const TrackerRecordSchema = z.object({
  version: z.literal(1),
  nextSeq: z.number().int().positive(),
  tasks: z.array(TaskSchema),
});
