import { z } from 'zod';
import { TASK_PRIORITIES, TASK_TYPES } from '../types/index.js';

// Tool schemas for MCP
export const SubmitTaskSchema = z.object({
  id: z.string().min(1).optional().describe('Task id; generated when omitted'),
  title: z.string().min(1).describe('Short task title'),
  type: z.enum(TASK_TYPES).describe('Role that owns the task'),
  description: z.string().optional().describe('Detailed task description'),
  priority: z.enum(TASK_PRIORITIES).optional().describe('Scheduling priority'),
  dependencies: z.array(z.string()).default([]).describe('IDs of tasks this depends on'),
  parallelGroup: z.string().optional().describe('Label of tasks meant to run together'),
  parentId: z.string().optional().describe('Parent task id for a subtask'),
  requiredGates: z.array(z.string()).optional().describe('Gates required for completion'),
  maxIterations: z.number().int().nonnegative().optional().describe('Rework limit'),
  context: z.record(z.string()).optional().describe('Handoff facts for dependent tasks'),
});

export const TaskIdSchema = z.object({
  taskId: z.string().describe('Task id'),
});

export const TransitionTaskSchema = z.object({
  taskId: z.string().describe('Task id'),
  state: z.string().describe('Target state'),
  actor: z.string().optional().describe('Who is making the change'),
  note: z.string().optional().describe('Note for the task history'),
  assignee: z.string().optional().describe('Role to hand the task to'),
  context: z.record(z.string()).optional().describe('Merged into the task context'),
});

export const AddBlockerSchema = z.object({
  taskId: z.string().describe('Task id'),
  text: z.string().min(1).describe('What is blocking the task'),
  actor: z.string().optional().describe('Who reported the blocker'),
});

export const ClearBlockerSchema = z.object({
  taskId: z.string().describe('Task id'),
  index: z.number().int().describe('Index of the blocker to clear (0 = first)'),
  resumeState: z.string().describe('State to resume into once no blockers remain'),
  actor: z.string().optional().describe('Who cleared the blocker'),
});

export const SetGateSchema = z.object({
  taskId: z.string().describe('Task id'),
  gate: z.string().min(1).describe('Quality gate name'),
  value: z.boolean().describe('Whether the gate passed'),
});

export const TOOL_DEFINITIONS = [
  {
    name: 'submit_task',
    description: 'Create a task, optionally depending on existing tasks',
    inputSchema: {
      type: 'object' as const,
      properties: {
        id: { type: 'string', description: 'Task id; generated when omitted' },
        title: { type: 'string', description: 'Short task title' },
        type: { type: 'string', enum: [...TASK_TYPES], description: 'Role that owns the task' },
        description: { type: 'string', description: 'Detailed task description' },
        priority: { type: 'string', enum: [...TASK_PRIORITIES], description: 'Priority' },
        dependencies: {
          type: 'array',
          items: { type: 'string' },
          description: 'IDs of tasks this depends on',
        },
        parallelGroup: { type: 'string', description: 'Label of tasks meant to run together' },
        parentId: { type: 'string', description: 'Parent task id for a subtask' },
        requiredGates: {
          type: 'array',
          items: { type: 'string' },
          description: 'Gates required for completion (defaults per type)',
        },
        maxIterations: { type: 'number', description: 'Rework limit before escalation' },
        context: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Handoff facts for dependent tasks',
        },
      },
      required: ['title', 'type'],
    },
  },
  {
    name: 'plan',
    description: 'Execution plan: batches of tasks that can run in parallel, in order',
    inputSchema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'transition_task',
    description: 'Move a task to another state',
    inputSchema: {
      type: 'object' as const,
      properties: {
        taskId: { type: 'string', description: 'Task id' },
        state: { type: 'string', description: 'Target state' },
        actor: { type: 'string', description: 'Who is making the change' },
        note: { type: 'string', description: 'Note for the task history' },
        assignee: { type: 'string', description: 'Role to hand the task to' },
        context: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Merged into the task context',
        },
      },
      required: ['taskId', 'state'],
    },
  },
  {
    name: 'add_blocker',
    description: 'Record a blocker; the task moves to blocked',
    inputSchema: {
      type: 'object' as const,
      properties: {
        taskId: { type: 'string', description: 'Task id' },
        text: { type: 'string', description: 'What is blocking the task' },
        actor: { type: 'string', description: 'Who reported the blocker' },
      },
      required: ['taskId', 'text'],
    },
  },
  {
    name: 'clear_blocker',
    description: 'Clear a blocker; the last one resumes the task into resumeState',
    inputSchema: {
      type: 'object' as const,
      properties: {
        taskId: { type: 'string', description: 'Task id' },
        index: { type: 'number', description: 'Index of the blocker to clear (0 = first)' },
        resumeState: { type: 'string', description: 'State to resume into' },
        actor: { type: 'string', description: 'Who cleared the blocker' },
      },
      required: ['taskId', 'index', 'resumeState'],
    },
  },
  {
    name: 'set_gate',
    description: 'Set a quality gate on a task',
    inputSchema: {
      type: 'object' as const,
      properties: {
        taskId: { type: 'string', description: 'Task id' },
        gate: { type: 'string', description: 'Quality gate name' },
        value: { type: 'boolean', description: 'Whether the gate passed' },
      },
      required: ['taskId', 'gate', 'value'],
    },
  },
  {
    name: 'task_status',
    description: 'Full task record with progress and readiness',
    inputSchema: {
      type: 'object' as const,
      properties: { taskId: { type: 'string', description: 'Task id' } },
      required: ['taskId'],
    },
  },
  {
    name: 'task_history',
    description: 'State changes of a task, oldest first',
    inputSchema: {
      type: 'object' as const,
      properties: { taskId: { type: 'string', description: 'Task id' } },
      required: ['taskId'],
    },
  },
  {
    name: 'ready_tasks',
    description: 'Tasks ready to start, and how they group',
    inputSchema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'team_status',
    description: 'Counts by state, type, priority and assignee; blockers; escalations',
    inputSchema: { type: 'object' as const, properties: {} },
  },
];

export const MUTATING_TOOLS: ReadonlySet<string> = new Set([
  'submit_task',
  'transition_task',
  'add_blocker',
  'clear_blocker',
  'set_gate',
]);
