import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { TrackerConfig } from '../config/schema.js';
import { SqliteTaskStore, type TaskStore } from '../db/index.js';
import { createTracer } from '../debug/index.js';
import type { DebugTracer } from '../debug/types.js';
import { DB_FILENAME, resolveConfig } from '../state/index.js';
import { TaskTracker } from '../tracker/tracker.js';
import {
  AddBlockerSchema,
  ClearBlockerSchema,
  MUTATING_TOOLS,
  SetGateSchema,
  SubmitTaskSchema,
  TOOL_DEFINITIONS,
  TaskIdSchema,
  TransitionTaskSchema,
} from './tools.js';

export interface ToolContext {
  store: TaskStore;
  config: TrackerConfig;
  tracer: DebugTracer;
}

export interface ToolResult {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}

function loadTracker(ctx: ToolContext): TaskTracker {
  const record = ctx.store.load();
  return record
    ? TaskTracker.fromRecord(record, ctx.config, { tracer: ctx.tracer })
    : new TaskTracker(ctx.config, { tracer: ctx.tracer });
}

function runTool(tracker: TaskTracker, name: string, args: unknown): unknown {
  switch (name) {
    case 'submit_task': {
      const { dependencies, ...input } = SubmitTaskSchema.parse(args);
      const taskId = tracker.submit(input, dependencies);
      return { taskId };
    }

    case 'plan':
      return { batches: tracker.plan() };

    case 'transition_task': {
      const { taskId, state, ...options } = TransitionTaskSchema.parse(args);
      return tracker.transition(taskId, state, options);
    }

    case 'add_blocker': {
      const { taskId, text, actor } = AddBlockerSchema.parse(args);
      tracker.addBlocker(taskId, text, actor);
      const task = tracker.status(taskId);
      return { state: task.state, blockers: task.blockers };
    }

    case 'clear_blocker': {
      const { taskId, index, resumeState, actor } = ClearBlockerSchema.parse(args);
      tracker.clearBlocker(taskId, index, resumeState, actor);
      const task = tracker.status(taskId);
      return { state: task.state, blockers: task.blockers };
    }

    case 'set_gate': {
      const { taskId, gate, value } = SetGateSchema.parse(args);
      tracker.setGate(taskId, gate, value);
      return { qualityGates: tracker.status(taskId).qualityGates };
    }

    case 'task_status':
      return tracker.status(TaskIdSchema.parse(args).taskId);

    case 'task_history':
      return { history: tracker.history(TaskIdSchema.parse(args).taskId) };

    case 'ready_tasks':
      return { ready: tracker.ready(), groups: tracker.parallelGroups() };

    case 'team_status':
      return tracker.teamStatus();

    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

/**
 * Runs one tool call against the stored tracker. The tracker is reloaded for every call
 * so the CLI and other agents see each other's writes. A mutating tool loads, applies and
 * saves inside one store transaction, and saves only on success.
 */
export function handleToolCall(
  ctx: ToolContext,
  name: string,
  args: Record<string, unknown> | undefined
): ToolResult {
  const startTime = Date.now();
  const input: Record<string, unknown> = args ?? {};

  try {
    const result = MUTATING_TOOLS.has(name)
      ? ctx.store.transaction(() => {
          const tracker = loadTracker(ctx);
          const output = runTool(tracker, name, input);
          ctx.store.save(tracker.toRecord());
          return output;
        })
      : runTool(loadTracker(ctx), name, input);

    ctx.tracer.logMcpToolCall(name, input, { success: true }, Date.now() - startTime);
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    ctx.tracer.logMcpToolCall(
      name,
      input,
      { success: false, error: errorMessage },
      Date.now() - startTime
    );

    // Returned as a tool result so the agent can read the message and retry
    return {
      content: [{ type: 'text', text: `Error in ${name}: ${errorMessage}` }],
      isError: true,
    };
  }
}

export function createMCPServer(ctx: ToolContext): Server {
  const server = new Server(
    { name: 'taskloom', version: '1.0.0' },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOL_DEFINITIONS,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleToolCall(ctx, request.params.name, request.params.arguments)
  );

  return server;
}

export interface StartMCPServerOptions {
  stateDir: string;
  configPath?: string;
  debug?: boolean;
}

export async function startMCPServer(options: StartMCPServerOptions): Promise<Server> {
  const config = resolveConfig(options.stateDir, options.configPath);
  const tracer = createTracer(options.debug ?? false, options.stateDir);
  await tracer.init(randomUUID(), 'mcp');

  const store = new SqliteTaskStore(join(options.stateDir, DB_FILENAME));
  const server = createMCPServer({ store, config, tracer });
  server.onclose = () => {
    store.close();
    tracer.finalize().catch((error: unknown) => {
      console.error('Failed to write debug trace:', error);
    });
  };

  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}
