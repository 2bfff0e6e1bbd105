import { type Options, query } from '@anthropic-ai/claude-agent-sdk';
import { z } from 'zod';
import type { Worker, WorkerResult } from '../executor/dispatch.js';
import type { DependencyHandoff, TaskSnapshot } from '../types/index.js';
import { type AgentMessage, isResultMessage } from '../types/sdk.js';
import { JSONExtractionError, extractJSONWithRepair } from '../utils/json-parser.js';
import { buildTaskPrompt } from './prompts.js';
import { createAgentConfig } from './spawn.js';

export type QueryFn = (params: {
  prompt: string;
  options: Options;
}) => AsyncIterable<AgentMessage>;

export class WorkerOutputError extends Error {
  constructor(
    message: string,
    public readonly taskId: string,
    public readonly rawOutput: string
  ) {
    super(message);
    this.name = 'WorkerOutputError';
  }
}

const AgentResultSchema = z.object({
  artifact: z.string().optional(),
  blockers: z.array(z.string()).default([]),
  gates: z.record(z.boolean()).default({}),
  nextState: z.string().optional(),
  note: z.string().optional(),
  context: z.record(z.string()).optional(),
});

export interface ClaudeWorkerOptions {
  cwd: string;
  nextStates: (taskId: string) => string[];
  /** What the task's dependencies handed over; included in the prompt */
  handoff?: (taskId: string) => DependencyHandoff[];
  stateDir?: string;
  /** Tracker config file handed to the agents' MCP server */
  configPath?: string;
  model?: string;
  queryFn?: QueryFn;
}

/**
 * Runs one agent session per task with the role prompt for its type and turns the
 * JSON block the agent ends with into a WorkerResult.
 */
export class ClaudeWorker implements Worker {
  private options: ClaudeWorkerOptions;
  private queryFn: QueryFn;

  constructor(options: ClaudeWorkerOptions) {
    this.options = options;
    this.queryFn = options.queryFn ?? query;
  }

  async execute(task: TaskSnapshot): Promise<WorkerResult> {
    const config = createAgentConfig(
      task.type,
      this.options.cwd,
      this.options.stateDir,
      this.options.model,
      this.options.configPath
    );
    const prompt = buildTaskPrompt(
      task,
      this.options.nextStates(task.id),
      this.options.handoff?.(task.id) ?? []
    );

    let output: string | null = null;
    for await (const message of this.queryFn({
      prompt,
      options: {
        cwd: config.cwd,
        allowedTools: config.allowedTools,
        permissionMode: config.permissionMode,
        maxTurns: config.maxTurns,
        model: config.model,
        mcpServers: config.mcpServers,
      },
    })) {
      if (isResultMessage(message)) {
        if (message.subtype !== 'success' || message.result === undefined) {
          throw new WorkerOutputError(
            `Agent run for ${task.id} ended with ${message.subtype ?? 'no result'}`,
            task.id,
            ''
          );
        }
        output = message.result;
      }
    }

    if (output === null) {
      throw new WorkerOutputError(`Agent run for ${task.id} produced no result`, task.id, '');
    }

    try {
      const parsed = extractJSONWithRepair(output, AgentResultSchema);
      return {
        artifact: parsed.artifact,
        newBlockers: parsed.blockers,
        gateUpdates: parsed.gates,
        nextState: parsed.nextState,
        note: parsed.note,
        context: parsed.context,
      };
    } catch (error) {
      if (error instanceof JSONExtractionError) {
        throw new WorkerOutputError(
          `Agent output for ${task.id} has no valid result JSON`,
          task.id,
          error.rawOutput
        );
      }
      throw error;
    }
  }
}
