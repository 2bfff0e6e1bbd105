import { MCP_SERVER_PATH } from '../paths.js';
import type { TaskType } from '../types/index.js';

interface MCPServerConfig {
  command: string;
  args: string[];
}

export interface AgentConfig {
  cwd: string;
  allowedTools: string[];
  permissionMode: 'bypassPermissions' | 'acceptEdits';
  maxTurns: number;
  mcpServers?: Record<string, MCPServerConfig>;
  model?: string;
}

export const MCP_SERVER_NAME = 'tl';

// Read-only tracker tools; results are reported back through the worker, not written directly
const MCP_TOOLS = [
  `mcp__${MCP_SERVER_NAME}__task_status`,
  `mcp__${MCP_SERVER_NAME}__task_history`,
  `mcp__${MCP_SERVER_NAME}__team_status`,
];

const READ_TOOLS = ['Read', 'Glob', 'Grep'];
const WRITE_TOOLS = ['Read', 'Edit', 'Write', 'Bash', 'Glob', 'Grep'];

const ROLE_TOOLS: Record<TaskType, string[]> = {
  architect: ['Read', 'Write', 'Glob', 'Grep'],
  coder: WRITE_TOOLS,
  reviewer: [...READ_TOOLS, 'Bash'],
  qa: [...READ_TOOLS, 'Bash'],
  debug: WRITE_TOOLS,
  docs: ['Read', 'Edit', 'Write', 'Glob', 'Grep'],
  devops: WRITE_TOOLS,
  security: [...READ_TOOLS, 'Bash'],
};

const ROLE_MAX_TURNS: Record<TaskType, number> = {
  architect: 50,
  coder: 100,
  reviewer: 50,
  qa: 60,
  debug: 100,
  docs: 40,
  devops: 60,
  security: 50,
};

/**
 * Agent config for one role. With a state dir the agent also gets the tracker's MCP
 * server so it can look up related tasks; `configPath` is passed on so that server
 * validates against the same tracker config as the dispatcher.
 */
export function createAgentConfig(
  type: TaskType,
  cwd: string,
  stateDir?: string,
  model?: string,
  configPath?: string
): AgentConfig {
  const config: AgentConfig = {
    cwd,
    allowedTools: stateDir ? [...ROLE_TOOLS[type], ...MCP_TOOLS] : ROLE_TOOLS[type],
    permissionMode: 'bypassPermissions',
    maxTurns: ROLE_MAX_TURNS[type],
    model,
  };

  if (stateDir) {
    const args = [MCP_SERVER_PATH, '--state-dir', stateDir];
    if (configPath) {
      args.push('--config', configPath);
    }
    config.mcpServers = {
      [MCP_SERVER_NAME]: { command: 'node', args },
    };
  }

  return config;
}
