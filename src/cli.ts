import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Argument, Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { ClaudeWorker } from './agents/claude-worker.js';
import { runUntilIdle } from './executor/dispatch.js';
import { TrackerError } from './graph/errors.js';
import {
  DEFAULT_STATE_DIR,
  type TrackerSession,
  closeSession,
  openSession,
  updateSession,
} from './state/index.js';
import {
  TASK_PRIORITIES,
  TASK_TYPES,
  type TaskPriority,
  type TaskSnapshot,
  type TaskTreeNode,
  type TaskType,
  isTaskPriority,
  isTaskType,
} from './types/index.js';

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

type GlobalOptions = {
  stateDir: string;
  config?: string;
  debug: boolean;
  json: boolean;
};

interface CreateOptions {
  id?: string;
  priority?: TaskPriority;
  dependsOn?: string[];
  group?: string;
  description?: string;
  gates?: string[];
  maxIterations?: number;
  context?: Record<string, string>;
}

interface UpdateOptions {
  actor?: string;
  note?: string;
  assignee?: string;
  context?: Record<string, string>;
}

interface RunCommandOptions {
  maxRounds?: number;
  concurrency?: number;
  model?: string;
  cwd: string;
}

function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return String(pkg.version);
    }
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }
  return 'unknown';
}

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0 || String(parsed) !== value) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function parseBoolean(value: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new InvalidArgumentError('Expected true or false.');
}

function parseTaskType(value: string): TaskType {
  if (!isTaskType(value)) {
    throw new InvalidArgumentError(`Allowed types are ${TASK_TYPES.join(', ')}.`);
  }
  return value;
}

function parsePriority(value: string): TaskPriority {
  if (!isTaskPriority(value)) {
    throw new InvalidArgumentError(`Allowed priorities are ${TASK_PRIORITIES.join(', ')}.`);
  }
  return value;
}

function parseContextEntry(
  value: string,
  previous: Record<string, string> = {}
): Record<string, string> {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError('Expected key=value.');
  }
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

function typeArgument(): Argument {
  return new Argument('<type>', `Task type (${TASK_TYPES.join('|')})`).argParser(parseTaskType);
}

function priorityOption(): Option {
  return new Option('--priority <level>', `Priority (${TASK_PRIORITIES.join('|')})`).argParser(
    parsePriority
  );
}

function formatStatus(task: TaskSnapshot): string[] {
  const gates = Object.entries(task.qualityGates).map(
    ([gate, passed]) => `${gate}=${passed ? 'passed' : 'open'}`
  );
  const lines = [
    `${task.id}: ${task.title}`,
    `  type: ${task.type}  priority: ${task.priority}  assignee: ${task.assignee}`,
    `  state: ${task.state}  progress: ${task.progress}%  ready: ${task.ready ? 'yes' : 'no'}`,
    `  iterations: ${task.iterationCount}/${task.maxIterations}${
      task.escalationRequired ? '  ESCALATED' : ''
    }`,
  ];
  if (task.dependencies.length > 0) lines.push(`  depends on: ${task.dependencies.join(', ')}`);
  if (task.parallelGroup) lines.push(`  group: ${task.parallelGroup}`);
  if (gates.length > 0) lines.push(`  gates: ${gates.join(', ')}`);
  task.blockers.forEach((blocker, index) => {
    lines.push(`  blocker ${index}: ${blocker}`);
  });
  for (const deliverable of task.deliverables) {
    lines.push(`  deliverable: ${deliverable}`);
  }
  for (const [key, value] of Object.entries(task.context)) {
    lines.push(`  context: ${key}=${value}`);
  }
  return lines;
}

function formatTree(node: TaskTreeNode, depth = 0): string[] {
  return [
    `${'  '.repeat(depth)}${node.id} [${node.state}] ${node.title}`,
    ...node.subtasks.flatMap((child) => formatTree(child, depth + 1)),
  ];
}

function blockerSummary(task: TaskSnapshot): string {
  return `${task.id}: ${task.state}, ${task.blockers.length} open blocker(s)`;
}

export function createCLI(io: CliIO = consoleIO): Command {
  const program = new Command();

  program
    .name('tl')
    .version(getVersion(), '-v, --version', 'Show version number')
    .description('Dependency-aware task tracker for agent teams')
    .option('--state-dir <path>', 'State directory', DEFAULT_STATE_DIR)
    .option('--config <path>', 'Tracker config file (default: <state-dir>/config.yaml)')
    .option('--debug', 'Write a debug trace under <state-dir>/debug', false)
    .option('--json', 'Print results as JSON', false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  async function withSession<T>(
    command: string,
    fn: (session: TrackerSession) => T | Promise<T>
  ): Promise<T> {
    const opts = globals();
    const session = await openSession({
      stateDir: resolve(opts.stateDir),
      configPath: opts.config,
      debug: opts.debug,
      command,
    });
    try {
      return await fn(session);
    } finally {
      await closeSession(session);
    }
  }

  function withUpdate<T>(command: string, fn: (session: TrackerSession) => T): Promise<T> {
    return withSession(command, (session) => updateSession(session, fn));
  }

  function print(value: unknown, lines: () => string[]): void {
    if (globals().json) {
      io.out(JSON.stringify(value, null, 2));
    } else {
      io.out(lines().join('\n'));
    }
  }

  program
    .command('create')
    .description('Create a task')
    .argument('<title>', 'Task title')
    .addArgument(typeArgument())
    .option('--id <id>', 'Task id (generated when omitted)')
    .addOption(priorityOption())
    .option('--depends-on <ids...>', 'Tasks this one depends on')
    .option('--group <label>', 'Parallel group label')
    .option('--description <text>', 'Task description')
    .option('--gates <names...>', 'Required quality gates (default: per type)')
    .option('--max-iterations <n>', 'Rework limit before escalation', parseCount)
    .option(
      '--context <key=value>',
      'Context entry for later tasks (repeatable)',
      parseContextEntry
    )
    .action(async (title: string, type: TaskType, options: CreateOptions) => {
      const taskId = await withUpdate('create', ({ tracker }) =>
        tracker.submit(
          {
            id: options.id,
            title,
            type,
            description: options.description,
            priority: options.priority,
            parallelGroup: options.group,
            requiredGates: options.gates,
            maxIterations: options.maxIterations,
            context: options.context,
          },
          options.dependsOn ?? []
        )
      );
      print({ taskId }, () => [`Created ${taskId}`]);
    });

  program
    .command('subtask')
    .description('Create a subtask under an existing task')
    .argument('<parentId>', 'Parent task id')
    .argument('<title>', 'Task title')
    .addArgument(typeArgument())
    .addOption(priorityOption())
    .option('--depends-on <ids...>', 'Tasks this one depends on')
    .option('--description <text>', 'Task description')
    .action(async (parentId: string, title: string, type: TaskType, options: CreateOptions) => {
      const taskId = await withUpdate('subtask', ({ tracker }) =>
        tracker.subtask(
          parentId,
          { title, type, description: options.description, priority: options.priority },
          options.dependsOn ?? []
        )
      );
      print({ taskId, parentId }, () => [`Created ${taskId} under ${parentId}`]);
    });

  program
    .command('depend')
    .description('Add a dependency between existing tasks')
    .argument('<id>', 'Task id')
    .argument('<dependsOn>', 'Task it depends on')
    .action(async (id: string, dependsOn: string) => {
      const added = await withUpdate('depend', ({ tracker }) =>
        tracker.addDependency(id, dependsOn)
      );
      print({ taskId: id, dependsOn, added }, () => [
        added ? `${id} now depends on ${dependsOn}` : `${id} already depends on ${dependsOn}`,
      ]);
    });

  program
    .command('update')
    .description('Move a task to another state')
    .argument('<id>', 'Task id')
    .argument('<state>', 'Target state')
    .option('--actor <name>', 'Who is making the change')
    .option('--note <text>', 'Note for the task history')
    .option('--assignee <role>', 'Hand the task to another role')
    .option(
      '--context <key=value>',
      'Context entry for later tasks (repeatable)',
      parseContextEntry
    )
    .action(async (id: string, state: string, options: UpdateOptions) => {
      const entry = await withUpdate('update', ({ tracker }) =>
        tracker.transition(id, state, options)
      );
      print(entry, () => [`${id}: ${entry.from} -> ${entry.to}`]);
    });

  program
    .command('blocker')
    .description('Record a blocker; the task moves to blocked')
    .argument('<id>', 'Task id')
    .argument('<text...>', 'What is blocking the task')
    .option('--actor <name>', 'Who reported the blocker')
    .action(async (id: string, text: string[], options: { actor?: string }) => {
      const task = await withUpdate('blocker', ({ tracker }) => {
        tracker.addBlocker(id, text.join(' '), options.actor);
        return tracker.status(id);
      });
      print({ taskId: id, state: task.state, blockers: task.blockers }, () => [
        blockerSummary(task),
      ]);
    });

  program
    .command('unblock')
    .description('Clear a blocker; clearing the last one resumes the task')
    .argument('<id>', 'Task id')
    .argument('<index>', 'Blocker index (0 = first)', parseCount)
    .argument('<resumeState>', 'State to resume into')
    .option('--actor <name>', 'Who cleared the blocker')
    .action(
      async (id: string, index: number, resumeState: string, options: { actor?: string }) => {
        const task = await withUpdate('unblock', ({ tracker }) => {
          tracker.clearBlocker(id, index, resumeState, options.actor);
          return tracker.status(id);
        });
        print({ taskId: id, state: task.state, blockers: task.blockers }, () => [
          blockerSummary(task),
        ]);
      }
    );

  program
    .command('gate')
    .description('Set a quality gate')
    .argument('<id>', 'Task id')
    .argument('<gate>', 'Gate name')
    .argument('<value>', 'true or false', parseBoolean)
    .action(async (id: string, gate: string, value: boolean) => {
      const unmet = await withUpdate('gate', ({ tracker }) => {
        tracker.setGate(id, gate, value);
        return tracker.unmetGates(id);
      });
      print({ taskId: id, gate, value, unmetGates: unmet }, () => [
        `${id}: ${gate} = ${value}`,
        unmet.length > 0 ? `  unmet: ${unmet.join(', ')}` : '  all required gates passed',
      ]);
    });

  program
    .command('status')
    .description('Show a task')
    .argument('<id>', 'Task id')
    .action(async (id: string) => {
      const task = await withSession('status', ({ tracker }) => tracker.status(id));
      print(task, () => formatStatus(task));
    });

  program
    .command('history')
    .description('Show the state changes of a task')
    .argument('<id>', 'Task id')
    .action(async (id: string) => {
      const history = await withSession('history', ({ tracker }) =>
        tracker.history(id)
      );
      print(history, () =>
        history.length === 0
          ? [`${id} has no history`]
          : history.map(
              (entry) =>
                `${entry.timestamp} ${entry.from} -> ${entry.to} (${entry.actor})${
                  entry.note ? `: ${entry.note}` : ''
                }`
            )
      );
    });

  program
    .command('ready')
    .description('List tasks ready to start')
    .action(async () => {
      const ready = await withSession('ready', ({ tracker }) =>
        tracker.ready().map((id) => tracker.status(id))
      );
      print(
        ready.map((task) => task.id),
        () =>
          ready.length === 0
            ? ['No tasks ready']
            : ready.map((task) => `${task.id} [${task.priority}] ${task.title}`)
      );
    });

  program
    .command('parallel')
    .description('Group ready tasks by parallel group')
    .action(async () => {
      const groups = await withSession('parallel', ({ tracker }) =>
        tracker.parallelGroups()
      );
      print(groups, () =>
        groups.length === 0
          ? ['No tasks ready']
          : groups.map((group) => `${group.label ?? '(ungrouped)'}: ${group.taskIds.join(', ')}`)
      );
    });

  program
    .command('plan')
    .description('Show the execution plan')
    .action(async () => {
      const batches = await withSession('plan', ({ tracker }) => tracker.plan());
      print(batches, () =>
        batches.length === 0
          ? ['Nothing to plan']
          : batches.map((batch, index) => `Batch ${index + 1}: ${batch.join(', ')}`)
      );
    });

  program
    .command('tree')
    .description('Show a task and its subtasks')
    .argument('<id>', 'Task id')
    .action(async (id: string) => {
      const tree = await withSession('tree', ({ tracker }) => tracker.tree(id));
      print(tree, () => formatTree(tree));
    });

  program
    .command('team')
    .description('Show team status')
    .action(async () => {
      const team = await withSession('team', ({ tracker }) => tracker.teamStatus());
      print(team, () => [
        `Tasks: ${team.totalTasks} (${team.completedTasks} complete, ${team.inProgress} in progress, ${team.readyToStart} ready)`,
        `Completion: ${Math.round(team.completionRate * 100)}%`,
        `Blockers: ${team.activeBlockers}`,
        `Parallel groups: ${team.parallelGroups}`,
        `Escalations: ${team.escalations.length > 0 ? team.escalations.join(', ') : 'none'}`,
        ...Object.entries(team.byState).map(([state, count]) => `  ${state}: ${count}`),
      ]);
    });

  program
    .command('remove')
    .description('Remove a task nothing depends on')
    .argument('<id>', 'Task id')
    .action(async (id: string) => {
      await withUpdate('remove', ({ tracker }) => tracker.remove(id));
      print({ removed: id }, () => [`Removed ${id}`]);
    });

  program
    .command('board')
    .description('Show the task board')
    .action(async () => {
      const { tasks, team } = await withSession('board', ({ tracker }) => ({
        tasks: tracker.list(),
        team: tracker.teamStatus(),
      }));
      if (globals().json) {
        io.out(JSON.stringify({ tasks, team }, null, 2));
        return;
      }

      const { render } = await import('ink');
      const { createElement } = await import('react');
      const { Board } = await import('./tui/Board.js');
      const instance = render(createElement(Board, { tasks, team }));
      instance.unmount();
      await instance.waitUntilExit();
    });

  program
    .command('run')
    .description('Dispatch ready tasks to Claude agents until nothing is ready')
    .option('--max-rounds <n>', 'Stop after this many rounds', parseCount)
    .option('--concurrency <n>', 'Agents running at once', parseCount)
    .option('--model <model>', 'Model for every agent')
    .option('--cwd <path>', 'Working directory for the agents', process.cwd())
    .action(async (options: RunCommandOptions) => {
      const { config: configPath } = globals();
      const summary = await withSession('run', async (session) => {
        const worker = new ClaudeWorker({
          cwd: resolve(options.cwd),
          nextStates: (taskId) => session.tracker.nextStates(taskId),
          handoff: (taskId) => session.tracker.handoffContext(taskId),
          stateDir: session.stateDir,
          configPath: configPath ? resolve(configPath) : undefined,
          model: options.model,
        });
        return runUntilIdle(session.tracker, worker, {
          actor: 'dispatcher',
          maxRounds: options.maxRounds,
          maxConcurrency: options.concurrency,
          tracer: session.tracer,
          // Each round reloads from and saves to the store itself
          store: session.store,
          onRound: (report, round) => {
            if (!globals().json) {
              io.out(`Round ${round}:`);
              for (const outcome of report.outcomes) {
                io.out(
                  outcome.status === 'applied'
                    ? `  ${outcome.taskId}: ${outcome.state}`
                    : `  ${outcome.taskId}: ${outcome.status} (${outcome.error})`
                );
              }
            }
          },
        });
      });
      print(summary, () => [
        summary.idle
          ? `Idle after ${summary.rounds.length} round(s)`
          : `Stopped after ${summary.rounds.length} round(s) with tasks still ready`,
      ]);
    });

  program
    .command('mcp')
    .description('Serve the tracker over MCP on stdio')
    .action(async () => {
      const opts = globals();
      const { startMCPServer } = await import('./mcp/server.js');
      await startMCPServer({
        stateDir: resolve(opts.stateDir),
        configPath: opts.config,
        debug: opts.debug,
      });
    });

  return program;
}

/**
 * Parse and run one command line. Caller errors print `Error: <message>` and yield exit
 * code 1; anything else propagates.
 */
export async function runCLI(argv: string[], io: CliIO = consoleIO): Promise<number> {
  const program = createCLI(io);
  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof TrackerError) {
      io.err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
