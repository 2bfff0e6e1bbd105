import assert from 'node:assert';
import { describe, test } from 'node:test';
import { getDefaultConfig } from '../config/loader.js';
import { TaskTracker } from '../tracker/tracker.js';
import type { AgentMessage } from '../types/sdk.js';
import { ClaudeWorker, type QueryFn, WorkerOutputError } from './claude-worker.js';

interface QueryCall {
  prompt: string;
  cwd?: string;
  mcpArgs?: string[];
}

function fakeQuery(messages: AgentMessage[], calls: QueryCall[] = []): QueryFn {
  return async function* ({ prompt, options }) {
    const server = options.mcpServers?.tl;
    calls.push({
      prompt,
      cwd: options.cwd,
      mcpArgs: server && 'args' in server ? server.args : undefined,
    });
    for (const message of messages) {
      yield message;
    }
  };
}

function setup(): { tracker: TaskTracker; id: string } {
  const tracker = new TaskTracker(getDefaultConfig());
  const id = tracker.submit({ title: 'Validate checkout', type: 'qa' });
  tracker.transition(id, 'testing');
  return { tracker, id };
}

describe('ClaudeWorker', () => {
  test('maps the agent JSON onto a worker result', async () => {
    const { tracker, id } = setup();
    const calls: QueryCall[] = [];
    const worker = new ClaudeWorker({
      cwd: '/work',
      nextStates: (taskId) => tracker.nextStates(taskId),
      queryFn: fakeQuery(
        [
          { type: 'system', subtype: 'init' },
          { type: 'assistant' },
          {
            type: 'result',
            subtype: 'success',
            result: [
              'All scenarios pass.',
              '```json',
              '{"artifact": "reports/checkout.md", "gates": {"qa_validated": true},',
              ' "nextState": "complete", "note": "12/12 scenarios"}',
              '```',
            ].join('\n'),
          },
        ],
        calls
      ),
    });

    const result = await worker.execute(tracker.status(id));

    assert.deepStrictEqual(result, {
      artifact: 'reports/checkout.md',
      newBlockers: [],
      gateUpdates: { qa_validated: true },
      nextState: 'complete',
      note: '12/12 scenarios',
      context: undefined,
    });
    assert.strictEqual(calls.length, 1);
    assert.strictEqual(calls[0].cwd, '/work');
    assert.ok(calls[0].prompt.includes('## Allowed Next States\niteration, complete'));
  });

  test('hands dependency output to the agent and reads back its context', async () => {
    const tracker = new TaskTracker(getDefaultConfig());
    const design = tracker.submit({ title: 'Design checkout', type: 'architect' });
    const id = tracker.submit({ title: 'Validate checkout', type: 'qa' }, [design]);
    tracker.addDeliverable(design, 'docs/checkout.md');
    const calls: QueryCall[] = [];
    const worker = new ClaudeWorker({
      cwd: '/work',
      nextStates: () => ['testing'],
      handoff: (taskId) => tracker.handoffContext(taskId),
      stateDir: '/work/.tl',
      configPath: '/work/tl.yaml',
      queryFn: fakeQuery(
        [
          {
            type: 'result',
            subtype: 'success',
            result: '{"nextState": "testing", "context": {"suite": "e2e/checkout"}}',
          },
        ],
        calls
      ),
    });

    const result = await worker.execute(tracker.status(id));

    assert.deepStrictEqual(result.context, { suite: 'e2e/checkout' });
    assert.ok(calls[0].prompt.includes('### task_001: Design checkout (architect, new)'));
    assert.ok(calls[0].prompt.includes('- deliverable: docs/checkout.md'));
    assert.deepStrictEqual(calls[0].mcpArgs?.slice(1), [
      '--state-dir',
      '/work/.tl',
      '--config',
      '/work/tl.yaml',
    ]);
  });

  test('reports blockers from the agent', async () => {
    const { tracker, id } = setup();
    const worker = new ClaudeWorker({
      cwd: '/work',
      nextStates: () => [],
      queryFn: fakeQuery([
        { type: 'result', subtype: 'success', result: '{"blockers": ["staging is down"]}' },
      ]),
    });

    const result = await worker.execute(tracker.status(id));
    assert.deepStrictEqual(result.newBlockers, ['staging is down']);
    assert.strictEqual(result.nextState, undefined);
  });

  test('output without result JSON is a WorkerOutputError', async () => {
    const { tracker, id } = setup();
    const worker = new ClaudeWorker({
      cwd: '/work',
      nextStates: () => [],
      queryFn: fakeQuery([{ type: 'result', subtype: 'success', result: 'I ran out of ideas.' }]),
    });

    await assert.rejects(worker.execute(tracker.status(id)), (error: unknown) => {
      assert.ok(error instanceof WorkerOutputError);
      assert.strictEqual(error.taskId, id);
      assert.strictEqual(error.rawOutput, 'I ran out of ideas.');
      return true;
    });
  });

  test('an unsuccessful run is a WorkerOutputError', async () => {
    const { tracker, id } = setup();
    const worker = new ClaudeWorker({
      cwd: '/work',
      nextStates: () => [],
      queryFn: fakeQuery([{ type: 'result', subtype: 'error_max_turns' }]),
    });

    await assert.rejects(
      worker.execute(tracker.status(id)),
      new RegExp(`Agent run for ${id} ended with error_max_turns`)
    );
  });

  test('a stream without a result message is a WorkerOutputError', async () => {
    const { tracker, id } = setup();
    const worker = new ClaudeWorker({
      cwd: '/work',
      nextStates: () => [],
      queryFn: fakeQuery([{ type: 'assistant' }]),
    });

    await assert.rejects(worker.execute(tracker.status(id)), WorkerOutputError);
  });
});
