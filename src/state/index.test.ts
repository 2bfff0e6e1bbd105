import assert from 'node:assert';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, test } from 'node:test';
import { getDefaultConfig } from '../config/loader.js';
import {
  closeSession,
  hasState,
  openSession,
  resolveConfig,
  saveSession,
  updateSession,
} from './index.js';

describe('Tracker sessions', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'tl-session-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test('state survives between sessions', async () => {
    const first = await openSession({ stateDir: tempDir, command: 'create' });
    assert.strictEqual(first.tracker.size, 0);
    const id = first.tracker.submit({ title: 'Write tests', type: 'qa' });
    first.tracker.transition(id, 'testing');
    saveSession(first);
    await closeSession(first);

    assert.ok(hasState(tempDir));

    const second = await openSession({ stateDir: tempDir, command: 'status' });
    assert.strictEqual(second.tracker.status(id).state, 'testing');
    assert.strictEqual(second.tracker.submit({ title: 'More tests', type: 'qa' }), 'task_002');
    await closeSession(second);
  });

  test('unsaved changes are discarded', async () => {
    const session = await openSession({ stateDir: tempDir, command: 'create' });
    session.tracker.submit({ title: 'Draft', type: 'docs' });
    await closeSession(session);

    const reopened = await openSession({ stateDir: tempDir, command: 'status' });
    assert.strictEqual(reopened.tracker.size, 0);
    await closeSession(reopened);
  });

  test('updates apply on top of writes made after the session opened', async () => {
    const seed = await openSession({ stateDir: tempDir, command: 'create' });
    const id = seed.tracker.submit({ title: 'Ship release', type: 'devops' });
    saveSession(seed);
    await closeSession(seed);

    const slow = await openSession({ stateDir: tempDir, command: 'gate' });
    const fast = await openSession({ stateDir: tempDir, command: 'blocker' });
    updateSession(fast, ({ tracker }) => tracker.addBlocker(id, 'waiting on sign-off'));
    await closeSession(fast);

    updateSession(slow, ({ tracker }) => tracker.setGate(id, 'tests_passing', true));
    await closeSession(slow);

    const check = await openSession({ stateDir: tempDir, command: 'status' });
    const task = check.tracker.status(id);
    assert.deepStrictEqual(task.blockers, ['waiting on sign-off']);
    assert.strictEqual(task.qualityGates.tests_passing, true);
    await closeSession(check);
  });

  test('a failed update saves nothing', async () => {
    const session = await openSession({ stateDir: tempDir, command: 'create' });
    assert.throws(() =>
      updateSession(session, ({ tracker }) => {
        tracker.submit({ title: 'Orphan', type: 'qa' });
        tracker.transition('task_001', 'complete');
      })
    );
    await closeSession(session);

    const reopened = await openSession({ stateDir: tempDir, command: 'status' });
    assert.strictEqual(reopened.tracker.size, 0);
    await closeSession(reopened);
  });

  test('config.yaml in the state dir is picked up', () => {
    writeFileSync(join(tempDir, 'config.yaml'), 'maxIterations: 7\n');
    assert.strictEqual(resolveConfig(tempDir).maxIterations, 7);
  });

  test('defaults apply without a config file', () => {
    assert.strictEqual(resolveConfig(tempDir), getDefaultConfig());
  });

  test('an explicit config path must exist', () => {
    assert.throws(() => resolveConfig(tempDir, join(tempDir, 'missing.yaml')), /ENOENT/);
  });

  test('debug sessions write a trace', async () => {
    const session = await openSession({ stateDir: tempDir, command: 'plan', debug: true });
    session.tracker.plan();
    await closeSession(session);

    assert.ok(existsSync(join(tempDir, 'debug')));
  });
});
