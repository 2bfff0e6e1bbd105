import assert from 'node:assert';
import { describe, test } from 'node:test';
import { getDefaultConfig, mergeConfig } from '../config/loader.js';
import {
  CycleError,
  DuplicateIdError,
  GateNotSatisfiedError,
  InvalidRecordError,
  NoSuchTaskError,
  UnknownDependencyError,
} from '../graph/errors.js';
import { TaskTracker, formatTaskId } from './tracker.js';

const FIXED_TIME = '2026-03-01T12:00:00.000Z';

function newTracker(): TaskTracker {
  return new TaskTracker(getDefaultConfig(), { now: () => FIXED_TIME });
}

function completeReviewer(tracker: TaskTracker, id: string): void {
  tracker.transition(id, 'reviewing');
  tracker.setGate(id, 'review_approved', true);
  tracker.transition(id, 'complete');
}

describe('TaskTracker.submit', () => {
  test('assigns sequential ids', () => {
    const tracker = newTracker();
    assert.strictEqual(tracker.submit({ title: 'Design', type: 'architect' }), 'task_001');
    assert.strictEqual(tracker.submit({ title: 'Build', type: 'coder' }), 'task_002');
    assert.strictEqual(formatTaskId(1234), 'task_1234');
  });

  test('skips ids taken by caller-supplied ones', () => {
    const tracker = newTracker();
    tracker.submit({ id: 'task_001', title: 'Manual', type: 'docs' });
    assert.strictEqual(tracker.submit({ title: 'Auto', type: 'docs' }), 'task_002');
  });

  test('a failed submit does not consume an id', () => {
    const tracker = newTracker();
    assert.throws(
      () => tracker.submit({ title: 'Orphan', type: 'coder' }, ['ghost']),
      UnknownDependencyError
    );
    assert.strictEqual(tracker.submit({ title: 'First', type: 'coder' }), 'task_001');
    assert.strictEqual(tracker.size, 1);
  });

  test('duplicate supplied id', () => {
    const tracker = newTracker();
    tracker.submit({ id: 'auth', title: 'Auth', type: 'coder' });
    assert.throws(() => tracker.submit({ id: 'auth', title: 'Again', type: 'coder' }), DuplicateIdError);
  });

  test('fills defaults from config', () => {
    const tracker = newTracker();
    const id = tracker.submit({ title: 'Login form', type: 'coder' });
    const task = tracker.status(id);

    assert.strictEqual(task.state, 'new');
    assert.strictEqual(task.priority, 'medium');
    assert.strictEqual(task.assignee, 'coder');
    assert.strictEqual(task.maxIterations, 3);
    assert.deepStrictEqual(task.requiredGates, ['tests_passing', 'review_approved']);
    assert.deepStrictEqual(task.qualityGates, { tests_passing: false, review_approved: false });
    assert.strictEqual(task.createdAt, FIXED_TIME);
    assert.strictEqual(task.progress, 0);
    assert.strictEqual(task.ready, true);
  });

  test('caller may override gates and iteration limit', () => {
    const tracker = newTracker();
    const id = tracker.submit({
      title: 'Spike',
      type: 'coder',
      requiredGates: ['demo_done'],
      maxIterations: 1,
    });
    const task = tracker.status(id);
    assert.deepStrictEqual(task.qualityGates, { demo_done: false });
    assert.strictEqual(task.maxIterations, 1);
  });

  test('subtasks link to their parent', () => {
    const tracker = newTracker();
    const parent = tracker.submit({ title: 'Checkout', type: 'architect' });
    const child = tracker.subtask(parent, { title: 'Cart API', type: 'coder' });

    assert.strictEqual(tracker.status(child).parentId, parent);
    assert.deepStrictEqual(tracker.tree(parent), {
      id: parent,
      title: 'Checkout',
      state: 'new',
      assignee: 'architect',
      subtasks: [
        { id: child, title: 'Cart API', state: 'new', assignee: 'coder', subtasks: [] },
      ],
    });
  });
});

describe('Example scenarios', () => {
  test('fan-out after the shared dependency completes', () => {
    const tracker = newTracker();
    const a = tracker.submit({ title: 'A', type: 'reviewer' });
    const b = tracker.submit({ title: 'B', type: 'coder' }, [a]);
    const c = tracker.submit({ title: 'C', type: 'coder', parallelGroup: 'g1' }, [a]);

    assert.deepStrictEqual(tracker.plan()[0], [a]);

    completeReviewer(tracker, a);

    const plan = tracker.plan();
    assert.deepStrictEqual([...plan[0]].sort(), [b, c].sort());
    assert.deepStrictEqual(tracker.ready(), [b, c]);
  });

  test('a dependency cycle is refused and the earlier edge survives', () => {
    const tracker = newTracker();
    const x = tracker.submit({ title: 'X', type: 'coder' });
    const y = tracker.submit({ title: 'Y', type: 'coder' });

    tracker.addDependency(x, y);
    assert.throws(() => tracker.addDependency(y, x), CycleError);

    assert.deepStrictEqual(tracker.status(x).dependencies, [y]);
    assert.deepStrictEqual(tracker.status(y).dependencies, []);
    assert.deepStrictEqual(tracker.plan(), [[y], [x]]);
  });

  test('completion waits for both required gates', () => {
    const tracker = newTracker();
    const id = tracker.submit({ title: 'Feature', type: 'coder' });
    tracker.transition(id, 'implementing');
    tracker.transition(id, 'reviewing');

    tracker.setGate(id, 'tests_passing', true);
    assert.throws(
      () => tracker.transition(id, 'complete'),
      (error: unknown) => {
        assert.ok(error instanceof GateNotSatisfiedError);
        assert.deepStrictEqual(error.unmetGates, ['review_approved']);
        return true;
      }
    );

    tracker.setGate(id, 'review_approved', true);
    tracker.transition(id, 'complete', { actor: 'reviewer' });
    assert.strictEqual(tracker.status(id).state, 'complete');
    assert.strictEqual(tracker.status(id).progress, 100);
  });
});

describe('Ready set', () => {
  test('changes only by the tasks that moved', () => {
    const tracker = newTracker();
    const a = tracker.submit({ title: 'A', type: 'qa' });
    const b = tracker.submit({ title: 'B', type: 'qa' });

    const first = tracker.ready();
    assert.deepStrictEqual(tracker.ready(), first);

    tracker.transition(a, 'testing');
    assert.deepStrictEqual(tracker.ready(), [b]);
  });

  test('a blocked task leaves the ready set and returns on resume', () => {
    const tracker = newTracker();
    const id = tracker.submit({ title: 'A', type: 'qa' });

    tracker.addBlocker(id, 'needs fixture data');
    assert.deepStrictEqual(tracker.ready(), []);
    assert.strictEqual(tracker.status(id).state, 'blocked');

    tracker.clearBlocker(id, 0, 'new');
    assert.deepStrictEqual(tracker.ready(), [id]);
  });

  test('parallel groups over the ready set', () => {
    const tracker = newTracker();
    const a = tracker.submit({ title: 'A', type: 'docs', parallelGroup: 'docs' });
    const b = tracker.submit({ title: 'B', type: 'coder' });
    const c = tracker.submit({ title: 'C', type: 'docs', parallelGroup: 'docs' });

    assert.deepStrictEqual(tracker.parallelGroups(), [
      { label: 'docs', taskIds: [a, c] },
      { label: null, taskIds: [b] },
    ]);
    assert.strictEqual(tracker.canParallelize([a, b, c]), true);
  });
});

describe('TaskTracker queries and edits', () => {
  test('unknown ids raise NoSuchTaskError everywhere', () => {
    const tracker = newTracker();
    assert.throws(() => tracker.status('ghost'), NoSuchTaskError);
    assert.throws(() => tracker.history('ghost'), NoSuchTaskError);
    assert.throws(() => tracker.setGate('ghost', 'x', true), NoSuchTaskError);
    assert.throws(() => tracker.addBlocker('ghost', 'x'), NoSuchTaskError);
    assert.throws(() => tracker.transition('ghost', 'complete'), NoSuchTaskError);
    assert.throws(() => tracker.remove('ghost'), NoSuchTaskError);
  });

  test('status is a deep copy', () => {
    const tracker = newTracker();
    const id = tracker.submit({ title: 'A', type: 'coder' });
    const snapshot = tracker.status(id);
    snapshot.blockers.push('tampered');
    snapshot.qualityGates.tests_passing = true;

    assert.deepStrictEqual(tracker.status(id).blockers, []);
    assert.strictEqual(tracker.status(id).qualityGates.tests_passing, false);
  });

  test('amend and deliverables', () => {
    const tracker = newTracker();
    const id = tracker.submit({ title: 'Draft', type: 'docs' });
    tracker.amend(id, { title: 'README', priority: 'high' });
    tracker.addDeliverable(id, 'docs/README.md');

    const task = tracker.status(id);
    assert.strictEqual(task.title, 'README');
    assert.strictEqual(task.priority, 'high');
    assert.strictEqual(task.description, '');
    assert.deepStrictEqual(task.deliverables, ['docs/README.md']);
  });

  test('handoff context carries what each dependency produced', () => {
    const tracker = newTracker();
    const design = tracker.submit({
      title: 'Design auth',
      type: 'architect',
      context: { requirement: 'SSO only' },
    });
    const review = tracker.submit({ title: 'Review schema', type: 'reviewer' });
    const build = tracker.submit({ title: 'Build auth', type: 'coder' }, [design, review]);

    tracker.transition(design, 'analyzing', { note: 'reading requirements' });
    tracker.transition(design, 'planning', { context: { tokens: 'JWT, 15 min expiry' } });
    tracker.addDeliverable(design, 'docs/auth.md');
    tracker.setGate(design, 'architecture_approved', true);
    tracker.transition(design, 'complete', { note: 'approved by lead' });
    completeReviewer(tracker, review);

    assert.deepStrictEqual(tracker.handoffContext(build), [
      {
        taskId: design,
        title: 'Design auth',
        type: 'architect',
        state: 'complete',
        deliverables: ['docs/auth.md'],
        context: { requirement: 'SSO only', tokens: 'JWT, 15 min expiry' },
        note: 'approved by lead',
      },
      {
        taskId: review,
        title: 'Review schema',
        type: 'reviewer',
        state: 'complete',
        deliverables: [],
        context: {},
        note: '',
      },
    ]);
    assert.deepStrictEqual(tracker.handoffContext(design), []);
  });

  test('subgraph and nextStates', () => {
    const tracker = newTracker();
    const a = tracker.submit({ title: 'A', type: 'coder' });
    const b = tracker.submit({ title: 'B', type: 'coder' }, [a]);
    assert.deepStrictEqual(tracker.subgraph(a), [a, b]);
    assert.deepStrictEqual(tracker.nextStates(a), ['analyzing', 'implementing']);
  });

  test('history lists every state change', () => {
    const tracker = newTracker();
    const id = tracker.submit({ title: 'A', type: 'qa' });
    tracker.transition(id, 'testing', { actor: 'qa', note: 'run suite' });
    tracker.addBlocker(id, 'flaky runner', 'qa');
    tracker.clearBlocker(id, 0, 'testing', 'devops');

    assert.deepStrictEqual(
      tracker.history(id).map((entry) => [entry.from, entry.to, entry.actor, entry.note]),
      [
        ['new', 'testing', 'qa', 'run suite'],
        ['testing', 'blocked', 'qa', 'flaky runner'],
        ['blocked', 'testing', 'devops', 'cleared blocker: flaky runner'],
      ]
    );
  });
});

describe('Serialization', () => {
  test('round trip is lossless', () => {
    const tracker = newTracker();
    const a = tracker.submit({ title: 'A', type: 'qa', priority: 'critical' });
    const b = tracker.submit({ title: 'B', type: 'coder', parallelGroup: 'g1' }, [a]);
    tracker.subtask(a, { title: 'A.1', type: 'docs' });
    tracker.transition(a, 'testing');
    tracker.transition(a, 'iteration');
    tracker.addBlocker(b, 'waiting');
    tracker.setGate(b, 'tests_passing', true);

    const record = tracker.toRecord();
    const restored = TaskTracker.fromRecord(JSON.parse(JSON.stringify(record)), getDefaultConfig());

    assert.deepStrictEqual(restored.toRecord(), record);
    assert.deepStrictEqual(restored.plan(), tracker.plan());
    assert.strictEqual(restored.submit({ title: 'C', type: 'qa' }), 'task_004');
  });

  test('record is detached from the tracker', () => {
    const tracker = newTracker();
    const id = tracker.submit({ title: 'A', type: 'qa' });
    const record = tracker.toRecord();
    record.tasks[0].title = 'changed';
    assert.strictEqual(tracker.status(id).title, 'A');
  });

  test('rejects malformed records', () => {
    assert.throws(
      () => TaskTracker.fromRecord({ version: 2, nextSeq: 1, tasks: [] }),
      InvalidRecordError
    );

    const tracker = newTracker();
    const id = tracker.submit({ title: 'A', type: 'qa' });
    const record = tracker.toRecord();
    record.tasks[0].blockers = ['orphan blocker'];

    assert.throws(
      () => TaskTracker.fromRecord(record),
      (error: unknown) => {
        assert.ok(error instanceof InvalidRecordError);
        assert.deepStrictEqual(error.issues, ['tasks.0.state: a task with blockers must be blocked']);
        return true;
      }
    );
    assert.strictEqual(id, 'task_001');
  });

  test('uses the policy of the config it is restored with', () => {
    const tracker = newTracker();
    const a = tracker.submit({ title: 'A', type: 'reviewer' });
    const b = tracker.submit({ title: 'B', type: 'coder' }, [a]);
    tracker.transition(a, 'reviewing');

    const loose = mergeConfig(getDefaultConfig(), { satisfiedStates: ['reviewing', 'complete'] });
    const restored = TaskTracker.fromRecord(tracker.toRecord(), loose);
    assert.deepStrictEqual(restored.ready(), [b]);
    assert.deepStrictEqual(tracker.ready(), []);
  });
});
