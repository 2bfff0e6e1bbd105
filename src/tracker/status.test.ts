import assert from 'node:assert';
import { describe, test } from 'node:test';
import { getDefaultConfig } from '../config/loader.js';
import { calculateProgress } from './status.js';
import { TaskTracker } from './tracker.js';

describe('calculateProgress', () => {
  test('new tasks have no progress even with gates passed', () => {
    const tracker = new TaskTracker(getDefaultConfig());
    const id = tracker.submit({ title: 'A', type: 'coder' });
    tracker.setGate(id, 'tests_passing', true);
    assert.strictEqual(tracker.status(id).progress, 0);
  });

  test('adds a share of the gate bonus', () => {
    const tracker = new TaskTracker(getDefaultConfig());
    const id = tracker.submit({ title: 'A', type: 'coder' });
    tracker.transition(id, 'implementing');
    assert.strictEqual(tracker.status(id).progress, 50);

    tracker.setGate(id, 'tests_passing', true);
    assert.strictEqual(tracker.status(id).progress, 55);
  });

  test('caps at 100', () => {
    const tracker = new TaskTracker(getDefaultConfig());
    const id = tracker.submit({ title: 'A', type: 'qa' });
    tracker.transition(id, 'testing');
    tracker.setGate(id, 'qa_validated', true);
    assert.strictEqual(tracker.status(id).progress, 95);

    tracker.transition(id, 'complete');
    const record = tracker.toRecord();
    assert.strictEqual(calculateProgress(record.tasks[0]), 100);
  });
});

describe('teamStatus', () => {
  test('empty tracker', () => {
    const status = new TaskTracker(getDefaultConfig()).teamStatus();
    assert.strictEqual(status.totalTasks, 0);
    assert.strictEqual(status.completionRate, 0);
    assert.deepStrictEqual(status.byState, {});
    assert.deepStrictEqual(status.escalations, []);
  });

  test('projects counts over the task set', () => {
    const tracker = new TaskTracker(getDefaultConfig());
    const design = tracker.submit({ title: 'Design', type: 'reviewer', priority: 'high' });
    const api = tracker.submit({ title: 'API', type: 'coder', parallelGroup: 'build' }, [design]);
    const ui = tracker.submit({ title: 'UI', type: 'coder', parallelGroup: 'build' }, [design]);
    const qa = tracker.submit({ title: 'QA', type: 'qa', maxIterations: 0 });

    tracker.transition(design, 'reviewing');
    tracker.setGate(design, 'review_approved', true);
    tracker.transition(design, 'complete');
    tracker.transition(api, 'implementing', { assignee: 'backend' });
    tracker.addBlocker(ui, 'design tokens missing');
    tracker.addBlocker(ui, 'icons missing');
    tracker.transition(qa, 'testing');
    tracker.transition(qa, 'iteration');

    const status = tracker.teamStatus();
    assert.strictEqual(status.totalTasks, 4);
    assert.deepStrictEqual(status.byState, {
      complete: 1,
      implementing: 1,
      blocked: 1,
      iteration: 1,
    });
    assert.deepStrictEqual(status.byType, { reviewer: 1, coder: 2, qa: 1 });
    assert.deepStrictEqual(status.byPriority, { high: 1, medium: 3 });
    assert.deepStrictEqual(status.byAssignee, { reviewer: 1, backend: 1, coder: 1, qa: 1 });
    assert.strictEqual(status.activeBlockers, 2);
    assert.strictEqual(status.completedTasks, 1);
    assert.strictEqual(status.inProgress, 2);
    assert.strictEqual(status.readyToStart, 0);
    assert.strictEqual(status.parallelGroups, 0);
    assert.deepStrictEqual(status.escalations, [qa]);
    assert.strictEqual(status.completionRate, 0.25);
  });

  test('counts ready tasks and only labeled groups', () => {
    const tracker = new TaskTracker(getDefaultConfig());
    tracker.submit({ title: 'A', type: 'docs', parallelGroup: 'docs' });
    tracker.submit({ title: 'B', type: 'docs', parallelGroup: 'docs' });
    tracker.submit({ title: 'C', type: 'coder' });
    tracker.submit({ title: 'D', type: 'qa' });

    const status = tracker.teamStatus();
    assert.strictEqual(status.readyToStart, 4);
    assert.strictEqual(tracker.parallelGroups().length, 3);
    assert.strictEqual(status.parallelGroups, 1);
    assert.strictEqual(status.inProgress, 0);
  });
});
