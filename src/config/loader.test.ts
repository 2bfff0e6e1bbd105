import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, test } from 'node:test';
import { ConfigError } from '../graph/errors.js';
import {
  allowedNextStates,
  getDefaultConfig,
  loadConfig,
  parseConfigOverride,
  requiredGatesFor,
} from './loader.js';

describe('Default Configuration', () => {
  test('caps iterations at 3 and requires complete dependencies', () => {
    const config = getDefaultConfig();
    assert.strictEqual(config.maxIterations, 3);
    assert.deepStrictEqual(config.pendingStates, ['new']);
    assert.deepStrictEqual(config.satisfiedStates, ['complete']);
  });

  test('coder chain goes through review before completion', () => {
    const config = getDefaultConfig();
    assert.deepStrictEqual(allowedNextStates(config, 'coder', 'new'), [
      'analyzing',
      'implementing',
    ]);
    assert.deepStrictEqual(allowedNextStates(config, 'coder', 'reviewing'), [
      'testing',
      'iteration',
      'complete',
    ]);
  });

  test('bug chain starts with debugging', () => {
    const config = getDefaultConfig();
    assert.deepStrictEqual(allowedNextStates(config, 'debug', 'new'), ['debugging']);
    assert.deepStrictEqual(allowedNextStates(config, 'debug', 'debugging'), ['implementing']);
  });

  test('unlisted states allow nothing', () => {
    assert.deepStrictEqual(allowedNextStates(getDefaultConfig(), 'qa', 'implementing'), []);
  });

  test('required gates per type', () => {
    const config = getDefaultConfig();
    assert.deepStrictEqual(requiredGatesFor(config, 'coder'), ['tests_passing', 'review_approved']);
    assert.deepStrictEqual(requiredGatesFor(config, 'qa'), ['qa_validated']);
  });
});

describe('Config File Loading', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'tl-config-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test('merges scalars and replaces listed task types', () => {
    const path = join(tempDir, 'config.yaml');
    writeFileSync(
      path,
      [
        'maxIterations: 5',
        'transitions:',
        '  qa:',
        '    new: [testing]',
        '    testing: [complete]',
        'dispatch:',
        '  maxConcurrency: 2',
      ].join('\n')
    );

    const config = loadConfig(path);

    assert.strictEqual(config.maxIterations, 5);
    assert.deepStrictEqual(allowedNextStates(config, 'qa', 'testing'), ['complete']);
    assert.deepStrictEqual(allowedNextStates(config, 'qa', 'iteration'), []);
    // Types not listed keep their defaults
    assert.deepStrictEqual(allowedNextStates(config, 'debug', 'new'), ['debugging']);
    assert.strictEqual(config.dispatch.maxConcurrency, 2);
    assert.strictEqual(config.dispatch.maxRounds, 20);
  });

  test('missing optional file falls back to defaults', () => {
    const config = loadConfig(join(tempDir, 'absent.yaml'), false);
    assert.strictEqual(config, getDefaultConfig());
  });

  test('missing required file throws', () => {
    assert.throws(() => loadConfig(join(tempDir, 'absent.yaml')), /ENOENT/);
  });

  test('empty file is an empty override', () => {
    assert.deepStrictEqual(parseConfigOverride('', 'empty.yaml'), {});
  });

  test('rejects unknown states with the offending path', () => {
    assert.throws(
      () => parseConfigOverride('pendingStates: [waiting]', 'bad.yaml'),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.strictEqual(error.path, 'bad.yaml');
        assert.ok(error.issues[0].startsWith('pendingStates.0:'));
        return true;
      }
    );
  });

  test('rejects unknown top-level keys', () => {
    assert.throws(() => parseConfigOverride('maxAgents: 3', 'bad.yaml'), ConfigError);
  });

  test('rejects a pending state that also satisfies dependencies', () => {
    const path = join(tempDir, 'config.yaml');
    writeFileSync(path, 'pendingStates: [new]\nsatisfiedStates: [new, complete]\n');

    assert.throws(
      () => loadConfig(path),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.deepStrictEqual(error.issues, [
          'satisfiedStates: new cannot both be pending and satisfy dependencies',
        ]);
        return true;
      }
    );
  });

  test('rejects leaving a pending state straight for complete or blocked', () => {
    const path = join(tempDir, 'config.yaml');
    writeFileSync(
      path,
      ['transitions:', '  reviewer:', '    new: [complete, reviewing, blocked]'].join('\n')
    );

    assert.throws(
      () => loadConfig(path),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.deepStrictEqual(error.issues, [
          'transitions.reviewer.new: a task cannot move from new straight to complete',
          'transitions.reviewer.new: a task cannot move from new straight to blocked',
        ]);
        return true;
      }
    );
  });
});
