import test from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import { DiffSchema, EntitiesSchema } from '../src/cli/schemas/diffSchemas';
import { configFromInput } from '../src/cli/handlers/diffHandlers';
import { errorFromException, runCommand } from '../src/cli/types';
import { SnapshotUnavailableError } from '../src/core/errors';

test('DiffSchema fills defaults', () => {
  assert.deepEqual(DiffSchema.parse({ branch: 'main', commit: 'abc123' }), {
    branch: 'main',
    commit: 'abc123',
    path: '.',
    out: 'output',
    exclude: [],
    write: true,
  });
});

test('DiffSchema coerces numeric options and rejects bad ones', () => {
  const parsed = DiffSchema.parse({ branch: 'main', commit: 'abc', concurrency: '4', write: false });
  assert.equal(parsed.concurrency, 4);
  assert.equal(parsed.write, false);
  assert.throws(() => DiffSchema.parse({ branch: 'main', commit: 'abc', concurrency: '0' }));
  assert.throws(() => DiffSchema.parse({ branch: '', commit: 'abc' }));
});

test('EntitiesSchema restricts kinds', () => {
  assert.equal(EntitiesSchema.parse({ rev: 'HEAD', kind: 'trait' }).kind, 'trait');
  assert.throws(() => EntitiesSchema.parse({ rev: 'HEAD', kind: 'macro' }));
});

test('configFromInput extends the default exclusions', () => {
  assert.deepEqual(configFromInput({ exclude: ['vendor/'], concurrency: 2 }), {
    excludePrefixes: ['target/', 'vendor/'],
    concurrency: 2,
  });
  assert.deepEqual(configFromInput({ exclude: [] }), { excludePrefixes: ['target/'] });
});

test('domain errors map to CLI reasons', () => {
  const out = errorFromException(new SnapshotUnavailableError('cannot resolve nope', { rev: 'nope' }));
  assert.equal(out.ok, false);
  assert.equal(out.reason, 'snapshot_unavailable');
  assert.equal(out.message, 'cannot resolve nope');
  assert.deepEqual(out.details, { rev: 'nope' });
  assert.throws(() => errorFromException(new Error('boom')), /boom/);
});

test('runCommand reports unknown commands and invalid input', async () => {
  const unknown = await runCommand('nope', {});
  assert.equal(unknown.exitCode, 1);
  assert.equal(unknown.outcome.ok, false);
  assert.equal(unknown.outcome.reason, 'unknown_command');

  const invalid = await runCommand('diff', { branch: '', commit: 'abc' });
  assert.equal(invalid.exitCode, 1);
  assert.equal(invalid.outcome.reason, 'validation_error');
  assert.equal(invalid.outcome.command, 'diff');
});

test('runCommand returns handler errors with exit code 2', async () => {
  const missing = path.join(os.tmpdir(), `rust-ast-diff-cli-${process.pid}-${Date.now()}`);
  const res = await runCommand('entities', { rev: 'HEAD', path: missing });
  assert.equal(res.exitCode, 2);
  assert.equal(res.outcome.ok, false);
  assert.equal(res.outcome.reason, 'repo_not_found');
  assert.equal(res.outcome.hint, 'Pass --repo-url to clone, or point --path at an existing git checkout');
});
