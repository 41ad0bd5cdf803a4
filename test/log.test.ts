import test from 'node:test';
import assert from 'node:assert/strict';
import { createLogger, parseLogThreshold, serializeError } from '../src/core/log';
import { AstDiffError } from '../src/core/errors';

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null;

test('parseLogThreshold accepts levels and silence', () => {
  assert.equal(parseLogThreshold(undefined), 'info');
  assert.equal(parseLogThreshold(' DEBUG '), 'debug');
  assert.equal(parseLogThreshold('off'), 'silent');
  assert.equal(parseLogThreshold('verbose'), 'info');
});

test('records below the threshold are dropped and child fields are bound', () => {
  const lines: string[] = [];
  const log = createLogger({ component: 'test' }, { threshold: 'warn', write: (l) => lines.push(l) });
  log.info('hidden');
  log.child({ file: 'src/lib.rs' }).warn('parse_failure', { reason: 'syntax_error' });
  assert.equal(lines.length, 1);
  const rec: unknown = JSON.parse(lines[0]);
  assert.ok(isRecord(rec));
  const { ts, ...rest } = rec;
  assert.equal(typeof ts, 'string');
  assert.deepEqual(rest, { level: 'warn', msg: 'parse_failure', component: 'test', file: 'src/lib.rs', reason: 'syntax_error' });
});

test('span rethrows and logs failures', async () => {
  const lines: string[] = [];
  const log = createLogger({}, { threshold: 'info', write: (l) => lines.push(l) });
  await assert.rejects(
    log.span('step', {}, async () => {
      throw new AstDiffError('SNAPSHOT_UNAVAILABLE', 'gone');
    }),
    /gone/,
  );
  assert.equal(lines.length, 1);
  assert.match(lines[0], /"ok":false/);
  assert.deepEqual(serializeError(new AstDiffError('SNAPSHOT_UNAVAILABLE', 'gone'))?.code, 'SNAPSHOT_UNAVAILABLE');
});
