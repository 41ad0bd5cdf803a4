import test from 'node:test';
import assert from 'node:assert/strict';
import { buildSnapshot } from '../src/core/snapshot/builder';
import { diffSnapshots, requireSnapshot } from '../src/core/diff/matcher';
import { SnapshotUnavailableError } from '../src/core/errors';
import { displayName } from '../src/core/keys';
import type { ChangeRecord, SourceFile } from '../src/core/types';

const snap = (commit: string, files: SourceFile[]) => buildSnapshot({ commit, files, config: { concurrency: 2 } });

const summarize = (changes: ChangeRecord[]) =>
  changes.map((c) => `${c.change} ${c.key.kind} ${c.key.module} ${displayName(c.key)}`);

test('formatting and comment changes produce no records', async () => {
  const base = await snap('b', [{ path: 'src/lib.rs', content: 'pub fn add(a:i32,b:i32)->i32{a+b}\npub struct P{x:i32}\n' }]);
  const target = await snap('t', [
    {
      path: 'src/lib.rs',
      content: '// math\npub fn add(\n    a: i32,\n    b: i32,\n) -> i32 {\n    a + b // sum\n}\n\npub struct P {\n    x: i32,\n}\n',
    },
  ]);
  assert.deepEqual(diffSnapshots(base, target), []);
});

test('identical snapshots produce no records', async () => {
  const files = [{ path: 'src/lib.rs', content: 'fn a() { b(1) }\ntrait T { fn m(&self); }\n' }];
  assert.deepEqual(diffSnapshots(await snap('b', files), await snap('t', files)), []);
});

test('a rename is a removal plus an addition', async () => {
  const base = await snap('b', [{ path: 'src/lib.rs', content: 'fn old_name() -> u8 { 1 }\n' }]);
  const target = await snap('t', [{ path: 'src/lib.rs', content: 'fn new_name() -> u8 { 1 }\n' }]);
  assert.deepEqual(summarize(diffSnapshots(base, target)), [
    'added function crate new_name',
    'removed function crate old_name',
  ]);
});

test('a trait gaining a method adds only the method', async () => {
  const base = await snap('b', [{ path: 'src/shape.rs', content: 'pub trait Shape { fn area(&self) -> f64; }\n' }]);
  const target = await snap('t', [
    { path: 'src/shape.rs', content: 'pub trait Shape {\n    fn area(&self) -> f64;\n    fn perimeter(&self) -> f64;\n}\n' },
  ]);
  const changes = diffSnapshots(base, target);
  assert.deepEqual(summarize(changes), ['added method crate::shape Shape.perimeter']);
  const [added] = changes;
  assert.equal(added.change, 'added');
  assert.equal(added.newSignature, 'fn perimeter(&self) -> f64;');
  assert.equal(added.key.owner, 'Shape');
});

test('deleting a file removes every entity it defined', async () => {
  const kept = { path: 'src/b.rs', content: 'pub fn b() {}\n' };
  const base = await snap('b', [{ path: 'src/a.rs', content: 'pub fn a() {}\npub struct A;\nimpl A { fn m(&self) {} }\n' }, kept]);
  const target = await snap('t', [kept]);
  const changes = diffSnapshots(base, target);
  assert.deepEqual(summarize(changes), [
    'removed function crate::a a',
    'removed type crate::a A',
    'removed method crate::a A.m',
  ]);
  assert.ok(changes.every((c) => c.change === 'removed'));
});

test('signature and body changes are flagged separately', async () => {
  const base = await snap('b', [{ path: 'src/lib.rs', content: 'fn s(x: u8) -> u8 { x }\nfn t(x: u8) -> u8 { x }\n' }]);
  const target = await snap('t', [{ path: 'src/lib.rs', content: 'fn s(x: u16) -> u8 { x }\nfn t(x: u8) -> u8 { x + 1 }\n' }]);
  const changes = diffSnapshots(base, target);
  assert.equal(changes.length, 2);
  const [s, t] = changes;
  assert.ok(s.change === 'modified' && t.change === 'modified');
  assert.equal(s.key.name, 's');
  assert.deepEqual([s.signatureChanged, s.bodyChanged], [true, false]);
  assert.equal(s.oldSignature, 'fn s(x: u8) -> u8');
  assert.equal(s.newSignature, 'fn s(x: u16) -> u8');
  assert.equal(t.key.name, 't');
  assert.deepEqual([t.signatureChanged, t.bodyChanged], [false, true]);
});

test('records are grouped by kind and sorted by module, owner and name', async () => {
  const target = await snap('t', [
    { path: 'src/z.rs', content: 'pub fn z() {}\npub struct Z;\n' },
    { path: 'src/a.rs', content: 'pub trait Q { fn q(&self); }\npub fn b() {}\npub fn a() {}\n' },
  ]);
  const base = await snap('b', []);
  assert.deepEqual(summarize(diffSnapshots(base, target)), [
    'added function crate::a a',
    'added function crate::a b',
    'added function crate::z z',
    'added type crate::z Z',
    'added trait crate::a Q',
    'added method crate::a Q.q',
  ]);
});

test('type records keep their type kind', async () => {
  const base = await snap('b', [{ path: 'src/lib.rs', content: 'enum E { A }\n' }]);
  const target = await snap('t', [{ path: 'src/lib.rs', content: 'enum E { A, B }\n' }]);
  const [change] = diffSnapshots(base, target);
  assert.equal(change.change, 'modified');
  assert.equal(change.typeKind, 'enum');
  assert.equal(change.newSignature, 'enum E { A, B }');
});

test('a missing snapshot aborts the comparison', async () => {
  const target = await snap('t', []);
  assert.throws(() => diffSnapshots(null, target), SnapshotUnavailableError);
  assert.throws(() => requireSnapshot(undefined, 'target'), /target snapshot is unavailable/);
});
