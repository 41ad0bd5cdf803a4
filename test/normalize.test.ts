import test from 'node:test';
import assert from 'node:assert/strict';
import { joinTokens } from '../src/core/parser/utils';
import { normalizeFloatLiteral, normalizeIntegerLiteral, normalizeQuotedLiteral } from '../src/core/parser/body';
import { isExcludedPath, moduleFromFilePath } from '../src/core/paths';
import { mergeDiffConfig } from '../src/core/config';
import { compareStrings, keyToString } from '../src/core/keys';

test('joinTokens applies fixed spacing and drops trailing commas', () => {
  assert.equal(joinTokens(['fn', 'f', '(', 'x', ':', 'u8', ',', ')', '->', 'u8']), 'fn f(x: u8) -> u8');
  assert.equal(joinTokens(['Vec', '<', 'T', '>']), 'Vec<T>');
  assert.equal(joinTokens(['&', "'a", 'str']), "&'a str");
  assert.equal(joinTokens(['std', '::', 'io', '::', 'Result']), 'std::io::Result');
  assert.equal(joinTokens(['struct', 'P', '{', 'x', ':', 'i32', ',', '}']), 'struct P { x: i32 }');
  assert.equal(joinTokens(['a', ',']), 'a');
});

test('integer literals compare by value', () => {
  assert.equal(normalizeIntegerLiteral('1_000u32'), '1000');
  assert.equal(normalizeIntegerLiteral('0xFFu8'), '255');
  assert.equal(normalizeIntegerLiteral('0b1010'), '10');
  assert.equal(normalizeIntegerLiteral('0o17'), '15');
  assert.equal(normalizeIntegerLiteral('42usize'), '42');
});

test('float literals lose separators and suffixes', () => {
  assert.equal(normalizeFloatLiteral('1_000.5f64'), '1000.5');
  assert.equal(normalizeFloatLiteral('2.0f32'), '2.0');
  assert.equal(normalizeFloatLiteral('1e10'), '1e10');
});

test('quoted literals keep content and byte prefixes', () => {
  assert.equal(normalizeQuotedLiteral('"abc"', '"'), 'abc');
  assert.equal(normalizeQuotedLiteral('r#"abc"#', '"'), 'abc');
  assert.equal(normalizeQuotedLiteral('b"x"', '"'), 'b"x"');
  assert.equal(normalizeQuotedLiteral('br"x"', '"'), 'b"x"');
  assert.equal(normalizeQuotedLiteral("'a'", "'"), 'a');
  assert.equal(normalizeQuotedLiteral("b'a'", "'"), "b'a'");
});

test('moduleFromFilePath maps files to module paths', () => {
  assert.equal(moduleFromFilePath('src/lib.rs'), 'crate');
  assert.equal(moduleFromFilePath('src/main.rs'), 'main');
  assert.equal(moduleFromFilePath('src/bin/tool.rs'), 'bin::tool');
  assert.equal(moduleFromFilePath('src/bin/tool/main.rs'), 'bin::tool');
  assert.equal(moduleFromFilePath('crates/wire-codec/src/main.rs'), 'wire_codec::main');
  assert.equal(moduleFromFilePath('src/net/mod.rs'), 'crate::net');
  assert.equal(moduleFromFilePath('src/net/tcp.rs'), 'crate::net::tcp');
  assert.equal(moduleFromFilePath('crates/wire-codec/src/frame.rs'), 'wire_codec::frame');
  assert.equal(moduleFromFilePath('crates/wire-codec/src/lib.rs'), 'wire_codec');
  assert.equal(moduleFromFilePath('tests/smoke.rs'), 'tests::smoke');
  assert.equal(moduleFromFilePath('build.rs'), 'build');
});

test('isExcludedPath matches prefixes at any directory level', () => {
  assert.equal(isExcludedPath('target/debug/build.rs', ['target/']), true);
  assert.equal(isExcludedPath('crates/a/target/gen.rs', ['target/']), true);
  assert.equal(isExcludedPath('src/targets.rs', ['target/']), false);
  assert.equal(isExcludedPath('src/lib.rs', []), false);
});

test('mergeDiffConfig clamps values and normalizes prefixes', () => {
  const cfg = mergeDiffConfig({ concurrency: 0, maxFileBytes: 2.7, excludePrefixes: ['vendor', './gen/', ' '] });
  assert.equal(cfg.concurrency, 1);
  assert.equal(cfg.maxFileBytes, 2);
  assert.deepEqual(cfg.excludePrefixes, ['vendor/', 'gen/']);
  assert.deepEqual(mergeDiffConfig().excludePrefixes, ['target/']);
  assert.ok(mergeDiffConfig().concurrency >= 1);
});

test('keys order by code unit', () => {
  assert.equal(compareStrings('B', 'a'), -1);
  assert.equal(compareStrings('a', 'a'), 0);
  assert.equal(keyToString({ module: 'crate', kind: 'method', owner: 'S', name: 'f' }), 'method|crate|S|f');
  assert.equal(keyToString({ module: 'crate', kind: 'function', name: 'f' }), 'function|crate||f');
});
