export function toPosixPath(p: string): string {
  return String(p).replace(/\\/g, '/');
}

export function splitPosixPath(p: string): string[] {
  return toPosixPath(p).split('/').filter(Boolean);
}

export function isRustSource(p: string): boolean {
  return toPosixPath(p).endsWith('.rs');
}

export function isExcludedPath(p: string, excludePrefixes: readonly string[]): boolean {
  const posix = toPosixPath(p).replace(/^\.\//, '');
  return excludePrefixes.some((prefix) => posix.startsWith(prefix) || posix.includes(`/${prefix}`));
}

/**
 * Module path a file contributes to. Library roots and binary targets get
 * distinct roots so a bin and a lib in one package never share keys.
 *
 * `src/lib.rs` -> `crate`, `src/net/mod.rs` -> `crate::net`,
 * `src/main.rs` -> `main`, `src/bin/tool.rs` -> `bin::tool`,
 * `crates/wire-codec/src/frame.rs` -> `wire_codec::frame`,
 * `crates/wire-codec/src/main.rs` -> `wire_codec::main`,
 * `tests/smoke.rs` -> `tests::smoke`.
 */
export function moduleFromFilePath(file: string): string {
  const parts = splitPosixPath(file.replace(/\.rs$/, ''));
  const srcIdx = parts.lastIndexOf('src');
  let root: string[] = [];
  let rest = srcIdx >= 0 ? parts.slice(srcIdx + 1) : parts;
  if (srcIdx >= 0) {
    const crateDir = parts.slice(0, srcIdx);
    const isBinary = (rest.length === 1 && rest[0] === 'main') || (rest.length > 1 && rest[0] === 'bin');
    if (rest.length === 1 && rest[0] === 'lib') rest = [];
    // src/bin/tool/main.rs is the root of the `tool` binary
    if (rest.length > 2 && rest[0] === 'bin' && rest[rest.length - 1] === 'main') rest = rest.slice(0, -1);
    if (crateDir.length > 0) root = [crateDir[crateDir.length - 1].replace(/-/g, '_')];
    else if (!isBinary) root = ['crate'];
  }
  if (rest.length > 0 && rest[rest.length - 1] === 'mod') rest = rest.slice(0, -1);
  const segments = [...root, ...rest];
  return segments.length > 0 ? segments.join('::') : 'crate';
}
