import type { CallSite, EntityKey, EntityKind, LiteralValue } from './types';

/** Code-unit comparison; unlike localeCompare it does not depend on the ICU build. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function keyToString(key: EntityKey): string {
  return `${key.kind}|${key.module}|${key.owner ?? ''}|${key.name}`;
}

/** Sort key within one kind: module path, then owner, then name. */
export function keySortString(key: EntityKey): string {
  return `${key.module}\u0000${key.owner ?? ''}\u0000${key.name}`;
}

export function compareEntityKeys(a: EntityKey, b: EntityKey): number {
  return compareStrings(keySortString(a), keySortString(b));
}

export function displayName(key: EntityKey): string {
  return key.owner ? `${key.owner}.${key.name}` : key.name;
}

/** `crate::net::Frame.new`; unique within a kind. */
export function qualifiedName(key: EntityKey): string {
  return `${key.module}::${displayName(key)}`;
}

export function callSiteIdentity(call: CallSite): string {
  return `${call.callee}/${call.argCount}`;
}

export function literalIdentity(lit: LiteralValue): string {
  return `${lit.kind}:${lit.value}`;
}

export function isCallableKind(kind: EntityKind): kind is 'function' | 'method' {
  return kind === 'function' || kind === 'method';
}
