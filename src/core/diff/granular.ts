import { InternalInconsistencyError } from '../errors';
import { callSiteIdentity, compareStrings, isCallableKind, keyToString, literalIdentity } from '../keys';
import type {
  BodyFacts,
  CallableRecord,
  ChangeRecord,
  EntityRecord,
  GranularDiff,
  ModifiedChange,
  Snapshot,
} from '../types';

export interface MultisetDiff<T> {
  added: T[];
  removed: T[];
}

/**
 * Count-aware comparison: for an identity seen b times before and t times
 * after, emits max(0, t - b) added and max(0, b - t) removed entries. Output
 * is ordered by identity ascending, one entry per unit of difference.
 */
export function diffMultiset<T>(before: readonly T[], after: readonly T[], identity: (item: T) => string): MultisetDiff<T> {
  const counts = new Map<string, { item: T; before: number; after: number }>();
  for (const item of before) {
    const id = identity(item);
    const entry = counts.get(id);
    if (entry) entry.before++;
    else counts.set(id, { item, before: 1, after: 0 });
  }
  for (const item of after) {
    const id = identity(item);
    const entry = counts.get(id);
    if (entry) entry.after++;
    else counts.set(id, { item, before: 0, after: 1 });
  }

  const added: T[] = [];
  const removed: T[] = [];
  const ids = Array.from(counts.keys()).sort(compareStrings);
  for (const id of ids) {
    const entry = counts.get(id);
    if (!entry) continue;
    for (let i = entry.before; i < entry.after; i++) added.push(entry.item);
    for (let i = entry.after; i < entry.before; i++) removed.push(entry.item);
  }
  return { added, removed };
}

const EMPTY_BODY: BodyFacts = { fingerprint: '', calls: [], literals: [] };

function assertCallable(rec: EntityRecord): CallableRecord {
  if (rec.kind !== 'function' && rec.kind !== 'method') {
    throw new InternalInconsistencyError(`granular diff requested for ${rec.kind} ${rec.key.name}`, {
      key: keyToString(rec.key),
    });
  }
  return rec;
}

export function granularDiff(oldRecord: EntityRecord, newRecord: EntityRecord): GranularDiff {
  const oldBody = assertCallable(oldRecord).body ?? EMPTY_BODY;
  const newBody = assertCallable(newRecord).body ?? EMPTY_BODY;
  const calls = diffMultiset(oldBody.calls, newBody.calls, callSiteIdentity);
  const literals = diffMultiset(oldBody.literals, newBody.literals, literalIdentity);
  return {
    addedCalls: calls.added,
    removedCalls: calls.removed,
    addedLiterals: literals.added,
    removedLiterals: literals.removed,
  };
}

/**
 * Copy of `changes` in which every modified function and method carries its
 * granular diff. Other records pass through untouched.
 */
export function attachGranularDiffs(changes: readonly ChangeRecord[], base: Snapshot, target: Snapshot): ChangeRecord[] {
  return changes.map((change) => {
    if (change.change !== 'modified') return change;
    if (!isCallableKind(change.key.kind)) return change;
    const k = keyToString(change.key);
    const oldRec = base.entities.get(k);
    const newRec = target.entities.get(k);
    if (!oldRec || !newRec) {
      throw new InternalInconsistencyError(`modified entity ${k} is missing from a snapshot`, { key: k });
    }
    const enriched: ModifiedChange = { ...change, granular: granularDiff(oldRec, newRec) };
    return enriched;
  });
}
