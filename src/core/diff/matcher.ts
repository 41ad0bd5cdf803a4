import { SnapshotUnavailableError } from '../errors';
import { compareEntityKeys } from '../keys';
import type {
  ChangeRecord,
  EntityKind,
  EntityRecord,
  ModifiedChange,
  Snapshot,
  TypeKind,
} from '../types';
import { ENTITY_KINDS } from '../types';

export type SnapshotRole = 'base' | 'target';

export function requireSnapshot(snapshot: Snapshot | null | undefined, role: SnapshotRole): Snapshot {
  if (!snapshot) {
    throw new SnapshotUnavailableError(`${role} snapshot is unavailable; refusing to compare against a partial tree`, { role });
  }
  return snapshot;
}

function typeKindOf(rec: EntityRecord): TypeKind | undefined {
  return rec.kind === 'type' ? rec.typeKind : undefined;
}

function fingerprintOf(rec: EntityRecord): string | null {
  switch (rec.kind) {
    case 'function':
      return rec.body.fingerprint;
    case 'method':
      return rec.body ? rec.body.fingerprint : null;
    case 'type':
    case 'trait':
      return null;
  }
}

function recordsOfKind(snapshot: Snapshot, kind: EntityKind): Map<string, EntityRecord> {
  const out = new Map<string, EntityRecord>();
  for (const [k, rec] of snapshot.entities) {
    if (rec.kind === kind) out.set(k, rec);
  }
  return out;
}

/** Null when the pair is unchanged. */
export function compareRecords(oldRec: EntityRecord, newRec: EntityRecord): ModifiedChange | null {
  const signatureChanged = oldRec.signature !== newRec.signature;
  const bodyChanged = fingerprintOf(oldRec) !== fingerprintOf(newRec);
  if (!signatureChanged && !bodyChanged) return null;
  const change: ModifiedChange = {
    change: 'modified',
    key: newRec.key,
    oldSignature: oldRec.signature,
    newSignature: newRec.signature,
    oldText: oldRec.text,
    newText: newRec.text,
    signatureChanged,
    bodyChanged,
    oldSpan: oldRec.span,
    newSpan: newRec.span,
  };
  const typeKind = typeKindOf(newRec);
  if (typeKind) change.typeKind = typeKind;
  return change;
}

export function diffKind(kind: EntityKind, base: Snapshot, target: Snapshot): ChangeRecord[] {
  const before = recordsOfKind(base, kind);
  const after = recordsOfKind(target, kind);
  const out: ChangeRecord[] = [];

  for (const [k, oldRec] of before) {
    const newRec = after.get(k);
    if (!newRec) {
      const typeKind = typeKindOf(oldRec);
      out.push({
        change: 'removed',
        key: oldRec.key,
        ...(typeKind ? { typeKind } : {}),
        oldSignature: oldRec.signature,
        newSignature: null,
        oldText: oldRec.text,
        newText: null,
        oldSpan: oldRec.span,
      });
      continue;
    }
    const modified = compareRecords(oldRec, newRec);
    if (modified) out.push(modified);
  }

  for (const [k, newRec] of after) {
    if (before.has(k)) continue;
    const typeKind = typeKindOf(newRec);
    out.push({
      change: 'added',
      key: newRec.key,
      ...(typeKind ? { typeKind } : {}),
      oldSignature: null,
      newSignature: newRec.signature,
      oldText: null,
      newText: newRec.text,
      newSpan: newRec.span,
    });
  }

  return out.sort((a, b) => compareEntityKeys(a.key, b.key));
}

/**
 * Classify every entity of both snapshots. Records are grouped by kind
 * (function, type, trait, method) and sorted by module, owner and name within
 * a kind; unchanged entities produce no record.
 */
export function diffSnapshots(base: Snapshot | null | undefined, target: Snapshot | null | undefined): ChangeRecord[] {
  const b = requireSnapshot(base, 'base');
  const t = requireSnapshot(target, 'target');
  return ENTITY_KINDS.flatMap((kind) => diffKind(kind, b, t));
}
