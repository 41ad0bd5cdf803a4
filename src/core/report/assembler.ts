import { compareStrings, displayName } from '../keys';
import type {
  ChangeKind,
  ChangeRecord,
  EntityKey,
  EntityKind,
  GranularDiff,
  ModifiedChange,
  ParseFailure,
  Snapshot,
  SourceSpan,
} from '../types';

export interface GranularEntry {
  key: EntityKey;
  name: string;
  oldSpan: SourceSpan;
  newSpan: SourceSpan;
  diff: GranularDiff;
}

export interface FileChanges {
  /** Present only in the target tree. */
  added: string[];
  /** Present only in the base tree. */
  removed: string[];
}

export interface ReportWarning extends ParseFailure {
  snapshot: 'base' | 'target';
}

export type ChangeCounts = Record<EntityKind, Record<ChangeKind, number>>;

export interface ChangeReport {
  baseCommit: string;
  targetCommit: string;
  all: ChangeRecord[];
  functions: ChangeRecord[];
  types: ChangeRecord[];
  traits: ChangeRecord[];
  methods: ChangeRecord[];
  granular: GranularEntry[];
  files: FileChanges;
  summary: ChangeCounts;
  warnings: ReportWarning[];
}

export interface ReportContext {
  base: Snapshot;
  target: Snapshot;
}

function emptyCounts(): ChangeCounts {
  const zero = (): Record<ChangeKind, number> => ({ added: 0, removed: 0, modified: 0 });
  return { function: zero(), type: zero(), trait: zero(), method: zero() };
}

function fileChanges(base: Snapshot, target: Snapshot): FileChanges {
  const added = Array.from(target.files.keys()).filter((f) => !base.files.has(f));
  const removed = Array.from(base.files.keys()).filter((f) => !target.files.has(f));
  return { added: added.sort(compareStrings), removed: removed.sort(compareStrings) };
}

function hasGranular(change: ChangeRecord): change is ModifiedChange & { granular: GranularDiff } {
  return change.change === 'modified' && change.granular !== undefined;
}

/** Regroups an ordered change list into the report views. Performs no comparison. */
export function assembleReport(changes: readonly ChangeRecord[], context: ReportContext): ChangeReport {
  const byKind = (kind: EntityKind) => changes.filter((c) => c.key.kind === kind);
  const summary = emptyCounts();
  for (const c of changes) summary[c.key.kind][c.change]++;

  const granular: GranularEntry[] = changes.filter(hasGranular).map((c) => ({
    key: c.key,
    name: displayName(c.key),
    oldSpan: c.oldSpan,
    newSpan: c.newSpan,
    diff: c.granular,
  }));

  return {
    baseCommit: context.base.commit,
    targetCommit: context.target.commit,
    all: [...changes],
    functions: byKind('function'),
    types: byKind('type'),
    traits: byKind('trait'),
    methods: byKind('method'),
    granular,
    files: fileChanges(context.base, context.target),
    summary,
    warnings: [
      ...context.base.parseFailures.map((f): ReportWarning => ({ ...f, snapshot: 'base' })),
      ...context.target.parseFailures.map((f): ReportWarning => ({ ...f, snapshot: 'target' })),
    ],
  };
}
