import fs from 'fs-extra';
import path from 'path';
import { qualifiedName } from '../keys';
import type { ChangeRecord, EntityKey, GranularDiff, SourceSpan } from '../types';
import type { ChangeReport } from './assembler';

export const REPORT_FILES = {
  all: 'all_code_changes.json',
  functions: 'function_changes.json',
  types: 'type_changes.json',
  traits: 'interface_changes.json',
  methods: 'method_changes.json',
  granular: 'function_changes_granular.json',
} as const;

type KindView = 'functions' | 'types' | 'traits' | 'methods';

interface EntryBase {
  module: string;
  name: string;
  owner?: string;
  typeKind?: string;
}

export interface KindChangesFile {
  added: Array<EntryBase & { code: string; span: SourceSpan }>;
  modified: Array<EntryBase & { oldCode: string; newCode: string; signatureChanged: boolean; bodyChanged: boolean }>;
  deleted: Array<EntryBase & { code: string; span: SourceSpan }>;
}

export interface GranularPayload extends GranularDiff {
  oldSpan: SourceSpan;
  newSpan: SourceSpan;
}

/** file -> module-qualified entity name -> payload */
export type GranularFile = Record<string, Record<string, GranularPayload>>;

function entryBase(key: EntityKey, typeKind?: string): EntryBase {
  const out: EntryBase = { module: key.module, name: key.name };
  if (key.owner) out.owner = key.owner;
  if (typeKind) out.typeKind = typeKind;
  return out;
}

export function toKindChangesFile(changes: readonly ChangeRecord[]): KindChangesFile {
  const out: KindChangesFile = { added: [], modified: [], deleted: [] };
  for (const c of changes) {
    const base = entryBase(c.key, c.typeKind);
    switch (c.change) {
      case 'added':
        out.added.push({ ...base, code: c.newText, span: c.newSpan });
        break;
      case 'removed':
        out.deleted.push({ ...base, code: c.oldText, span: c.oldSpan });
        break;
      case 'modified':
        out.modified.push({
          ...base,
          oldCode: c.oldText,
          newCode: c.newText,
          signatureChanged: c.signatureChanged,
          bodyChanged: c.bodyChanged,
        });
        break;
    }
  }
  return out;
}

export function toGranularFile(report: ChangeReport): GranularFile {
  const out: GranularFile = {};
  for (const entry of report.granular) {
    const file = entry.newSpan.file;
    const perFile = out[file] ?? (out[file] = {});
    perFile[qualifiedName(entry.key)] = { ...entry.diff, oldSpan: entry.oldSpan, newSpan: entry.newSpan };
  }
  return out;
}

/** File name -> rendered JSON for every report file. */
export function renderReportFiles(report: ChangeReport): Record<string, string> {
  const render = (value: unknown): string => JSON.stringify(value, null, 2) + '\n';
  const out: Record<string, string> = {
    [REPORT_FILES.all]: render({
      baseCommit: report.baseCommit,
      targetCommit: report.targetCommit,
      summary: report.summary,
      files: report.files,
      changes: report.all,
      warnings: report.warnings,
    }),
    [REPORT_FILES.granular]: render(toGranularFile(report)),
  };
  const views: KindView[] = ['functions', 'types', 'traits', 'methods'];
  for (const view of views) out[REPORT_FILES[view]] = render(toKindChangesFile(report[view]));
  return out;
}

export async function writeReportFiles(report: ChangeReport, outDir: string): Promise<string[]> {
  await fs.ensureDir(outDir);
  const written: string[] = [];
  for (const [name, rendered] of Object.entries(renderReportFiles(report))) {
    const target = path.join(outDir, name);
    const tmp = path.join(outDir, `${name}.tmp-${process.pid}-${Date.now()}`);
    await fs.writeFile(tmp, rendered, 'utf-8');
    await fs.move(tmp, target, { overwrite: true });
    written.push(target);
  }
  return written.sort();
}
