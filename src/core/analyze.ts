import path from 'path';
import { mergeDiffConfig, type DiffConfig } from './config';
import { attachGranularDiffs } from './diff/granular';
import { diffSnapshots } from './diff/matcher';
import { loadTreeState, prepareRepository } from './git';
import type { Logger } from './log';
import { silentLogger } from './log';
import type { EntityExtractor } from './parser/adapter';
import { assembleReport, type ChangeReport } from './report/assembler';
import { writeReportFiles } from './report/writer';
import { buildSnapshot } from './snapshot/builder';
import type { Snapshot, SourceFile } from './types';

export interface TreeInput {
  commit: string;
  files: readonly SourceFile[];
}

export interface AnalyzeTreesOptions {
  config?: Partial<DiffConfig>;
  extractor?: EntityExtractor;
  logger?: Logger;
}

/** Compare two in-memory trees. Both snapshots are complete before any comparison starts. */
export async function analyzeTrees(base: TreeInput, target: TreeInput, options: AnalyzeTreesOptions = {}): Promise<ChangeReport> {
  const log = options.logger ?? silentLogger;
  const config = mergeDiffConfig(options.config);

  const baseSnapshot = await log.span('snapshot_base', { commit: base.commit, files: base.files.length }, () =>
    buildSnapshot({ commit: base.commit, files: base.files, config, extractor: options.extractor, logger: log }),
  );
  const targetSnapshot = await log.span('snapshot_target', { commit: target.commit, files: target.files.length }, () =>
    buildSnapshot({ commit: target.commit, files: target.files, config, extractor: options.extractor, logger: log }),
  );

  const changes = attachGranularDiffs(diffSnapshots(baseSnapshot, targetSnapshot), baseSnapshot, targetSnapshot);
  return assembleReport(changes, { base: baseSnapshot, target: targetSnapshot });
}

export interface AnalyzeRepositoryOptions {
  /** Local checkout; cloned from `repoUrl` when missing. */
  localPath: string;
  repoUrl?: string;
  /** Base revision, usually a branch name. */
  branch: string;
  /** Target revision. */
  commit: string;
  /** When set, the report files are written here. */
  outDir?: string;
  config?: Partial<DiffConfig>;
  logger?: Logger;
}

export interface AnalyzeRepositoryResult {
  report: ChangeReport;
  repoRoot: string;
  warnings: string[];
  written: string[];
}

export async function analyzeRepository(options: AnalyzeRepositoryOptions): Promise<AnalyzeRepositoryResult> {
  const log = (options.logger ?? silentLogger).child({ command: 'diff' });
  const config = mergeDiffConfig(options.config);
  const prepared = await prepareRepository({ localPath: options.localPath, repoUrl: options.repoUrl, logger: log });

  const treeOptions = { excludePrefixes: config.excludePrefixes, concurrency: config.concurrency, logger: log };
  const baseTree = await loadTreeState(prepared.repoRoot, options.branch, treeOptions);
  const targetTree = await loadTreeState(prepared.repoRoot, options.commit, treeOptions);

  const report = await analyzeTrees(
    { commit: baseTree.commit, files: baseTree.files },
    { commit: targetTree.commit, files: targetTree.files },
    { config, logger: log },
  );

  const written = options.outDir ? await writeReportFiles(report, path.resolve(options.outDir)) : [];
  log.info('diff_complete', {
    base: report.baseCommit,
    target: report.targetCommit,
    changes: report.all.length,
    warnings: report.warnings.length,
  });
  return { report, repoRoot: prepared.repoRoot, warnings: prepared.warnings, written };
}

export interface ListEntitiesOptions {
  localPath: string;
  rev: string;
  config?: Partial<DiffConfig>;
  logger?: Logger;
}

/** Snapshot of a single revision of an existing checkout. */
export async function snapshotRevision(options: ListEntitiesOptions): Promise<Snapshot> {
  const log = options.logger ?? silentLogger;
  const config = mergeDiffConfig(options.config);
  const prepared = await prepareRepository({ localPath: options.localPath, logger: log });
  const tree = await loadTreeState(prepared.repoRoot, options.rev, {
    excludePrefixes: config.excludePrefixes,
    concurrency: config.concurrency,
    logger: log,
  });
  return buildSnapshot({ commit: tree.commit, files: tree.files, config, logger: log });
}
