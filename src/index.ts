export * from './core/types';
export { analyzeRepository, analyzeTrees, snapshotRevision } from './core/analyze';
export type { AnalyzeRepositoryOptions, AnalyzeRepositoryResult, AnalyzeTreesOptions, TreeInput } from './core/analyze';
export { buildSnapshot, mergeExtractions } from './core/snapshot/builder';
export { diffSnapshots, compareRecords, requireSnapshot } from './core/diff/matcher';
export { attachGranularDiffs, diffMultiset, granularDiff } from './core/diff/granular';
export { assembleReport } from './core/report/assembler';
export type { ChangeReport, FileChanges, GranularEntry, ReportWarning } from './core/report/assembler';
export { REPORT_FILES, renderReportFiles, writeReportFiles } from './core/report/writer';
export { RustEntityExtractor } from './core/parser/rust';
export type { EntityExtractor } from './core/parser/adapter';
export { defaultDiffConfig, mergeDiffConfig } from './core/config';
export type { DiffConfig } from './core/config';
export { AstDiffError, InternalInconsistencyError, SnapshotUnavailableError } from './core/errors';
export { createLogger, silentLogger } from './core/log';
export type { Logger } from './core/log';
