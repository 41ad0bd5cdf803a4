import { analyzeRepository, snapshotRevision } from '../../core/analyze';
import { defaultDiffConfig, type DiffConfig } from '../../core/config';
import type { Logger } from '../../core/log';
import { createLogger } from '../../core/log';
import type { EntitiesInput, DiffInput } from '../schemas/diffSchemas';
import type { CLIOutcome } from '../types';
import { errorFromException, success } from '../types';

export function configFromInput(input: { concurrency?: number; maxFileBytes?: number; exclude: string[] }): Partial<DiffConfig> {
  const config: Partial<DiffConfig> = {
    excludePrefixes: [...defaultDiffConfig().excludePrefixes, ...input.exclude],
  };
  if (input.concurrency !== undefined) config.concurrency = input.concurrency;
  if (input.maxFileBytes !== undefined) config.maxFileBytes = input.maxFileBytes;
  return config;
}

export async function handleDiff(input: DiffInput, logger: Logger = createLogger({ component: 'cli' })): Promise<CLIOutcome> {
  try {
    const result = await analyzeRepository({
      localPath: input.path,
      repoUrl: input.repoUrl,
      branch: input.branch,
      commit: input.commit,
      outDir: input.write ? input.out : undefined,
      config: configFromInput(input),
      logger,
    });
    const { report } = result;
    return success({
      repoRoot: result.repoRoot,
      baseCommit: report.baseCommit,
      targetCommit: report.targetCommit,
      summary: report.summary,
      files: report.files,
      parseFailures: report.warnings.length,
      written: result.written,
      ...(result.warnings.length ? { gitWarnings: result.warnings } : {}),
    });
  } catch (e) {
    return errorFromException(e);
  }
}

export async function handleEntities(input: EntitiesInput, logger: Logger = createLogger({ component: 'cli' })): Promise<CLIOutcome> {
  try {
    const snapshot = await snapshotRevision({
      localPath: input.path,
      rev: input.rev,
      config: configFromInput(input),
      logger,
    });
    const entities = Array.from(snapshot.entities.values())
      .filter((rec) => !input.kind || rec.kind === input.kind)
      .map((rec) => ({
        kind: rec.kind,
        module: rec.key.module,
        ...(rec.key.owner ? { owner: rec.key.owner } : {}),
        name: rec.key.name,
        signature: rec.signature,
        span: rec.span,
      }));
    return success({
      commit: snapshot.commit,
      files: snapshot.files.size,
      entities,
      parseFailures: snapshot.parseFailures,
    });
  } catch (e) {
    return errorFromException(e);
  }
}
