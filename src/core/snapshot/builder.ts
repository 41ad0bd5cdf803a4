import { mergeDiffConfig, type DiffConfig } from '../config';
import { InternalInconsistencyError } from '../errors';
import { compareStrings, keyToString } from '../keys';
import type { Logger } from '../log';
import { silentLogger } from '../log';
import type { EntityExtractor } from '../parser/adapter';
import { RustEntityExtractor } from '../parser/rust';
import { toPosixPath } from '../paths';
import type { EntityRecord, FileExtraction, ParseFailure, Snapshot, SourceFile } from '../types';

export interface BuildSnapshotOptions {
  commit: string;
  files: readonly SourceFile[];
  config?: Partial<DiffConfig>;
  extractor?: EntityExtractor;
  logger?: Logger;
  onProgress?: (p: { totalFiles: number; processedFiles: number; currentFile?: string }) => void;
}

const yieldToEventLoop = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

function freezeSnapshot(snapshot: Snapshot): Snapshot {
  for (const rec of snapshot.entities.values()) deepFreeze(rec);
  for (const keys of snapshot.files.values()) Object.freeze(keys);
  deepFreeze(snapshot.parseFailures);
  return Object.freeze(snapshot);
}

export async function buildSnapshot(options: BuildSnapshotOptions): Promise<Snapshot> {
  const config = mergeDiffConfig(options.config);
  const log = (options.logger ?? silentLogger).child({ component: 'snapshot', commit: options.commit });
  const extractor = options.extractor ?? new RustEntityExtractor();
  const extensions = extractor.getSupportedFileExtensions();

  const files = options.files
    .map((f) => ({ path: toPosixPath(f.path), content: f.content }))
    .filter((f) => extensions.some((ext) => f.path.endsWith(ext)))
    .sort((a, b) => compareStrings(a.path, b.path));

  // one slot per file; tasks never touch another file's slot
  const results: Array<FileExtraction | undefined> = new Array(files.length);
  const totalFiles = files.length;
  let processedFiles = 0;
  let next = 0;

  const processFile = async (index: number): Promise<void> => {
    const file = files[index];
    await yieldToEventLoop();
    processedFiles++;
    options.onProgress?.({ totalFiles, processedFiles, currentFile: file.path });

    const bytes = Buffer.byteLength(file.content, 'utf8');
    if (bytes > config.maxFileBytes) {
      results[index] = {
        file: file.path,
        module: '',
        entities: [],
        failure: {
          file: file.path,
          reason: 'file_too_large',
          message: `file is ${bytes} bytes, limit is ${config.maxFileBytes}`,
        },
      };
      return;
    }
    results[index] = extractor.extract(file.path, file.content);
  };

  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const index = next++;
      await processFile(index);
    }
  };

  const workerCount = Math.min(config.concurrency, Math.max(1, files.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return freezeSnapshot(mergeExtractions(options.commit, results, log));
}

/** Join per-file results in path order; a later duplicate key replaces the earlier record. */
export function mergeExtractions(
  commit: string,
  results: ReadonlyArray<FileExtraction | undefined>,
  log: Logger = silentLogger,
): Snapshot {
  const entities = new Map<string, EntityRecord>();
  const origin = new Map<string, string>();
  const files = new Map<string, string[]>();
  const parseFailures: ParseFailure[] = [];

  for (const res of results) {
    if (!res) throw new InternalInconsistencyError('file extraction result missing after join', { commit });
    if (res.failure) {
      parseFailures.push(res.failure);
      log.warn('parse_failure', { file: res.failure.file, reason: res.failure.reason, message: res.failure.message });
      files.set(res.file, []);
      continue;
    }
    const keys: string[] = [];
    for (const rec of res.entities) {
      const k = keyToString(rec.key);
      const previous = origin.get(k);
      if (previous !== undefined) {
        log.debug('duplicate_entity_key', { key: k, file: res.file, replaces: previous });
      }
      entities.set(k, rec);
      origin.set(k, res.file);
      if (!keys.includes(k)) keys.push(k);
    }
    files.set(res.file, keys.sort(compareStrings));
  }

  const sortedEntities = new Map(Array.from(entities.entries()).sort((a, b) => compareStrings(a[0], b[0])));
  const sortedFiles = new Map(Array.from(files.entries()).sort((a, b) => compareStrings(a[0], b[0])));

  log.debug('snapshot_built', {
    files: sortedFiles.size,
    entities: sortedEntities.size,
    parse_failures: parseFailures.length,
  });

  return {
    commit,
    entities: sortedEntities,
    files: sortedFiles,
    parseFailures,
  };
}
