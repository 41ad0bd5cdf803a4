import os from 'os';

export interface DiffConfig {
  /** Maximum number of files extracted concurrently. */
  concurrency: number;
  /** Files larger than this are reported as parse failures instead of parsed. */
  maxFileBytes: number;
  /** Path prefixes (posix, relative to the repository root) never enumerated. */
  excludePrefixes: string[];
}

export function defaultDiffConfig(): DiffConfig {
  const cpuCount = Math.max(1, os.cpus()?.length ?? 1);
  return {
    concurrency: Math.max(1, cpuCount - 1),
    maxFileBytes: 1_000_000,
    excludePrefixes: ['target/'],
  };
}

export function mergeDiffConfig(overrides?: Partial<DiffConfig>): DiffConfig {
  const defaults = defaultDiffConfig();
  if (!overrides) return defaults;
  const merged: DiffConfig = {
    concurrency: overrides.concurrency ?? defaults.concurrency,
    maxFileBytes: overrides.maxFileBytes ?? defaults.maxFileBytes,
    excludePrefixes: overrides.excludePrefixes ?? defaults.excludePrefixes,
  };
  merged.concurrency = Math.max(1, Math.floor(merged.concurrency));
  merged.maxFileBytes = Math.max(1, Math.floor(merged.maxFileBytes));
  merged.excludePrefixes = merged.excludePrefixes.map(normalizePrefix).filter(Boolean);
  return merged;
}

function normalizePrefix(p: string): string {
  const trimmed = String(p).trim().replace(/\\/g, '/').replace(/^\.\//, '');
  if (!trimmed) return '';
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
}
