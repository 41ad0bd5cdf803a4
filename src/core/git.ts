import simpleGit from 'simple-git';
import fs from 'fs-extra';
import path from 'path';
import { AstDiffError, SnapshotUnavailableError, errorMessage } from './errors';
import type { Logger } from './log';
import { silentLogger } from './log';
import { isExcludedPath, isRustSource, toPosixPath } from './paths';
import type { SourceFile } from './types';

export async function resolveGitRoot(startDir: string): Promise<string> {
  const resolved = path.resolve(startDir);
  try {
    const git = simpleGit(resolved);
    const root = await git.raw(['rev-parse', '--show-toplevel']);
    return root.trim();
  } catch {
    return resolved;
  }
}

export interface PrepareRepositoryOptions {
  localPath: string;
  repoUrl?: string;
  logger?: Logger;
}

export interface PreparedRepository {
  repoRoot: string;
  cloned: boolean;
  warnings: string[];
}

/**
 * Clone `repoUrl` into `localPath` when nothing is there yet; otherwise point
 * `origin` at the URL and fetch. Fetch problems only produce warnings: the
 * commits may already be present locally.
 */
export async function prepareRepository(options: PrepareRepositoryOptions): Promise<PreparedRepository> {
  const log = (options.logger ?? silentLogger).child({ component: 'git' });
  const localPath = path.resolve(options.localPath);
  const warnings: string[] = [];

  if (!(await fs.pathExists(localPath))) {
    if (!options.repoUrl) {
      throw new AstDiffError('REPO_UNAVAILABLE', `repository path does not exist: ${localPath}`);
    }
    log.info('git_clone', { repoUrl: options.repoUrl, localPath });
    try {
      await simpleGit().clone(options.repoUrl, localPath);
    } catch (e) {
      throw new AstDiffError('REPO_UNAVAILABLE', `failed to clone ${options.repoUrl}: ${errorMessage(e)}`);
    }
    return { repoRoot: await resolveGitRoot(localPath), cloned: true, warnings };
  }

  const repoRoot = await resolveGitRoot(localPath);
  const git = simpleGit(repoRoot);
  if (options.repoUrl) {
    try {
      await git.remote(['set-url', 'origin', options.repoUrl]);
    } catch (e) {
      warnings.push(`set_remote_failed: ${errorMessage(e)}`);
    }
    try {
      await git.fetch();
    } catch (e) {
      warnings.push(`fetch_failed: ${errorMessage(e)}`);
    }
  }
  for (const w of warnings) log.warn('git_prepare', { warning: w });
  return { repoRoot, cloned: false, warnings };
}

export async function resolveCommitHash(repoRoot: string, rev: string): Promise<string> {
  const git = simpleGit(repoRoot);
  try {
    return (await git.raw(['rev-parse', '--verify', `${rev}^{commit}`])).trim();
  } catch (e) {
    throw new SnapshotUnavailableError(`cannot resolve ${rev} to a commit: ${errorMessage(e)}`, { rev });
  }
}

/** Paths from `git ls-tree -r -z --name-only` output, kept to Rust sources outside the excluded prefixes. */
export function parseLsTree(raw: string, excludePrefixes: readonly string[]): string[] {
  return raw
    .split('\0')
    .map(toPosixPath)
    .filter(Boolean)
    .filter((p) => isRustSource(p) && !isExcludedPath(p, excludePrefixes))
    .sort();
}

export async function listRustFilesAtCommit(repoRoot: string, commit: string, excludePrefixes: readonly string[]): Promise<string[]> {
  const git = simpleGit(repoRoot);
  try {
    const raw = await git.raw(['ls-tree', '-r', '-z', '--name-only', commit]);
    return parseLsTree(raw, excludePrefixes);
  } catch (e) {
    throw new SnapshotUnavailableError(`cannot list files at ${commit}: ${errorMessage(e)}`, { commit });
  }
}

export async function gitShowFile(repoRoot: string, commit: string, filePath: string): Promise<string> {
  const git = simpleGit(repoRoot);
  return git.raw(['show', `${commit}:${filePath}`]);
}

/**
 * Contents of `files` as of `commit`, read from the object store so the
 * working tree is never checked out. Any unreadable file makes the tree
 * state unavailable.
 */
export async function readFilesAtCommit(
  repoRoot: string,
  commit: string,
  files: readonly string[],
  concurrency = 8,
): Promise<SourceFile[]> {
  const out: SourceFile[] = new Array(files.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const index = next++;
      const file = files[index];
      try {
        out[index] = { path: file, content: await gitShowFile(repoRoot, commit, file) };
      } catch (e) {
        throw new SnapshotUnavailableError(`cannot read ${file} at ${commit}: ${errorMessage(e)}`, { commit, file });
      }
    }
  };
  await Promise.all(Array.from({ length: Math.max(1, Math.min(concurrency, files.length)) }, () => worker()));
  return out;
}

export interface TreeState {
  rev: string;
  commit: string;
  files: SourceFile[];
}

export async function loadTreeState(
  repoRoot: string,
  rev: string,
  options: { excludePrefixes: readonly string[]; concurrency: number; logger?: Logger },
): Promise<TreeState> {
  const log = (options.logger ?? silentLogger).child({ component: 'git', rev });
  const commit = await resolveCommitHash(repoRoot, rev);
  const paths = await listRustFilesAtCommit(repoRoot, commit, options.excludePrefixes);
  const files = await readFilesAtCommit(repoRoot, commit, paths, options.concurrency);
  log.debug('tree_loaded', { commit, files: files.length });
  return { rev, commit, files };
}
