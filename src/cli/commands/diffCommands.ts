import { Command } from 'commander';
import { executeHandler } from '../types';

export const diffCommand = new Command('diff')
  .description('Compare the Rust entities of <branch> against <commit> and write change reports')
  .argument('<branch>', 'Base revision (branch name or commit)')
  .argument('<commit>', 'Target revision')
  .option('--repo-url <url>', 'Clone from this URL when --path does not exist; otherwise fetch from it')
  .option('-p, --path <path>', 'Local repository checkout', '.')
  .option('-o, --out <dir>', 'Directory for the report files', 'output')
  .option('--concurrency <n>', 'Files parsed concurrently (default: CPU count - 1)')
  .option('--max-file-bytes <n>', 'Skip files larger than this many bytes')
  .option('--exclude <prefix...>', 'Extra path prefixes to skip (target/ is always skipped)')
  .option('--no-write', 'Print the summary without writing report files')
  .action(async (branch: string, commit: string, options: Record<string, unknown>) => {
    await executeHandler('diff', { branch, commit, ...options });
  });

export const entitiesCommand = new Command('entities')
  .description('List the Rust entities extracted at <rev>')
  .argument('<rev>', 'Revision to inspect')
  .option('-p, --path <path>', 'Local repository checkout', '.')
  .option('--kind <kind>', 'Only this entity kind (function, type, trait, method)')
  .option('--concurrency <n>', 'Files parsed concurrently')
  .option('--max-file-bytes <n>', 'Skip files larger than this many bytes')
  .option('--exclude <prefix...>', 'Extra path prefixes to skip')
  .action(async (rev: string, options: Record<string, unknown>) => {
    await executeHandler('entities', { rev, ...options });
  });
