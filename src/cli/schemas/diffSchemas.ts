import { z } from 'zod';

const Concurrency = z.coerce.number().int().positive().optional();
const MaxFileBytes = z.coerce.number().int().positive().optional();

export const DiffSchema = z.object({
  branch: z.string().min(1, 'branch is required'),
  commit: z.string().min(1, 'commit is required'),
  repoUrl: z.string().min(1).optional(),
  path: z.string().default('.'),
  out: z.string().default('output'),
  concurrency: Concurrency,
  maxFileBytes: MaxFileBytes,
  exclude: z.array(z.string()).default([]),
  write: z.boolean().default(true),
});

export type DiffInput = z.infer<typeof DiffSchema>;

export const EntitiesSchema = z.object({
  rev: z.string().min(1, 'rev is required'),
  path: z.string().default('.'),
  kind: z.enum(['function', 'type', 'trait', 'method']).optional(),
  concurrency: Concurrency,
  maxFileBytes: MaxFileBytes,
  exclude: z.array(z.string()).default([]),
});

export type EntitiesInput = z.infer<typeof EntitiesSchema>;
