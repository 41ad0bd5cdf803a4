import { z } from 'zod';
import { createLogger } from '../core/log';
import { isAstDiffError, type ErrorCode } from '../core/errors';

/**
 * Standard CLI result for successful operations.
 *
 * - ok: always true
 * - command: the command that was executed
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 */
export interface CLIResult {
  ok: true;
  command?: string;
  repoRoot?: string;
  timestamp?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

/**
 * Standard CLI error.
 *
 * - reason: machine-readable error code
 * - message: human-readable description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIOutcome = CLIResult | CLIError;

export type CLIHandler<TInput> = (input: TInput) => Promise<CLIOutcome>;

/** A handler bound to the schema that validates its raw input. */
export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIOutcome>;
}

export function defineHandler<S extends z.ZodTypeAny>(schema: S, handler: CLIHandler<z.output<S>>): HandlerRegistration {
  return {
    run: async (rawInput) => handler(schema.parse(rawInput)),
  };
}

export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

export const ErrorReasons = {
  SNAPSHOT_UNAVAILABLE: 'snapshot_unavailable',
  INTERNAL_INCONSISTENCY: 'internal_inconsistency',
  REPO_NOT_FOUND: 'repo_not_found',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
  UNKNOWN_COMMAND: 'unknown_command',
} as const;

export const ErrorHints = {
  VALIDATION_ERROR: 'Check command syntax with --help',
  INTERNAL_ERROR: 'An unexpected error occurred. Re-run with RUST_AST_DIFF_LOG_LEVEL=debug for details',
  UNKNOWN_COMMAND: 'Run "rust-ast-diff --help" to see available commands',
} as const;

const reasonByCode: Record<ErrorCode, string> = {
  SNAPSHOT_UNAVAILABLE: ErrorReasons.SNAPSHOT_UNAVAILABLE,
  INTERNAL_INCONSISTENCY: ErrorReasons.INTERNAL_INCONSISTENCY,
  REPO_UNAVAILABLE: ErrorReasons.REPO_NOT_FOUND,
};

/** Turns a domain error into a CLI error; anything else is rethrown. */
export function errorFromException(e: unknown): CLIError {
  if (!isAstDiffError(e)) throw e;
  return error(reasonByCode[e.code], {
    message: e.message,
    hint: e.hint,
    ...(e.meta ? { details: e.meta } : {}),
  });
}

/**
 * Validate and run a registered handler. Validation failures and unexpected
 * exceptions come back as CLI errors; `exitCode` is what the process should
 * exit with.
 */
export async function runCommand(commandKey: string, rawInput: unknown): Promise<{ outcome: CLIOutcome; exitCode: number }> {
  const { cliHandlers } = await import('./registry');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();
  const meta = () => ({ command: commandKey, timestamp, duration_ms: Date.now() - startedAt });

  const registration = cliHandlers[commandKey];
  if (!registration) {
    return {
      outcome: error(ErrorReasons.UNKNOWN_COMMAND, { command: commandKey, timestamp, hint: ErrorHints.UNKNOWN_COMMAND }),
      exitCode: 1,
    };
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await registration.run(rawInput);
    return { outcome: { ...result, ...meta() }, exitCode: result.ok ? 0 : 2 };
  } catch (e) {
    if (e instanceof z.ZodError) {
      const errors = e.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      }));
      return {
        outcome: error(ErrorReasons.VALIDATION_ERROR, {
          message: 'Invalid command arguments',
          ...meta(),
          errors,
          hint: ErrorHints.VALIDATION_ERROR,
        }),
        exitCode: 1,
      };
    }

    log.error(commandKey, {
      ok: false,
      err: e instanceof Error ? { name: e.name, message: e.message, stack: e.stack } : { message: String(e) },
    });
    return {
      outcome: error(ErrorReasons.INTERNAL_ERROR, {
        message: e instanceof Error ? e.message : String(e),
        ...meta(),
        hint: ErrorHints.INTERNAL_ERROR,
      }),
      exitCode: 1,
    };
  }
}

/**
 * Commander action entry point: prints the outcome as JSON (stdout on
 * success, stderr otherwise) and exits.
 *
 * @example
 * ```typescript
 * .action(async (branch, commit, options) => {
 *   await executeHandler('diff', { branch, commit, ...options });
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const { outcome, exitCode } = await runCommand(commandKey, rawInput);
  const rendered = formatCLIResult(outcome);
  if (outcome.ok) console.log(rendered);
  else process.stderr.write(rendered + '\n');
  process.exit(exitCode);
}

export function formatCLIResult(result: CLIOutcome): string {
  return JSON.stringify(result, null, 2);
}
