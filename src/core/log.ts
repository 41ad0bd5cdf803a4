export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogThreshold(raw: string | undefined): LogThreshold {
  const v = String(raw ?? '').trim().toLowerCase();
  if (!v) return 'info';
  if (v === 'silent' || v === 'off' || v === 'none' || v === '0') return 'silent';
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return 'info';
}

function getConfiguredThreshold(): LogThreshold {
  return parseLogThreshold(process.env.RUST_AST_DIFF_LOG_LEVEL ?? process.env.LOG_LEVEL);
}

export function serializeError(e: unknown): { name?: string; message?: string; code?: string; stack?: string } | undefined {
  if (!e) return undefined;
  if (e instanceof Error) {
    const code = 'code' in e && typeof e.code === 'string' ? e.code : undefined;
    return { name: e.name, message: e.message, code, stack: e.stack };
  }
  return { message: String(e) };
}

export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  child(fields: Record<string, unknown>): Logger;
  span<T>(name: string, fields: Record<string, unknown>, fn: () => Promise<T>): Promise<T>;
}

export interface LoggerOptions {
  /** Overrides the environment threshold. */
  threshold?: LogThreshold;
  write?: (line: string) => void;
}

export function createLogger(baseFields: Record<string, unknown> = {}, options: LoggerOptions = {}): Logger {
  const configured = options.threshold ?? getConfiguredThreshold();
  const threshold = configured === 'silent' ? Infinity : levelOrder[configured];
  const sink = options.write ?? ((line: string) => process.stderr.write(line));

  const write = (level: LogLevel, msg: string, fields?: Record<string, unknown>) => {
    if (levelOrder[level] < threshold) return;
    const rec = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...baseFields,
      ...(fields ?? {}),
    };
    sink(JSON.stringify(rec) + '\n');
  };

  const logger: Logger = {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (fields) => createLogger({ ...baseFields, ...fields }, options),
    span: async (name, fields, fn) => {
      const startedAt = Date.now();
      try {
        const out = await fn();
        write('info', name, { ...fields, ok: true, duration_ms: Date.now() - startedAt });
        return out;
      } catch (e) {
        write('error', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
        throw e;
      }
    },
  };

  return logger;
}

export const silentLogger: Logger = createLogger({}, { threshold: 'silent' });
