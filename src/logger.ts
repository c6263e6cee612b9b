/**
 * Structured logging: one JSON object per line with timestamp, level, message,
 * placement from env when available, and any bound fields (e.g. connection id).
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Pod/namespace/node when running in Kubernetes (downward API). */
  placement?: { pod?: string; namespace?: string; node?: string };
  /** Optional extra key-value for context. */
  [key: string]: unknown;
}

export type LogSink = (record: LogRecord) => void;

export interface LoggerOptions {
  /** Emit debug records. */
  verbose?: boolean;
  /** Emit debug and trace records. */
  veryVerbose?: boolean;
  /** Fields merged into every record. */
  fields?: Record<string, unknown>;
  /** Record sink. Default: JSON line to stdout (stderr for errors). */
  write?: LogSink;
}

export interface Logger {
  readonly verbose: boolean;
  readonly veryVerbose: boolean;
  error(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  debug(message: string, extra?: Record<string, unknown>): void;
  trace(message: string, extra?: Record<string, unknown>): void;
  /** Logger with the same sink and verbosity, plus extra bound fields. */
  child(fields: Record<string, unknown>): Logger;
}

function isoTimestamp(): string {
  return new Date().toISOString();
}

function getPlacement(): LogRecord['placement'] {
  const pod = process.env.POD_NAME;
  const namespace = process.env.NAMESPACE;
  const node = process.env.NODE_NAME;
  if (pod ?? namespace ?? node) {
    return { pod, namespace, node };
  }
  return undefined;
}

export function writeJsonLine(record: LogRecord): void {
  const line = JSON.stringify(record) + '\n';
  const out = record.level === 'error' ? process.stderr : process.stdout;
  out.write(line);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const veryVerbose = options.veryVerbose === true;
  const verbose = veryVerbose || options.verbose === true;
  const fields = options.fields ?? {};
  const sink = options.write ?? writeJsonLine;

  function emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (level === 'debug' && !verbose) return;
    if (level === 'trace' && !veryVerbose) return;
    const placement = getPlacement();
    sink({
      timestamp: isoTimestamp(),
      level,
      message,
      ...(placement && { placement }),
      ...fields,
      ...extra,
    });
  }

  return {
    verbose,
    veryVerbose,
    error: (message, extra) => emit('error', message, extra),
    warn: (message, extra) => emit('warn', message, extra),
    info: (message, extra) => emit('info', message, extra),
    debug: (message, extra) => emit('debug', message, extra),
    trace: (message, extra) => emit('trace', message, extra),
    child(extraFields) {
      return createLogger({
        verbose,
        veryVerbose,
        fields: { ...fields, ...extraFields },
        write: sink,
      });
    },
  };
}

/** Collects records in memory; for tests and embedding. */
export function createMemoryLogger(options: Omit<LoggerOptions, 'write'> = {}): Logger & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({ ...options, write: (record) => records.push(record) });
  return Object.assign(logger, { records });
}
