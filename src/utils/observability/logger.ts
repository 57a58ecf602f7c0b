import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let fileSink: { path: string; stream: WriteStream } | null = null;
let sinkHooksInstalled = false;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function minimumLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').toLowerCase();
  if (isLogLevel(raw)) return raw;
  return process.env.NODE_ENV === 'test' ? 'error' : 'info';
}

function shouldWriteFileSink(): boolean {
  return process.env.NODE_ENV === 'development' && process.env.APP_LOG_FILE !== 'off';
}

function resolveLogFilePath(): string {
  if (process.env.APP_LOG_FILE) return process.env.APP_LOG_FILE;
  const baseDir = process.env.APP_LOG_DIR || './logs';
  return join(baseDir, new Date().toISOString().slice(0, 10), 'app.ndjson');
}

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  if (!shouldWriteFileSink()) return null;

  const filePath = resolveLogFilePath();
  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  if (!sinkHooksInstalled) {
    sinkHooksInstalled = true;
    process.once('exit', closeFileSink);
  }

  try {
    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    // A broken log file must not take the process down.
    stream.on('error', closeFileSink);
    fileSink = { path: filePath, stream };
    return stream;
  } catch (error) {
    process.stderr.write(`${JSON.stringify({
      timestamp: new Date().toISOString(),
      level: 'warn',
      event: 'log_file_sink_unavailable',
      error: error instanceof Error ? error.message : String(error),
    })}\n`);
    return null;
  }
}

function writeRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  if (record.level === 'error' || record.level === 'warn') {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
  ensureFileSink()?.write(`${line}\n`);
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...getLogContext(),
    ...baseContext,
    ...(data ? redactSecrets(data) : {}),
  };
}

/**
 * Structured JSON logger. Every record carries the ambient log context
 * (request, turn, user) plus the logger's own base context.
 */
export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;
    writeRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event, data) => log('debug', event, data),
    info: (event, data) => log('info', event, data),
    warn: (event, data) => log('warn', event, data),
    error: (event, data) => log('error', event, data),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}
