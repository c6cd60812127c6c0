import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let minLevel: LogLevel = 'info';
let fileStream: WriteStream | null = null;

/**
 * Configure level and the optional per-process log file.
 * Returns the log file path when one is opened.
 */
export function configureLogging(options: { level: LogLevel; dir?: string }): string | null {
  minLevel = options.level;

  if (!options.dir) return null;

  mkdirSync(options.dir, { recursive: true });
  const stamp = new Date().toISOString().replace(/[:.]/g, '-');
  const path = join(options.dir, `log_${stamp}.log`);
  fileStream = createWriteStream(path, { flags: 'a' });
  return path;
}

export async function closeLogging(): Promise<void> {
  const stream = fileStream;
  if (!stream) return;
  fileStream = null;
  await new Promise<void>((resolve) => stream.end(resolve));
}

function formatDetail(detail: unknown): string {
  if (detail instanceof Error) return detail.stack ?? detail.message;
  if (typeof detail === 'string') return detail;
  try {
    return JSON.stringify(detail);
  } catch {
    return String(detail);
  }
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    const line = [
      `${new Date().toISOString()} | ${level.toUpperCase()} | [${scope}] ${message}`,
      ...details.map(formatDetail),
    ].join(' ');

    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);

    fileStream?.write(`${line}\n`);
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}
