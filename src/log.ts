import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { FatalConfigError } from './errors.js';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Same sink and level, every line prefixed with `[scope]`. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Extra destination for every emitted line (e.g. a log file stream). */
  sink?: (line: string) => void;
  /** Replace the console (tests). */
  console?: Pick<Console, 'log' | 'warn' | 'error'>;
  scope?: string;
}

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  if (meta instanceof Error) return ` ${meta.name}: ${meta.message}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

const noop = () => {};

export function createLogger(level: LogLevel = 'info', opts: LoggerOptions = {}): Logger {
  if (level === 'silent') {
    const silent: Logger = {
      error: noop,
      warn: noop,
      info: noop,
      debug: noop,
      child: () => silent,
    };
    return silent;
  }

  const threshold = ORDER[level];
  const out = opts.console ?? console;
  const scope = opts.scope ? `[${opts.scope}] ` : '';
  const prefix = (lvl: string) => `${new Date().toISOString()} ${lvl.toUpperCase()} ${scope}`;

  const can = (lvl: Exclude<LogLevel, 'silent'>) => ORDER[lvl] <= threshold;

  const emit = (lvl: Exclude<LogLevel, 'silent'>, msg: string, meta: unknown) => {
    if (!can(lvl)) return;
    const line = prefix(lvl) + msg + fmtMeta(meta);
    if (lvl === 'error') out.error(line);
    else if (lvl === 'warn') out.warn(line);
    else out.log(line);
    opts.sink?.(line);
  };

  return {
    error: (msg, meta) => emit('error', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    debug: (msg, meta) => emit('debug', msg, meta),
    child: (child) =>
      createLogger(level, { ...opts, scope: opts.scope ? `${opts.scope}/${child}` : child }),
  };
}

export interface LogFile {
  /** Pass as `LoggerOptions.sink`; becomes a no-op once the file fails. */
  sink: (line: string) => void;
  close(): Promise<void>;
}

/**
 * Open `file` for appending before anything is logged to it. An open failure
 * is a FatalConfigError; a later write failure is reported once through
 * `onError` and further lines are dropped.
 */
export async function openLogFile(file: string, onError: (e: Error) => void = () => {}): Promise<LogFile> {
  const stream = createWriteStream(file, { flags: 'a' });
  try {
    await once(stream, 'open');
  } catch (e) {
    stream.destroy();
    throw new FatalConfigError(`Cannot open log file ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let failed = false;
  stream.on('error', (e) => {
    if (failed) return;
    failed = true;
    onError(e);
  });

  return {
    sink: (line) => {
      if (!failed) stream.write(line + '\n');
    },
    close: () =>
      new Promise<void>((resolve) => {
        if (failed || stream.destroyed) resolve();
        else stream.end(() => resolve());
      }),
  };
}
