import { describe, expect, it } from 'vitest';
import { mkdtemp, readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FatalConfigError } from '../src/errors.js';
import { createLogger, openLogFile } from '../src/log.js';

function capture() {
  const lines: Array<[string, string]> = [];
  const out = {
    log: (m: string) => lines.push(['log', m]),
    warn: (m: string) => lines.push(['warn', m]),
    error: (m: string) => lines.push(['error', m]),
  };
  return { lines, out };
}

const stamp = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z /;

describe('createLogger', () => {
  it('filters by level and routes to the matching console method', () => {
    const { lines, out } = capture();
    const sunk: string[] = [];
    const log = createLogger('warn', { console: out, sink: (l) => sunk.push(l) });

    log.info('hidden');
    log.debug('hidden');
    log.warn('careful');
    log.error('failed', new Error('boom'));

    expect(lines.map(([kind, line]) => [kind, line.replace(stamp, '')])).toEqual([
      ['warn', 'WARN careful'],
      ['error', 'ERROR failed Error: boom'],
    ]);
    expect(sunk).toHaveLength(2);
  });

  it('prefixes child scopes', () => {
    const { lines, out } = capture();
    const log = createLogger('debug', { console: out, scope: 'run' }).child('scoro');

    log.info('listing', { page: 1 });
    expect(lines[0]?.[1].replace(stamp, '')).toBe('INFO [run/scoro] listing {"page":1}');
  });

  it('stays quiet when silent', () => {
    const { lines, out } = capture();
    const log = createLogger('silent', { console: out });
    log.error('nothing');
    log.child('x').warn('nothing');
    expect(lines).toEqual([]);
  });
});

describe('openLogFile', () => {
  it('appends logger lines to the file', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'migrate-log-'));
    const file = path.join(dir, 'run.log');
    const { out } = capture();

    const logFile = await openLogFile(file);
    createLogger('info', { console: out, sink: logFile.sink }).info('first');
    logFile.sink('second');
    await logFile.close();

    const lines = (await readFile(file, 'utf8')).split('\n');
    expect(lines[0]?.replace(stamp, '')).toBe('INFO first');
    expect(lines.slice(1)).toEqual(['second', '']);
  });

  it('rejects a path that cannot be opened as a configuration error', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'migrate-log-'));
    const file = path.join(dir, 'missing', 'run.log');

    await expect(openLogFile(file)).rejects.toBeInstanceOf(FatalConfigError);
    await expect(openLogFile(file)).rejects.toThrow(`Cannot open log file ${file}`);
  });
});
