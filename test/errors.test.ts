import { afterEach, describe, expect, it } from 'vitest';
import { readEnv } from '../src/config.js';
import { fatalExits } from '../src/errors.js';

describe('fatalExits', () => {
  const initial = process.exitCode;
  afterEach(() => {
    process.exitCode = initial;
  });

  it('maps configuration errors to exit code 2', async () => {
    const reported: string[] = [];
    await fatalExits(async () => {
      readEnv({ MIGRATE_LOG_LEVEL: 'loud' });
    }, (m) => reported.push(m));

    expect(process.exitCode).toBe(2);
    expect(reported).toHaveLength(1);
    expect(reported[0]).toMatch(/^Invalid configuration: /);
  });

  it('rethrows everything else', async () => {
    const reported: string[] = [];
    await expect(
      fatalExits(async () => {
        throw new TypeError('boom');
      }, (m) => reported.push(m)),
    ).rejects.toBeInstanceOf(TypeError);
    expect(reported).toEqual([]);
    expect(process.exitCode).toBe(initial);
  });

  it('leaves the exit code alone on success', async () => {
    await fatalExits(async () => {});
    expect(process.exitCode).toBe(initial);
  });
});
