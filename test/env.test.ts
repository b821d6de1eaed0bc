import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadEnvFiles, parseEnvFile } from '../src/env.js';

describe('parseEnvFile', () => {
  it('handles comments, quotes and export prefixes', () => {
    const raw = [
      '# comment',
      'export A=1',
      'B="quoted # not a comment"',
      'C=plain # trailing',
      "D='single'",
      'E',
      '=novalue',
      'F = spaced',
      '',
    ].join('\n');

    expect(parseEnvFile(raw)).toEqual({ A: '1', B: 'quoted # not a comment', C: 'plain', D: 'single', F: 'spaced' });
  });
});

describe('loadEnvFiles', () => {
  it('never overrides keys that are already set', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'migrate-env-'));
    await writeFile(path.join(dir, '.env'), 'A=from-file\nB=file\n');
    await writeFile(path.join(dir, '.env.local'), 'B=local\nC=local\n');

    const target: NodeJS.ProcessEnv = { A: 'real' };
    const { loaded } = loadEnvFiles(['.env', '.env.local', '.env.missing'], dir, target);

    expect(loaded).toEqual(['.env', '.env.local']);
    expect(target).toEqual({ A: 'real', B: 'file', C: 'local' });
  });
});
