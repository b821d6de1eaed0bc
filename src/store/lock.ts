import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';
import { FatalConfigError } from '../errors.js';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export interface LockOptions {
  filename?: string;
  pid?: number;
  /** Liveness check for the pid found in an existing lock. */
  isAlive?: (pid: number) => boolean;
}

async function readOwner(lockPath: string): Promise<number | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    if (parsed && typeof parsed === 'object' && 'pid' in parsed && typeof parsed.pid === 'number') return parsed.pid;
    return undefined;
  } catch {
    // unreadable or half-written: treat as stale
    return undefined;
  }
}

/**
 * One migration per state dir. A lock held by a live process aborts the run;
 * a stale one is taken over.
 */
export async function acquireLock(dir: string, opts: LockOptions = {}): Promise<LockHandle> {
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, opts.filename ?? 'lock');
  const pid = opts.pid ?? process.pid;
  const isAlive = opts.isAlive ?? isProcessAlive;
  const payload = JSON.stringify({ pid, at: new Date().toISOString() }) + '\n';

  try {
    await writeFile(lockPath, payload, { flag: 'wx' });
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err;

    const otherPid = await readOwner(lockPath);
    if (otherPid !== undefined && otherPid !== pid && isAlive(otherPid)) {
      throw new FatalConfigError(`Another migration is running (pid=${otherPid}); lock at ${lockPath}`);
    }
    await writeFile(lockPath, payload, { flag: 'w' });
  }

  return {
    path: lockPath,
    release: async () => {
      await unlink(lockPath).catch(() => undefined);
    },
  };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
