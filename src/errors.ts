import { HttpError, NetworkError } from './http.js';

/** The destination answered 200 but with `status: "ERROR"` in its envelope. */
export class RemoteApiError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly messages: string[] = [],
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'RemoteApiError';
  }
}

/** Missing or invalid credentials/configuration. Aborts the run before any project is touched. */
export class FatalConfigError extends Error {
  constructor(message: string, public readonly missing: string[] = []) {
    super(message);
    this.name = 'FatalConfigError';
  }
}

export class ProjectImportFailure extends Error {
  constructor(
    message: string,
    public readonly projectId: string,
    public readonly stage: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProjectImportFailure';
  }
}

export class TaskImportFailure extends Error {
  constructor(
    message: string,
    public readonly taskId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TaskImportFailure';
  }
}

export function isTransientStatus(status: number) {
  return status === 429 || status >= 500;
}

/** 429, 5xx, timeouts and transport failures are worth another attempt; nothing else is. */
export function isTransientError(e: unknown): boolean {
  if (e instanceof HttpError) return isTransientStatus(e.status);
  if (e instanceof NetworkError) return true;
  if (e instanceof RemoteApiError) return e.status !== undefined && isTransientStatus(e.status);
  return false;
}

export function isAuthError(e: unknown): boolean {
  return e instanceof HttpError && (e.status === 401 || e.status === 403);
}

export function errorMessage(e: unknown): string {
  if (e instanceof RemoteApiError && e.messages.length) return `${e.message}: ${e.messages.join('; ')}`;
  if (e instanceof HttpError && e.responseText) return `${e.message}: ${e.responseText.slice(0, 300)}`;
  return e instanceof Error ? e.message : String(e);
}

/** Fatal configuration problems set exit code 2; anything else is rethrown. */
export async function fatalExits(
  fn: () => Promise<void>,
  report: (message: string) => void = (m) => console.error(m),
): Promise<void> {
  try {
    await fn();
  } catch (e) {
    if (!(e instanceof FatalConfigError)) throw e;
    report(e.message);
    process.exitCode = 2;
  }
}
