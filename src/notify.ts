import { requestJson, type FetchLike } from './http.js';
import { errorMessage } from './errors.js';
import { createLogger, type Logger } from './log.js';

/** Phase1 = export, Phase2 = transform, Phase3 = import. */
export type MigrationPhase = 'Phase1' | 'Phase2' | 'Phase3';

export interface StatusNotifier {
  notify(projectId: string, projectName: string, phase: MigrationPhase): Promise<void>;
}

export const nullNotifier: StatusNotifier = {
  notify: async () => {},
};

export interface HttpStatusNotifierOptions {
  timeoutMs?: number;
  logger?: Logger;
  fetcher?: FetchLike;
}

/**
 * Posts progress to the external dashboard. Never throws: a dashboard that
 * is down must not affect the run.
 */
export class HttpStatusNotifier implements StatusNotifier {
  private logger: Logger;

  constructor(
    private url: string,
    private opts: HttpStatusNotifierOptions = {},
  ) {
    this.logger = opts.logger ?? createLogger('silent');
  }

  async notify(projectId: string, projectName: string, phase: MigrationPhase): Promise<void> {
    try {
      await requestJson<unknown>(
        this.url,
        {
          method: 'POST',
          body: { 'asana GID': projectId, status: phase, 'asana project name': projectName },
          timeoutMs: this.opts.timeoutMs ?? 2000,
        },
        this.opts.fetcher,
      );
      this.logger.debug(`status ${phase} sent for ${projectId}`);
    } catch (e) {
      this.logger.debug(`status ${phase} for ${projectId} not delivered`, errorMessage(e));
    }
  }
}
