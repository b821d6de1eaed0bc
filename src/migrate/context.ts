import { createLogger, type Logger } from '../log.js';
import type { ProjectClassification } from '../model.js';
import type { DestinationProvider } from '../providers/destination.js';
import { ActivityResolver } from '../resolve/activities.js';
import { ResolutionCache } from '../resolve/cache.js';
import { CompanyResolver } from '../resolve/companies.js';
import type { ResolverDeps } from '../resolve/deps.js';
import { PhaseResolver } from '../resolve/phases.js';
import { ProjectResolver } from '../resolve/projects.js';
import { UserResolver } from '../resolve/users.js';
import { RateLimitedExecutor } from '../retry.js';
import { CategoryMapper } from './categories.js';
import { DedupLedger } from './dedup.js';
import { MigrationSummary } from './summary.js';

export interface RunSettings {
  /** Destination user used whenever a person cannot be resolved. */
  fallbackUserId: number;
  dryRun: boolean;
  reuseExistingProjects: boolean;
  cutoffDate?: string;
  teamMembers: string[];
  classificationOverrides: Record<string, ProjectClassification>;
  userAliases: Record<string, string>;
}

export const DEFAULT_RUN_SETTINGS: Omit<RunSettings, 'fallbackUserId'> = {
  dryRun: false,
  reuseExistingProjects: true,
  teamMembers: [],
  classificationOverrides: {},
  userAliases: {},
};

export interface RunContextOptions {
  destination: DestinationProvider;
  settings: Partial<RunSettings> & Pick<RunSettings, 'fallbackUserId'>;
  executor?: RateLimitedExecutor;
  logger?: Logger;
  mapper?: CategoryMapper;
  now?: () => Date;
}

/**
 * Everything that lives for exactly one run: ledger, caches, executor state,
 * summary. Created once and handed to every stage.
 */
export class RunContext {
  readonly settings: RunSettings;
  readonly destination: DestinationProvider;
  readonly executor: RateLimitedExecutor;
  readonly logger: Logger;
  readonly mapper: CategoryMapper;
  readonly ledger = new DedupLedger();
  readonly cache = new ResolutionCache();
  readonly summary: MigrationSummary;

  readonly users: UserResolver;
  readonly phases: PhaseResolver;
  readonly companies: CompanyResolver;
  readonly activities: ActivityResolver;
  readonly projects: ProjectResolver;

  constructor(opts: RunContextOptions) {
    this.settings = { ...DEFAULT_RUN_SETTINGS, ...opts.settings };
    this.destination = opts.destination;
    this.logger = opts.logger ?? createLogger('silent');
    this.executor = opts.executor ?? new RateLimitedExecutor(undefined, { logger: this.logger.child('http') });
    this.mapper = opts.mapper ?? new CategoryMapper();
    this.summary = new MigrationSummary(opts.now, this.settings.dryRun);

    const deps: ResolverDeps = {
      destination: this.destination,
      executor: this.executor,
      cache: this.cache,
      logger: this.logger.child('resolve'),
    };
    this.users = new UserResolver(deps, this.settings.userAliases);
    this.phases = new PhaseResolver(deps);
    this.companies = new CompanyResolver(deps, { allowCreate: !this.settings.dryRun });
    this.activities = new ActivityResolver(deps);
    this.projects = new ProjectResolver(deps);
  }
}
