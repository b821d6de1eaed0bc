import type { Logger } from '../log.js';
import type { DestinationProvider } from '../providers/destination.js';
import type { RateLimitedExecutor } from '../retry.js';
import type { ResolutionCache } from './cache.js';

/** What every resolver needs; all of it is run-scoped. */
export interface ResolverDeps {
  destination: DestinationProvider;
  executor: RateLimitedExecutor;
  cache: ResolutionCache;
  logger: Logger;
}
