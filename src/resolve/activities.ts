import { DEFAULT_ACTIVITY } from '../migrate/categories.js';
import type { RemoteActivity } from '../providers/destination.js';
import { ListingCache, NOT_FOUND, isFound, normalizeName, type Resolution } from './cache.js';
import type { ResolverDeps } from './deps.js';

export function matchActivity(activities: RemoteActivity[], name: string): RemoteActivity | undefined {
  const wanted = name.trim();
  if (!wanted) return undefined;
  return (
    activities.find((a) => a.name.trim() === wanted) ??
    activities.find((a) => normalizeName(a.name) === normalizeName(wanted))
  );
}

export class ActivityResolver {
  private listing = new ListingCache<RemoteActivity>();

  constructor(private deps: ResolverDeps) {}

  private activities() {
    const { executor, destination } = this.deps;
    return this.listing.get('all', () => executor.execute('activities/list', () => destination.listActivities()));
  }

  async resolve(name: string): Promise<Resolution> {
    const wanted = name.trim();
    if (!wanted) return NOT_FOUND;
    return this.deps.cache.resolve('activity', wanted, async () => {
      const match = matchActivity(await this.activities(), wanted);
      return match ? match.id : NOT_FOUND;
    });
  }

  /**
   * Activity id for a mapped activity name, falling back to "Other".
   * Undefined when neither exists in the destination.
   */
  async resolveOrDefault(name: string): Promise<number | undefined> {
    const direct = await this.resolve(name);
    if (isFound(direct)) return direct;

    const fallback = await this.resolve(DEFAULT_ACTIVITY);
    if (isFound(fallback)) {
      if (name !== DEFAULT_ACTIVITY) this.deps.logger.warn(`activity type "${name}" not found; using "${DEFAULT_ACTIVITY}"`);
      return fallback;
    }
    this.deps.logger.warn(`activity type "${name}" not found and no "${DEFAULT_ACTIVITY}" fallback; field omitted`);
    return undefined;
  }
}
