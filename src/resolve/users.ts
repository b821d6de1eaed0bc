import type { RemoteUser } from '../providers/destination.js';
import { ListingCache, NOT_FOUND, isFound, normalizeName, type Resolution } from './cache.js';
import type { ResolverDeps } from './deps.js';

/**
 * Pick the destination user for a display name. Strategies in order, first
 * match wins, ties go to listing order:
 * full name, first + last, first name alone (single-word input), email.
 */
export function matchUser(users: RemoteUser[], name: string): RemoteUser | undefined {
  const n = normalizeName(name);
  if (!n) return undefined;
  const active = users.filter((u) => u.isActive);

  const byFull = active.find((u) => u.fullName && normalizeName(u.fullName) === n);
  if (byFull) return byFull;

  const byParts = active.find(
    (u) => u.firstname && u.lastname && normalizeName(`${u.firstname} ${u.lastname}`) === n,
  );
  if (byParts) return byParts;

  if (!n.includes(' ')) {
    const byFirst = active.find((u) => u.firstname && normalizeName(u.firstname) === n);
    if (byFirst) return byFirst;
  }

  return active.find((u) => u.email && normalizeName(u.email) === n);
}

export class UserResolver {
  private listing = new ListingCache<RemoteUser>();
  private aliases: Map<string, string>;

  constructor(
    private deps: ResolverDeps,
    aliases: Record<string, string> = {},
  ) {
    this.aliases = new Map(Object.entries(aliases).map(([k, v]) => [normalizeName(k), v]));
  }

  private users() {
    const { executor, destination } = this.deps;
    return this.listing.get('all', () => executor.execute('users/list', () => destination.listUsers()));
  }

  async resolve(name: string | undefined): Promise<Resolution> {
    const trimmed = (name ?? '').trim();
    if (!trimmed) return NOT_FOUND;

    return this.deps.cache.resolve('user', trimmed, async () => {
      const target = this.aliases.get(normalizeName(trimmed)) ?? trimmed;
      const match = matchUser(await this.users(), target);
      if (!match) {
        this.deps.logger.warn(`user not found: "${trimmed}"`);
        return NOT_FOUND;
      }
      return match.id;
    });
  }

  /** Resolve several names; unresolved ones are dropped and ids de-duplicated in input order. */
  async resolveMany(names: string[]): Promise<number[]> {
    const ids: number[] = [];
    for (const n of names) {
      const r = await this.resolve(n);
      if (isFound(r) && !ids.includes(r)) ids.push(r);
    }
    return ids;
  }
}
