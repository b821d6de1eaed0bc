import type { RemoteProject } from '../providers/destination.js';
import { ListingCache, NOT_FOUND, normalizeName, type Resolution } from './cache.js';
import type { ResolverDeps } from './deps.js';

/** Destination projects by name, for reusing a project created by an earlier run. */
export class ProjectResolver {
  private listing = new ListingCache<RemoteProject>();

  constructor(private deps: ResolverDeps) {}

  async resolve(name: string): Promise<Resolution> {
    const wanted = name.trim();
    if (!wanted) return NOT_FOUND;
    const { executor, destination, cache } = this.deps;
    return cache.resolve('project', wanted, async () => {
      const projects = await this.listing.get('all', () =>
        executor.execute('projects/list', () => destination.listProjects()),
      );
      const n = normalizeName(wanted);
      return projects.find((p) => normalizeName(p.name) === n)?.id ?? NOT_FOUND;
    });
  }

  remember(project: RemoteProject): void {
    this.deps.cache.set('project', project.name, project.id);
    this.listing.append('all', project);
  }
}
