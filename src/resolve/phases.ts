import { decodeEntities } from '../fields.js';
import type { RemotePhase } from '../providers/destination.js';
import { ListingCache, NOT_FOUND, type Resolution } from './cache.js';
import type { ResolverDeps } from './deps.js';

function clean(title: string) {
  return decodeEntities(title).trim();
}

/**
 * Find a phase by title among phases that belong to `projectId`.
 * Exact (entity-decoded) match first, then case-insensitive.
 */
export function matchPhase(
  phases: RemotePhase[],
  title: string,
  projectId: number,
  onAmbiguous?: (matches: RemotePhase[]) => void,
): RemotePhase | undefined {
  const scoped = phases.filter((p) => p.projectId === projectId);
  const wanted = clean(title);
  if (!wanted) return undefined;

  const exact = scoped.find((p) => clean(p.title) === wanted);
  if (exact) return exact;

  const lower = wanted.toLowerCase();
  const loose = scoped.filter((p) => clean(p.title).toLowerCase() === lower);
  if (loose.length > 1) onAmbiguous?.(loose);
  return loose[0];
}

export class PhaseResolver {
  private listing = new ListingCache<RemotePhase>();

  constructor(private deps: ResolverDeps) {}

  /**
   * The listing endpoint ignores its project filter, so whatever comes back
   * is filtered here to the phases of `projectId`.
   */
  private phasesFor(projectId: number) {
    const { executor, destination, logger } = this.deps;
    return this.listing.get(String(projectId), async () => {
      const all = await executor.execute(`projectPhases/list#${projectId}`, () => destination.listPhases(projectId));
      const scoped = all.filter((p) => p.projectId === projectId);
      if (scoped.length !== all.length) {
        logger.debug(`phase listing for project ${projectId}: dropped ${all.length - scoped.length} foreign phases`);
      }
      return scoped;
    });
  }

  async resolve(title: string | undefined, projectId: number): Promise<Resolution> {
    const wanted = clean(title ?? '');
    if (!wanted) return NOT_FOUND;

    return this.deps.cache.resolve(
      'phase',
      wanted,
      async () => {
        const match = matchPhase(await this.phasesFor(projectId), wanted, projectId, (m) =>
          this.deps.logger.warn(`phase "${wanted}" is ambiguous in project ${projectId}; using id ${m[0]?.id}`),
        );
        if (!match) {
          this.deps.logger.warn(`phase not found in project ${projectId}: "${wanted}"`);
          return NOT_FOUND;
        }
        return match.id;
      },
      projectId,
    );
  }

  /** Register a phase the importer just created so later lookups hit it. */
  remember(phase: RemotePhase, projectId: number): void {
    this.deps.cache.set('phase', clean(phase.title), phase.id, projectId);
    this.listing.append(String(projectId), { ...phase, projectId });
  }
}
