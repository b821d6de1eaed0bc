import { errorMessage } from '../errors.js';
import type { RemoteCompany } from '../providers/destination.js';
import { ListingCache, NOT_FOUND, normalizeName, type Resolution } from './cache.js';
import type { ResolverDeps } from './deps.js';

const MIN_PARTIAL = 3;

export function matchCompany(companies: RemoteCompany[], name: string): RemoteCompany | undefined {
  const n = normalizeName(name);
  if (!n) return undefined;

  const exact = companies.find((c) => normalizeName(c.name) === n);
  if (exact) return exact;

  if (n.length < MIN_PARTIAL) return undefined;
  return companies.find((c) => {
    const cn = normalizeName(c.name);
    return cn.length >= MIN_PARTIAL && (cn.includes(n) || n.includes(cn));
  });
}

export interface CompanyResolverOptions {
  /** When false (dry run) a miss stays a miss. */
  allowCreate?: boolean;
}

/** Get-or-create companies by name. */
export class CompanyResolver {
  private listing = new ListingCache<RemoteCompany>();
  private allowCreate: boolean;

  constructor(
    private deps: ResolverDeps,
    opts: CompanyResolverOptions = {},
  ) {
    this.allowCreate = opts.allowCreate ?? true;
  }

  private companies() {
    const { executor, destination } = this.deps;
    return this.listing.get('all', () => executor.execute('companies/list', () => destination.listCompanies()));
  }

  async resolve(name: string | undefined): Promise<Resolution> {
    const trimmed = (name ?? '').trim();
    if (!trimmed) return NOT_FOUND;

    return this.deps.cache.resolve('company', trimmed, async () => {
      const { executor, destination, logger } = this.deps;
      const match = matchCompany(await this.companies(), trimmed);
      if (match) return match.id;
      if (!this.allowCreate) return NOT_FOUND;

      try {
        const created = await executor.execute('companies/modify', () => destination.createCompany(trimmed));
        this.listing.append('all', created);
        logger.info(`created company "${trimmed}" (id ${created.id})`);
        return created.id;
      } catch (e) {
        logger.warn(`could not create company "${trimmed}"; association omitted`, errorMessage(e));
        return NOT_FOUND;
      }
    });
  }
}
