export const NOT_FOUND: unique symbol = Symbol('not-found');
export type NotFound = typeof NOT_FOUND;

/** A destination id, or the negative-cache sentinel. */
export type Resolution = number | NotFound;

export type ResolutionKind = 'user' | 'phase' | 'company' | 'activity' | 'project';

export function normalizeName(s: string | undefined): string {
  return (s ?? '').trim().replace(/\s+/g, ' ').toLowerCase();
}

export function isFound(r: Resolution): r is number {
  return r !== NOT_FOUND;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
}

/**
 * Run-scoped memo of (kind, name[, scope]) -> id | NOT_FOUND.
 *
 * Once an outcome is stored it is returned for every later lookup of the same
 * key without calling the loader again; that includes NOT_FOUND. Loader
 * errors are not stored.
 */
export class ResolutionCache {
  private entries = new Map<string, Resolution>();
  private hits = 0;
  private misses = 0;

  // Phase titles match exact case before falling back, so their keys keep case.
  private key(kind: ResolutionKind, name: string, scope?: string | number) {
    const n = kind === 'phase' ? name.trim().replace(/\s+/g, ' ') : normalizeName(name);
    return `${kind}\u0000${scope ?? ''}\u0000${n}`;
  }

  peek(kind: ResolutionKind, name: string, scope?: string | number): Resolution | undefined {
    return this.entries.get(this.key(kind, name, scope));
  }

  set(kind: ResolutionKind, name: string, value: Resolution, scope?: string | number): void {
    this.entries.set(this.key(kind, name, scope), value);
  }

  async resolve(
    kind: ResolutionKind,
    name: string,
    loader: () => Promise<Resolution>,
    scope?: string | number,
  ): Promise<Resolution> {
    const k = this.key(kind, name, scope);
    const cached = this.entries.get(k);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }
    this.misses++;
    const value = await loader();
    this.entries.set(k, value);
    return value;
  }

  stats(): CacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }
}

/** Whole-listing memo (one remote listing per key per run). */
export class ListingCache<T> {
  private lists = new Map<string, T[]>();

  async get(key: string, loader: () => Promise<T[]>): Promise<T[]> {
    const existing = this.lists.get(key);
    if (existing) return existing;
    const loaded = await loader();
    this.lists.set(key, loaded);
    return loaded;
  }

  /** Append to an already loaded listing; ignored when it was never loaded. */
  append(key: string, item: T): void {
    this.lists.get(key)?.push(item);
  }

  has(key: string): boolean {
    return this.lists.has(key);
  }
}
