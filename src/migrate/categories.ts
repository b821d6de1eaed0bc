import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const DEFAULT_ACTIVITY = 'Other';

const CategoryTableSchema = z.record(z.string().min(1), z.string().min(1));
export type CategoryTable = z.infer<typeof CategoryTableSchema>;

const TABLE_URL = new URL('../../data/category-map.json', import.meta.url);

let bundled: CategoryTable | undefined;

export function loadCategoryTable(url: URL = TABLE_URL): CategoryTable {
  return CategoryTableSchema.parse(JSON.parse(readFileSync(url, 'utf8')));
}

/**
 * Source category label -> destination activity type name.
 *
 * Exact match first, then case-insensitive. A blank or unknown label maps to
 * "Other"; nothing else about the task is consulted.
 */
export class CategoryMapper {
  private exact: Map<string, string>;
  private folded: Map<string, string>;

  constructor(table: CategoryTable = (bundled ??= loadCategoryTable())) {
    this.exact = new Map(Object.entries(table));
    this.folded = new Map();
    for (const [k, v] of this.exact) {
      const key = k.toLowerCase();
      if (!this.folded.has(key)) this.folded.set(key, v);
    }
  }

  map(label: string | undefined | null): string {
    const trimmed = (label ?? '').trim();
    if (!trimmed) return DEFAULT_ACTIVITY;
    return this.exact.get(trimmed) ?? this.folded.get(trimmed.toLowerCase()) ?? DEFAULT_ACTIVITY;
  }

  size(): number {
    return this.exact.size;
  }
}
