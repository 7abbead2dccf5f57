import type { PackageInfo } from '../daemon/types.js';

export type UpdateCategory = 'security' | 'important' | 'bugfix' | 'other';

export interface PackageEntry {
  readonly id: string;
  readonly summary: string;
  readonly category: UpdateCategory;
}

/**
 * Immutable view of one committed enumeration pass.
 * `count === securityCount + importantCount + otherCount`, where bug fixes
 * count as "other".
 */
export interface CatalogSnapshot {
  /** Display order: security, important, bug fix, other; ties by id. */
  readonly entries: readonly PackageEntry[];
  /** id → summary */
  readonly packages: Readonly<Record<string, string>>;
  readonly count: number;
  readonly securityCount: number;
  readonly importantCount: number;
  readonly otherCount: number;
  readonly isUpToDate: boolean;
}

const CATEGORY_ORDER: Record<UpdateCategory, number> = {
  security: 0,
  important: 1,
  bugfix: 2,
  other: 3
};

/**
 * Category for a package reported during enumeration, or undefined for
 * blocked updates, which cannot be installed and are neither listed nor counted.
 */
export function categorize(info: PackageInfo): UpdateCategory | undefined {
  switch (info) {
    case 'blocked':
      return undefined;
    case 'security':
      return 'security';
    case 'important':
      return 'important';
    case 'bugfix':
      return 'bugfix';
    default:
      return 'other';
  }
}

export function buildCatalogSnapshot(entries: Iterable<PackageEntry>): CatalogSnapshot {
  const sorted = [...entries].sort((a, b) =>
    CATEGORY_ORDER[a.category] - CATEGORY_ORDER[b.category] || a.id.localeCompare(b.id)
  );

  const packages: Record<string, string> = {};
  let securityCount = 0;
  let importantCount = 0;
  for (const entry of sorted) {
    packages[entry.id] = entry.summary;
    if (entry.category === 'security') securityCount++;
    else if (entry.category === 'important') importantCount++;
  }

  return Object.freeze({
    entries: Object.freeze(sorted.map(entry => Object.freeze({ ...entry }))),
    packages: Object.freeze(packages),
    count: sorted.length,
    securityCount,
    importantCount,
    otherCount: sorted.length - securityCount - importantCount,
    isUpToDate: sorted.length === 0
  });
}

export const EMPTY_CATALOG: CatalogSnapshot = buildCatalogSnapshot([]);

/**
 * Working set for an enumeration pass. Nothing recorded here is visible to
 * readers until `commit()` hands out a new snapshot.
 */
export class UpdateCatalog {
  private working = new Map<string, PackageEntry>();

  get size(): number {
    return this.working.size;
  }

  beginPass(): void {
    this.working = new Map();
  }

  /** Insert or overwrite by id. */
  record(entry: PackageEntry): void {
    this.working.set(entry.id, entry);
  }

  commit(): CatalogSnapshot {
    return buildCatalogSnapshot(this.working.values());
  }
}
