import type { ColumnMap } from './_table';

/**
 * CM master catalog - one row per CM part, keyed by CM part number
 */
export interface CmCatalogEntry {
  partNumber: string;
  boxCode: string;
  boxName: string;
  storageLocation: string;
}

/**
 * A-parts master catalog - one row per A part, keyed by part number
 */
export interface APartsCatalogEntry {
  partNumber: string;
  partName: string;
  storageLocation: string;
  rack: string;
  quantityPerBox: number;
}

// Header labels expected in each catalog's header row
export const CM_CATALOG_COLUMNS = {
  partNumber: 'CM part number',
  boxCode: 'box code',
  boxName: 'box name',
  storageLocation: 'storage location',
} as const satisfies ColumnMap<CmCatalogEntry>;

export const A_PARTS_CATALOG_COLUMNS = {
  partNumber: 'part number',
  partName: 'part name',
  storageLocation: 'storage location',
  rack: 'rack',
  quantityPerBox: 'quantity per box',
} as const satisfies ColumnMap<APartsCatalogEntry>;

/**
 * Read-only part-number lookup. When a part number appears more than once,
 * the first entry wins.
 */
export class MasterCatalog<Entry extends { partNumber: string }> {
  readonly name: string;
  private readonly entries = new Map<string, Entry>();
  private duplicates = 0;

  constructor(name: string, entries: Iterable<Entry>) {
    this.name = name;
    for (const entry of entries) {
      if (!entry.partNumber) continue;
      if (this.entries.has(entry.partNumber)) {
        this.duplicates++;
        continue;
      }
      this.entries.set(entry.partNumber, Object.freeze({ ...entry }));
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get duplicateCount(): number {
    return this.duplicates;
  }

  find(partNumber: string): Entry | null {
    return this.entries.get(partNumber) ?? null;
  }
}

export type CmCatalog = MasterCatalog<CmCatalogEntry>;
export type APartsCatalog = MasterCatalog<APartsCatalogEntry>;

export interface MasterCatalogs {
  cm: CmCatalog;
  aParts: APartsCatalog;
}
