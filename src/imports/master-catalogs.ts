/**
 * Master catalog loading
 *
 * Both catalogs are read fresh on every run from a named sheet with a header
 * row (or from a CSV export with the same header). Columns are located by
 * header label, so column order in the file doesn't matter.
 */

import type { PickingConfig } from '../config';
import { MasterCatalogError, errorMessage, runStageAsync, type StageResult } from '../errors';
import type { Logger } from '../logger';
import {
  A_PARTS_CATALOG_COLUMNS,
  CM_CATALOG_COLUMNS,
  MasterCatalog,
  cellInt,
  cellText,
  type APartsCatalog,
  type APartsCatalogEntry,
  type Cell,
  type CmCatalog,
  type CmCatalogEntry,
  type MasterCatalogs,
} from '../schema';
import { readTableFile, type SheetGrid } from './workbook';

export const CM_CATALOG_NAME = 'CM master';
export const A_PARTS_CATALOG_NAME = 'A-parts master';

export interface CatalogSource {
  file: string;
  sheet: string;
}

type ColumnReader = (row: readonly Cell[], label: string) => Cell;

/**
 * Resolve header labels against the grid's first row. Every required label
 * that is absent is reported in one MasterCatalogError.
 */
export function columnReader(
  header: readonly Cell[],
  requiredLabels: readonly string[],
  source: string
): ColumnReader {
  const labels = header.map((cell) => cellText(cell));
  const missing = requiredLabels.filter((label) => !labels.includes(label));

  if (missing.length > 0) {
    throw new MasterCatalogError(`${source} is missing column(s): ${missing.join(', ')}`);
  }

  return (row, label) => row[labels.indexOf(label)] ?? null;
}

export function parseCmCatalog(grid: SheetGrid, source: string): CmCatalog {
  const [header = [], ...rows] = grid;
  const read = columnReader(header, Object.values(CM_CATALOG_COLUMNS), source);

  const entries = rows.map(
    (row): CmCatalogEntry => ({
      partNumber: cellText(read(row, CM_CATALOG_COLUMNS.partNumber)),
      boxCode: cellText(read(row, CM_CATALOG_COLUMNS.boxCode)),
      boxName: cellText(read(row, CM_CATALOG_COLUMNS.boxName)),
      storageLocation: cellText(read(row, CM_CATALOG_COLUMNS.storageLocation)),
    })
  );

  return new MasterCatalog(CM_CATALOG_NAME, entries);
}

export function parseAPartsCatalog(grid: SheetGrid, source: string): APartsCatalog {
  const [header = [], ...rows] = grid;
  const read = columnReader(header, Object.values(A_PARTS_CATALOG_COLUMNS), source);

  const entries = rows.map(
    (row): APartsCatalogEntry => ({
      partNumber: cellText(read(row, A_PARTS_CATALOG_COLUMNS.partNumber)),
      partName: cellText(read(row, A_PARTS_CATALOG_COLUMNS.partName)),
      storageLocation: cellText(read(row, A_PARTS_CATALOG_COLUMNS.storageLocation)),
      rack: cellText(read(row, A_PARTS_CATALOG_COLUMNS.rack)),
      quantityPerBox: cellInt(read(row, A_PARTS_CATALOG_COLUMNS.quantityPerBox)),
    })
  );

  return new MasterCatalog(A_PARTS_CATALOG_NAME, entries);
}

async function readCatalogGrid(source: CatalogSource, name: string, logger: Logger): Promise<SheetGrid> {
  logger.info(`Loading ${name}: ${source.file}`);
  try {
    return await readTableFile(source.file, source.sheet);
  } catch (error) {
    throw new MasterCatalogError(`Could not load ${name} (${source.file}): ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function logCatalog<Entry extends { partNumber: string }>(
  logger: Logger,
  catalog: MasterCatalog<Entry>
): void {
  logger.info(`${catalog.name} - entries: ${catalog.size}`);
  if (catalog.duplicateCount > 0) {
    logger.warn(`${catalog.name}: ${catalog.duplicateCount} duplicate part number(s), first entry kept`);
  }
}

export async function loadMasterCatalogs(
  config: Pick<PickingConfig, 'cmMaster' | 'aPartsMaster'>,
  logger: Logger
): Promise<StageResult<MasterCatalogs>> {
  return runStageAsync(
    (message, cause) => new MasterCatalogError(`Master catalog load failed: ${message}`, { cause }),
    async () => {
      const cmGrid = await readCatalogGrid(config.cmMaster, CM_CATALOG_NAME, logger);
      const cm = parseCmCatalog(cmGrid, config.cmMaster.file);
      logCatalog(logger, cm);

      const aPartsGrid = await readCatalogGrid(config.aPartsMaster, A_PARTS_CATALOG_NAME, logger);
      const aParts = parseAPartsCatalog(aPartsGrid, config.aPartsMaster.file);
      logCatalog(logger, aParts);

      return { cm, aParts };
    }
  );
}
