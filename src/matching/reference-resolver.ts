/**
 * Reference Table Resolution
 *
 * Joins matrix rows against the master catalogs to build the CM and A-parts
 * reference tables that the picking builders work from.
 *
 * Flow (run once per catalog, each a full pass over the matrix):
 * 1. Skip rows whose part number fails screening (blank, length, FRAME/SET/KIT)
 * 2. Skip rows classified as a different part type
 * 3. Look the part number up in the catalog; drop it with a warning if absent
 * 4. Emit a reference row numbered by emitted count
 */

import { ReferenceTableError, runStage, type StageResult } from '../errors';
import { logTableInfo, type Logger } from '../logger';
import {
  aPartsReferenceTable,
  cmReferenceTable,
  createTable,
  type APartsCatalog,
  type APartsReferenceRow,
  type APartsReferenceTable,
  type CmCatalog,
  type CmReferenceRow,
  type CmReferenceTable,
  type MasterCatalogs,
  type MatrixRow,
  type MatrixTable,
  type ReferenceTables,
} from '../schema';
import { classifyPartNumbers, identifyPartType, isValidPartNumber, type PartType } from './part-numbers';

/**
 * Data rows whose part number passes screening and classifies as `type`
 */
function candidateRows(matrix: MatrixTable, type: PartType): MatrixRow[] {
  return matrix.dataRows.filter((row) => {
    const partNumber = row.partNumber;
    return isValidPartNumber(partNumber) && identifyPartType(partNumber) === type;
  });
}

export function buildCmReferenceTable(
  matrix: MatrixTable,
  catalog: CmCatalog,
  logger: Logger
): CmReferenceTable {
  const rows: CmReferenceRow[] = [];

  for (const row of candidateRows(matrix, 'CM')) {
    const partNumber = row.partNumber;
    const entry = catalog.find(partNumber);

    if (!entry) {
      logger.warn(`Part not in ${catalog.name}: ${partNumber} (matrix row ${row.index + 1})`);
      continue;
    }

    rows.push({
      no: rows.length + 1,
      startPart: row.startPart,
      factory: row.factory,
      partNumber,
      partName: row.partName,
      spec: row.spec,
      boxCode: entry.boxCode,
      boxName: entry.boxName,
      storageLocation: entry.storageLocation,
    });
  }

  if (rows.length === 0) {
    logger.warn('No CM parts found');
  }

  return createTable(cmReferenceTable, rows);
}

export function buildAPartsReferenceTable(
  matrix: MatrixTable,
  catalog: APartsCatalog,
  logger: Logger
): APartsReferenceTable {
  const rows: APartsReferenceRow[] = [];

  for (const row of candidateRows(matrix, 'A_PARTS')) {
    const partNumber = row.partNumber;
    const entry = catalog.find(partNumber);

    if (!entry) {
      logger.warn(`Part not in ${catalog.name}: ${partNumber} (matrix row ${row.index + 1})`);
      continue;
    }

    rows.push({
      no: rows.length + 1,
      startPart: row.startPart,
      factory: row.factory,
      partNumber,
      partName: row.partName,
      storageLocation: entry.storageLocation,
      rack: entry.rack,
      quantityPerBox: entry.quantityPerBox,
    });
  }

  if (rows.length === 0) {
    logger.warn('No A-parts found');
  }

  return createTable(aPartsReferenceTable, rows);
}

/**
 * Build both reference tables. Missing catalog entries are recovered per row;
 * anything else that goes wrong is reported as a reference-table error.
 */
export function resolveReferenceTables(
  matrix: MatrixTable,
  catalogs: MasterCatalogs,
  logger: Logger
): StageResult<ReferenceTables> {
  return runStage(
    (message, cause) => new ReferenceTableError(`Reference table build failed: ${message}`, { cause }),
    () => {
      const breakdown = classifyPartNumbers(matrix.dataRows.map((row) => row.partNumber));
      logger.info(
        `Part types - CM: ${breakdown.CM}, A-parts: ${breakdown.A_PARTS}, ` +
          `frame: ${breakdown.FRAME}, other: ${breakdown.OTHER}, excluded: ${breakdown.EXCLUDED}`
      );

      logger.info('Building CM picking reference...');
      const cm = buildCmReferenceTable(matrix, catalogs.cm, logger);
      logTableInfo(logger, cmReferenceTable.name, cm);

      logger.info('Building A-parts picking reference...');
      const aParts = buildAPartsReferenceTable(matrix, catalogs.aParts, logger);
      logTableInfo(logger, aPartsReferenceTable.name, aParts);

      return { cm, aParts };
    }
  );
}
