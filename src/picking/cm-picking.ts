/**
 * CM Picking
 *
 * Re-joins each CM reference row to its matrix row (first match by part
 * number) to pick up the quantity and options. Reference rows with no
 * matching matrix row are dropped with a warning.
 */

import { ProcessingError, runStage, type StageResult } from '../errors';
import { logTableInfo, type Logger } from '../logger';
import {
  cmPickingTable,
  createTable,
  type CmPickingRow,
  type CmPickingTable,
  type CmReferenceRow,
  type CmReferenceTable,
  type MatrixRow,
  type MatrixTable,
} from '../schema';
import { extractOptions, formatOptions } from './shared';

function toCmPickingRow(reference: CmReferenceRow, matrixRow: MatrixRow, no: number): CmPickingRow {
  return {
    no,
    startPart: reference.startPart,
    factory: reference.factory,
    partNumber: reference.partNumber,
    partName: reference.partName,
    spec: reference.spec,
    quantity: matrixRow.quantity,
    boxCode: reference.boxCode,
    boxName: reference.boxName,
    storageLocation: reference.storageLocation,
    options: formatOptions(extractOptions(matrixRow.optionCells)),
  };
}

export function buildCmPicking(
  matrix: MatrixTable,
  reference: CmReferenceTable,
  logger: Logger
): StageResult<CmPickingTable> {
  return runStage(
    (message, cause) => new ProcessingError(`CM picking build failed: ${message}`, { cause }),
    () => {
      const rows: CmPickingRow[] = [];

      for (const refRow of reference.rows) {
        const matrixRow = matrix.findByPartNumber(refRow.partNumber);

        if (!matrixRow) {
          logger.warn(`Not found in matrix: ${refRow.partNumber}`);
          continue;
        }

        rows.push(toCmPickingRow(refRow, matrixRow, rows.length + 1));
      }

      const table = createTable(cmPickingTable, rows);
      logTableInfo(logger, cmPickingTable.name, table);
      logger.info(`CM picking complete: ${rows.length} row(s)`);

      return table;
    }
  );
}
