/**
 * A-Parts Picking
 *
 * Same re-join as CM picking, plus box arithmetic: each line carries the
 * number of whole boxes needed, and a check row comparing the boxed
 * quantity against the required quantity. The check table is index-aligned
 * with the picking table.
 */

import { ProcessingError, runStage, type StageResult } from '../errors';
import { logTableInfo, type Logger } from '../logger';
import {
  aPartsPickingTable,
  aPartsValidationTable,
  createTable,
  type APartsPickingRow,
  type APartsPickingTable,
  type APartsReferenceRow,
  type APartsReferenceTable,
  type APartsValidationRow,
  type APartsValidationTable,
  type MatrixRow,
  type MatrixTable,
} from '../schema';
import { calculateRequiredBoxes, extractOptions, formatOptions } from './shared';

export interface APartsPicking {
  picking: APartsPickingTable;
  validation: APartsValidationTable;
}

function toAPartsPickingRow(
  reference: APartsReferenceRow,
  matrixRow: MatrixRow,
  no: number
): APartsPickingRow {
  const quantity = matrixRow.quantity;

  return {
    no,
    startPart: reference.startPart,
    factory: reference.factory,
    partNumber: reference.partNumber,
    partName: reference.partName,
    quantity,
    storageLocation: reference.storageLocation,
    rack: reference.rack,
    quantityPerBox: reference.quantityPerBox,
    requiredBoxes: calculateRequiredBoxes(quantity, reference.quantityPerBox),
    options: formatOptions(extractOptions(matrixRow.optionCells)),
  };
}

export function toValidationRow(picking: APartsPickingRow): APartsValidationRow {
  const boxedQuantity = picking.requiredBoxes * picking.quantityPerBox;
  const difference = boxedQuantity - picking.quantity;

  return {
    no: picking.no,
    partNumber: picking.partNumber,
    requiredQuantity: picking.quantity,
    quantityPerBox: picking.quantityPerBox,
    requiredBoxes: picking.requiredBoxes,
    boxedQuantity,
    difference,
    verdict: difference >= 0 ? 'OK' : 'NG',
  };
}

export function buildAPartsPicking(
  matrix: MatrixTable,
  reference: APartsReferenceTable,
  logger: Logger
): StageResult<APartsPicking> {
  return runStage(
    (message, cause) => new ProcessingError(`A-parts picking build failed: ${message}`, { cause }),
    () => {
      const pickingRows: APartsPickingRow[] = [];
      const validationRows: APartsValidationRow[] = [];

      for (const refRow of reference.rows) {
        const matrixRow = matrix.findByPartNumber(refRow.partNumber);

        if (!matrixRow) {
          logger.warn(`Not found in matrix: ${refRow.partNumber}`);
          continue;
        }

        const pickingRow = toAPartsPickingRow(refRow, matrixRow, pickingRows.length + 1);
        pickingRows.push(pickingRow);
        validationRows.push(toValidationRow(pickingRow));
      }

      const picking = createTable(aPartsPickingTable, pickingRows);
      const validation = createTable(aPartsValidationTable, validationRows);

      logTableInfo(logger, aPartsPickingTable.name, picking);
      const shortCount = validationRows.filter((row) => row.verdict === 'NG').length;
      if (shortCount > 0) {
        logger.warn(`A-parts picking: ${shortCount} line(s) short after boxing`);
      }
      logger.info(`A-parts picking complete: ${pickingRows.length} row(s)`);

      return { picking, validation };
    }
  );
}
