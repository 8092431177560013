/**
 * Legacy System Input
 *
 * Flattens the CM and A-parts picking tables into order-entry lines for the
 * legacy ordering system: CM lines first, then A-parts lines, numbered
 * 1..n across both groups. Every line shares one document number and one
 * delivery date, fixed when the assembler is constructed.
 *
 * The document sequence is always "001", so two runs on the same day produce
 * the same document number. This matches the legacy system's current intake
 * and is left as-is until the numbering rule is confirmed.
 */

import { addDays, format } from 'date-fns';
import type { Borders, Workbook, Worksheet } from 'exceljs';
import { OutputError, runStage, type StageResult } from '../errors';
import type { Logger } from '../logger';
import {
  DELIVERY_LEAD_DAYS,
  LEGACY_COLUMN_WIDTHS,
  LEGACY_DOCUMENT_SEQUENCE,
  LEGACY_UNIT_LABEL,
  createTable,
  legacySystemTable,
  type APartsPickingTable,
  type CmPickingTable,
  type LegacySystemRow,
  type MatrixTable,
  type Table,
} from '../schema';

export type LegacySystemTable = Table<LegacySystemRow>;

export interface LegacyAssemblerInput {
  // Identifies the assembly in logs; not written to the lines
  framePartNumber: string;
  cmPicking: CmPickingTable;
  // null in CM-only mode
  aPartsPicking: APartsPickingTable | null;
  // Accepted for future use; the picking tables already carry everything the lines need
  matrix: MatrixTable;
  now?: Date;
}

export function generateDocumentNumber(now: Date): string {
  return `${format(now, 'yyyyMMdd')}-${LEGACY_DOCUMENT_SEQUENCE}`;
}

export function calculateDeliveryDate(now: Date, daysAhead: number = DELIVERY_LEAD_DAYS): string {
  return format(addDays(now, daysAhead), 'yyyy-MM-dd');
}

const THIN_BORDER: Partial<Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

export class LegacyRowAssembler {
  readonly framePartNumber: string;
  readonly documentNumber: string;
  readonly deliveryDate: string;
  private readonly cmPicking: CmPickingTable;
  private readonly aPartsPicking: APartsPickingTable | null;
  readonly matrix: MatrixTable;

  constructor(input: LegacyAssemblerInput) {
    const now = input.now ?? new Date();
    this.framePartNumber = input.framePartNumber;
    this.cmPicking = input.cmPicking;
    this.aPartsPicking = input.aPartsPicking;
    this.matrix = input.matrix;
    this.documentNumber = generateDocumentNumber(now);
    this.deliveryDate = calculateDeliveryDate(now);
  }

  assemble(): LegacySystemTable {
    const pickedLines = [
      ...this.cmPicking.rows,
      ...(this.aPartsPicking ? this.aPartsPicking.rows : []),
    ];

    const rows = pickedLines.map(
      (line, index): LegacySystemRow => ({
        documentNumber: this.documentNumber,
        lineNumber: index + 1,
        partNumber: line.partNumber,
        quantity: line.quantity,
        unit: LEGACY_UNIT_LABEL,
        deliveryDate: this.deliveryDate,
        remarks: line.options,
      })
    );

    return createTable(legacySystemTable, rows);
  }

  /**
   * Add the styled legacy sheet to `workbook`: bold centered header,
   * left-aligned bordered data cells, fixed column widths.
   */
  render(workbook: Workbook, table: LegacySystemTable = this.assemble()): Worksheet {
    const worksheet = workbook.addWorksheet(legacySystemTable.name);
    const { keys } = legacySystemTable;

    const headerRow = worksheet.addRow([...table.headers]);
    for (let col = 1; col <= keys.length; col++) {
      const cell = headerRow.getCell(col);
      cell.font = { bold: true, size: 11 };
      cell.alignment = { horizontal: 'center', vertical: 'middle' };
      cell.border = THIN_BORDER;
    }

    for (const line of table.rows) {
      const row = worksheet.addRow(keys.map((key) => line[key]));
      for (let col = 1; col <= keys.length; col++) {
        const cell = row.getCell(col);
        cell.alignment = { horizontal: 'left', vertical: 'middle' };
        cell.border = THIN_BORDER;
      }
    }

    keys.forEach((key, index) => {
      worksheet.getColumn(index + 1).width = LEGACY_COLUMN_WIDTHS[key];
    });

    return worksheet;
  }
}

/**
 * Assemble the legacy lines for one run and render them into `workbook`
 */
export function buildLegacySystemSheet(
  assembler: LegacyRowAssembler,
  workbook: Workbook,
  logger: Logger
): StageResult<LegacySystemTable> {
  return runStage(
    (message, cause) => new OutputError(`Legacy system sheet build failed: ${message}`, { cause }),
    () => {
      logger.info(`Building legacy system input for ${assembler.framePartNumber}...`);
      const table = assembler.assemble();
      assembler.render(workbook, table);
      logger.info(`Legacy system input complete: ${table.rows.length} line(s), document ${assembler.documentNumber}`);
      return table;
    }
  );
}
