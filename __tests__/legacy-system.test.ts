import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import {
  LegacyRowAssembler,
  buildLegacySystemSheet,
  calculateDeliveryDate,
  generateDocumentNumber,
} from '../src/output/legacy-system';
import {
  aPartsPickingTable,
  cmPickingTable,
  createTable,
  type APartsPickingRow,
  type CmPickingRow,
} from '../src/schema';
import { buildMatrix, createTestLogger } from './helpers';

function cmLine(partNumber: string, quantity: number, options = ''): CmPickingRow {
  return {
    no: 0,
    startPart: 'ST-01',
    factory: 'F1',
    partNumber,
    partName: '',
    spec: '',
    quantity,
    boxCode: '',
    boxName: '',
    storageLocation: '',
    options,
  };
}

function aLine(partNumber: string, quantity: number, options = ''): APartsPickingRow {
  return {
    no: 0,
    startPart: 'ST-01',
    factory: 'F1',
    partNumber,
    partName: '',
    quantity,
    storageLocation: '',
    rack: '',
    quantityPerBox: 10,
    requiredBoxes: 1,
    options,
  };
}

describe('Legacy System Input', () => {
  // Local time, so date-fns formatting is timezone independent
  const now = new Date(2024, 2, 28, 9, 30, 0);
  const matrix = buildMatrix([{ partNumber: 'FRAME-1001' }]);

  describe('document number and delivery date', () => {
    it('should stamp the document number with the run date', () => {
      expect(generateDocumentNumber(now)).toBe('20240328-001');
    });

    it('should deliver seven days later, across month ends', () => {
      expect(calculateDeliveryDate(now)).toBe('2024-04-04');
      expect(calculateDeliveryDate(now, 1)).toBe('2024-03-29');
    });
  });

  describe('LegacyRowAssembler', () => {
    it('should list CM lines before A-parts lines, numbered across both', () => {
      const assembler = new LegacyRowAssembler({
        framePartNumber: 'FRAME-1001',
        cmPicking: createTable(cmPickingTable, [cmLine('CM100001', 4, 'red / wide'), cmLine('CM100002', 1)]),
        aPartsPicking: createTable(aPartsPickingTable, [aLine('A200001', 25)]),
        matrix,
        now,
      });

      const table = assembler.assemble();

      expect(table.rows).toEqual([
        {
          documentNumber: '20240328-001',
          lineNumber: 1,
          partNumber: 'CM100001',
          quantity: 4,
          unit: 'pcs',
          deliveryDate: '2024-04-04',
          remarks: 'red / wide',
        },
        {
          documentNumber: '20240328-001',
          lineNumber: 2,
          partNumber: 'CM100002',
          quantity: 1,
          unit: 'pcs',
          deliveryDate: '2024-04-04',
          remarks: '',
        },
        {
          documentNumber: '20240328-001',
          lineNumber: 3,
          partNumber: 'A200001',
          quantity: 25,
          unit: 'pcs',
          deliveryDate: '2024-04-04',
          remarks: '',
        },
      ]);
    });

    it('should emit CM lines only when there is no A-parts table', () => {
      const assembler = new LegacyRowAssembler({
        framePartNumber: 'FRAME-1001',
        cmPicking: createTable(cmPickingTable, [cmLine('CM100001', 4)]),
        aPartsPicking: null,
        matrix,
        now,
      });

      expect(assembler.assemble().rows.map((row) => row.lineNumber)).toEqual([1]);
    });

    it('should produce a header-only table when nothing was picked', () => {
      const assembler = new LegacyRowAssembler({
        framePartNumber: 'FRAME-1001',
        cmPicking: createTable(cmPickingTable, []),
        aPartsPicking: createTable(aPartsPickingTable, []),
        matrix,
        now,
      });

      const table = assembler.assemble();

      expect(table.rows).toEqual([]);
      expect(table.headers).toHaveLength(7);
    });
  });

  describe('buildLegacySystemSheet', () => {
    it('should render a styled sheet into the workbook', () => {
      const workbook = new ExcelJS.Workbook();
      const { logger } = createTestLogger();
      const assembler = new LegacyRowAssembler({
        framePartNumber: 'FRAME-1001',
        cmPicking: createTable(cmPickingTable, [cmLine('CM100001', 4)]),
        aPartsPicking: null,
        matrix,
        now,
      });

      const result = buildLegacySystemSheet(assembler, workbook, logger);

      expect(result.ok && result.value.rows).toHaveLength(1);
      const sheet = workbook.getWorksheet('Legacy System Input');
      expect(sheet).toBeDefined();
      if (!sheet) return;
      expect(sheet.getRow(1).getCell(1).value).toBe('Document No');
      expect(sheet.getRow(1).getCell(1).font?.bold).toBe(true);
      expect(sheet.getRow(1).getCell(1).alignment?.horizontal).toBe('center');
      expect(sheet.getRow(2).getCell(3).value).toBe('CM100001');
      expect(sheet.getRow(2).getCell(3).alignment?.horizontal).toBe('left');
      expect(sheet.getRow(2).getCell(3).border?.top?.style).toBe('thin');
      expect(sheet.getColumn(1).width).toBe(15);
      expect(sheet.getColumn(7).width).toBe(30);
    });
  });
});
