import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import ExcelJS from 'exceljs';
import type { CellHyperlinkValue } from 'exceljs';
import { FileNotFoundError, InvalidFileFormatError } from '../src/errors';
import { loadCsv, readSheetGrid, readTableFile, toCell, worksheetToGrid } from '../src/imports/workbook';

describe('Workbook reading', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'picking-workbook-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('toCell', () => {
    it('should pass plain values through', () => {
      expect(toCell('abc')).toBe('abc');
      expect(toCell(12)).toBe(12);
      expect(toCell(null)).toBeNull();
    });

    it('should flatten structured values', () => {
      expect(toCell(true)).toBe('TRUE');
      expect(toCell(new Date(2024, 2, 28))).toBe('2024-03-28');
      expect(toCell({ formula: 'A1*2', result: 8, date1904: false })).toBe(8);
      expect(toCell({ richText: [{ text: 'CM10' }, { text: '0001' }] })).toBe('CM100001');
      expect(toCell({ text: 'link', hyperlink: 'https://example.com' })).toBe('link');
      expect(toCell({ error: '#N/A' })).toBeNull();
    });

    it('should flatten hyperlinks whose text is formatted', () => {
      const link: CellHyperlinkValue = { text: '', hyperlink: 'https://example.com' };
      Reflect.set(link, 'text', { richText: [{ text: 'CM1' }, { text: '00001' }] });

      expect(toCell(link)).toBe('CM100001');
    });
  });

  describe('worksheetToGrid', () => {
    it('should keep blank rows and leading blank cells in place', () => {
      const workbook = new ExcelJS.Workbook();
      const sheet = workbook.addWorksheet('Matrix');
      sheet.getCell('A1').value = 'No';
      sheet.getCell('C1').value = 'factory';
      sheet.getCell('B3').value = 'CM100001';

      const grid = worksheetToGrid(sheet);

      expect(grid).toEqual([['No', null, 'factory'], [], [null, 'CM100001']]);
    });

    it('should keep a merged value only in the top-left cell of the range', async () => {
      const file = join(workDir, 'merged.xlsx');
      const workbook = new ExcelJS.Workbook();
      const sheet = workbook.addWorksheet('Matrix');
      sheet.getCell('A1').value = 'No';
      sheet.getCell('L2').value = 'red';
      sheet.mergeCells('L2:M2');
      sheet.getCell('E2').value = 'CM100001';
      sheet.mergeCells('E2:E4');
      sheet.getCell('A4').value = 3;
      await workbook.xlsx.writeFile(file);

      const grid = await readSheetGrid(file);

      expect(grid[1][11]).toBe('red');
      expect(grid[1][12] ?? null).toBeNull();
      expect(grid.map((row) => row[4] ?? null)).toEqual([null, 'CM100001', null, null]);
    });
  });

  describe('readSheetGrid', () => {
    it('should read the first sheet by default and others by name', async () => {
      const file = join(workDir, 'book.xlsx');
      const workbook = new ExcelJS.Workbook();
      workbook.addWorksheet('First').addRow(['a', 1]);
      workbook.addWorksheet('Second').addRow(['b', 2]);
      await workbook.xlsx.writeFile(file);

      expect(await readSheetGrid(file)).toEqual([['a', 1]]);
      expect(await readSheetGrid(file, 'Second')).toEqual([['b', 2]]);
    });

    it('should raise a not-found error for a missing file', async () => {
      await expect(readSheetGrid(join(workDir, 'missing.xlsx'))).rejects.toBeInstanceOf(FileNotFoundError);
    });

    it('should raise a format error for a file that is not a workbook', async () => {
      const file = join(workDir, 'broken.xlsx');
      writeFileSync(file, 'not a zip archive');

      await expect(readSheetGrid(file)).rejects.toBeInstanceOf(InvalidFileFormatError);
    });

    it('should raise a format error for a missing sheet', async () => {
      const file = join(workDir, 'book.xlsx');
      const workbook = new ExcelJS.Workbook();
      workbook.addWorksheet('First').addRow(['a']);
      await workbook.xlsx.writeFile(file);

      await expect(readSheetGrid(file, 'Other')).rejects.toThrow(`Workbook ${file} has no sheet named 'Other'`);
      await expect(readSheetGrid(file, 3)).rejects.toThrow(`Workbook ${file} has no sheet at position 4`);
    });
  });

  describe('loadCsv', () => {
    it('should trim cells and skip blank lines', async () => {
      const file = join(workDir, 'catalog.csv');
      writeFileSync(file, '\uFEFFpart number, rack\n\nA200001 , R-01\nA200002\n');

      expect(await loadCsv(file)).toEqual([['part number', 'rack'], ['A200001', 'R-01'], ['A200002']]);
    });

    it('should be chosen by readTableFile for .csv files', async () => {
      const file = join(workDir, 'catalog.CSV');
      writeFileSync(file, 'a,b\n1,2\n');

      expect(await readTableFile(file, 'ignored')).toEqual([['a', 'b'], ['1', '2']]);
    });
  });
});
