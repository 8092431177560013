import { createReadStream, existsSync } from 'fs';
import { extname } from 'path';
import ExcelJS from 'exceljs';
import type { CellValue, Workbook, Worksheet } from 'exceljs';
import { parse } from 'csv-parse';
import { format } from 'date-fns';
import { FileNotFoundError, InvalidFileFormatError, errorMessage } from '../errors';
import type { Cell } from '../schema';

export type SheetGrid = Cell[][];

/**
 * Which sheet to read: a name, or a 0-based position
 */
export type SheetSelector = string | number;

/**
 * Reduce an exceljs cell value to a plain string or number.
 * Formula cells yield their cached result; rich text is concatenated.
 */
export function toCell(value: CellValue): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (value instanceof Date) return format(value, 'yyyy-MM-dd');

  if ('formula' in value || 'sharedFormula' in value) {
    return toCell(value.result);
  }
  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('');
  }
  if ('hyperlink' in value) {
    // Formatted link text arrives as rich text
    return toCell(value.text);
  }
  // Error values (#N/A, #REF!, ...)
  return null;
}

/**
 * Every row of a worksheet as a positional cell array, blank rows included
 * so row indices match the sheet. Only the top-left cell of a merged range
 * keeps the value; the rest of the range reads as empty.
 */
export function worksheetToGrid(worksheet: Worksheet): SheetGrid {
  const grid: SheetGrid = [];

  worksheet.eachRow({ includeEmpty: true }, (row, rowNumber) => {
    const cells: Cell[] = [];
    row.eachCell((cell, colNumber) => {
      while (cells.length < colNumber - 1) {
        cells.push(null);
      }
      cells[colNumber - 1] = cell.isMerged && cell.master !== cell ? null : toCell(cell.value);
    });
    grid[rowNumber - 1] = cells;
  });

  // Fill holes left by rows exceljs never visited
  for (let i = 0; i < grid.length; i++) {
    grid[i] = grid[i] ?? [];
  }

  return grid;
}

export async function readWorkbook(filePath: string): Promise<Workbook> {
  if (!existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw new InvalidFileFormatError(`Could not read workbook ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return workbook;
}

export async function readSheetGrid(filePath: string, sheet: SheetSelector = 0): Promise<SheetGrid> {
  const workbook = await readWorkbook(filePath);

  const worksheet =
    typeof sheet === 'number' ? workbook.worksheets[sheet] : workbook.getWorksheet(sheet);

  if (!worksheet) {
    throw new InvalidFileFormatError(
      typeof sheet === 'number'
        ? `Workbook ${filePath} has no sheet at position ${sheet + 1}`
        : `Workbook ${filePath} has no sheet named '${sheet}'`
    );
  }

  return worksheetToGrid(worksheet);
}

/**
 * Parse a CSV file into raw rows (no header handling)
 */
export async function loadCsv(filePath: string): Promise<SheetGrid> {
  if (!existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }

  return new Promise((resolve, reject) => {
    const rows: SheetGrid = [];

    createReadStream(filePath)
      .on('error', reject)
      .pipe(
        parse({
          bom: true,
          skip_empty_lines: true,
          trim: true,
          relax_column_count: true,
        })
      )
      .on('data', (row: string[]) => rows.push(row))
      .on('end', () => resolve(rows))
      .on('error', (error: Error) =>
        reject(new InvalidFileFormatError(`Could not parse CSV ${filePath}: ${error.message}`, { cause: error }))
      );
  });
}

/**
 * Read a table-shaped file: CSV by extension, otherwise an xlsx workbook sheet
 */
export async function readTableFile(filePath: string, sheet: SheetSelector = 0): Promise<SheetGrid> {
  return extname(filePath).toLowerCase() === '.csv' ? loadCsv(filePath) : readSheetGrid(filePath, sheet);
}
