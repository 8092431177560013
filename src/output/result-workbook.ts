import { mkdirSync, renameSync, rmSync } from 'fs';
import { basename, dirname, extname, join } from 'path';
import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import { format } from 'date-fns';
import { OutputError, errorMessage, runStageAsync, type StageResult } from '../errors';
import type { Logger } from '../logger';
import { tableToGrid, type Cell, type Table, type TableRow } from '../schema';

export function createResultWorkbook(): Workbook {
  return new ExcelJS.Workbook();
}

/**
 * `{inputBaseName}_{suffix}_{YYYYMMDD_HHMMSS}.xlsx` inside `outputDir`
 */
export function generateOutputPath(
  inputFile: string,
  outputDir: string,
  suffix: string,
  now: Date = new Date()
): string {
  const stem = basename(inputFile, extname(inputFile));
  const timestamp = format(now, 'yyyyMMdd_HHmmss');
  return join(outputDir, `${stem}_${suffix}_${timestamp}.xlsx`);
}

export function addGridSheet(workbook: Workbook, name: string, grid: readonly (readonly Cell[])[]): Worksheet {
  const worksheet = workbook.addWorksheet(name);
  for (const row of grid) {
    worksheet.addRow([...row]);
  }
  return worksheet;
}

/**
 * Add a table as a sheet named after its schema, header row first.
 * An empty table still gets its header.
 */
export function addTableSheet<Row extends TableRow<Row>>(workbook: Workbook, table: Table<Row>): Worksheet {
  const worksheet = addGridSheet(workbook, table.schema.name, tableToGrid(table));
  worksheet.getRow(1).font = { bold: true };
  return worksheet;
}

/**
 * Write to a temporary file beside the target, then rename into place.
 * Creates the output directory if needed.
 */
export async function saveWorkbook(
  workbook: Workbook,
  outputPath: string,
  logger: Logger
): Promise<StageResult<string>> {
  return runStageAsync(
    (message, cause) => new OutputError(`Could not save ${outputPath}: ${message}`, { cause }),
    async () => {
      mkdirSync(dirname(outputPath), { recursive: true });
      const tempPath = `${outputPath}.${process.pid}.tmp`;

      logger.info(`Saving results: ${outputPath}`);
      try {
        await workbook.xlsx.writeFile(tempPath);
        renameSync(tempPath, outputPath);
      } catch (error) {
        rmSync(tempPath, { force: true });
        throw new OutputError(`Could not save ${outputPath}: ${errorMessage(error)}`, { cause: error });
      }
      logger.info(`Saved: ${outputPath}`);

      return outputPath;
    }
  );
}
