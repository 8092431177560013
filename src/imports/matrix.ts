import { InvalidFileFormatError, runStageAsync, type StageResult } from '../errors';
import type { Logger } from '../logger';
import { MatrixTable, MATRIX_SHEET_NAME } from '../schema';
import { readSheetGrid } from './workbook';

/**
 * Load the first sheet of the matrix workbook as a raw grid. No header row is
 * assumed here; the validator treats row 0 as the header.
 */
export async function loadMatrix(filePath: string, logger: Logger): Promise<StageResult<MatrixTable>> {
  return runStageAsync(
    (message, cause) => new InvalidFileFormatError(`Matrix read failed: ${message}`, { cause }),
    async () => {
      const grid = await readSheetGrid(filePath, 0);
      const matrix = MatrixTable.fromGrid(grid);
      logger.info(`${MATRIX_SHEET_NAME} - rows: ${matrix.length}, columns: ${matrix.width}`);
      return matrix;
    }
  );
}
