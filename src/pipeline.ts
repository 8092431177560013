/**
 * Picking Pipeline
 *
 * One run turns one matrix workbook into one result workbook:
 * 1. Read and validate the matrix
 * 2. Load the master catalogs
 * 3. Resolve the CM and A-parts reference tables
 * 4. Build the CM picking table (and, on the A line, the A-parts picking and check tables)
 * 5. Assemble the legacy system input lines
 * 6. Save every table to a timestamped workbook
 *
 * Each stage returns a StageResult; the first failure ends the run and is
 * reported in the returned PickingResult rather than thrown.
 */

import type { PickingConfig } from './config';
import { errorMessage, isPickingSystemError, type PickingSystemError } from './errors';
import { loadMasterCatalogs } from './imports/master-catalogs';
import { loadMatrix } from './imports/matrix';
import type { Logger } from './logger';
import { resolveReferenceTables } from './matching/reference-resolver';
import { LegacyRowAssembler, buildLegacySystemSheet } from './output/legacy-system';
import {
  addGridSheet,
  addTableSheet,
  createResultWorkbook,
  generateOutputPath,
  saveWorkbook,
} from './output/result-workbook';
import { buildAPartsPicking, type APartsPicking } from './picking/a-parts-picking';
import { buildCmPicking } from './picking/cm-picking';
import { MATRIX_SHEET_NAME, type MasterCatalogs } from './schema';
import { validateMatrix } from './validation/input-validator';

/**
 * A: CM + A-parts picking. C: CM picking only.
 */
export type ProcessLine = 'A' | 'C';

export const PROCESS_LINES: readonly ProcessLine[] = ['A', 'C'];

export interface PickingResult {
  success: boolean;
  message: string;
  outputFile: string | null;
  cmPickingCount: number;
  aPartsPickingCount: number;
  legacyLineCount: number;
  errors: string[];
  warnings: string[];
  // Seconds
  processingTime: number;
}

export interface PickingRunOptions {
  inputFile: string;
  line?: ProcessLine;
  config: Pick<PickingConfig, 'cmMaster' | 'aPartsMaster' | 'outputDir' | 'outputSuffix'>;
  logger: Logger;
  // Pre-loaded catalogs; read from config when omitted
  catalogs?: MasterCatalogs;
  now?: () => Date;
}

function failure(
  message: string,
  errors: string[],
  warnings: string[],
  startedAt: number,
  now: () => Date
): PickingResult {
  return {
    success: false,
    message,
    outputFile: null,
    cmPickingCount: 0,
    aPartsPickingCount: 0,
    legacyLineCount: 0,
    errors,
    warnings,
    processingTime: (now().getTime() - startedAt) / 1000,
  };
}

export async function runPicking(options: PickingRunOptions): Promise<PickingResult> {
  const { inputFile, config, logger } = options;
  const line = options.line ?? 'A';
  const now = options.now ?? (() => new Date());
  const startedAt = now().getTime();
  let warnings: string[] = [];

  const systemFailure = (error: PickingSystemError): PickingResult => {
    logger.error(`Processing error: ${error.message}`);
    return failure(`Error: ${error.message}`, [error.message], warnings, startedAt, now);
  };

  logger.info('='.repeat(60));
  logger.info('Picking list generation started');
  logger.info(`Input file: ${inputFile}`);
  logger.info(`Process line: ${line}`);
  logger.info('='.repeat(60));

  try {
    // Step 1: Read and validate the matrix
    logger.info('--- Input validation ---');
    const matrixResult = await loadMatrix(inputFile, logger);
    if (!matrixResult.ok) {
      return systemFailure(matrixResult.error);
    }
    const matrix = matrixResult.value;

    const validation = validateMatrix(matrix, inputFile);
    warnings = validation.warnings;
    for (const warning of validation.warnings) {
      logger.warn(warning);
    }
    if (!validation.isValid || !validation.framePartNumber) {
      for (const error of validation.errors) {
        logger.error(error);
      }
      return failure('Input file validation failed', validation.errors, warnings, startedAt, now);
    }
    const framePartNumber = validation.framePartNumber;
    logger.info(`Frame part number: ${framePartNumber}`);

    // Step 2: Master catalogs
    logger.info('--- Master catalogs ---');
    let catalogs = options.catalogs;
    if (!catalogs) {
      const catalogResult = await loadMasterCatalogs(config, logger);
      if (!catalogResult.ok) {
        return systemFailure(catalogResult.error);
      }
      catalogs = catalogResult.value;
    }

    // Step 3: Reference tables
    logger.info('--- Reference tables ---');
    const referenceResult = resolveReferenceTables(matrix, catalogs, logger);
    if (!referenceResult.ok) {
      return systemFailure(referenceResult.error);
    }
    const references = referenceResult.value;

    // Step 4: Picking tables
    logger.info('--- CM picking ---');
    const cmResult = buildCmPicking(matrix, references.cm, logger);
    if (!cmResult.ok) {
      return systemFailure(cmResult.error);
    }
    const cmPicking = cmResult.value;

    let aParts: APartsPicking | null = null;
    if (line === 'A') {
      logger.info('--- A-parts picking ---');
      const aPartsResult = buildAPartsPicking(matrix, references.aParts, logger);
      if (!aPartsResult.ok) {
        return systemFailure(aPartsResult.error);
      }
      aParts = aPartsResult.value;
    }

    const workbook = createResultWorkbook();
    addGridSheet(workbook, MATRIX_SHEET_NAME, matrix.toGrid());
    addTableSheet(workbook, references.cm);
    addTableSheet(workbook, cmPicking);

    if (line === 'A') {
      if (references.aParts.rows.length > 0) addTableSheet(workbook, references.aParts);
      if (aParts && aParts.picking.rows.length > 0) addTableSheet(workbook, aParts.picking);
      if (aParts && aParts.validation.rows.length > 0) addTableSheet(workbook, aParts.validation);
    }

    // Step 5: Legacy system input
    logger.info('--- Legacy system input ---');
    const assembler = new LegacyRowAssembler({
      framePartNumber,
      cmPicking,
      aPartsPicking: aParts ? aParts.picking : null,
      matrix,
      now: now(),
    });
    const legacyResult = buildLegacySystemSheet(assembler, workbook, logger);
    if (!legacyResult.ok) {
      return systemFailure(legacyResult.error);
    }

    // Step 6: Save
    const outputPath = generateOutputPath(inputFile, config.outputDir, config.outputSuffix, now());
    const saveResult = await saveWorkbook(workbook, outputPath, logger);
    if (!saveResult.ok) {
      return systemFailure(saveResult.error);
    }

    const processingTime = (now().getTime() - startedAt) / 1000;

    logger.info('='.repeat(60));
    logger.info('Picking list generation complete');
    logger.info(`Output file: ${saveResult.value}`);
    logger.info(`Processing time: ${processingTime.toFixed(2)}s`);
    logger.info('='.repeat(60));

    return {
      success: true,
      message: 'Processing completed successfully',
      outputFile: saveResult.value,
      cmPickingCount: cmPicking.rows.length,
      aPartsPickingCount: aParts ? aParts.picking.rows.length : 0,
      legacyLineCount: legacyResult.value.rows.length,
      errors: [],
      warnings,
      processingTime,
    };
  } catch (error) {
    if (isPickingSystemError(error)) {
      return systemFailure(error);
    }
    logger.error(`Unexpected error: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return failure(`Unexpected error: ${errorMessage(error)}`, [errorMessage(error)], warnings, startedAt, now);
  }
}
