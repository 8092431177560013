import { basename, extname } from 'path';
import { REQUIRED_HEADERS, type MatrixTable } from '../schema';

export interface InputValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  framePartNumber: string | null;
}

// Characters compared between the input file name and the frame part number
const FILE_NAME_PREFIX_LENGTH = 10;

/**
 * Check the matrix header row and shape, then read the frame part number.
 *
 * Every mismatched or missing header cell is reported, not just the first.
 * A file name that doesn't start like the frame part number is only a warning.
 */
export function validateMatrix(matrix: MatrixTable, inputFile: string): InputValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (matrix.length < 2) {
    errors.push('Matrix has no data rows');
    return { isValid: false, errors, warnings, framePartNumber: null };
  }

  const header = matrix.rows[0];
  for (const { index, label } of REQUIRED_HEADERS) {
    if (index >= matrix.width) {
      errors.push(`Column ${index + 1} is missing`);
      continue;
    }

    const actual = header.text(index);
    if (actual !== label) {
      errors.push(`Column ${index + 1} header is invalid (expected: '${label}', actual: '${actual}')`);
    }
  }

  if (errors.length > 0) {
    return { isValid: false, errors, warnings, framePartNumber: null };
  }

  const framePartNumber = matrix.rows[1].partNumber;
  if (!framePartNumber) {
    errors.push('Frame part number is empty');
    return { isValid: false, errors, warnings, framePartNumber: null };
  }

  const fileStem = basename(inputFile, extname(inputFile));
  const filePrefix = fileStem.slice(0, FILE_NAME_PREFIX_LENGTH);
  const framePrefix = framePartNumber.slice(0, FILE_NAME_PREFIX_LENGTH);

  if (filePrefix !== framePrefix) {
    warnings.push(
      `File name does not match frame part number (file: '${filePrefix}', frame: '${framePrefix}')`
    );
  }

  return { isValid: true, errors, warnings, framePartNumber };
}
