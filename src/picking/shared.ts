import { cellText, type Cell } from '../schema';

// Cell values that mean "no option" in the matrix option columns
export const OPTION_PLACEHOLDERS: readonly string[] = ['', '-', 'nan'];

export const OPTION_SEPARATOR = ' / ';

/**
 * Non-empty, non-placeholder option values, in column order
 */
export function extractOptions(cells: readonly Cell[]): string[] {
  const options: string[] = [];
  for (const cell of cells) {
    const value = cellText(cell);
    if (value && !OPTION_PLACEHOLDERS.includes(value)) {
      options.push(value);
    }
  }
  return options;
}

export function formatOptions(options: readonly string[]): string {
  return options.join(OPTION_SEPARATOR);
}

/**
 * Whole boxes needed to cover `quantity`. A non-positive box size yields 0.
 */
export function calculateRequiredBoxes(quantity: number, quantityPerBox: number): number {
  if (quantityPerBox <= 0) return 0;
  const boxes = Math.ceil(quantity / quantityPerBox);
  // Math.ceil(-0.6) is -0
  return boxes === 0 ? 0 : boxes;
}
