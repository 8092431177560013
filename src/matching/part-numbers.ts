/**
 * Part number screening and classification
 *
 * All patterns are case-insensitive prefix matches. Classification order
 * matters: CM patterns are tried before A-parts patterns.
 */

export type PartType = 'CM' | 'A_PARTS' | 'FRAME' | 'OTHER';

export const CM_PART_PATTERNS: readonly RegExp[] = [/^CM\d{6}/i, /^C-\d{6}/i];

export const A_PARTS_PATTERNS: readonly RegExp[] = [/^A\d{6}/i, /^AP-\d{6}/i];

export const FRAME_PATTERN = /^FRAME/i;

export const EXCLUDE_PART_PATTERNS: readonly RegExp[] = [FRAME_PATTERN, /^SET/i, /^KIT/i];

export const PART_NUMBER_MIN_LENGTH = 6;
export const PART_NUMBER_MAX_LENGTH = 20;

/**
 * Whether a matrix part number should be considered at all.
 * The length screen runs before any pattern is looked at.
 */
export function isValidPartNumber(partNumber: string | null | undefined): boolean {
  if (!partNumber) return false;

  const trimmed = partNumber.trim();
  if (!trimmed) return false;

  if (trimmed.length < PART_NUMBER_MIN_LENGTH || trimmed.length > PART_NUMBER_MAX_LENGTH) {
    return false;
  }

  return !EXCLUDE_PART_PATTERNS.some((pattern) => pattern.test(trimmed));
}

export function identifyPartType(partNumber: string | null | undefined): PartType {
  if (!partNumber) return 'OTHER';

  const trimmed = partNumber.trim();

  if (CM_PART_PATTERNS.some((pattern) => pattern.test(trimmed))) return 'CM';
  if (A_PARTS_PATTERNS.some((pattern) => pattern.test(trimmed))) return 'A_PARTS';
  if (FRAME_PATTERN.test(trimmed)) return 'FRAME';

  return 'OTHER';
}

export type PartTypeBreakdown = Record<PartType | 'EXCLUDED', number>;

/**
 * Count part numbers per classification. Frame numbers are counted as FRAME
 * even though screening excludes them; everything else that fails screening
 * (blank, wrong length, SET/KIT) is EXCLUDED.
 */
export function classifyPartNumbers(partNumbers: Iterable<string>): PartTypeBreakdown {
  const counts: PartTypeBreakdown = { CM: 0, A_PARTS: 0, FRAME: 0, OTHER: 0, EXCLUDED: 0 };
  for (const partNumber of partNumbers) {
    const trimmed = partNumber.trim();
    if (FRAME_PATTERN.test(trimmed)) {
      counts.FRAME++;
    } else if (!isValidPartNumber(trimmed)) {
      counts.EXCLUDED++;
    } else {
      counts[identifyPartType(trimmed)]++;
    }
  }
  return counts;
}
