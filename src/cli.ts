import { PROCESS_LINES, type PickingResult, type ProcessLine } from './pipeline';

export const USAGE = `Usage:
  npx tsx scripts/generate-picking.ts <matrix.xlsx>            # CM + A-parts picking
  npx tsx scripts/generate-picking.ts <matrix.xlsx> --line C   # CM picking only`;

export interface CliArgs {
  inputFile: string;
  line: ProcessLine;
}

export type CliParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

function isProcessLine(value: string): value is ProcessLine {
  return PROCESS_LINES.some((line) => line === value);
}

/**
 * Parse `<input> [--line A|C]` (also `--line=C`). The line defaults to A.
 */
export function parseCliArgs(argv: readonly string[]): CliParseResult {
  let inputFile: string | null = null;
  let lineValue = 'A';

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--line') {
      const next = argv[i + 1];
      if (next === undefined) {
        return { ok: false, error: '--line needs a value (A or C)' };
      }
      lineValue = next;
      i++;
    } else if (arg.startsWith('--line=')) {
      lineValue = arg.slice('--line='.length);
    } else if (arg.startsWith('--')) {
      return { ok: false, error: `Unknown option: ${arg}` };
    } else if (inputFile === null) {
      inputFile = arg;
    } else {
      return { ok: false, error: `Unexpected argument: ${arg}` };
    }
  }

  const line = lineValue.toUpperCase();
  if (!isProcessLine(line)) {
    return { ok: false, error: `Invalid --line value '${lineValue}' (expected A or C)` };
  }
  if (!inputFile) {
    return { ok: false, error: 'Input file is required' };
  }

  return { ok: true, args: { inputFile, line } };
}

/**
 * Console summary printed after a run
 */
export function formatSummary(result: PickingResult): string[] {
  const lines = ['='.repeat(60)];

  if (result.success) {
    lines.push('Picking Lists Generated');
    lines.push('='.repeat(60));
    lines.push(`  Output file:       ${result.outputFile ?? '-'}`);
    lines.push(`  CM picking rows:   ${result.cmPickingCount}`);
    if (result.aPartsPickingCount > 0) {
      lines.push(`  A-parts rows:      ${result.aPartsPickingCount}`);
    }
    lines.push(`  Legacy lines:      ${result.legacyLineCount}`);
    lines.push(`  Processing time:   ${result.processingTime.toFixed(2)}s`);
  } else {
    lines.push('Picking Generation Failed');
    lines.push('='.repeat(60));
    lines.push(`  ${result.message}`);
    for (const error of result.errors) {
      lines.push(`  - ${error}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push('  Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  - ${warning}`);
    }
  }

  return lines;
}
