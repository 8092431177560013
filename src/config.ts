import { join } from 'path';
import { z } from 'zod';
import type { LogLevel } from './logger';

/**
 * Runtime configuration, read from the environment (populated from .env by
 * the CLI through dotenv). Layout conventions that are part of the matrix
 * contract live in src/schema, not here.
 */
export interface PickingConfig {
  dataDir: string;
  cmMaster: { file: string; sheet: string };
  aPartsMaster: { file: string; sheet: string };
  outputDir: string;
  outputSuffix: string;
  logLevel: LogLevel;
  logFile: string | null;
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((val) => (val === '' ? undefined : val));

const envSchema = z.object({
  PICKING_DATA_DIR: optionalString,
  CM_MASTER_FILE: optionalString,
  CM_MASTER_SHEET: optionalString,
  A_PARTS_MASTER_FILE: optionalString,
  A_PARTS_MASTER_SHEET: optionalString,
  PICKING_OUTPUT_DIR: optionalString,
  PICKING_OUTPUT_SUFFIX: optionalString,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  LOG_FILE: optionalString,
});

export const DEFAULT_CM_MASTER_SHEET = 'CM Master';
export const DEFAULT_A_PARTS_MASTER_SHEET = 'A-Parts Master';
export const DEFAULT_OUTPUT_SUFFIX = 'result';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PickingConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid picking configuration - ${issues}`);
  }

  const vars = parsed.data;
  const dataDir = vars.PICKING_DATA_DIR ?? './data';

  return {
    dataDir,
    cmMaster: {
      file: vars.CM_MASTER_FILE ?? join(dataDir, 'master', 'cm-master.xlsx'),
      sheet: vars.CM_MASTER_SHEET ?? DEFAULT_CM_MASTER_SHEET,
    },
    aPartsMaster: {
      file: vars.A_PARTS_MASTER_FILE ?? join(dataDir, 'master', 'a-parts-master.xlsx'),
      sheet: vars.A_PARTS_MASTER_SHEET ?? DEFAULT_A_PARTS_MASTER_SHEET,
    },
    outputDir: vars.PICKING_OUTPUT_DIR ?? join(dataDir, 'output'),
    outputSuffix: vars.PICKING_OUTPUT_SUFFIX ?? DEFAULT_OUTPUT_SUFFIX,
    logLevel: vars.LOG_LEVEL,
    logFile: vars.LOG_FILE ?? null,
  };
}
