/**
 * picking-list-generator - matrix BOM to picking lists and legacy order entry
 */

export { runPicking, PROCESS_LINES } from './pipeline';
export type { PickingResult, PickingRunOptions, ProcessLine } from './pipeline';
export { loadConfig } from './config';
export type { PickingConfig } from './config';
export { createConsoleLogger, silentLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export * from './errors';
export * from './schema';

// Stages, for callers that run them one at a time
export { loadMatrix } from './imports/matrix';
export { loadMasterCatalogs, parseCmCatalog, parseAPartsCatalog } from './imports/master-catalogs';
export { validateMatrix } from './validation/input-validator';
export type { InputValidation } from './validation/input-validator';
export { identifyPartType, isValidPartNumber, classifyPartNumbers } from './matching/part-numbers';
export type { PartType } from './matching/part-numbers';
export { resolveReferenceTables } from './matching/reference-resolver';
export { buildCmPicking } from './picking/cm-picking';
export { buildAPartsPicking } from './picking/a-parts-picking';
export type { APartsPicking } from './picking/a-parts-picking';
export { LegacyRowAssembler, buildLegacySystemSheet } from './output/legacy-system';
export type { LegacySystemTable } from './output/legacy-system';
