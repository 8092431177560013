import { vi } from 'vitest';
import type { Logger } from '../src/logger';
import {
  MasterCatalog,
  MatrixTable,
  type APartsCatalogEntry,
  type Cell,
  type CmCatalogEntry,
  type MasterCatalogs,
} from '../src/schema';

export const MATRIX_HEADER: Cell[] = [
  'No',
  'start part',
  'factory',
  'maker',
  'part number',
  'part name',
  'spec',
  'color (out)',
  'color (in)',
  'quantity',
  'unit',
  'option 1',
  'option 2',
];

export interface MatrixLine {
  no?: number;
  startPart?: string;
  factory?: string;
  partNumber: string;
  partName?: string;
  spec?: string;
  quantity?: Cell;
  unit?: string;
  options?: Cell[];
}

export function matrixRow(line: MatrixLine): Cell[] {
  return [
    line.no ?? null,
    line.startPart ?? 'ST-01',
    line.factory ?? 'F1',
    null,
    line.partNumber,
    line.partName ?? `${line.partNumber} name`,
    line.spec ?? '',
    null,
    null,
    line.quantity ?? 1,
    line.unit ?? 'pc',
    ...(line.options ?? []),
  ];
}

export function matrixGrid(lines: MatrixLine[]): Cell[][] {
  return [MATRIX_HEADER, ...lines.map((line, index) => matrixRow({ no: index + 1, ...line }))];
}

export function buildMatrix(lines: MatrixLine[]): MatrixTable {
  return MatrixTable.fromGrid(matrixGrid(lines));
}

export function buildCatalogs(
  cmEntries: CmCatalogEntry[] = [],
  aPartsEntries: APartsCatalogEntry[] = []
): MasterCatalogs {
  return {
    cm: new MasterCatalog('CM master', cmEntries),
    aParts: new MasterCatalog('A-parts master', aPartsEntries),
  };
}

export function cmEntry(partNumber: string, overrides: Partial<CmCatalogEntry> = {}): CmCatalogEntry {
  return {
    partNumber,
    boxCode: `BX-${partNumber.slice(-3)}`,
    boxName: 'Small box',
    storageLocation: 'W1',
    ...overrides,
  };
}

export function aPartsEntry(partNumber: string, overrides: Partial<APartsCatalogEntry> = {}): APartsCatalogEntry {
  return {
    partNumber,
    partName: 'Catalog name',
    storageLocation: 'W2',
    rack: 'R-01',
    quantityPerBox: 10,
    ...overrides,
  };
}

export function createTestLogger() {
  const logger = {
    debug: vi.fn<[string], void>(),
    info: vi.fn<[string], void>(),
    warn: vi.fn<[string], void>(),
    error: vi.fn<[string], void>(),
  } satisfies Logger;

  const messages = (level: keyof Logger): string[] => logger[level].mock.calls.map(([message]) => message);

  return { logger, messages };
}
