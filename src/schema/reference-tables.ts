import { defineTable, type Table } from './_table';

/**
 * Reference tables - matrix rows joined to their master catalog entry.
 *
 * `no` is 1-based and gap-free within each table; rows dropped during
 * resolution never take a number.
 */

export interface CmReferenceRow {
  no: number;
  startPart: string;
  factory: string;
  partNumber: string;
  partName: string;
  spec: string;
  boxCode: string;
  boxName: string;
  storageLocation: string;
}

export interface APartsReferenceRow {
  no: number;
  startPart: string;
  factory: string;
  partNumber: string;
  partName: string;
  storageLocation: string;
  rack: string;
  quantityPerBox: number;
}

export const cmReferenceTable = defineTable<CmReferenceRow>('CM Picking Reference', {
  no: 'No',
  startPart: 'Start Part',
  factory: 'Factory',
  partNumber: 'Part Number',
  partName: 'Part Name',
  spec: 'Spec',
  boxCode: 'Box Code',
  boxName: 'Box Name',
  storageLocation: 'Storage Location',
});

export const aPartsReferenceTable = defineTable<APartsReferenceRow>('A-Parts Picking Reference', {
  no: 'No',
  startPart: 'Start Part',
  factory: 'Factory',
  partNumber: 'Part Number',
  partName: 'Part Name',
  storageLocation: 'Storage Location',
  rack: 'Rack',
  quantityPerBox: 'Qty per Box',
});

export type CmReferenceTable = Table<CmReferenceRow>;
export type APartsReferenceTable = Table<APartsReferenceRow>;

export interface ReferenceTables {
  cm: CmReferenceTable;
  aParts: APartsReferenceTable;
}
