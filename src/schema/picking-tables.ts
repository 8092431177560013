import { defineTable, type Table } from './_table';

/**
 * CM Picking - one line per CM part to pick, with the matrix quantity and
 * the row's options flattened to a single string
 */
export interface CmPickingRow {
  no: number;
  startPart: string;
  factory: string;
  partNumber: string;
  partName: string;
  spec: string;
  quantity: number;
  boxCode: string;
  boxName: string;
  storageLocation: string;
  options: string;
}

export const cmPickingTable = defineTable<CmPickingRow>('CM Picking', {
  no: 'No',
  startPart: 'Start Part',
  factory: 'Factory',
  partNumber: 'Part Number',
  partName: 'Part Name',
  spec: 'Spec',
  quantity: 'Quantity',
  boxCode: 'Box Code',
  boxName: 'Box Name',
  storageLocation: 'Storage Location',
  options: 'Options',
});

/**
 * A-Parts Picking - picked by whole boxes, so each line carries the
 * box size and the number of boxes needed to cover the quantity
 */
export interface APartsPickingRow {
  no: number;
  startPart: string;
  factory: string;
  partNumber: string;
  partName: string;
  quantity: number;
  storageLocation: string;
  rack: string;
  quantityPerBox: number;
  requiredBoxes: number;
  options: string;
}

export const aPartsPickingTable = defineTable<APartsPickingRow>('A-Parts Picking', {
  no: 'No',
  startPart: 'Start Part',
  factory: 'Factory',
  partNumber: 'Part Number',
  partName: 'Part Name',
  quantity: 'Quantity',
  storageLocation: 'Storage Location',
  rack: 'Rack',
  quantityPerBox: 'Qty per Box',
  requiredBoxes: 'Required Boxes',
  options: 'Options',
});

export type PickingVerdict = 'OK' | 'NG';

/**
 * A-Parts quantity check, index-aligned with the A-Parts Picking table.
 * `difference` is boxed quantity minus required quantity; negative means short.
 */
export interface APartsValidationRow {
  no: number;
  partNumber: string;
  requiredQuantity: number;
  quantityPerBox: number;
  requiredBoxes: number;
  boxedQuantity: number;
  difference: number;
  verdict: PickingVerdict;
}

export const aPartsValidationTable = defineTable<APartsValidationRow>('A-Parts Picking Check', {
  no: 'No',
  partNumber: 'Part Number',
  requiredQuantity: 'Required Qty',
  quantityPerBox: 'Qty per Box',
  requiredBoxes: 'Required Boxes',
  boxedQuantity: 'Boxed Qty',
  difference: 'Surplus/Deficit',
  verdict: 'Verdict',
});

export type CmPickingTable = Table<CmPickingRow>;
export type APartsPickingTable = Table<APartsPickingRow>;
export type APartsValidationTable = Table<APartsValidationRow>;
