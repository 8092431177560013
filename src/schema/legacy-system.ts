import { defineTable } from './_table';

/**
 * Legacy order-entry import format: one line per picked part,
 * CM lines first, then A-parts lines.
 */
export interface LegacySystemRow {
  documentNumber: string;
  lineNumber: number;
  partNumber: string;
  quantity: number;
  unit: string;
  deliveryDate: string;
  remarks: string;
}

export const legacySystemTable = defineTable<LegacySystemRow>('Legacy System Input', {
  documentNumber: 'Document No',
  lineNumber: 'Line No',
  partNumber: 'Part Number',
  quantity: 'Quantity',
  unit: 'Unit',
  deliveryDate: 'Delivery Date',
  remarks: 'Remarks',
});

// Display widths, in legacySystemTable column order
export const LEGACY_COLUMN_WIDTHS: Readonly<Record<keyof LegacySystemRow, number>> = {
  documentNumber: 15,
  lineNumber: 8,
  partNumber: 20,
  quantity: 8,
  unit: 6,
  deliveryDate: 12,
  remarks: 30,
};

export const LEGACY_UNIT_LABEL = 'pcs';
export const LEGACY_DOCUMENT_SEQUENCE = '001';
export const DELIVERY_LEAD_DAYS = 7;
