import type { TransitionRecord } from 'types';

/**
 * Header names expected by downstream targeted-method tools, in column order.
 */
export const TRANSITION_COLUMNS = [
  'Molecule List Name',
  'Molecule',
  'Molecule Formula',
  'Precursor Adduct',
  'Precursor m/z',
  'Precursor Charge',
  'Product Name',
  'Product Formula',
  'Product m/z',
  'Product Charge',
  'Label',
] as const;

export type TransitionColumn = (typeof TRANSITION_COLUMNS)[number];

export type TableRow = Readonly<Record<TransitionColumn, string | number>>;

export interface TableRowOptions {
  decimals?: number; // default 4
  blankMz?: boolean; // leave m/z cells empty so the consumer computes them
}

export function createTransitionRecord(fields: TransitionRecord): TransitionRecord {
  return Object.freeze({ ...fields });
}

function roundTo(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

export function toTableRow(record: TransitionRecord, options: TableRowOptions = {}): TableRow {
  const decimals = options.decimals ?? 4;
  const mz = (value: number) => (options.blankMz ? '' : roundTo(value, decimals));

  return {
    'Molecule List Name': record.moleculeListName,
    Molecule: record.molecule,
    'Molecule Formula': record.moleculeFormula,
    'Precursor Adduct': record.precursorAdduct,
    'Precursor m/z': mz(record.precursorMz),
    'Precursor Charge': record.precursorCharge,
    'Product Name': record.productName,
    'Product Formula': record.productFormula,
    'Product m/z': mz(record.productMz),
    'Product Charge': record.productCharge,
    Label: record.label ?? '',
  };
}

export function toTableRows(records: Iterable<TransitionRecord>, options: TableRowOptions = {}): TableRow[] {
  return Array.from(records, (record) => toTableRow(record, options));
}
